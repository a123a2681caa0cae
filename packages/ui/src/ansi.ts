/**
 * @blockpaint/ui — ANSI escape code utilities for terminal rendering.
 *
 * The SGR primitives the renderer needs: 24-bit colors, reset, and quoting
 * escape-coded text for raw output.
 */

/** Control Sequence Introducer. */
const CSI = "\x1b[";

// ─── Reset ──────────────────────────────────────────────────────────────────

/** ANSI reset escape sequence -- clears all styles. */
export const reset = `${CSI}0m`;

// ─── True-Color Functions ───────────────────────────────────────────────────

/**
 * Set foreground to true-color RGB.
 * @param r - Red channel (0-255).
 * @param g - Green channel (0-255).
 * @param b - Blue channel (0-255).
 * @returns ANSI escape sequence string.
 */
export function rgb(r: number, g: number, b: number): string {
	return `${CSI}38;2;${r};${g};${b}m`;
}

/**
 * Set background to true-color RGB.
 * @param r - Red channel (0-255).
 * @param g - Green channel (0-255).
 * @param b - Blue channel (0-255).
 * @returns ANSI escape sequence string.
 */
export function bgRgb(r: number, g: number, b: number): string {
	return `${CSI}48;2;${r};${g};${b}m`;
}

// ─── Quoting ────────────────────────────────────────────────────────────────

/**
 * Replace every ESC byte with the four printable characters `\x1b`, so the
 * output can be pasted into `echo -e`, `printf` or a source string literal.
 */
export function quoteEscapes(s: string): string {
	return s.replaceAll("\x1b", "\\x1b");
}
