/**
 * @blockpaint/raster — Cells to 24-bit ANSI text.
 *
 * Color escapes are emitted only when the active color changes, and every
 * row ends with a reset so that a truncated or interleaved stream never
 * leaks color into the next line.
 */

import { bgRgb, quoteEscapes, reset, rgb } from "@blockpaint/ui/ansi";
import type { Cell, Rgb } from "./types.js";

export interface SerializeOptions {
	/** Write ESC as the literal text `\x1b`. */
	raw?: boolean;
}

function sameColor(a: Rgb | null, b: Rgb | null): boolean {
	if (a === null || b === null) return a === b;
	return a.r === b.r && a.g === b.g && a.b === b.b;
}

function serializeRow(row: readonly Cell[]): string {
	// null = the terminal's default
	let fg: Rgb | null = null;
	let bg: Rgb | null = null;
	let out = "";

	for (const cell of row) {
		if (cell.bg === null && bg !== null) {
			out += reset;
			fg = null;
			bg = null;
		}
		if (cell.fg !== null && !sameColor(cell.fg, fg)) {
			out += rgb(cell.fg.r, cell.fg.g, cell.fg.b);
			fg = cell.fg;
		}
		if (cell.bg !== null && !sameColor(cell.bg, bg)) {
			out += bgRgb(cell.bg.r, cell.bg.g, cell.bg.b);
			bg = cell.bg;
		}
		out += cell.glyph;
	}

	return `${out}${reset}\n`;
}

/**
 * Serialize a cell grid, one line per row.
 *
 * @example
 * ```ts
 * serializeCells([[{ glyph: "▀", fg: { r: 255, g: 0, b: 0 }, bg: { r: 0, g: 0, b: 255 } }]]);
 * // "\x1b[38;2;255;0;0m\x1b[48;2;0;0;255m▀\x1b[0m\n"
 * ```
 */
export function serializeCells(cells: readonly (readonly Cell[])[], options: SerializeOptions = {}): string {
	const text = cells.map(serializeRow).join("");
	return options.raw ? quoteEscapes(text) : text;
}
