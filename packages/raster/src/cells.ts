/**
 * @blockpaint/raster — Glyph and color selection per cell.
 */

import { luma } from "./pixel-buffer.js";
import type { Cell, Rgb, SampleGrid } from "./types.js";

export const UPPER_HALF = "▀";
export const LOWER_HALF = "▄";
export const FULL_BLOCK = "█";

/** Empty to full, by perceived brightness. */
export const SHADE_RAMP = [" ", "░", "▒", "▓", FULL_BLOCK] as const;

const EMPTY: Cell = { glyph: " ", fg: null, bg: null };

export interface ComposeOptions {
	/** Block mode only. */
	shade?: boolean;
}

/**
 * Shade glyph for a color: luma is gamma-lifted (`^(1/2.2)`) before being
 * rounded onto the ramp, so mid-grays land on ▒ rather than ░.
 */
export function shadeGlyph(color: Rgb): string {
	const perceptual = Math.pow(luma(color.r, color.g, color.b) / 255, 1 / 2.2);
	const max = SHADE_RAMP.length - 1;
	return SHADE_RAMP[Math.min(max, Math.round(perceptual * max))];
}

function halfBlockCell(upper: Rgb | null, lower: Rgb | null): Cell {
	if (upper && lower) return { glyph: UPPER_HALF, fg: upper, bg: lower };
	if (upper) return { glyph: UPPER_HALF, fg: upper, bg: null };
	if (lower) return { glyph: LOWER_HALF, fg: lower, bg: null };
	return EMPTY;
}

function blockCell(color: Rgb | null, shade: boolean): Cell {
	if (!color) return EMPTY;
	return { glyph: shade ? shadeGlyph(color) : FULL_BLOCK, fg: color, bg: null };
}

/**
 * Turn a sample grid into `rows × cols` cells.
 *
 * Half-block cells draw the upper sample as the ▀ foreground and the lower one
 * as its background. When only one half is visible the other must show the
 * terminal background, so the cell carries no bg and the glyph covers just
 * the visible half.
 */
export function composeCells(grid: SampleGrid, options: ComposeOptions = {}): Cell[][] {
	const shade = options.shade ?? false;
	const cells: Cell[][] = [];
	for (let row = 0; row < grid.rows; row++) {
		const line: Cell[] = [];
		for (let col = 0; col < grid.cols; col++) {
			line.push(
				grid.mode === "halfblock"
					? halfBlockCell(grid.samples[row * 2][col], grid.samples[row * 2 + 1][col])
					: blockCell(grid.samples[row][col], shade),
			);
		}
		cells.push(line);
	}
	return cells;
}
