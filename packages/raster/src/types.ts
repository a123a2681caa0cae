/**
 * @blockpaint/raster — Types shared by the conversion pipeline.
 */

import type { ResampleFilter } from "@blockpaint/core";

// ─── Image Formats ──────────────────────────────────────────────────────────

export type ImageFormat = "png" | "jpeg" | "gif" | "webp" | "bmp" | "unknown";

// ─── Colors ─────────────────────────────────────────────────────────────────

/** 8-bit sRGB color. */
export interface Rgb {
	readonly r: number;
	readonly g: number;
	readonly b: number;
}

export interface Rgba extends Rgb {
	readonly a: number;
}

/** CIELAB (D65) coordinates. Only ever compared, never rendered. */
export interface LabColor {
	readonly l: number;
	readonly a: number;
	readonly b: number;
}

// ─── Grid ───────────────────────────────────────────────────────────────────

export interface GridSize {
	cols: number;
	rows: number;
}

export interface ImageSize {
	width: number;
	height: number;
}

/**
 * `halfblock` packs two stacked samples into each cell (▀ with fg/bg);
 * `block` gives each cell a single sample.
 */
export type RenderMode = "halfblock" | "block";

/**
 * Resampled colors before glyph selection. `samples` has `rows` lines in block
 * mode and `2 * rows` in half-block mode (upper sub-row, then lower sub-row,
 * for each cell row). `null` marks a transparent sample.
 */
export interface SampleGrid {
	readonly mode: RenderMode;
	readonly cols: number;
	readonly rows: number;
	readonly samples: ReadonlyArray<ReadonlyArray<Rgb | null>>;
}

/**
 * One output character. A null `fg` means the glyph paints nothing; a null
 * `bg` means the terminal's default background must show through.
 */
export interface Cell {
	readonly glyph: string;
	readonly fg: Rgb | null;
	readonly bg: Rgb | null;
}

// ─── Conversion ─────────────────────────────────────────────────────────────

export interface ConversionConfig {
	/** Target grid in character cells. */
	size: GridSize;
	/** Full-block cells instead of half-block cells. */
	useBlocks: boolean;
	/** CIE76 distance under which colors merge. 0 disables quantization. */
	colorTolerance: number;
	/** Desaturate before resampling. */
	bw: boolean;
	/** Averaged alpha below this renders transparent. Default 128. */
	alphaThreshold?: number;
	/** Default "box". */
	filter?: ResampleFilter;
	/** Emit `\x1b` as literal text instead of the ESC byte. */
	raw?: boolean;
	/** Block mode only: pick ` ░▒▓█` by brightness instead of always `█`. */
	shade?: boolean;
}
