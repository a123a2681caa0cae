/**
 * @blockpaint/raster — Grid sizing and box-filter resampling.
 *
 * Terminal cells are roughly twice as tall as they are wide, so an image
 * W×H pixels wide maps to `cols × round(cols · H/W · k)` cells, where `k` is
 * the aspect correction (0.5 by default). In half-block mode each cell holds
 * two vertically stacked samples, giving square-ish sub-cells.
 */

import { InvalidDimensionsError, createLogger } from "@blockpaint/core";
import type { ResampleFilter } from "@blockpaint/core";
import type { PixelBuffer } from "./pixel-buffer.js";
import type { GridSize, ImageSize, RenderMode, Rgb, SampleGrid } from "./types.js";

const log = createLogger("raster:resampler");

/** Height/width ratio of a terminal cell, inverted: cells are ~2× taller than wide. */
export const DEFAULT_ASPECT_CORRECTION = 0.5;

/** Averaged alpha below this renders as transparent. */
export const DEFAULT_ALPHA_THRESHOLD = 128;

/** Used when neither a size nor bounds are given. */
export const DEFAULT_BOUNDS: Readonly<GridSize> = { cols: 80, rows: 24 };

// ─── Sizing ─────────────────────────────────────────────────────────────────

export interface SizeRequest {
	/** Columns. */
	width?: number;
	/** Cell rows. */
	height?: number;
}

export interface SizeOptions {
	aspectCorrection?: number;
	/** Box to fit into when the request names neither dimension. */
	bounds?: GridSize;
}

function isPositiveInteger(n: number): boolean {
	return Number.isInteger(n) && n > 0;
}

function checkRequested(value: number | undefined, request: SizeRequest): void {
	if (value !== undefined && !isPositiveInteger(value)) {
		throw new InvalidDimensionsError(
			`Output size must be a positive integer, got ${value}`,
			request.width ?? 0,
			request.height ?? 0,
		);
	}
}

function checkAspect(k: number): void {
	if (!Number.isFinite(k) || k <= 0) {
		throw new InvalidDimensionsError(`Aspect correction must be a positive number, got ${k}`, 0, 0);
	}
}

/**
 * Largest grid inside `bounds` that keeps the image's aspect ratio.
 * Bounds below one cell are treated as one cell.
 */
export function fitToBounds(source: ImageSize, bounds: GridSize, aspectCorrection = DEFAULT_ASPECT_CORRECTION): GridSize {
	checkAspect(aspectCorrection);
	const maxCols = Math.max(1, Math.floor(bounds.cols));
	const maxRows = Math.max(1, Math.floor(bounds.rows));
	const ratio = (source.height / source.width) * aspectCorrection;
	const cols = Math.max(1, Math.min(maxCols, Math.floor(maxRows / ratio)));
	const rows = Math.max(1, Math.min(maxRows, Math.round(cols * ratio)));
	return { cols, rows };
}

/**
 * Decide the output grid for an image.
 *
 * - both dimensions given: used as is, aspect ignored
 * - one given: the other follows the image's aspect ratio
 * - neither: {@link fitToBounds}
 *
 * @throws {InvalidDimensionsError} If a requested dimension is not a positive integer.
 *
 * @example
 * ```ts
 * resolveGridSize({ width: 200, height: 100 }, { width: 40 }); // { cols: 40, rows: 10 }
 * ```
 */
export function resolveGridSize(source: ImageSize, request: SizeRequest, options: SizeOptions = {}): GridSize {
	checkRequested(request.width, request);
	checkRequested(request.height, request);
	const k = options.aspectCorrection ?? DEFAULT_ASPECT_CORRECTION;
	checkAspect(k);

	const { width, height } = request;
	if (width !== undefined && height !== undefined) {
		return { cols: width, rows: height };
	}
	if (width !== undefined) {
		return { cols: width, rows: Math.max(1, Math.round(width * (source.height / source.width) * k)) };
	}
	if (height !== undefined) {
		return { cols: Math.max(1, Math.round((height * (source.width / source.height)) / k)), rows: height };
	}
	return fitToBounds(source, options.bounds ?? DEFAULT_BOUNDS, k);
}

// ─── Resampling ─────────────────────────────────────────────────────────────

export interface ResampleOptions {
	mode: RenderMode;
	filter?: ResampleFilter;
	alphaThreshold?: number;
}

/** Index of the source pixel under the center of slot `i` of `slots`. */
function center(i: number, extent: number, slots: number): number {
	return Math.min(extent - 1, Math.floor(((i + 0.5) * extent) / slots));
}

/**
 * Reduce `buffer` to one color per sample slot.
 *
 * Box filter: each slot averages every source pixel in its region, each
 * channel rounded. A region that rounds to zero pixels (upscaling) takes the
 * pixel under its center, as does every slot with `filter: "nearest"`.
 *
 * @throws {InvalidDimensionsError} If the grid is not positive integers.
 */
export function resample(buffer: PixelBuffer, grid: GridSize, options: ResampleOptions): SampleGrid {
	const { cols, rows } = grid;
	if (!isPositiveInteger(cols) || !isPositiveInteger(rows)) {
		throw new InvalidDimensionsError(`Grid size must be positive integers, got ${cols}x${rows}`, cols, rows);
	}
	const threshold = options.alphaThreshold ?? DEFAULT_ALPHA_THRESHOLD;
	const nearest = options.filter === "nearest";
	const subRows = options.mode === "halfblock" ? rows * 2 : rows;
	const { width: W, height: H, data } = buffer;

	const samples: (Rgb | null)[][] = [];
	for (let sy = 0; sy < subRows; sy++) {
		const line: (Rgb | null)[] = [];
		const y0 = Math.floor((sy * H) / subRows);
		const y1 = Math.floor(((sy + 1) * H) / subRows);

		for (let cx = 0; cx < cols; cx++) {
			const x0 = Math.floor((cx * W) / cols);
			const x1 = Math.floor(((cx + 1) * W) / cols);

			let r = 0;
			let g = 0;
			let b = 0;
			let a = 0;
			let n = 0;
			if (nearest || x1 <= x0 || y1 <= y0) {
				const i = (center(sy, H, subRows) * W + center(cx, W, cols)) * 4;
				r = data[i];
				g = data[i + 1];
				b = data[i + 2];
				a = data[i + 3];
				n = 1;
			} else {
				for (let y = y0; y < y1; y++) {
					for (let x = x0; x < x1; x++) {
						const i = (y * W + x) * 4;
						r += data[i];
						g += data[i + 1];
						b += data[i + 2];
						a += data[i + 3];
						n++;
					}
				}
			}

			line.push(
				Math.round(a / n) < threshold
					? null
					: { r: Math.round(r / n), g: Math.round(g / n), b: Math.round(b / n) },
			);
		}
		samples.push(line);
	}

	log.debug("Resampled", { from: `${W}x${H}`, to: `${cols}x${rows}`, mode: options.mode, filter: nearest ? "nearest" : "box" });
	return { mode: options.mode, cols, rows, samples };
}
