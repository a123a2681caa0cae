/**
 * @blockpaint/raster — The image → ANSI pipeline.
 *
 * grayscale (optional) → resample → quantize (optional) → cells → text.
 * Everything is validated up front; a failure produces no output at all.
 */

import { InvalidDimensionsError, assertValid, createLogger, v } from "@blockpaint/core";
import type { ResampleFilter } from "@blockpaint/core";
import { composeCells } from "./cells.js";
import type { PixelBuffer } from "./pixel-buffer.js";
import { quantizeGrid } from "./quantizer.js";
import { DEFAULT_ALPHA_THRESHOLD, resample } from "./resampler.js";
import { serializeCells } from "./serializer.js";
import type { ConversionConfig } from "./types.js";

const log = createLogger("raster:convert");

const optionsSchema = v.object({
	useBlocks: v.boolean(),
	// ≤ 0 or NaN leaves colours unquantized
	colorTolerance: v.number().allowNaN(),
	bw: v.boolean(),
	alphaThreshold: v.optional(v.number().integer().between(0, 255)),
	filter: v.optional(v.oneOf<ResampleFilter>("box", "nearest")),
	raw: v.optional(v.boolean()),
	shade: v.optional(v.boolean()),
});

function checkSize(config: ConversionConfig): void {
	const { cols, rows } = config.size;
	if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols <= 0 || rows <= 0) {
		throw new InvalidDimensionsError(`Output size must be positive integers, got ${cols}x${rows}`, cols, rows);
	}
}

/**
 * Render an image as rows of 24-bit ANSI text, one line per cell row.
 *
 * @throws {InvalidDimensionsError} If `config.size` is not positive integers.
 * @throws {BlockpaintError} `VALIDATION_ERROR` for any other malformed option.
 *
 * @example
 * ```ts
 * const image = await loadImage("logo.png");
 * process.stdout.write(convert(image, { size: { cols: 40, rows: 20 }, useBlocks: false, colorTolerance: 0, bw: false }));
 * ```
 */
export function convert(image: PixelBuffer, config: ConversionConfig): string {
	checkSize(config);
	assertValid(config, optionsSchema, "conversion config");

	const start = performance.now();
	const source = config.bw ? image.toGrayscale() : image;
	const mode = config.useBlocks ? "block" : "halfblock";

	let grid = resample(source, config.size, {
		mode,
		filter: config.filter,
		alphaThreshold: config.alphaThreshold ?? DEFAULT_ALPHA_THRESHOLD,
	});

	let clusters: number | undefined;
	if (config.colorTolerance > 0) {
		const quantized = quantizeGrid(grid, config.colorTolerance);
		grid = quantized.grid;
		clusters = quantized.quantization.size;
	}

	const text = serializeCells(composeCells(grid, { shade: config.shade }), { raw: config.raw });

	log.debug("Converted image", {
		source: `${image.width}x${image.height}`,
		grid: `${config.size.cols}x${config.size.rows}`,
		mode,
		...(clusters !== undefined ? { clusters } : {}),
		duration: Math.round(performance.now() - start),
	});
	return text;
}

/** Alias of {@link convert}. */
export const toAnsi = convert;
