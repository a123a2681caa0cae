// @blockpaint/raster — Image to terminal-cell rendering
export * from "./types.js";
export { detectFormat } from "./image-meta.js";
export { PixelBuffer, luma } from "./pixel-buffer.js";
export { decodeImage, loadImage } from "./decode.js";
export { toLab, distance, colorDistance } from "./color-metric.js";
export {
	quantize,
	quantizeGrid,
	collectGridColors,
	applyQuantization,
	colorKey,
} from "./quantizer.js";
export type { Cluster, Quantization } from "./quantizer.js";
export {
	resolveGridSize,
	fitToBounds,
	resample,
	DEFAULT_ASPECT_CORRECTION,
	DEFAULT_ALPHA_THRESHOLD,
	DEFAULT_BOUNDS,
} from "./resampler.js";
export type { SizeRequest, SizeOptions, ResampleOptions } from "./resampler.js";
export { composeCells, shadeGlyph, SHADE_RAMP, UPPER_HALF, LOWER_HALF, FULL_BLOCK } from "./cells.js";
export type { ComposeOptions } from "./cells.js";
export { serializeCells } from "./serializer.js";
export type { SerializeOptions } from "./serializer.js";
export { convert, toAnsi } from "./convert.js";
