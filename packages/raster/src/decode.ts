/**
 * @blockpaint/raster — Decode PNG, JPEG and GIF bytes into a {@link PixelBuffer}.
 *
 * The codecs themselves come from npm (fast-png, jpeg-js, omggif); this
 * module only normalizes their output to 8-bit row-major RGBA.
 */

import { readFile } from "node:fs/promises";
import { decode as decodePng } from "fast-png";
import jpeg from "jpeg-js";
import { GifReader } from "omggif";
import { DecodeError, createLogger } from "@blockpaint/core";
import { detectFormat } from "./image-meta.js";
import { PixelBuffer } from "./pixel-buffer.js";
import type { ImageFormat } from "./types.js";

const log = createLogger("raster:decode");

/** Refuse JPEGs that would need more than this many megapixels. */
const MAX_JPEG_MEGAPIXELS = 100;

// ─── PNG ────────────────────────────────────────────────────────────────────

/**
 * Expand packed 1/2/4-bit samples to one value per byte.
 * Rows are padded to a whole byte in the packed form.
 */
function unpackSamples(data: ArrayLike<number>, width: number, height: number, depth: number): Uint8Array {
	const rowBytes = Math.ceil((width * depth) / 8);
	if (data.length !== rowBytes * height) {
		// Decoder already returned one sample per element.
		return Uint8Array.from(data);
	}
	const out = new Uint8Array(width * height);
	const mask = (1 << depth) - 1;
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const bit = x * depth;
			const byte = data[y * rowBytes + (bit >> 3)];
			const shift = 8 - depth - (bit & 7);
			out[y * width + x] = (byte >> shift) & mask;
		}
	}
	return out;
}

function decodePngImage(bytes: Uint8Array): PixelBuffer {
	const decoded = decodePng(bytes);
	const { width, height, channels, depth, palette } = decoded;
	const pixelCount = width * height;

	let samples: Uint8Array;
	if (depth === 16) {
		samples = new Uint8Array(decoded.data.length);
		for (let i = 0; i < decoded.data.length; i++) {
			samples[i] = decoded.data[i] >> 8; // high byte
		}
	} else if (depth < 8) {
		samples = unpackSamples(decoded.data, width, height, depth);
	} else {
		samples = Uint8Array.from(decoded.data);
	}

	const rgba = new Uint8ClampedArray(pixelCount * 4);

	if (palette && channels === 1) {
		for (let i = 0; i < pixelCount; i++) {
			const color = palette[samples[i]] ?? [0, 0, 0];
			rgba[i * 4] = color[0];
			rgba[i * 4 + 1] = color[1];
			rgba[i * 4 + 2] = color[2];
			rgba[i * 4 + 3] = color[3] ?? 255;
		}
	} else if (channels === 1 || channels === 2) {
		// Low bit depths use the full 0-255 range once scaled.
		const scale = depth < 8 ? 255 / ((1 << depth) - 1) : 1;
		for (let i = 0; i < pixelCount; i++) {
			const gray = Math.round(samples[i * channels] * scale);
			rgba[i * 4] = gray;
			rgba[i * 4 + 1] = gray;
			rgba[i * 4 + 2] = gray;
			rgba[i * 4 + 3] = channels === 2 ? samples[i * 2 + 1] : 255;
		}
	} else if (channels === 3) {
		for (let i = 0; i < pixelCount; i++) {
			rgba[i * 4] = samples[i * 3];
			rgba[i * 4 + 1] = samples[i * 3 + 1];
			rgba[i * 4 + 2] = samples[i * 3 + 2];
			rgba[i * 4 + 3] = 255;
		}
	} else if (channels === 4) {
		rgba.set(samples.subarray(0, pixelCount * 4));
	} else {
		throw new Error(`Unsupported PNG channel count: ${channels}`);
	}

	return new PixelBuffer(width, height, rgba);
}

// ─── JPEG ───────────────────────────────────────────────────────────────────

function decodeJpegImage(bytes: Uint8Array): PixelBuffer {
	const decoded = jpeg.decode(bytes, {
		useTArray: true,
		formatAsRGBA: true,
		maxResolutionInMP: MAX_JPEG_MEGAPIXELS,
	});
	return new PixelBuffer(decoded.width, decoded.height, decoded.data);
}

// ─── GIF ────────────────────────────────────────────────────────────────────

/** First frame only; animation is out of scope. */
function decodeGifImage(bytes: Uint8Array): PixelBuffer {
	const reader = new GifReader(Buffer.from(bytes));
	const frames = reader.numFrames();
	if (frames > 1) log.info("Animated GIF, rendering the first frame", { frames });
	const pixels = new Uint8Array(reader.width * reader.height * 4);
	reader.decodeAndBlitFrameRGBA(0, pixels);
	return new PixelBuffer(reader.width, reader.height, pixels);
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Decode encoded image bytes.
 *
 * @param bytes - Encoded PNG, JPEG or GIF data.
 * @param format - Skip magic-byte sniffing when the caller already knows the format.
 * @param source - File path used in error messages.
 * @throws {DecodeError} If the format is unsupported or the data is truncated or corrupt.
 */
export function decodeImage(bytes: Uint8Array, format: ImageFormat = detectFormat(bytes), source?: string): PixelBuffer {
	const label = source ?? "image data";
	try {
		switch (format) {
			case "png":
				return decodePngImage(bytes);
			case "jpeg":
				return decodeJpegImage(bytes);
			case "gif":
				return decodeGifImage(bytes);
			case "webp":
			case "bmp":
				throw new DecodeError(
					`Cannot decode ${label}: ${format.toUpperCase()} is not supported (PNG, JPEG and GIF are)`,
					source,
				);
			case "unknown":
				throw new DecodeError(`Cannot decode ${label}: unrecognized image format`, source);
		}
	} catch (err) {
		if (err instanceof DecodeError) throw err;
		const cause = err instanceof Error ? err : new Error(String(err));
		throw new DecodeError(`Cannot decode ${label} as ${format.toUpperCase()}: ${cause.message}`, source, cause);
	}
}

/**
 * Read and decode an image file.
 *
 * @throws {DecodeError} If the file cannot be read or decoded; the message cites the path.
 */
export async function loadImage(imagePath: string): Promise<PixelBuffer> {
	let bytes: Buffer;
	try {
		bytes = await readFile(imagePath);
	} catch (err) {
		const cause = err instanceof Error ? err : new Error(String(err));
		throw new DecodeError(`Cannot read ${imagePath}: ${cause.message}`, imagePath, cause);
	}
	return decodeImage(bytes, detectFormat(bytes), imagePath);
}
