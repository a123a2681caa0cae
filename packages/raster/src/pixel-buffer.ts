/**
 * @blockpaint/raster — Decoded RGBA pixels.
 */

import { InvalidDimensionsError, OutOfBoundsError } from "@blockpaint/core";
import type { ImageSize, Rgb, Rgba } from "./types.js";

/** ITU-R BT.601 luma weights. */
const LUMA_R = 0.299;
const LUMA_G = 0.587;
const LUMA_B = 0.114;

/**
 * Luma of an sRGB triple, rounded to the nearest integer and clamped to 0-255.
 */
export function luma(r: number, g: number, b: number): number {
	const y = Math.round(LUMA_R * r + LUMA_G * g + LUMA_B * b);
	return Math.min(255, Math.max(0, y));
}

function isPositiveInteger(n: number): boolean {
	return Number.isInteger(n) && n > 0;
}

/**
 * A row-major RGBA image. Every buffer owns its bytes: the constructor
 * copies its input and derived buffers allocate fresh storage.
 */
export class PixelBuffer implements ImageSize {
	readonly width: number;
	readonly height: number;
	readonly data: Uint8ClampedArray;

	/**
	 * @param data - RGBA bytes, `width * height * 4` long.
	 * @throws {InvalidDimensionsError} On a zero or fractional size, or a data length that does not match it.
	 */
	constructor(width: number, height: number, data: ArrayLike<number>) {
		if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
			throw new InvalidDimensionsError(
				`Image dimensions must be positive integers, got ${width}x${height}`,
				width,
				height,
			);
		}
		const expected = width * height * 4;
		if (data.length !== expected) {
			throw new InvalidDimensionsError(
				`Pixel data holds ${data.length} bytes, expected ${expected} for ${width}x${height} RGBA`,
				width,
				height,
			);
		}
		this.width = width;
		this.height = height;
		this.data = Uint8ClampedArray.from(data);
	}

	/** Build a buffer by evaluating `pixel` at every coordinate. */
	static from(width: number, height: number, pixel: (x: number, y: number) => Rgb | Rgba): PixelBuffer {
		const data = new Uint8ClampedArray(Math.max(0, width * height * 4));
		for (let y = 0; y < height; y++) {
			for (let x = 0; x < width; x++) {
				const c = pixel(x, y);
				const i = (y * width + x) * 4;
				data[i] = c.r;
				data[i + 1] = c.g;
				data[i + 2] = c.b;
				data[i + 3] = "a" in c ? c.a : 255;
			}
		}
		return new PixelBuffer(width, height, data);
	}

	/** A buffer where every pixel is `color`. */
	static filled(width: number, height: number, color: Rgb | Rgba): PixelBuffer {
		return PixelBuffer.from(width, height, () => color);
	}

	/**
	 * Read one pixel.
	 *
	 * @throws {OutOfBoundsError} If (x, y) is not an integer coordinate inside the buffer.
	 */
	sample(x: number, y: number): Rgba {
		if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
			throw new OutOfBoundsError(x, y, this.width, this.height);
		}
		const i = (y * this.width + x) * 4;
		return {
			r: this.data[i],
			g: this.data[i + 1],
			b: this.data[i + 2],
			a: this.data[i + 3],
		};
	}

	/**
	 * A new buffer whose RGB channels all carry the pixel's luma. Alpha is kept.
	 * Applying it twice gives the same pixels as applying it once.
	 */
	toGrayscale(): PixelBuffer {
		const out = new Uint8ClampedArray(this.data.length);
		for (let i = 0; i < this.data.length; i += 4) {
			const y = luma(this.data[i], this.data[i + 1], this.data[i + 2]);
			out[i] = y;
			out[i + 1] = y;
			out[i + 2] = y;
			out[i + 3] = this.data[i + 3];
		}
		return new PixelBuffer(this.width, this.height, out);
	}
}
