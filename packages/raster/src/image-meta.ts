/**
 * @blockpaint/raster — Image format sniffing from magic bytes.
 */

import type { ImageFormat } from "./types.js";

// ─── Magic Bytes ────────────────────────────────────────────────────────────

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const JPEG_SOI = [0xff, 0xd8, 0xff];
const GIF87A = [0x47, 0x49, 0x46, 0x38, 0x37, 0x61];
const GIF89A = [0x47, 0x49, 0x46, 0x38, 0x39, 0x61];
const BMP_MAGIC = [0x42, 0x4d];
const RIFF_MAGIC = [0x52, 0x49, 0x46, 0x46];
const WEBP_MAGIC = [0x57, 0x45, 0x42, 0x50];

function matchesAt(bytes: Uint8Array, offset: number, magic: readonly number[]): boolean {
	if (bytes.length < offset + magic.length) return false;
	return magic.every((byte, i) => bytes[offset + i] === byte);
}

// ─── Format Detection ───────────────────────────────────────────────────────

/**
 * Detect image format by inspecting magic bytes at the start of the buffer.
 *
 * Supports PNG, JPEG, GIF (87a/89a), BMP, and WebP.
 *
 * @param bytes - Raw image data (at least 12 bytes recommended).
 * @returns The detected image format, or "unknown" if unrecognized.
 *
 * @example
 * ```ts
 * const format = detectFormat(fs.readFileSync("photo.png"));
 * // => "png"
 * ```
 */
export function detectFormat(bytes: Uint8Array): ImageFormat {
	if (bytes.length < 4) {
		return "unknown";
	}

	if (matchesAt(bytes, 0, PNG_MAGIC)) {
		return "png";
	}

	if (matchesAt(bytes, 0, JPEG_SOI)) {
		return "jpeg";
	}

	if (matchesAt(bytes, 0, GIF87A) || matchesAt(bytes, 0, GIF89A)) {
		return "gif";
	}

	if (matchesAt(bytes, 0, BMP_MAGIC)) {
		return "bmp";
	}

	// WebP: RIFF....WEBP
	if (matchesAt(bytes, 0, RIFF_MAGIC) && matchesAt(bytes, 8, WEBP_MAGIC)) {
		return "webp";
	}

	return "unknown";
}
