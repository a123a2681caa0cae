// sRGB → CIELAB (D65) and the CIE76 distance used by the quantizer.
// CIE76 is plain Euclidean distance in Lab. It over-weights lightness a
// little compared with CIEDE2000, but it runs inside the quantizer's inner
// loop and the tolerance is user-tunable anyway.

import type { LabColor, Rgb } from "./types.js";

/** Pre-computed sRGB (0-255) → linear (0-1) LUT. */
const SRGB_TO_LINEAR = new Float64Array(256);
for (let i = 0; i < 256; i++) {
	const s = i / 255;
	SRGB_TO_LINEAR[i] = s <= 0.04045 ? s / 12.92 : Math.pow((s + 0.055) / 1.055, 2.4);
}

/** D65 reference white, Y normalized to 1. */
const WHITE_X = 0.95047;
const WHITE_Y = 1.0;
const WHITE_Z = 1.08883;

const EPSILON = 216 / 24389; // (6/29)^3
const KAPPA = 24389 / 27;

function labF(t: number): number {
	return t > EPSILON ? Math.cbrt(t) : (KAPPA * t + 16) / 116;
}

/**
 * Convert an sRGB color to CIELAB via linear RGB and CIEXYZ.
 * Channels outside 0-255 are clamped.
 */
export function toLab(color: Rgb): LabColor {
	const lr = SRGB_TO_LINEAR[clampByte(color.r)];
	const lg = SRGB_TO_LINEAR[clampByte(color.g)];
	const lb = SRGB_TO_LINEAR[clampByte(color.b)];

	const x = 0.4124564 * lr + 0.3575761 * lg + 0.1804375 * lb;
	const y = 0.2126729 * lr + 0.7151522 * lg + 0.0721750 * lb;
	const z = 0.0193339 * lr + 0.1191920 * lg + 0.9503041 * lb;

	const fx = labF(x / WHITE_X);
	const fy = labF(y / WHITE_Y);
	const fz = labF(z / WHITE_Z);

	return {
		l: 116 * fy - 16,
		a: 500 * (fx - fy),
		b: 200 * (fy - fz),
	};
}

/** CIE76 ΔE: Euclidean distance between two Lab colors. */
export function distance(p: LabColor, q: LabColor): number {
	const dl = p.l - q.l;
	const da = p.a - q.a;
	const db = p.b - q.b;
	return Math.sqrt(dl * dl + da * da + db * db);
}

/** ΔE between two sRGB colors. */
export function colorDistance(p: Rgb, q: Rgb): number {
	return distance(toLab(p), toLab(q));
}

function clampByte(n: number): number {
	return Math.min(255, Math.max(0, Math.round(n)));
}
