/**
 * @blockpaint/raster — Tolerance-based color clustering.
 *
 * Colors are folded, in a fixed order, into an indexed cluster list. A color
 * joins the nearest existing cluster whose representative lies within the
 * tolerance (CIE76); otherwise it founds a new cluster. The founding color
 * stays the representative forever, so earlier assignments never drift as
 * clusters grow. The result depends on input order, which is why
 * {@link collectGridColors} defines one.
 */

import { distance, toLab } from "./color-metric.js";
import type { LabColor, Rgb, SampleGrid } from "./types.js";

export interface Cluster {
	/** Position in creation order. */
	readonly index: number;
	readonly representative: Rgb;
	readonly lab: LabColor;
	/** Distinct colors assigned to this cluster, representative first. */
	readonly members: Rgb[];
}

export interface Quantization {
	readonly tolerance: number;
	readonly clusters: readonly Cluster[];
	/** Number of clusters. */
	readonly size: number;
	/** Representative for `color`; colors never seen map to themselves. */
	map(color: Rgb): Rgb;
	clusterOf(color: Rgb): Cluster | undefined;
}

/** Pack an 8-bit RGB triple into a 24-bit integer key. */
export function colorKey(color: Rgb): number {
	return (color.r << 16) | (color.g << 8) | color.b;
}

interface FoldState {
	clusters: Cluster[];
	/** colorKey → index into `clusters` */
	lookup: Map<number, number>;
}

function assign(state: FoldState, color: Rgb, tolerance: number): FoldState {
	const key = colorKey(color);
	if (state.lookup.has(key)) return state;

	const lab = toLab(color);
	let best = -1;
	let bestDist = Infinity;
	if (tolerance > 0) {
		for (const cluster of state.clusters) {
			const d = distance(lab, cluster.lab);
			// Strict comparison: on a tie the earlier cluster keeps the match.
			if (d < bestDist) {
				bestDist = d;
				best = cluster.index;
			}
		}
	}

	if (best >= 0 && bestDist <= tolerance) {
		state.clusters[best].members.push(color);
		state.lookup.set(key, best);
		return state;
	}

	const cluster: Cluster = {
		index: state.clusters.length,
		representative: { r: color.r, g: color.g, b: color.b },
		lab,
		members: [color],
	};
	state.clusters.push(cluster);
	state.lookup.set(key, cluster.index);
	return state;
}

/**
 * Cluster `colors` in iteration order.
 *
 * With `tolerance <= 0` (or NaN) every distinct color is its own cluster, so
 * {@link Quantization.map} is the identity.
 */
export function quantize(colors: Iterable<Rgb>, tolerance: number): Quantization {
	const effective = tolerance > 0 ? tolerance : 0;
	let state: FoldState = { clusters: [], lookup: new Map() };
	for (const color of colors) {
		state = assign(state, color, effective);
	}
	const { clusters, lookup } = state;

	const clusterOf = (color: Rgb): Cluster | undefined => {
		const idx = lookup.get(colorKey(color));
		return idx === undefined ? undefined : clusters[idx];
	};

	return {
		tolerance: effective,
		clusters,
		size: clusters.length,
		clusterOf,
		map(color: Rgb): Rgb {
			return clusterOf(color)?.representative ?? color;
		},
	};
}

/**
 * Visible colors of a grid in canonical order: cell rows top to bottom, cells
 * left to right, and in half-block mode the upper sample before the lower one.
 */
export function* collectGridColors(grid: SampleGrid): Generator<Rgb> {
	const perCell = grid.mode === "halfblock" ? 2 : 1;
	for (let row = 0; row < grid.rows; row++) {
		for (let col = 0; col < grid.cols; col++) {
			for (let sub = 0; sub < perCell; sub++) {
				const sample = grid.samples[row * perCell + sub][col];
				if (sample) yield sample;
			}
		}
	}
}

/** A new grid with every visible sample replaced by its representative. */
export function applyQuantization(grid: SampleGrid, quantization: Quantization): SampleGrid {
	return {
		mode: grid.mode,
		cols: grid.cols,
		rows: grid.rows,
		samples: grid.samples.map((line) => line.map((s) => (s ? quantization.map(s) : null))),
	};
}

/** Quantize a grid's colors in canonical order. */
export function quantizeGrid(grid: SampleGrid, tolerance: number): { grid: SampleGrid; quantization: Quantization } {
	const quantization = quantize(collectGridColors(grid), tolerance);
	return { grid: applyQuantization(grid, quantization), quantization };
}
