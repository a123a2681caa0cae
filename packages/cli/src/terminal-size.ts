/**
 * @blockpaint/cli — Terminal size detection.
 */

import type { GridSize } from "@blockpaint/raster";

export const FALLBACK_SIZE: Readonly<GridSize> = { cols: 80, rows: 24 };

/** The parts of a tty stream that carry its size. */
export interface SizedStream {
	columns?: number;
	rows?: number;
}

function positive(n: number | undefined): number | undefined {
	return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}

function fromEnv(value: string | undefined): number | undefined {
	if (!value || !/^\d+$/.test(value.trim())) return undefined;
	return positive(Number(value.trim()));
}

/**
 * Size of the output terminal in cells.
 *
 * Each dimension is taken from the stream when it is a tty, then from
 * `COLUMNS` / `LINES`, then from the 80×24 fallback.
 */
export function getOutputSize(
	stream: SizedStream = process.stdout,
	env: NodeJS.ProcessEnv = process.env,
): GridSize {
	return {
		cols: positive(stream.columns) ?? fromEnv(env.COLUMNS) ?? FALLBACK_SIZE.cols,
		rows: positive(stream.rows) ?? fromEnv(env.LINES) ?? FALLBACK_SIZE.rows,
	};
}
