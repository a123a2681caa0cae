/**
 * @blockpaint/core — Shared configuration types.
 */

// ─── Configuration ───────────────────────────────────────────────────────────

/** `global` is the settings file, `session` the flags of one run. */
export type ConfigLayer = "global" | "session";

/** One layer of configuration; layers are combined with `cascadeConfigs`. */
export interface Config {
	layer: ConfigLayer;
	all(): Record<string, unknown>;
	merge(other: Record<string, unknown>): void;
}

/** Resampling strategy used when shrinking an image onto the cell grid. */
export type ResampleFilter = "box" | "nearest";

/** Log line format written to stderr. */
export type LogFormat = "text" | "json";

/** User settings persisted at ~/.blockpaint/config/settings.json. */
export interface BlockpaintSettings {
	/**
	 * Rows per column of source aspect. Terminal cells are roughly twice as
	 * tall as they are wide, so 0.5 keeps square regions square.
	 */
	aspectCorrection: number;
	/** Averaged alpha below this renders as a transparent cell. */
	alphaThreshold: number;
	/** Default quantization tolerance (CIE76 distance). 0 disables. */
	tolerance: number;
	filter: ResampleFilter;
	/** Cells kept free on each axis when sizing to the terminal. */
	margin: number;
	logFormat: LogFormat;
}

/** Accepted `aspectCorrection` values, inclusive. */
export const ASPECT_CORRECTION_RANGE = { min: 0.05, max: 4 } as const;

export const DEFAULT_SETTINGS: BlockpaintSettings = {
	aspectCorrection: 0.5,
	alphaThreshold: 128,
	tolerance: 0,
	filter: "box",
	margin: 2,
	logFormat: "text",
};
