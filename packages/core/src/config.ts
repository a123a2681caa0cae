import fs from "fs";
import path from "path";
import { ConfigError } from "./errors.js";
import { createLogger } from "./observability/logger.js";
import type { Config, ConfigLayer, BlockpaintSettings, LogFormat, ResampleFilter } from "./types.js";
import { ASPECT_CORRECTION_RANGE, DEFAULT_SETTINGS } from "./types.js";
import { formatIssues, v, validate } from "./validation.js";

const log = createLogger("core:config");

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep-merge source into target (mutates target). Arrays are replaced, not concatenated.
 * Nested objects are copied, never shared with the source.
 * `undefined` values in source leave the target untouched, so sparse CLI
 * overrides can be layered over settings.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
	for (const key of Object.keys(source)) {
		const sv = source[key];
		if (sv === undefined) continue;
		if (isRecord(sv)) {
			const tv = target[key];
			const next = isRecord(tv) ? tv : {};
			target[key] = next;
			deepMerge(next, sv);
		} else {
			target[key] = sv;
		}
	}
}

/**
 * Create a config layer backed by an in-memory object.
 *
 * @example
 * ```ts
 * const flags = createConfig("session", { tolerance: 4, filter: undefined });
 * flags.all(); // { tolerance: 4 }
 * ```
 */
export function createConfig(layer: ConfigLayer, initial: Record<string, unknown> = {}): Config {
	const data: Record<string, unknown> = {};
	deepMerge(data, initial);

	return {
		layer,

		all(): Record<string, unknown> {
			return { ...data };
		},

		merge(other: Record<string, unknown>): void {
			deepMerge(data, other);
		},
	};
}

/**
 * Cascade multiple config layers into a single merged config.
 *
 * Layers are applied left-to-right, so later layers override earlier ones
 * on key conflicts. The resulting config has layer type "session".
 */
export function cascadeConfigs(...layers: Config[]): Config {
	const merged = createConfig("session");
	for (const layer of layers) {
		merged.merge(layer.all());
	}
	return merged;
}

/**
 * Get the blockpaint home directory path (~/.blockpaint).
 *
 * Honors `BLOCKPAINT_HOME` when set, otherwise falls back to
 * `$HOME/.blockpaint` (`$USERPROFILE` on Windows).
 */
export function getBlockpaintHome(): string {
	const override = process.env.BLOCKPAINT_HOME?.trim();
	if (override) return override;
	return path.join(process.env.HOME || process.env.USERPROFILE || "~", ".blockpaint");
}

/** Absolute path of the settings file. */
export function getSettingsPath(): string {
	return path.join(getBlockpaintHome(), "config", "settings.json");
}

const settingsSchema = v.object({
	aspectCorrection: v.optional(v.number().between(ASPECT_CORRECTION_RANGE.min, ASPECT_CORRECTION_RANGE.max)),
	alphaThreshold: v.optional(v.number().integer().between(0, 255)),
	tolerance: v.optional(v.number().finite().atLeast(0)),
	filter: v.optional(v.oneOf<ResampleFilter>("box", "nearest")),
	margin: v.optional(v.number().integer().atLeast(0)),
	logFormat: v.optional(v.oneOf<LogFormat>("text", "json")),
});

/**
 * Validate a partial settings object and fill the gaps from {@link DEFAULT_SETTINGS}.
 *
 * @throws {ConfigError} If a present key has the wrong type or is out of range.
 */
export function resolveSettings(raw: unknown, source = "settings"): BlockpaintSettings {
	const result = validate(raw, settingsSchema);
	if (!result.valid) {
		throw new ConfigError(`Invalid ${source}: ${formatIssues(result.issues)}`);
	}
	const s = result.value;
	return {
		aspectCorrection: s.aspectCorrection ?? DEFAULT_SETTINGS.aspectCorrection,
		alphaThreshold: s.alphaThreshold ?? DEFAULT_SETTINGS.alphaThreshold,
		tolerance: s.tolerance ?? DEFAULT_SETTINGS.tolerance,
		filter: s.filter ?? DEFAULT_SETTINGS.filter,
		margin: s.margin ?? DEFAULT_SETTINGS.margin,
		logFormat: s.logFormat ?? DEFAULT_SETTINGS.logFormat,
	};
}

/**
 * Load user settings from `~/.blockpaint/config/settings.json`.
 *
 * Returns pure defaults if the file does not exist. Keys missing from the
 * file fall back to their defaults; keys blockpaint does not know are
 * ignored with a warning.
 *
 * @throws {ConfigError} If the file exists but is not valid JSON or holds invalid values.
 */
export function loadSettings(): BlockpaintSettings {
	const settingsPath = getSettingsPath();
	if (!fs.existsSync(settingsPath)) {
		return { ...DEFAULT_SETTINGS };
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(fs.readFileSync(settingsPath, "utf-8"));
	} catch (err) {
		throw new ConfigError(
			`Failed to parse ${settingsPath}`,
			err instanceof Error ? err : undefined,
		);
	}
	const settings = resolveSettings(parsed, settingsPath);
	if (isRecord(parsed)) {
		const unknown = Object.keys(parsed).filter((key) => !(key in DEFAULT_SETTINGS));
		if (unknown.length > 0) {
			log.warn("Ignoring unknown settings", { path: settingsPath, keys: unknown });
		}
	}
	return settings;
}
