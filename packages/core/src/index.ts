// @blockpaint/core — Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	createConfig,
	cascadeConfigs,
	getBlockpaintHome,
	getSettingsPath,
	resolveSettings,
	loadSettings,
} from "./config.js";

// Validation
export { v, validate, assertValid, formatIssues } from "./validation.js";
export type { Issue, Schema, ValidationResult } from "./validation.js";

// Observability
export * from "./observability/index.js";
