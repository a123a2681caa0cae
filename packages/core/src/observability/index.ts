/**
 * Observability — logging for blockpaint.
 */

export {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
} from "./logger.js";
export type {
	LogEntry,
	LogTransport,
	LoggingOptions,
} from "./logger.js";
