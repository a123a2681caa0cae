/**
 * Logging for blockpaint.
 *
 * Modules create their logger at import time (`createLogger("raster:convert")`);
 * level and transports are looked up on every call, so the CLI's later
 * `configureLogging` still reaches them. Every transport writes to stderr:
 * stdout belongs to the rendered image.
 */

// ─── Levels ──────────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
};

function parseLogLevel(name: string): LogLevel | undefined {
	switch (name.trim().toLowerCase()) {
		case "debug":
			return LogLevel.DEBUG;
		case "info":
			return LogLevel.INFO;
		case "warn":
			return LogLevel.WARN;
		case "error":
			return LogLevel.ERROR;
		default:
			return undefined;
	}
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 */
	timestamp: string;
	level: LogLevel;
	/** Name the logger was created with. */
	logger: string;
	message: string;
	fields: Record<string, unknown>;
	/** Lifted out of a numeric `duration` field. */
	durationMs?: number;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggingOptions {
	level?: LogLevel;
	transports?: LogTransport[];
}

// ─── Transports ──────────────────────────────────────────────────────────────

/** `12:34:56.789 DEBUG raster:convert Converted image grid="4x2" 12ms` */
export class ConsoleTransport implements LogTransport {
	write(entry: LogEntry): void {
		let line = `${entry.timestamp.slice(11, 23)} ${LEVEL_NAMES[entry.level].padEnd(5)} ${entry.logger} ${entry.message}`;
		for (const [key, value] of Object.entries(entry.fields)) {
			line += ` ${key}=${JSON.stringify(value)}`;
		}
		if (entry.durationMs !== undefined) line += ` ${entry.durationMs}ms`;
		process.stderr.write(`${line}\n`);
	}
}

/** One JSON object per line. */
export class JsonTransport implements LogTransport {
	write(entry: LogEntry): void {
		process.stderr.write(`${JSON.stringify({
			timestamp: entry.timestamp,
			level: LEVEL_NAMES[entry.level],
			logger: entry.logger,
			message: entry.message,
			...(Object.keys(entry.fields).length > 0 ? { fields: entry.fields } : {}),
			...(entry.durationMs !== undefined ? { durationMs: entry.durationMs } : {}),
		})}\n`);
	}
}

const consoleTransport = new ConsoleTransport();

// ─── Global Options ──────────────────────────────────────────────────────────

let globalOptions: LoggingOptions = {};

/** Replace the process-wide defaults. Unset keys fall back to WARN and the console transport. */
export function configureLogging(options: LoggingOptions): void {
	globalOptions = { ...options };
}

/** `LOG_LEVEL`, then the logger's own level, then the global one, then WARN. */
function effectiveLevel(own: LogLevel | undefined): LogLevel {
	const env = process.env.LOG_LEVEL;
	const fromEnv = env ? parseLogLevel(env) : undefined;
	return fromEnv ?? own ?? globalOptions.level ?? LogLevel.WARN;
}

// ─── Logger ──────────────────────────────────────────────────────────────────

export class Logger {
	constructor(
		readonly name: string,
		private readonly own: LoggingOptions = {},
	) {}

	get level(): LogLevel {
		return effectiveLevel(this.own.level);
	}

	debug(message: string, fields?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, fields);
	}

	info(message: string, fields?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, fields);
	}

	warn(message: string, fields?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, fields);
	}

	private emit(level: LogLevel, message: string, fields: Record<string, unknown> = {}): void {
		if (level < this.level) return;

		const { duration, ...rest } = fields;
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			logger: this.name,
			message,
			fields: typeof duration === "number" || duration === undefined ? rest : { ...rest, duration },
		};
		if (typeof duration === "number") entry.durationMs = duration;

		for (const transport of this.own.transports ?? globalOptions.transports ?? [consoleTransport]) {
			try {
				transport.write(entry);
			} catch (err) {
				// never throw into the caller
				process.stderr.write(`blockpaint: log transport failed: ${err instanceof Error ? err.message : String(err)}\n`);
			}
		}
	}
}

/** @param name - Module identifier, e.g. `"raster:convert"`. */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
