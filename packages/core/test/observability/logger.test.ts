import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
	LogLevel,
	Logger,
	ConsoleTransport,
	JsonTransport,
	createLogger,
	configureLogging,
} from "@blockpaint/core";
import type { LogEntry, LogTransport } from "@blockpaint/core";

// ─── Test Transport ──────────────────────────────────────────────────────────

class TestTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
	last(): LogEntry {
		const entry = this.entries[this.entries.length - 1];
		if (!entry) throw new Error("no entries written");
		return entry;
	}
}

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
	return {
		timestamp: "2026-01-01T12:34:56.789Z",
		level: LogLevel.DEBUG,
		logger: "raster:convert",
		message: "Converted image",
		fields: {},
		...overrides,
	};
}

describe("Logger", () => {
	let transport: TestTransport;
	let savedEnvLevel: string | undefined;

	beforeEach(() => {
		transport = new TestTransport();
		savedEnvLevel = process.env.LOG_LEVEL;
		delete process.env.LOG_LEVEL;
		configureLogging({});
	});

	afterEach(() => {
		if (savedEnvLevel !== undefined) process.env.LOG_LEVEL = savedEnvLevel;
		configureLogging({});
		vi.restoreAllMocks();
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Level resolution
	// ═══════════════════════════════════════════════════════════════════════

	describe("level resolution", () => {
		it("should emit entries at or above the logger's level", () => {
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			logger.debug("hidden");
			logger.info("shown");
			logger.warn("also shown");
			expect(transport.entries.map((e) => e.message)).toEqual(["shown", "also shown"]);
		});

		it("should default to WARN", () => {
			const logger = new Logger("test", { transports: [transport] });
			logger.info("quiet");
			logger.warn("loud");
			expect(transport.entries).toHaveLength(1);
			expect(logger.level).toBe(LogLevel.WARN);
		});

		it("should let LOG_LEVEL override the logger and global levels", () => {
			process.env.LOG_LEVEL = "DEBUG";
			configureLogging({ level: LogLevel.ERROR });
			const logger = new Logger("test", { level: LogLevel.ERROR, transports: [transport] });
			logger.debug("visible");
			expect(transport.entries).toHaveLength(1);
		});

		it("should silence warnings under LOG_LEVEL=error", () => {
			process.env.LOG_LEVEL = "error";
			const logger = new Logger("test", { transports: [transport] });
			logger.warn("dropped");
			expect(transport.entries).toHaveLength(0);
		});

		it("should ignore an unknown LOG_LEVEL", () => {
			process.env.LOG_LEVEL = "chatty";
			const logger = new Logger("test", { level: LogLevel.INFO, transports: [transport] });
			expect(logger.level).toBe(LogLevel.INFO);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Entries
	// ═══════════════════════════════════════════════════════════════════════

	describe("entries", () => {
		it("should carry timestamp, level, logger name and fields", () => {
			const logger = new Logger("raster:test", { level: LogLevel.DEBUG, transports: [transport] });
			logger.info("hello world", { cols: 40 });
			const e = transport.last();
			expect(e.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
			expect(e.level).toBe(LogLevel.INFO);
			expect(e.logger).toBe("raster:test");
			expect(e.message).toBe("hello world");
			expect(e.fields).toEqual({ cols: 40 });
		});

		it("should lift a numeric duration out of the fields", () => {
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			logger.debug("timed", { duration: 150, grid: "4x2" });
			expect(transport.last().durationMs).toBe(150);
			expect(transport.last().fields).toEqual({ grid: "4x2" });
		});

		it("should leave a non-numeric duration in the fields", () => {
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [transport] });
			logger.debug("odd", { duration: "slow" });
			expect(transport.last().durationMs).toBeUndefined();
			expect(transport.last().fields).toEqual({ duration: "slow" });
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Global configuration
	// ═══════════════════════════════════════════════════════════════════════

	describe("configureLogging", () => {
		it("should reach loggers created before it was called", () => {
			const logger = createLogger("early");
			logger.debug("dropped");
			configureLogging({ transports: [transport], level: LogLevel.DEBUG });
			logger.debug("kept");
			expect(transport.entries.map((e) => e.message)).toEqual(["kept"]);
		});

		it("should not override a logger's own transports", () => {
			const own = new TestTransport();
			configureLogging({ transports: [transport], level: LogLevel.DEBUG });
			new Logger("test", { transports: [own] }).warn("mine");
			expect(own.entries).toHaveLength(1);
			expect(transport.entries).toHaveLength(0);
		});
	});

	// ═══════════════════════════════════════════════════════════════════════
	// Transports
	// ═══════════════════════════════════════════════════════════════════════

	describe("transports", () => {
		it("ConsoleTransport should write one plain line to stderr", () => {
			const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
			const stdout = vi.spyOn(process.stdout, "write").mockReturnValue(true);
			new ConsoleTransport().write(entry({ fields: { grid: "4x2" }, durationMs: 12 }));
			expect(stdout).not.toHaveBeenCalled();
			expect(stderr).toHaveBeenCalledWith('12:34:56.789 DEBUG raster:convert Converted image grid="4x2" 12ms\n');
		});

		it("JsonTransport should write one JSON object to stderr", () => {
			const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
			new JsonTransport().write(entry({ level: LogLevel.INFO, fields: { key: "value" } }));
			expect(stderr).toHaveBeenCalledWith(
				'{"timestamp":"2026-01-01T12:34:56.789Z","level":"INFO","logger":"raster:convert","message":"Converted image","fields":{"key":"value"}}\n',
			);
		});

		it("JsonTransport should omit empty fields and add durationMs", () => {
			const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
			new JsonTransport().write(entry({ durationMs: 3 }));
			expect(stderr).toHaveBeenCalledWith(
				'{"timestamp":"2026-01-01T12:34:56.789Z","level":"DEBUG","logger":"raster:convert","message":"Converted image","durationMs":3}\n',
			);
		});

		it("should report a failing transport on stderr and keep going", () => {
			const stderr = vi.spyOn(process.stderr, "write").mockReturnValue(true);
			const broken: LogTransport = {
				write() { throw new Error("disk full"); },
			};
			const logger = new Logger("test", { level: LogLevel.DEBUG, transports: [broken, transport] });
			logger.info("still delivered");
			expect(transport.entries).toHaveLength(1);
			expect(stderr).toHaveBeenCalledWith("blockpaint: log transport failed: disk full\n");
		});
	});
});
