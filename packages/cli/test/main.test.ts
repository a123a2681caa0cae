import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { encode as encodePng } from "fast-png";
import {
	ArgumentError,
	ConfigError,
	DecodeError,
	DEFAULT_SETTINGS,
	InvalidDimensionsError,
	getSettingsPath,
	configureLogging,
} from "@blockpaint/core";
import type { GridSize } from "@blockpaint/raster";
import { effectiveSettings, formatError, run, VERSION } from "../src/main.js";
import type { MainIO } from "../src/main.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

interface Captured {
	io: MainIO;
	out: () => string;
	err: () => string;
}

function capture(terminal: GridSize = { cols: 80, rows: 24 }): Captured {
	let out = "";
	let err = "";
	return {
		io: {
			stdout: { write: (chunk: string) => (out += chunk) },
			stderr: { write: (chunk: string) => (err += chunk) },
			terminalSize: () => terminal,
		},
		out: () => out,
		err: () => err,
	};
}

/** RGBA PNG from a flat list of [r, g, b, a] pixels. */
function pngOf(width: number, height: number, pixels: number[][]): Uint8Array {
	return encodePng({ width, height, channels: 4, depth: 8, data: Uint8Array.from(pixels.flat()) });
}

const RED = [255, 0, 0, 255];
const BLUE = [0, 0, 255, 255];
const RESET = "\x1b[0m";

let home: string;
let savedHome: string | undefined;
let checkerboard: string;

beforeEach(async () => {
	savedHome = process.env.BLOCKPAINT_HOME;
	home = await mkdtemp(join(tmpdir(), "blockpaint-cli-"));
	process.env.BLOCKPAINT_HOME = home;
	checkerboard = join(home, "checkerboard.png");
	await writeFile(checkerboard, pngOf(2, 2, [RED, BLUE, BLUE, RED]));
});

afterEach(async () => {
	if (savedHome === undefined) {
		delete process.env.BLOCKPAINT_HOME;
	} else {
		process.env.BLOCKPAINT_HOME = savedHome;
	}
	configureLogging({});
	await rm(home, { recursive: true, force: true });
});

async function writeSettings(settings: Record<string, unknown>): Promise<void> {
	await mkdir(join(home, "config"), { recursive: true });
	await writeFile(getSettingsPath(), JSON.stringify(settings));
}

// ═══════════════════════════════════════════════════════════════════════════════
// run — success
// ═══════════════════════════════════════════════════════════════════════════════

describe("run", () => {
	it("should render half blocks at an explicit size", async () => {
		const c = capture();
		const code = await run(["-w", "2", "--height", "1", checkerboard], c.io);
		expect(code).toBe(0);
		expect(c.out()).toBe(
			"\x1b[38;2;255;0;0m\x1b[48;2;0;0;255m▀\x1b[38;2;0;0;255m\x1b[48;2;255;0;0m▀" + `${RESET}\n`,
		);
		expect(c.err()).toBe("");
	});

	it("should render full blocks with -B", async () => {
		const c = capture();
		expect(await run(["-B", "-w", "2", "--height", "1", checkerboard], c.io)).toBe(0);
		expect(c.out()).toBe(`\x1b[38;2;128;0;128m██${RESET}\n`);
	});

	it("should spell escapes out with --raw", async () => {
		const c = capture();
		expect(await run(["-B", "-r", "-w", "1", "--height", "1", checkerboard], c.io)).toBe(0);
		expect(c.out()).toBe("\\x1b[38;2;128;0;128m█\\x1b[0m\n");
	});

	it("should fit the terminal minus the margin when no size is given", async () => {
		const c = capture({ cols: 12, rows: 7 });
		expect(await run([checkerboard], c.io)).toBe(0);
		const lines = c.out().split("\n");
		// 10x5 cells: square image, 0.5 aspect correction, 2-cell margin
		expect(lines).toHaveLength(6);
		expect(lines[5]).toBe("");
		expect(lines.slice(0, 5).every((line) => line.endsWith(RESET))).toBe(true);
		expect(c.out().split("▀")).toHaveLength(51);
	});

	it("should print the version", async () => {
		const c = capture();
		expect(await run(["--version"], c.io)).toBe(0);
		expect(c.out()).toBe(`blockpaint v${VERSION}\n`);
	});

	it("should print help without an image path", async () => {
		const c = capture();
		expect(await run(["-h"], c.io)).toBe(0);
		expect(c.out().startsWith("blockpaint — Render images")).toBe(true);
	});
});

// ═══════════════════════════════════════════════════════════════════════════════
// run — settings
// ═══════════════════════════════════════════════════════════════════════════════

describe("run with a settings file", () => {
	const grays = (): Uint8Array => pngOf(2, 1, [[100, 100, 100, 255], [101, 100, 100, 255]]);

	it("should take the default tolerance from settings", async () => {
		const image = join(home, "grays.png");
		await writeFile(image, grays());
		await writeSettings({ tolerance: 5 });

		const c = capture();
		expect(await run(["-B", "-w", "2", "--height", "1", image], c.io)).toBe(0);
		expect(c.out()).toBe(`\x1b[38;2;100;100;100m██${RESET}\n`);
	});

	it("should let a flag override the settings file", async () => {
		const image = join(home, "grays.png");
		await writeFile(image, grays());
		await writeSettings({ tolerance: 5 });

		const c = capture();
		expect(await run(["-B", "-t", "0", "-w", "2", "--height", "1", image], c.io)).toBe(0);
		expect(c.out()).toBe(`\x1b[38;2;100;100;100m█\x1b[38;2;101;100;100m█${RESET}\n`);
	});

	it("should fail on an invalid settings file", async () => {
		await writeSettings({ tolerance: "lots" });

		const c = capture();
		expect(await run([checkerboard], c.io)).toBe(1);
		expect(c.out()).toBe("");
		expect(c.err()).toBe(
			`\nConfig error: Invalid ${getSettingsPath()}: tolerance must be a number, got \"lots\"\n` +
			`Fix or remove ${getSettingsPath()}.\n\n`,
		);
	});
});

// ═══════════════════════════════════════════════════════════════════════════════
// run — failures
// ═══════════════════════════════════════════════════════════════════════════════

describe("run failures", () => {
	it("should require an image path", async () => {
		const c = capture();
		expect(await run([], c.io)).toBe(1);
		expect(c.err()).toBe(
			"\nError: Missing image path. Usage: blockpaint [OPTIONS] <IMAGE_PATH>\n" +
			"Run `blockpaint --help` for usage information.\n\n",
		);
	});

	it("should report an unreadable file", async () => {
		const c = capture();
		const missing = join(home, "missing.png");
		expect(await run([missing], c.io)).toBe(1);
		expect(c.err().startsWith(`\nImage error: Cannot read ${missing}: `)).toBe(true);
		expect(c.out()).toBe("");
	});

	it("should report a file that is not an image", async () => {
		const notes = join(home, "notes.txt");
		await writeFile(notes, "not pixels");
		const c = capture();
		expect(await run([notes], c.io)).toBe(1);
		expect(c.err()).toBe(`\nImage error: Cannot decode ${notes}: unrecognized image format\n\n`);
	});

	it("should reject a zero width", async () => {
		const c = capture();
		expect(await run(["-w", "0", checkerboard], c.io)).toBe(1);
		expect(c.err()).toBe("\nSize error: Output size must be a positive integer, got 0\n\n");
	});

	it("should blame the flag, not the settings file, for an out-of-range aspect", async () => {
		const c = capture();
		expect(await run(["--aspect", "5", checkerboard], c.io)).toBe(1);
		expect(c.err()).toBe(
			"\nError: Invalid value for --aspect: aspect correction must be between 0.05 and 4\n" +
			"Run `blockpaint --help` for usage information.\n\n",
		);
	});

	it("should reject a malformed number", async () => {
		const c = capture();
		expect(await run(["-t", "abc", checkerboard], c.io)).toBe(1);
		expect(c.err()).toBe(
			'\nError: Invalid value for -t: "abc" is not a number\n' +
			"Run `blockpaint --help` for usage information.\n\n",
		);
	});
});

// ═══════════════════════════════════════════════════════════════════════════════
// effectiveSettings / formatError
// ═══════════════════════════════════════════════════════════════════════════════

describe("effectiveSettings", () => {
	it("should keep file values for flags that were not given", () => {
		expect(effectiveSettings({}, { ...DEFAULT_SETTINGS, margin: 4 })).toEqual({ ...DEFAULT_SETTINGS, margin: 4 });
	});

	it("should layer flags over file values", () => {
		const s = effectiveSettings({ aspect: 1, alpha: 10, filter: "nearest" }, { ...DEFAULT_SETTINGS, tolerance: 3 });
		expect(s).toEqual({ ...DEFAULT_SETTINGS, aspectCorrection: 1, alphaThreshold: 10, filter: "nearest", tolerance: 3 });
	});
});

describe("formatError", () => {
	it("should label each error family", () => {
		expect(formatError(new DecodeError("bad bytes"))).toBe("\nImage error: bad bytes\n\n");
		expect(formatError(new InvalidDimensionsError("too small", 0, 0))).toBe("\nSize error: too small\n\n");
		expect(formatError(new ArgumentError("nope"))).toContain("Run `blockpaint --help`");
		expect(formatError(new ConfigError("broken"))).toBe(`\nConfig error: broken\nFix or remove ${getSettingsPath()}.\n\n`);
	});

	it("should fall back to a plain message", () => {
		expect(formatError(new Error("boom"))).toBe("\nError: boom\n\n");
		expect(formatError("text")).toBe("\nError: text\n\n");
	});
});
