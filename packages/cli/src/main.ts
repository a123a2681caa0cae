/**
 * @blockpaint/cli — Main conversion flow.
 *
 * settings file → CLI overrides → logging → decode → size → convert → stdout.
 */

import {
	ArgumentError,
	BlockpaintError,
	JsonTransport,
	LogLevel,
	cascadeConfigs,
	configureLogging,
	createConfig,
	createLogger,
	getSettingsPath,
	loadSettings,
	resolveSettings,
} from "@blockpaint/core";
import type { BlockpaintSettings } from "@blockpaint/core";
import { convert, loadImage, resolveGridSize } from "@blockpaint/raster";
import type { ConversionConfig, GridSize } from "@blockpaint/raster";
import { parseArgs, printHelp } from "./args.js";
import type { ParsedArgs } from "./args.js";
import { getOutputSize } from "./terminal-size.js";

export const VERSION = "0.1.0";

const log = createLogger("cli:main");

/** Where output goes and how big the terminal is. Swapped out in tests. */
export interface MainIO {
	stdout: { write(chunk: string): unknown };
	stderr: { write(chunk: string): unknown };
	terminalSize: () => GridSize;
}

const defaultIO: MainIO = {
	stdout: process.stdout,
	stderr: process.stderr,
	terminalSize: () => getOutputSize(),
};

// ─── Settings ───────────────────────────────────────────────────────────────

/**
 * Layer CLI flags over the settings file. Flags that were not given leave
 * the file's (or the default) value in place.
 */
export function effectiveSettings(args: ParsedArgs, fileSettings: BlockpaintSettings = loadSettings()): BlockpaintSettings {
	const global = createConfig("global", { ...fileSettings });
	const flags = createConfig("session", {
		aspectCorrection: args.aspect,
		alphaThreshold: args.alpha,
		tolerance: args.tolerance,
		filter: args.filter,
	});
	return resolveSettings(cascadeConfigs(global, flags).all(), "options");
}

function setupLogging(args: ParsedArgs, settings: BlockpaintSettings): void {
	configureLogging({
		level: args.verbose ? LogLevel.DEBUG : undefined,
		transports: settings.logFormat === "json" ? [new JsonTransport()] : undefined,
	});
}

// ─── Main ───────────────────────────────────────────────────────────────────

/**
 * Render the image named in `args` to `io.stdout`.
 *
 * @throws {ArgumentError} If no image path was given.
 * @throws {BlockpaintError} From settings, decoding, sizing or conversion.
 */
export async function main(args: ParsedArgs, io: MainIO = defaultIO): Promise<void> {
	if (!args.imagePath) {
		throw new ArgumentError("Missing image path. Usage: blockpaint [OPTIONS] <IMAGE_PATH>");
	}

	const settings = effectiveSettings(args);
	setupLogging(args, settings);
	log.debug("Settings resolved", { ...settings });

	const image = await loadImage(args.imagePath);
	log.debug("Image decoded", { path: args.imagePath, width: image.width, height: image.height });

	const terminal = io.terminalSize();
	const size = resolveGridSize(
		image,
		{ width: args.width, height: args.height },
		{
			aspectCorrection: settings.aspectCorrection,
			bounds: { cols: terminal.cols - settings.margin, rows: terminal.rows - settings.margin },
		},
	);

	const config: ConversionConfig = {
		size,
		useBlocks: args.blocks ?? false,
		colorTolerance: settings.tolerance,
		bw: args.bw ?? false,
		alphaThreshold: settings.alphaThreshold,
		filter: settings.filter,
		raw: args.raw ?? false,
		shade: args.shade ?? false,
	};

	io.stdout.write(convert(image, config));
}

// ─── Error Reporting ────────────────────────────────────────────────────────

/** Friendly one-paragraph message for an error that ended the run. */
export function formatError(error: unknown): string {
	const message = error instanceof Error ? error.message : String(error);
	const code = error instanceof BlockpaintError ? error.code : undefined;

	switch (code) {
		case "ARGUMENT_ERROR":
			return `\nError: ${message}\nRun \`blockpaint --help\` for usage information.\n\n`;
		case "DECODE_ERROR":
			return `\nImage error: ${message}\n\n`;
		case "INVALID_DIMENSIONS":
			return `\nSize error: ${message}\n\n`;
		case "CONFIG_ERROR":
			return `\nConfig error: ${message}\nFix or remove ${getSettingsPath()}.\n\n`;
		default:
			return `\nError: ${message}\n\n`;
	}
}

/**
 * Run the CLI against `argv` and return the process exit code.
 * Never throws: every failure is reported on `io.stderr` as exit code 1.
 */
export async function run(argv: string[], io: MainIO = defaultIO): Promise<number> {
	try {
		const args = parseArgs(argv);

		if (args.version) {
			io.stdout.write(`blockpaint v${VERSION}\n`);
			return 0;
		}
		if (args.help) {
			printHelp(io.stdout);
			return 0;
		}

		await main(args, io);
		return 0;
	} catch (error) {
		log.debug("Run failed", { error: error instanceof Error ? error.name : String(error) });
		io.stderr.write(formatError(error));
		return 1;
	}
}
