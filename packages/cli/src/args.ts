/**
 * @blockpaint/cli — Argument parser.
 *
 * Hand-rolled argv parser: every flag is known up front, values are checked
 * as they are read, and anything unexpected is an {@link ArgumentError}.
 */

import { ASPECT_CORRECTION_RANGE, ArgumentError } from "@blockpaint/core";
import type { ResampleFilter } from "@blockpaint/core";

export interface ParsedArgs {
	imagePath?: string;
	/** Desaturate before rendering. */
	bw?: boolean;
	/** Output columns. */
	width?: number;
	/** Output rows. */
	height?: number;
	/** CIE76 merge distance. */
	tolerance?: number;
	/** Full blocks instead of half blocks. */
	blocks?: boolean;
	raw?: boolean;
	shade?: boolean;
	filter?: ResampleFilter;
	aspect?: number;
	alpha?: number;
	verbose?: boolean;
	version?: boolean;
	help?: boolean;
}

// ─── Value Parsers ──────────────────────────────────────────────────────────

function parseInteger(flag: string, value: string): number {
	if (!/^[+-]?\d+$/.test(value)) {
		throw new ArgumentError(`Invalid value for ${flag}: "${value}" is not an integer`, flag);
	}
	return Number(value);
}

function parseNumber(flag: string, value: string): number {
	const n = Number(value);
	if (value.trim() === "" || !Number.isFinite(n)) {
		throw new ArgumentError(`Invalid value for ${flag}: "${value}" is not a number`, flag);
	}
	return n;
}

function parseTolerance(flag: string, value: string): number {
	const n = parseNumber(flag, value);
	if (n < 0) {
		throw new ArgumentError(`Invalid value for ${flag}: tolerance cannot be negative`, flag);
	}
	return n;
}

function parseAspect(flag: string, value: string): number {
	const n = parseNumber(flag, value);
	const { min, max } = ASPECT_CORRECTION_RANGE;
	if (n < min || n > max) {
		throw new ArgumentError(`Invalid value for ${flag}: aspect correction must be between ${min} and ${max}`, flag);
	}
	return n;
}

function parseAlpha(flag: string, value: string): number {
	const n = parseInteger(flag, value);
	if (n < 0 || n > 255) {
		throw new ArgumentError(`Invalid value for ${flag}: alpha threshold must be between 0 and 255`, flag);
	}
	return n;
}

function parseFilter(flag: string, value: string): ResampleFilter {
	if (value === "box" || value === "nearest") return value;
	throw new ArgumentError(`Invalid value for ${flag}: "${value}" (expected box or nearest)`, flag);
}

/**
 * Parse argv (without the leading `node` and script entries).
 *
 * Does not require the image path: `--help` and `--version` work without one.
 *
 * @throws {ArgumentError} On unknown flags, missing or malformed values, or a second positional argument.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const result: ParsedArgs = {};

	let i = 0;

	const takeValue = (flag: string): string => {
		i++;
		if (i >= argv.length) {
			throw new ArgumentError(`Missing value for ${flag}`, flag);
		}
		return argv[i];
	};

	while (i < argv.length) {
		const arg = argv[i];

		switch (arg) {
			// ─── Flags with values ──────────────────────────────────────
			case "-w":
			case "--width":
				result.width = parseInteger(arg, takeValue(arg));
				break;
			case "--height":
				result.height = parseInteger(arg, takeValue(arg));
				break;
			case "-t":
			case "--tolerance":
				result.tolerance = parseTolerance(arg, takeValue(arg));
				break;
			case "--filter":
				result.filter = parseFilter(arg, takeValue(arg));
				break;
			case "--aspect":
				result.aspect = parseAspect(arg, takeValue(arg));
				break;
			case "--alpha":
				result.alpha = parseAlpha(arg, takeValue(arg));
				break;

			// ─── Boolean flags ──────────────────────────────────────────
			case "-b":
			case "--bw":
				result.bw = true;
				break;
			case "-B":
			case "--blocks":
				result.blocks = true;
				break;
			case "-r":
			case "--raw":
				result.raw = true;
				break;
			case "-s":
			case "--shade":
				result.shade = true;
				break;
			case "--verbose":
				result.verbose = true;
				break;
			case "-v":
			case "--version":
				result.version = true;
				break;
			case "-h":
			case "--help":
				result.help = true;
				break;

			// ─── Positional ─────────────────────────────────────────────
			default:
				if (arg.startsWith("-") && arg !== "-") {
					throw new ArgumentError(`Unknown option: ${arg}`, arg);
				}
				if (result.imagePath !== undefined) {
					throw new ArgumentError(`Unexpected argument: ${arg} (only one image path is accepted)`);
				}
				result.imagePath = arg;
		}
		i++;
	}

	return result;
}

export const HELP_TEXT = `
blockpaint — Render images in the terminal with 24-bit color blocks

Usage:
  blockpaint [OPTIONS] <IMAGE_PATH>

Options:
  -w, --width <N>               Output width in columns
      --height <N>              Output height in rows
  -t, --tolerance <N>           Merge colors closer than N (CIE76, default 0 = off)
  -b, --bw                      Render in grayscale
  -B, --blocks                  One full block per cell instead of two half blocks
  -s, --shade                   With --blocks, pick ░▒▓█ by brightness
  -r, --raw                     Print escapes as literal \\x1b text
      --filter <box|nearest>    Downscaling filter (default box)
      --aspect <K>              Cell aspect correction (default 0.5)
      --alpha <0-255>           Alpha below this is transparent (default 128)
      --verbose                 Debug logging on stderr
  -v, --version                 Show version
  -h, --help                    Show this help

Without --width or --height the image is fitted to the terminal.
Defaults can be changed in ~/.blockpaint/config/settings.json.
`;

/**
 * Print the CLI help text (to stdout unless told otherwise).
 */
export function printHelp(out: { write(chunk: string): unknown } = process.stdout): void {
	out.write(HELP_TEXT.trimStart());
}
