/**
 * Typed error hierarchy for blockpaint.
 *
 * All blockpaint errors extend {@link BlockpaintError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all blockpaint errors.
 *
 * Carries a machine-readable `code` field (e.g. `"DECODE_ERROR"`) for
 * programmatic error detection in addition to the human-readable `message`.
 */
export class BlockpaintError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "BlockpaintError";
		this.code = code;
	}
}

/**
 * Image bytes could not be read, are corrupt, or use an unsupported format.
 *
 * `source` is the file path when the bytes came from disk.
 */
export class DecodeError extends BlockpaintError {
	readonly source?: string;

	constructor(message: string, source?: string, cause?: Error) {
		super(message, "DECODE_ERROR", cause);
		this.name = "DecodeError";
		this.source = source;
	}
}

/**
 * A grid or pixel buffer was requested with a zero, negative or fractional size.
 */
export class InvalidDimensionsError extends BlockpaintError {
	readonly width: number;
	readonly height: number;

	constructor(message: string, width: number, height: number) {
		super(message, "INVALID_DIMENSIONS");
		this.name = "InvalidDimensionsError";
		this.width = width;
		this.height = height;
	}
}

/**
 * Pixel coordinates outside the buffer.
 */
export class OutOfBoundsError extends BlockpaintError {
	readonly x: number;
	readonly y: number;

	constructor(x: number, y: number, width: number, height: number) {
		super(`Pixel (${x}, ${y}) is outside the ${width}x${height} buffer`, "OUT_OF_BOUNDS");
		this.name = "OutOfBoundsError";
		this.x = x;
		this.y = y;
	}
}

/**
 * Malformed command-line input (unknown flag, bad number, missing path).
 */
export class ArgumentError extends BlockpaintError {
	readonly flag?: string;

	constructor(message: string, flag?: string) {
		super(message, "ARGUMENT_ERROR");
		this.name = "ArgumentError";
		this.flag = flag;
	}
}

/**
 * Configuration error (invalid JSON, value out of range, etc.).
 */
export class ConfigError extends BlockpaintError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}
