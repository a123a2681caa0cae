/**
 * Schema checks for the settings file and conversion options.
 *
 * Schemas are built with `v` and run with {@link validate}. Every failing
 * field is reported under its key, e.g. `alphaThreshold must be between 0 and 255, got 300`.
 */

import { BlockpaintError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** One failed check. `path` is the dotted key; empty for the value itself. */
export interface Issue {
	path: string;
	message: string;
}

export type ValidationResult<T> =
	| { valid: true; value: T }
	| { valid: false; issues: Issue[] };

export interface Schema<T> {
	check(value: unknown, path: string): ValidationResult<T>;
}

type Shape = Record<string, Schema<unknown>>;

type Fields<S extends Shape> = {
	[K in keyof S]: S[K] extends Schema<infer T> ? T : never;
};

function fail(path: string, message: string): { valid: false; issues: Issue[] } {
	return { valid: false, issues: [{ path, message }] };
}

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "an array";
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "number" || typeof value === "boolean") return String(value);
	return typeof value;
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

class NumberSchema implements Schema<number> {
	private lo?: number;
	private hi?: number;
	private whole = false;
	private finiteOnly = false;
	private nanOk = false;

	integer(): this {
		this.whole = true;
		return this;
	}

	finite(): this {
		this.finiteOnly = true;
		return this;
	}

	/** For options where NaN means "off". */
	allowNaN(): this {
		this.nanOk = true;
		return this;
	}

	atLeast(lo: number): this {
		this.lo = lo;
		return this;
	}

	/** Inclusive on both ends. */
	between(lo: number, hi: number): this {
		this.lo = lo;
		this.hi = hi;
		return this;
	}

	check(value: unknown, path: string): ValidationResult<number> {
		if (typeof value !== "number" || (Number.isNaN(value) && !this.nanOk)) {
			return fail(path, `must be a number, got ${describe(value)}`);
		}
		if (this.finiteOnly && !Number.isFinite(value)) {
			return fail(path, `must be finite, got ${value}`);
		}
		if (this.whole && !Number.isInteger(value)) {
			return fail(path, `must be an integer, got ${value}`);
		}
		if (this.hi !== undefined && this.lo !== undefined && (value < this.lo || value > this.hi)) {
			return fail(path, `must be between ${this.lo} and ${this.hi}, got ${value}`);
		}
		if (this.lo !== undefined && value < this.lo) {
			return fail(path, `must be at least ${this.lo}, got ${value}`);
		}
		return { valid: true, value };
	}
}

class BooleanSchema implements Schema<boolean> {
	check(value: unknown, path: string): ValidationResult<boolean> {
		if (typeof value !== "boolean") {
			return fail(path, `must be true or false, got ${describe(value)}`);
		}
		return { valid: true, value };
	}
}

class OneOfSchema<T extends string> implements Schema<T> {
	constructor(private readonly choices: readonly T[]) {}

	check(value: unknown, path: string): ValidationResult<T> {
		const match = this.choices.find((choice) => choice === value);
		if (match === undefined) {
			return fail(path, `must be one of ${this.choices.join(", ")}, got ${describe(value)}`);
		}
		return { valid: true, value: match };
	}
}

/** Absent means `undefined` or `null` (a JSON settings file can only spell the latter). */
class OptionalSchema<T> implements Schema<T | undefined> {
	constructor(private readonly inner: Schema<T>) {}

	check(value: unknown, path: string): ValidationResult<T | undefined> {
		if (value === undefined || value === null) return { valid: true, value: undefined };
		return this.inner.check(value, path);
	}
}

class ObjectSchema<S extends Shape> implements Schema<Fields<S>> {
	constructor(private readonly shape: S) {}

	check(value: unknown, path: string): ValidationResult<Fields<S>> {
		if (value === null || typeof value !== "object" || Array.isArray(value)) {
			return fail(path, `must be an object, got ${describe(value)}`);
		}
		const fields = new Map<string, unknown>(Object.entries(value));
		const out: Record<string, unknown> = {};
		const issues: Issue[] = [];

		for (const [key, schema] of Object.entries(this.shape)) {
			const result = schema.check(fields.get(key), path ? `${path}.${key}` : key);
			if (result.valid) out[key] = result.value;
			else issues.push(...result.issues);
		}

		if (issues.length > 0) return { valid: false, issues };
		// Every key of the shape was checked above; unknown keys are dropped.
		return { valid: true, value: out as Fields<S> };
	}
}

// ─── Builders ────────────────────────────────────────────────────────────────

/**
 * ```ts
 * const sizeSchema = v.object({
 *   cols: v.number().integer().atLeast(1),
 *   filter: v.optional(v.oneOf("box", "nearest")),
 * });
 * ```
 */
export const v = {
	number: () => new NumberSchema(),
	boolean: () => new BooleanSchema(),
	oneOf: <T extends string>(...choices: T[]) => new OneOfSchema<T>(choices),
	optional: <T>(schema: Schema<T>) => new OptionalSchema<T>(schema),
	object: <S extends Shape>(shape: S) => new ObjectSchema<S>(shape),
};

// ─── Running ─────────────────────────────────────────────────────────────────

export function validate<T>(value: unknown, schema: Schema<T>): ValidationResult<T> {
	return schema.check(value, "");
}

/** `alphaThreshold must be …; margin must be …` */
export function formatIssues(issues: readonly Issue[]): string {
	return issues.map((issue) => (issue.path ? `${issue.path} ${issue.message}` : issue.message)).join("; ");
}

/**
 * Validate and return the typed value.
 *
 * @throws {BlockpaintError} `VALIDATION_ERROR`, message prefixed with `label`.
 */
export function assertValid<T>(value: unknown, schema: Schema<T>, label: string): T {
	const result = validate(value, schema);
	if (!result.valid) {
		throw new BlockpaintError(`${label}: ${formatIssues(result.issues)}`, "VALIDATION_ERROR");
	}
	return result.value;
}
