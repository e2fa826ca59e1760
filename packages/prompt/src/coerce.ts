/**
 * Conversion of entered text into typed values.
 *
 * Each kind is declared by the caller and carries its own parser, so the
 * prompt never has to guess the destination type.
 */

export type Coerced<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface ValueKind<T> {
	/** Name used in messages, e.g. "integer" */
	readonly type: string;
	coerce(text: string): Coerced<T>;
	/** Text shown for a default value and in the result summary */
	format(value: T): string;
	/**
	 * Kinds with exactly two values are entered with a single key instead of
	 * the line editor.
	 */
	readonly choice?: { readonly yes: T; readonly no: T };
}

export interface IntegerOptions {
	/** Width of the value range; omitted means the safe integer range */
	bits?: 8 | 16 | 32;
	unsigned?: boolean;
}

export interface FloatOptions {
	/** Round to 32-bit precision and reject values beyond its range */
	single?: boolean;
}

const YES = new Set(["y", "Y", "yes", "YES", "1", "t", "T", "TRUE", "true", "True"]);
const NO = new Set(["n", "N", "no", "NO", "0", "f", "F", "FALSE", "false", "False"]);

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\+?\d+$/;
const FLOAT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?(inf|infinity)|nan)$/i;
const FLOAT32_MAX = 3.4028234663852886e38;

function ok<T>(value: T): Coerced<T> {
	return { ok: true, value };
}

function fail<T>(reason: string): Coerced<T> {
	return { ok: false, reason };
}

/** Affirmative and negative keywords plus the usual boolean literals. */
export function parseBoolean(text: string): boolean | undefined {
	if (YES.has(text)) return true;
	if (NO.has(text)) return false;
	return undefined;
}

function integerRange(options: IntegerOptions): [min: number, max: number] {
	if (options.bits === undefined) {
		return [options.unsigned ? 0 : Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER];
	}
	if (options.unsigned) {
		return [0, 2 ** options.bits - 1];
	}
	return [-(2 ** (options.bits - 1)), 2 ** (options.bits - 1) - 1];
}

function parseFloatText(text: string): number | undefined {
	if (FLOAT.test(text)) return Number(text);
	if (FLOAT_SPECIAL.test(text)) {
		const lower = text.toLowerCase();
		if (lower === "nan") return Number.NaN;
		return lower.startsWith("-") ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
	}
	return undefined;
}

export const kinds = {
	string(): ValueKind<string> {
		return {
			type: "string",
			coerce: (text) => ok(text.trim()),
			format: (value) => value,
		};
	},

	boolean(): ValueKind<boolean> {
		return {
			type: "boolean",
			coerce: (text) => {
				const value = parseBoolean(text.trim());
				return value === undefined ? fail("invalid boolean") : ok(value);
			},
			format: (value) => (value ? "yes" : "no"),
			choice: { yes: true, no: false },
		};
	},

	integer(options: IntegerOptions = {}): ValueKind<number> {
		const [min, max] = integerRange(options);
		const syntax = options.unsigned ? UNSIGNED_INTEGER : SIGNED_INTEGER;
		const invalid = options.unsigned ? "invalid positive integer" : "invalid integer";
		return {
			type: "integer",
			coerce: (text) => {
				const trimmed = text.trim();
				if (!syntax.test(trimmed)) return fail(invalid);
				const value = Number(trimmed);
				if (value < min || value > max) return fail("integer overflow");
				return ok(value);
			},
			format: (value) => String(value),
		};
	},

	float(options: FloatOptions = {}): ValueKind<number> {
		return {
			type: "floating point",
			coerce: (text) => {
				const trimmed = text.trim();
				const value = parseFloatText(trimmed);
				if (value === undefined) return fail("invalid floating point");
				// Literal infinities are accepted; overflowing digits are not
				if (!Number.isFinite(value) && FLOAT.test(trimmed)) return fail("floating point overflow");
				if (options.single) {
					if (Number.isFinite(value) && Math.abs(value) > FLOAT32_MAX) return fail("floating point overflow");
					return ok(Math.fround(value));
				}
				return ok(value);
			},
			format: (value) => String(value),
		};
	},

	date(): ValueKind<Date> {
		return {
			type: "datetime",
			coerce: (text) => {
				const trimmed = text.trim();
				const value = new Date(trimmed);
				if (trimmed === "" || Number.isNaN(value.getTime())) return fail("invalid datetime");
				return ok(value);
			},
			format: (value) => value.toISOString(),
		};
	},

	/**
	 * Kind backed by a caller-supplied parser. A thrown error becomes the
	 * rejection reason.
	 */
	custom<T>(name: string, parse: (text: string) => T, format: (value: T) => string = String): ValueKind<T> {
		return {
			type: name,
			coerce: (text) => {
				try {
					return ok(parse(text.trim()));
				} catch (error) {
					const reason = error instanceof Error ? error.message : String(error);
					return fail(`invalid ${name}: ${reason}`);
				}
			},
			format,
		};
	},
};
