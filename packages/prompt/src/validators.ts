import * as fs from "node:fs";

/** Returns a rejection reason, or undefined to accept. */
export type Validator<T> = (value: T) => string | undefined;

/** First rejection among `validators`, in order. */
export function validate<T>(value: T, validators: ReadonlyArray<Validator<T>>): string | undefined {
	for (const validator of validators) {
		const reason = validator(value);
		if (reason !== undefined) return reason;
	}
	return undefined;
}

function formatLimit(value: number | Date): string {
	return value instanceof Date ? value.toISOString() : String(value);
}

function less(a: number | Date, b: number | Date): boolean {
	return (a instanceof Date ? a.getTime() : a) < (b instanceof Date ? b.getTime() : b);
}

function statPath(value: string): fs.Stats | undefined {
	try {
		return fs.statSync(value);
	} catch {
		return undefined;
	}
}

function same<T>(a: T, b: T): boolean {
	if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
	return Object.is(a, b);
}

// =============================================================================
// Strings
// =============================================================================

/** Length in code points within [min, max]. Pass -1 as max for no upper limit. */
export function strLength(min: number, max = -1): Validator<string> {
	return (value) => {
		const length = Array.from(value).length;
		if (length < min) return `too short, minimum is ${min}`;
		if (max !== -1 && max < length) return `too long, maximum is ${max}`;
		return undefined;
	};
}

export function prefix(affix: string): Validator<string> {
	return (value) => (value.startsWith(affix) ? undefined : `expected prefix '${affix}'`);
}

export function suffix(affix: string): Validator<string> {
	return (value) => (value.endsWith(affix) ? undefined : `expected suffix '${affix}'`);
}

export function pattern(regex: RegExp | string, message: string): Validator<string> {
	const re = typeof regex === "string" ? new RegExp(regex) : regex;
	return (value) => {
		re.lastIndex = 0;
		return re.test(value) ? undefined : message;
	};
}

/** Accept the empty string, otherwise defer to `validator`. */
export function emptyOr(validator: Validator<string>): Validator<string> {
	return (value) => (value === "" ? undefined : validator(value));
}

export function emailAddress(): Validator<string> {
	return pattern(/^[\w.-]+@([a-z0-9][a-z0-9-]{0,61}[a-z0-9]\.)+[a-z0-9]{2,63}$/, "invalid e-mail address");
}

export function ipAddress(): Validator<string> {
	return pattern(
		/^([0-9]{1,3}\.){3}[0-9]{1,3}$|^(([a-fA-F0-9]{1,4}|):){1,7}([a-fA-F0-9]{1,4}|:)$/,
		"invalid IP address",
	);
}

export function ipv4Address(): Validator<string> {
	return pattern(/^([0-9]{1,3}\.){3}[0-9]{1,3}$/, "invalid IPv4 address");
}

export function ipv6Address(): Validator<string> {
	return pattern(/^(([a-fA-F0-9]{1,4}|):){1,7}([a-fA-F0-9]{1,4}|:)$/, "invalid IPv6 address");
}

export function path(): Validator<string> {
	return pattern(/^([^/]+)?\/([^/]+\/)*([^/]+)?$/, "invalid path");
}

export function absolutePath(): Validator<string> {
	return pattern(/^\/([^/]+\/)*([^/]+)?$/, "invalid absolute path");
}

/** Unix user name: lowercase, up to 32 characters, optional trailing $. */
export function userName(): Validator<string> {
	return pattern(/^[a-z_]([a-z0-9_-]{1,31}|[a-z0-9_-]{1,30}\$)$/, "invalid user name");
}

export function topDomainName(): Validator<string> {
	return pattern(/^[a-z0-9][a-z0-9-]{0,61}[a-z0-9]\.[a-z0-9]{2,63}$/, "invalid top-level domain name");
}

export function domainName(): Validator<string> {
	return pattern(/^([a-z0-9][a-z0-9-]{0,61}[a-z0-9]\.)+[a-z0-9]{2,63}$/, "invalid domain name");
}

/** Domain name with the trailing root dot. */
export function fqdn(): Validator<string> {
	return pattern(/^([a-z0-9][a-z0-9-]{0,61}[a-z0-9]\.)+[a-z0-9]{2,63}\.$/, "invalid fully qualified domain name");
}

/** Path to an existing directory. */
export function dir(): Validator<string> {
	return (value) => {
		const stats = statPath(value);
		if (!stats) return `file not found: ${value}`;
		if (!stats.isDirectory()) return `path is not a directory: ${value}`;
		return undefined;
	};
}

/** Path to an existing regular file. */
export function file(): Validator<string> {
	return (value) => {
		const stats = statPath(value);
		if (!stats) return `file not found: ${value}`;
		if (!stats.isFile()) return `path is not a regular file: ${value}`;
		return undefined;
	};
}

// =============================================================================
// Numbers and dates
// =============================================================================

/** Inclusive range. NaN or an infinity leaves that side open. */
export function numRange(min: number, max: number): Validator<number> {
	return (value) => {
		if ((!Number.isNaN(min) && value < min) || (!Number.isNaN(max) && max < value)) {
			return `out of range [${min},${max}]`;
		}
		return undefined;
	};
}

export function port(): Validator<number> {
	return numRange(1, 65535);
}

/** Inclusive range; an omitted limit is open. */
export function dateRange(min?: Date, max?: Date): Validator<Date> {
	return (value) => {
		if ((min && value.getTime() < min.getTime()) || (max && value.getTime() > max.getTime())) {
			return `out of range [${min ? min.toISOString() : ""},${max ? max.toISOString() : ""}]`;
		}
		return undefined;
	};
}

export function before(limit: number): Validator<number>;
export function before(limit: Date): Validator<Date>;
export function before(limit: number | Date): Validator<number | Date> {
	return (value) => (less(value, limit) ? undefined : `must be before ${formatLimit(limit)}`);
}

export function after(limit: number): Validator<number>;
export function after(limit: Date): Validator<Date>;
export function after(limit: number | Date): Validator<number | Date> {
	return (value) => (less(limit, value) ? undefined : `must be after ${formatLimit(limit)}`);
}

// =============================================================================
// Any value
// =============================================================================

export function is<T>(expected: T): Validator<T> {
	return (value) => (same(value, expected) ? undefined : `expected '${String(expected)}'`);
}

export function oneOf<T>(list: readonly T[]): Validator<T> {
	return (value) => (list.some((item) => same(item, value)) ? undefined : "not available");
}

export function notIn<T>(list: readonly T[]): Validator<T> {
	return (value) => (list.some((item) => same(item, value)) ? "not available" : undefined);
}

export function not<T>(validator: Validator<T>): Validator<T> {
	return (value) => (validator(value) === undefined ? "not available" : undefined);
}

/** All validators must accept; reports the first rejection. */
export function and<T>(...validators: Validator<T>[]): Validator<T> {
	return (value) => validate(value, validators);
}

/** At least one validator must accept. No validators accepts anything. */
export function or<T>(...validators: Validator<T>[]): Validator<T> {
	return (value) => {
		if (validators.length === 0) return undefined;
		return validators.some((validator) => validator(value) === undefined) ? undefined : "not available";
	};
}
