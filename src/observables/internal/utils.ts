import type { Comparable, Equatable } from "../../types";

export function isNonPrimitive(val: unknown): val is object {
	return val != null && (typeof val === "object" || typeof val === "function");
}

export function isEquatable(val: unknown): val is Equatable {
	return (
		isNonPrimitive(val) &&
		"equals" in val &&
		typeof val.equals === "function"
	);
}

export function isComparable(val: unknown): val is Comparable {
	return (
		isNonPrimitive(val) &&
		"compareTo" in val &&
		typeof val.compareTo === "function"
	);
}

/**
 * SameValueZero, unless the left operand brings its own `equals`.
 */
export function defaultEquals<T>(a: T, b: T): boolean {
	if (a === b || (a !== a && b !== b)) {
		return true;
	}

	return isEquatable(a) ? a.equals(b) : false;
}

function compareValues<V extends string | number | bigint | boolean>(
	a: V,
	b: V
): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Natural ordering: `compareTo` when the element defines one, numeric for
 * numbers and bigints, chronological for dates, code-unit order for strings,
 * and the string forms for everything else.
 */
export function naturalCompare<T>(a: T, b: T): number {
	if (isComparable(a)) {
		return a.compareTo(b);
	}

	if (typeof a === "number" && typeof b === "number") {
		// NaN sorts after every number
		if (a !== a) return b !== b ? 0 : 1;
		if (b !== b) return -1;
		return compareValues(a, b);
	}

	if (typeof a === "bigint" && typeof b === "bigint") {
		return compareValues(a, b);
	}

	if (typeof a === "string" && typeof b === "string") {
		return compareValues(a, b);
	}

	if (typeof a === "boolean" && typeof b === "boolean") {
		return compareValues(a, b);
	}

	if (a instanceof Date && b instanceof Date) {
		return compareValues(a.getTime(), b.getTime());
	}

	return compareValues(toDisplayString(a), toDisplayString(b));
}

/**
 * Objects without any string conversion (e.g. `Object.create(null)`) fall back
 * to their `[object Tag]` form instead of throwing.
 */
function hasStringConversion(val: object): boolean {
	return Symbol.toPrimitive in val || "toString" in val || "valueOf" in val;
}

export function toDisplayString(value: unknown): string {
	if (value == null) return "";
	if (isNonPrimitive(value) && !hasStringConversion(value)) {
		return Object.prototype.toString.call(value);
	}
	return String(value);
}

export function toLocaleDisplayString(value: unknown): string {
	if (value == null) return "";
	if (
		isNonPrimitive(value) &&
		"toLocaleString" in value &&
		typeof value.toLocaleString === "function"
	) {
		return String(value.toLocaleString());
	}
	return isNonPrimitive(value) ? toDisplayString(value) : String(value);
}
