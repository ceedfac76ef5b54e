/**
 * Integer coercion applied to every index argument: truncates toward zero,
 * maps NaN to 0 and keeps the infinities.
 */
export function toInteger(value: number): number {
	if (value !== value) return 0;
	if (!Number.isFinite(value)) return value;
	return Math.trunc(value) || 0;
}

/**
 * Resolve a possibly negative index against `length`, clamped to
 * `[0, length]`.
 */
export function relativeIndex(value: number, length: number): number {
	const index = toInteger(value);
	return index < 0 ? Math.max(length + index, 0) : Math.min(index, length);
}

/**
 * `[start, end)` bounds of a region operation, `end` defaulting to `length`.
 */
export function resolveRange(
	length: number,
	start: number = 0,
	end?: number
): [from: number, to: number] {
	const from = relativeIndex(start, length);
	const to = end === undefined ? length : relativeIndex(end, length);
	return [from, Math.max(from, to)];
}

export type CopyWithinRange = {
	target: number;
	start: number;
	end: number;
};

/**
 * Bounds used by `copyWithin`. `end` is resolved before `start`: a negative
 * `start` takes the resolved `end` when `end` was negative as well, and
 * `length + start` otherwise.
 */
export function resolveCopyWithin(
	length: number,
	target: number,
	start: number,
	end?: number
): CopyWithinRange {
	const rawEnd = end === undefined ? length : toInteger(end);
	const resolvedEnd = relativeIndex(rawEnd, length);

	const rawStart = toInteger(start);
	let resolvedStart: number;
	if (rawStart < 0) {
		resolvedStart =
			rawEnd < 0 ? resolvedEnd : Math.max(length + rawStart, 0);
	} else {
		resolvedStart = Math.min(rawStart, length);
	}

	return {
		target: relativeIndex(target, length),
		start: resolvedStart,
		end: Math.max(resolvedStart, resolvedEnd),
	};
}

/**
 * Direct index access takes no normalization: only integers in
 * `[0, length)` are valid.
 */
export function isValidIndex(index: number, length: number): boolean {
	return Number.isInteger(index) && index >= 0 && index < length;
}
