/**
 * Interval arithmetic for absolute time intervals.
 * All intervals are half-open [start, end): start is inclusive, end is exclusive.
 * Zero-length intervals are empty and never appear in a result.
 */

import type { Interval } from './types.js';

export type { Interval };

function cloneInterval(interval: Interval): Interval {
	return {
		start: new Date(interval.start.getTime()),
		end: new Date(interval.end.getTime()),
	};
}

function byStartThenEnd(a: Interval, b: Interval): number {
	const startDiff = a.start.getTime() - b.start.getTime();
	if (startDiff !== 0) return startDiff;
	return a.end.getTime() - b.end.getTime();
}

// ============================================================================
// Single Intervals
// ============================================================================

/**
 * True when the interval covers no time.
 */
export function isEmpty(interval: Interval): boolean {
	return interval.start.getTime() >= interval.end.getTime();
}

/**
 * Length of the interval in milliseconds (0 for empty intervals).
 */
export function duration(interval: Interval): number {
	return Math.max(0, interval.end.getTime() - interval.start.getTime());
}

/**
 * Checks if the interval contains a point in time.
 */
export function contains(interval: Interval, point: Date): boolean {
	return point >= interval.start && point < interval.end;
}

/**
 * Checks if `inner` lies entirely within `outer`.
 * An empty `inner` is never contained.
 */
export function containsInterval(outer: Interval, inner: Interval): boolean {
	if (isEmpty(inner)) return false;
	return inner.start >= outer.start && inner.end <= outer.end;
}

/**
 * Checks if two intervals share some time.
 * [a, b) and [b, c) touch but do not overlap.
 */
export function overlaps(a: Interval, b: Interval): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * The time shared by both intervals, or null when they do not overlap.
 */
export function intersect(a: Interval, b: Interval): Interval | null {
	const start = Math.max(a.start.getTime(), b.start.getTime());
	const end = Math.min(a.end.getTime(), b.end.getTime());
	if (start >= end) return null;
	return { start: new Date(start), end: new Date(end) };
}

/**
 * Removes `b` from `a`. Yields zero, one or two pieces.
 *
 * @example
 * ```typescript
 * subtract(
 *   { start: d('2024-01-01T09:00:00Z'), end: d('2024-01-01T17:00:00Z') },
 *   { start: d('2024-01-01T12:00:00Z'), end: d('2024-01-01T13:00:00Z') },
 * );
 * // [09:00-12:00, 13:00-17:00]
 * ```
 */
export function subtract(a: Interval, b: Interval): Interval[] {
	if (isEmpty(a)) return [];
	if (!overlaps(a, b)) return [cloneInterval(a)];

	const pieces: Interval[] = [];
	if (a.start < b.start) {
		pieces.push({ start: new Date(a.start.getTime()), end: new Date(b.start.getTime()) });
	}
	if (a.end > b.end) {
		pieces.push({ start: new Date(b.end.getTime()), end: new Date(a.end.getTime()) });
	}
	return pieces;
}

/**
 * Widens an interval by `before` at its start and `after` at its end.
 * Negative amounts shrink it.
 */
export function inflate(interval: Interval, before: number, after: number): Interval {
	return {
		start: new Date(interval.start.getTime() - before),
		end: new Date(interval.end.getTime() + after),
	};
}

// ============================================================================
// Interval Sets
// ============================================================================

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 *
 * @param intervals - Array of intervals to merge (can be unsorted)
 * @returns A sorted array of non-overlapping intervals covering the same total time
 *
 * @example
 * ```typescript
 * const merged = mergeIntervals([
 *   { start: new Date('2024-01-01T10:00:00Z'), end: new Date('2024-01-01T12:00:00Z') },
 *   { start: new Date('2024-01-01T11:00:00Z'), end: new Date('2024-01-01T13:00:00Z') },
 * ]);
 * // [{ start: 2024-01-01T10:00:00Z, end: 2024-01-01T13:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
	const valid = intervals.filter((interval) => !isEmpty(interval)).map(cloneInterval);
	if (valid.length === 0) {
		return [];
	}

	valid.sort(byStartThenEnd);

	const merged: Interval[] = [];
	for (const current of valid) {
		const last = merged[merged.length - 1];
		// [a, b) and [b, c) are adjacent and merge into [a, c)
		if (last && current.start <= last.end) {
			if (current.end > last.end) {
				last.end = current.end;
			}
		} else {
			merged.push(current);
		}
	}

	return merged;
}

/**
 * Removes all time covered by `remove` from `from`.
 * May split intervals when a removed interval punches a hole in the middle.
 *
 * @returns The remaining intervals, merged and sorted
 */
export function subtractIntervals(from: Interval[], remove: Interval[]): Interval[] {
	const mergedFrom = mergeIntervals(from);
	if (mergedFrom.length === 0 || remove.length === 0) {
		return mergedFrom;
	}

	const mergedRemove = mergeIntervals(remove);
	const result: Interval[] = [];

	for (const interval of mergedFrom) {
		let remaining: Interval[] = [interval];
		for (const hole of mergedRemove) {
			if (hole.start >= interval.end) break;
			remaining = remaining.flatMap((piece) => subtract(piece, hole));
		}
		result.push(...remaining);
	}

	return result;
}

/**
 * Computes the time present in both sets.
 *
 * @example
 * ```typescript
 * intersectIntervals(
 *   [{ start: d('2024-01-01T08:00:00Z'), end: d('2024-01-01T12:00:00Z') }],
 *   [{ start: d('2024-01-01T10:00:00Z'), end: d('2024-01-01T14:00:00Z') }],
 * );
 * // [{ start: 2024-01-01T10:00:00Z, end: 2024-01-01T12:00:00Z }]
 * ```
 */
export function intersectIntervals(a: Interval[], b: Interval[]): Interval[] {
	const mergedA = mergeIntervals(a);
	const mergedB = mergeIntervals(b);
	const result: Interval[] = [];

	// Two pointers over sorted, merged inputs
	let i = 0;
	let j = 0;
	while (i < mergedA.length && j < mergedB.length) {
		const intervalA = mergedA[i];
		const intervalB = mergedB[j];

		const shared = intersect(intervalA, intervalB);
		if (shared) {
			result.push(shared);
		}

		// Advance whichever interval ends first
		if (intervalA.end <= intervalB.end) {
			i++;
		} else {
			j++;
		}
	}

	return result;
}

/**
 * Clips every interval to `window`, dropping what falls outside.
 */
export function clampIntervals(intervals: Interval[], window: Interval): Interval[] {
	const result: Interval[] = [];
	for (const interval of intervals) {
		const clipped = intersect(interval, window);
		if (clipped) {
			result.push(clipped);
		}
	}
	return result;
}
