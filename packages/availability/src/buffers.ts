/**
 * Buffer, minimum-notice and advance-window rules.
 */

import { clampIntervals, duration, inflate } from './intervals.js';
import type { BufferPolicy, DurationMs, EffectivePolicy, EventType, Interval } from './types.js';

/** Latest instant a booking window reaches; used when no advance window is configured */
const FAR_FUTURE = new Date('9999-12-31T23:59:59.999Z').getTime();

function capped(instant: number): Date {
	return new Date(Math.min(instant, FAR_FUTURE));
}

/**
 * Merges an owner's buffer policy with an event type's overrides,
 * the override winning.
 */
export function resolvePolicy(
	policy: BufferPolicy,
	eventType?: Pick<EventType, 'bufferBefore' | 'bufferAfter' | 'minimumNotice' | 'maximumAdvance'>,
): EffectivePolicy {
	return {
		before: eventType?.bufferBefore ?? policy.before,
		after: eventType?.bufferAfter ?? policy.after,
		minimumNotice: eventType?.minimumNotice ?? policy.minimumNotice,
		maximumAdvance: eventType?.maximumAdvance ?? policy.maximumAdvance,
	};
}

/**
 * The span in which meetings may take place as seen at `now`:
 * [now + minimumNotice, now + maximumAdvance), neither end later than
 * 9999-12-31T23:59:59.999Z. Empty when the advance window is shorter than the notice.
 */
export function bookingWindow(policy: EffectivePolicy, now: Date): Interval {
	const start = capped(now.getTime() + policy.minimumNotice);
	const end = capped(
		policy.maximumAdvance === undefined ? FAR_FUTURE : now.getTime() + policy.maximumAdvance,
	);
	return { start, end };
}

/**
 * Applies a buffer policy to free time.
 *
 * 1. **Shrink** - each interval loses `before` at its start and `after` at its end
 * 2. **Notice** - intersect with [now + minimumNotice, +inf)
 * 3. **Advance** - intersect with (-inf, now + maximumAdvance]
 * 4. **Drop** - pieces shorter than `minDuration` are removed
 *
 * @param intervals - Free intervals, sorted and non-overlapping
 * @param policy - The effective policy for the event type being booked
 * @param options.now - Reference time for notice and advance rules
 * @param options.minDuration - Shortest interval worth keeping (the event duration)
 */
export function applyBufferPolicy(
	intervals: Interval[],
	policy: EffectivePolicy,
	options: { now: Date; minDuration: DurationMs },
): Interval[] {
	const shrunk = intervals.map((interval) => inflate(interval, -policy.before, -policy.after));
	const windowed = clampIntervals(shrunk, bookingWindow(policy, options.now));
	return windowed.filter((interval) => duration(interval) >= options.minDuration);
}
