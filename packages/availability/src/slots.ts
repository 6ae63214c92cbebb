/**
 * Slot generation: turns buffered free time into discrete start times.
 */

import { applyBufferPolicy, resolvePolicy } from './buffers.js';
import { subtractIntervals } from './intervals.js';
import { resolveAvailability } from './schedule.js';
import { assertEventType } from './schemas.js';
import { loadTimezoneDatabase, type TimezoneDatabase } from './timezone.js';
import type {
	Booking,
	DateRange,
	DurationMs,
	EffectivePolicy,
	EventType,
	Interval,
	OwnerCalendar,
	Slot,
} from './types.js';

/**
 * Rounds an instant up to the next multiple of `step` since the Unix epoch.
 * Anchoring to a fixed epoch keeps slot boundaries identical across
 * overlapping queries.
 */
export function alignToStep(instant: number, step: DurationMs): number {
	return Math.ceil(instant / step) * step;
}

/**
 * Lazily yields candidate start times inside each interval.
 *
 * For each interval the first candidate is the interval start aligned to
 * `step`; candidates then advance by `step` while `candidate + duration`
 * still fits. Intervals shorter than `duration` yield nothing.
 *
 * The returned iterable restarts from the beginning on every iteration.
 *
 * @example
 * ```typescript
 * const starts = generateSlots(
 *   [{ start: d('2024-01-01T09:10:00Z'), end: d('2024-01-01T10:30:00Z') }],
 *   { duration: 30 * MINUTE, step: 15 * MINUTE },
 * );
 * [...starts]; // 09:15, 09:30, 09:45, 10:00
 * ```
 */
export function generateSlots(
	intervals: readonly Interval[],
	options: { duration: DurationMs; step: DurationMs },
): Iterable<Date> {
	const { duration, step } = options;
	if (!(duration > 0) || !(step > 0)) {
		throw new RangeError(`duration and step must be positive (got ${duration}, ${step})`);
	}

	return {
		*[Symbol.iterator]() {
			for (const interval of intervals) {
				const end = interval.end.getTime();
				for (
					let candidate = alignToStep(interval.start.getTime(), step);
					candidate + duration <= end;
					candidate += step
				) {
					yield new Date(candidate);
				}
			}
		},
	};
}

/**
 * The range that must be resolved (and whose bookings must be loaded) to list
 * slots starting inside `range`: wide enough that buffers and the event
 * duration at either edge see the real availability.
 */
export function slotSearchRange(range: DateRange, policy: EffectivePolicy, eventDuration: DurationMs): DateRange {
	const pad = policy.before + policy.after + eventDuration;
	return {
		start: new Date(range.start.getTime() - pad),
		end: new Date(range.end.getTime() + pad),
	};
}

/**
 * Input for the pure slot computation.
 */
export interface GetAvailableSlotsInput {
	calendar: OwnerCalendar;
	eventType: EventType;
	/** Bookings of the owner; cancelled ones are ignored */
	bookings: Booking[];
	/** Slots starting in this range are returned */
	range: DateRange;
}

/**
 * Computes bookable slots for one owner and event type.
 *
 * 1. **Resolve** working hours and exceptions to UTC intervals
 * 2. **Subtract** confirmed bookings
 * 3. **Buffer** - shrink by the effective buffers, apply notice and advance window
 * 4. **Generate** aligned candidates of the event's duration
 * 5. **Filter** to candidates starting inside the requested range
 *
 * @param now - Reference time for notice and advance rules (defaults to new Date())
 * @throws SettingsError when the calendar or event type is malformed
 */
export function getAvailableSlots(
	input: GetAvailableSlotsInput,
	now: Date = new Date(),
	timezones: TimezoneDatabase = loadTimezoneDatabase(),
): Slot[] {
	const { calendar, eventType, bookings, range } = input;
	assertEventType(eventType);
	if (!eventType.active) {
		return [];
	}

	const policy = resolvePolicy(calendar.bufferPolicy, eventType);
	const available = resolveAvailability(
		calendar,
		slotSearchRange(range, policy, eventType.duration),
		timezones,
	);

	const busy = bookings
		.filter((booking) => booking.status === 'confirmed' && booking.ownerId === calendar.ownerId)
		.map((booking) => ({ start: booking.start, end: booking.end }));
	const free = subtractIntervals(available, busy);

	const buffered = applyBufferPolicy(free, policy, { now, minDuration: eventType.duration });

	const slots: Slot[] = [];
	for (const start of generateSlots(buffered, eventType)) {
		if (start < range.start) continue;
		if (start >= range.end) break;
		slots.push({
			ownerId: calendar.ownerId,
			eventTypeId: eventType.id,
			start,
			end: new Date(start.getTime() + eventType.duration),
		});
	}

	return slots;
}
