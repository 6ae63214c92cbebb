/**
 * @openslot/availability
 *
 * Resolves working hours, exceptions and buffer policy into bookable slots.
 * Given an owner's calendar settings, their bookings and an event type,
 * it answers the question: "When can this meeting start?"
 *
 * @packageDocumentation
 */

// Interval arithmetic
export {
	clampIntervals,
	contains,
	containsInterval,
	duration,
	inflate,
	intersect,
	intersectIntervals,
	isEmpty,
	mergeIntervals,
	overlaps,
	subtract,
	subtractIntervals,
} from './intervals.js';
// Timezone database
export {
	addDays,
	dayOfWeek,
	loadTimezoneDatabase,
	type TimezoneDatabase,
} from './timezone.js';
// Rule expansion
export { resolveAvailability } from './schedule.js';
// Buffer policy
export { applyBufferPolicy, bookingWindow, resolvePolicy } from './buffers.js';
// Slot generation
export {
	alignToStep,
	generateSlots,
	getAvailableSlots,
	slotSearchRange,
	type GetAvailableSlotsInput,
} from './slots.js';
// Boundary validation
export {
	MAX_SETTING_DURATION,
	assertEventType,
	assertOwnerCalendar,
	instantSchema,
	parseInput,
	rangeSchema,
} from './schemas.js';
// Adapter-based engine
export {
	DEFAULT_MAX_RANGE_DAYS,
	assertRangeSpan,
	createAvailability,
	loadBookingContext,
	parseEngineOptions,
} from './engine.js';

export type {
	AvailabilityAdapter,
	AvailabilityEngine,
	AvailabilityException,
	Booking,
	BookingStatus,
	BufferPolicy,
	CreateAvailabilityOptions,
	DateRange,
	DayOfWeek,
	DurationMs,
	EffectivePolicy,
	EventType,
	InstantInput,
	Interval,
	LocalDate,
	LocalTime,
	OwnerCalendar,
	OwnerId,
	SettingsAdapter,
	Slot,
	SlotQuery,
	WorkingHourRule,
} from './types.js';
