/**
 * Availability Type Definitions
 *
 * All intervals are half-open: [start, end)
 * All instants are UTC internally; local wall-clock time only appears in
 * working-hour rules and exceptions, and is converted at expansion time.
 */

import type { DateRange, DurationMs, Interval, Logger, OwnerId } from '@openslot/core';

export type { DateRange, DurationMs, Interval, OwnerId };

/**
 * Days of the week used in working-hour rules.
 * Lowercase string literals for consistent parsing.
 */
export type DayOfWeek =
	| 'monday'
	| 'tuesday'
	| 'wednesday'
	| 'thursday'
	| 'friday'
	| 'saturday'
	| 'sunday';

/**
 * A local time string in HH:mm format (24-hour).
 * "24:00" is accepted as an end time and means the following midnight.
 *
 * @example "09:00", "17:30", "00:00", "24:00"
 */
export type LocalTime = string;

/**
 * A calendar date in YYYY-MM-DD format, interpreted in the owner's timezone.
 */
export type LocalDate = string;

/**
 * A recurring weekly window of availability for one day of the week.
 *
 * @example
 * const mondayMorning: WorkingHourRule = {
 *   ownerId: 'owner-1',
 *   day: 'monday',
 *   startTime: '09:00',
 *   endTime: '12:00',
 *   timezone: 'Europe/Berlin',
 * };
 */
export interface WorkingHourRule {
	ownerId: OwnerId;
	day: DayOfWeek;
	/** Start time in HH:mm format (local time) */
	startTime: LocalTime;
	/** End time in HH:mm format (local time); must be after startTime */
	endTime: LocalTime;
	/** IANA timezone identifier; must match the owner's calendar timezone */
	timezone: string;
	/** First local date the rule applies to (inclusive); unbounded when absent */
	validFrom?: LocalDate;
	/** Last local date the rule applies to (inclusive); unbounded when absent */
	validUntil?: LocalDate;
}

/**
 * Replaces the weekly rules for one specific date.
 *
 * @example
 * // Day off
 * const holiday: AvailabilityException = {
 *   ownerId: 'owner-1',
 *   date: '2024-12-25',
 *   kind: 'blocked',
 * };
 *
 * // Short Saturday
 * const saturday: AvailabilityException = {
 *   ownerId: 'owner-1',
 *   date: '2024-01-20',
 *   kind: 'override',
 *   startTime: '10:00',
 *   endTime: '14:00',
 * };
 */
export type AvailabilityException =
	| {
			ownerId: OwnerId;
			date: LocalDate;
			kind: 'blocked';
	  }
	| {
			ownerId: OwnerId;
			date: LocalDate;
			kind: 'override';
			startTime: LocalTime;
			endTime: LocalTime;
	  };

/**
 * An owner's buffer and booking-window policy.
 */
export interface BufferPolicy {
	ownerId: OwnerId;
	/** Idle time required before every meeting */
	before: DurationMs;
	/** Idle time required after every meeting */
	after: DurationMs;
	/** Shortest allowed lead time between now and a meeting start */
	minimumNotice: DurationMs;
	/** Furthest a meeting may end from now; undefined means no limit */
	maximumAdvance?: DurationMs;
}

/**
 * The calendar-settings read model for one owner.
 */
export interface OwnerCalendar {
	ownerId: OwnerId;
	/** IANA timezone identifier used to interpret rules and exceptions */
	timezone: string;
	rules: WorkingHourRule[];
	exceptions: AvailabilityException[];
	bufferPolicy: BufferPolicy;
}

/**
 * A bookable meeting template.
 *
 * @example
 * const intro: EventType = {
 *   id: 'intro-call',
 *   ownerId: 'owner-1',
 *   name: 'Intro call',
 *   duration: 30 * 60 * 1000,
 *   step: 15 * 60 * 1000,
 *   active: true,
 * };
 */
export interface EventType {
	id: string;
	ownerId: OwnerId;
	name: string;
	/** Length of the meeting */
	duration: DurationMs;
	/** Granularity of offered start times */
	step: DurationMs;
	/** Inactive event types offer no slots and accept no bookings */
	active: boolean;
	/** Overrides the owner's pre-meeting buffer for this event type */
	bufferBefore?: DurationMs;
	/** Overrides the owner's post-meeting buffer for this event type */
	bufferAfter?: DurationMs;
	/** Overrides the owner's minimum notice for this event type */
	minimumNotice?: DurationMs;
	/** Overrides the owner's advance window for this event type */
	maximumAdvance?: DurationMs;
}

/**
 * The buffer policy in force for one event type: owner policy with the
 * event type's overrides applied.
 */
export interface EffectivePolicy {
	before: DurationMs;
	after: DurationMs;
	minimumNotice: DurationMs;
	maximumAdvance?: DurationMs;
}

export type BookingStatus = 'confirmed' | 'cancelled';

/**
 * A booking. Start and end are absolute instants, never local time.
 */
export interface Booking {
	id: string;
	ownerId: OwnerId;
	eventTypeId: string;
	start: Date;
	end: Date;
	status: BookingStatus;
	createdAt: Date;
	cancelledAt?: Date;
}

/**
 * A bookable time slot returned by the engine.
 */
export interface Slot {
	ownerId: OwnerId;
	eventTypeId: string;
	/** Start of the slot (inclusive) */
	start: Date;
	/** End of the slot (exclusive); equals start + eventType.duration */
	end: Date;
}

/**
 * Read access to the calendar-settings module.
 */
export interface SettingsAdapter {
	getCalendar: (ownerId: OwnerId) => Promise<OwnerCalendar | null>;
	getEventType: (eventTypeId: string) => Promise<EventType | null>;
}

/**
 * Settings plus read access to confirmed bookings.
 */
export interface AvailabilityAdapter extends SettingsAdapter {
	/** Confirmed bookings of the owner overlapping the range */
	getBookings: (query: { ownerId: OwnerId; range: DateRange }) => Promise<Booking[]>;
}

/**
 * An instant at the public boundary: a Date, or an ISO-8601 string with an
 * explicit offset ("2024-01-15T09:00:00Z", "2024-01-15T10:00:00+01:00").
 */
export type InstantInput = Date | string;

export interface SlotQuery {
	ownerId: OwnerId;
	eventTypeId: string;
	range: { start: InstantInput; end: InstantInput };
	/** Reference time for notice and advance rules; defaults to the engine clock */
	at?: InstantInput;
}

export interface CreateAvailabilityOptions {
	adapter: AvailabilityAdapter;
	clock?: () => Date;
	logger?: Logger;
	/** Widest range a single slot query may span, in days */
	maxRangeDays?: number;
}

export interface AvailabilityEngine {
	/** Working hours of the owner as UTC intervals, before bookings and buffers */
	resolve: (input: { ownerId: OwnerId; range: { start: InstantInput; end: InstantInput } }) => Promise<Interval[]>;
	listSlots: (query: SlotQuery) => Promise<Slot[]>;
}
