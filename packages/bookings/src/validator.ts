/**
 * Authoritative validation of a proposed booking.
 */

import {
	assertEventType,
	bookingWindow,
	containsInterval,
	inflate,
	intersect,
	loadTimezoneDatabase,
	overlaps,
	resolveAvailability,
	resolvePolicy,
	type Booking,
	type EventType,
	type Interval,
	type OwnerCalendar,
	type TimezoneDatabase,
} from '@openslot/availability';
import { AvailabilityError, ConflictError } from '@openslot/core';
import type { BookingDecision, Rejection, RejectionReason } from './types.js';

export interface ValidateBookingInput {
	calendar: OwnerCalendar;
	eventType: EventType;
	/** Bookings of the owner around the proposal; cancelled ones are ignored */
	bookings: Booking[];
	proposal: Interval;
	/** Validation time; notice and advance rules are measured from here */
	now: Date;
}

function reject(reason: RejectionReason, explanation: string, conflictingBookingId?: string): Rejection {
	return conflictingBookingId === undefined
		? { outcome: 'reject', reason, explanation }
		: { outcome: 'reject', reason, explanation, conflictingBookingId };
}

/**
 * Checks a proposed booking against every constraint, in order:
 *
 * 1. **Duration** - end - start equals the event type's duration
 * 2. **Availability** - the proposal lies inside resolved working hours
 * 3. **Notice** - it starts no earlier than now + minimumNotice
 * 4. **Advance** - it ends no later than now + maximumAdvance
 * 5. **Buffers** - the proposal widened by its buffers lies inside working hours
 * 6. **Double booking** - it overlaps no confirmed booking
 * 7. **Booking buffers** - its buffers overlap no confirmed booking
 *
 * Availability is recomputed from the calendar on every call; a slot shown
 * earlier is never trusted. Touching intervals ([a, b) and [b, c)) do not
 * conflict.
 *
 * @throws SettingsError when the calendar or event type is malformed
 */
export function validateBooking(
	input: ValidateBookingInput,
	timezones: TimezoneDatabase = loadTimezoneDatabase(),
): BookingDecision {
	const { calendar, eventType, proposal, now } = input;
	assertEventType(eventType);

	const length = proposal.end.getTime() - proposal.start.getTime();
	if (length !== eventType.duration) {
		return reject(
			'DurationMismatch',
			`Booking lasts ${length}ms but ${eventType.id} lasts ${eventType.duration}ms`,
		);
	}

	const policy = resolvePolicy(calendar.bufferPolicy, eventType);
	const guarded = inflate(proposal, policy.before, policy.after);
	const available = resolveAvailability(calendar, guarded, timezones);

	if (!available.some((interval) => containsInterval(interval, proposal))) {
		return reject('OutsideAvailability', 'Requested time is outside working hours');
	}

	const window = bookingWindow(policy, now);
	if (proposal.start < window.start) {
		return reject(
			'NoticeViolation',
			`Bookings need ${policy.minimumNotice}ms notice; earliest start is ${window.start.toISOString()}`,
		);
	}
	if (proposal.end > window.end) {
		return reject(
			'AdvanceWindowViolation',
			`Bookings must end by ${window.end.toISOString()}`,
		);
	}

	if (!available.some((interval) => containsInterval(interval, guarded))) {
		return reject('BufferViolation', 'Requested time leaves no buffer at the edge of working hours');
	}

	const confirmed = input.bookings.filter(
		(booking) => booking.status === 'confirmed' && booking.ownerId === calendar.ownerId,
	);

	const clash = confirmed.find((booking) => intersect(booking, proposal) !== null);
	if (clash) {
		return reject('DoubleBooking', 'Requested time overlaps an existing booking', clash.id);
	}

	const tooClose = confirmed.find((booking) => overlaps(booking, guarded));
	if (tooClose) {
		return reject('BufferViolation', 'Requested time leaves no buffer around an existing booking', tooClose.id);
	}

	return { outcome: 'accept' };
}

/**
 * Converts a rejection into the user-facing error for its reason.
 */
export function rejectionToError(rejection: Pick<Rejection, 'reason' | 'explanation' | 'conflictingBookingId'>): AvailabilityError | ConflictError {
	switch (rejection.reason) {
		case 'DurationMismatch':
			return new AvailabilityError('DURATION_MISMATCH', rejection.explanation);
		case 'OutsideAvailability':
			return new AvailabilityError('OUTSIDE_AVAILABILITY', rejection.explanation);
		case 'NoticeViolation':
			return new AvailabilityError('NOTICE_VIOLATION', rejection.explanation);
		case 'AdvanceWindowViolation':
			return new AvailabilityError('ADVANCE_WINDOW_VIOLATION', rejection.explanation);
		case 'BufferViolation':
			return new AvailabilityError('BUFFER_VIOLATION', rejection.explanation);
		case 'DoubleBooking':
			return new ConflictError(rejection.explanation, rejection.conflictingBookingId);
	}
}
