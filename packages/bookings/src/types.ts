/**
 * Booking Type Definitions
 */

import type {
	Booking,
	BookingStatus,
	DateRange,
	InstantInput,
	OwnerId,
	SettingsAdapter,
} from '@openslot/availability';
import type { Logger } from '@openslot/core';

/**
 * Why a proposed booking was refused. Each maps to a distinct user-facing error.
 */
export type RejectionReason =
	| 'DurationMismatch'
	| 'OutsideAvailability'
	| 'NoticeViolation'
	| 'AdvanceWindowViolation'
	| 'BufferViolation'
	| 'DoubleBooking';

export interface Rejection {
	outcome: 'reject';
	reason: RejectionReason;
	explanation: string;
	/** Set for DoubleBooking and booking-buffer violations */
	conflictingBookingId?: string;
}

/**
 * The result of validating a proposed booking.
 */
export type BookingDecision = { outcome: 'accept' } | Rejection;

/**
 * Result of the store's conditional insert.
 */
export type InsertResult =
	| { status: 'created'; booking: Booking }
	| { status: 'conflict'; conflicting: Booking };

/**
 * Persistence contract for bookings.
 *
 * `insertIfFree` must be atomic with respect to other writers, including
 * other processes: it inserts the booking only if no confirmed booking of the
 * same owner overlaps [start, end), typically through a storage-level
 * exclusion constraint or a conditional write.
 */
export interface BookingStore {
	/** Confirmed bookings of the owner overlapping the range */
	getBookings: (query: { ownerId: OwnerId; range: DateRange }) => Promise<Booking[]>;
	findById: (bookingId: string) => Promise<Booking | null>;
	insertIfFree: (booking: Booking) => Promise<InsertResult>;
	/** Sets the status; returns the updated booking or null if it does not exist */
	updateStatus: (bookingId: string, status: BookingStatus, at: Date) => Promise<Booking | null>;
}

export interface BookingRequest {
	ownerId: OwnerId;
	eventTypeId: string;
	start: InstantInput;
	/** Defaults to start + the event type's duration */
	end?: InstantInput;
}

/**
 * A dry-run check. Writes always measure notice and advance from the engine
 * clock; a validation may ask what the answer would be at another time.
 */
export interface ValidateBookingRequest extends BookingRequest {
	/** Reference time for notice and advance rules; defaults to the engine clock */
	at?: InstantInput;
}

export type CreateBookingResult =
	| { status: 'created'; booking: Booking }
	| ({ status: 'rejected' } & Omit<Rejection, 'outcome'>);

export interface CancelBookingRequest {
	bookingId: string;
}

export type CancelBookingResult =
	| { status: 'cancelled'; booking: Booking; alreadyCancelled: boolean }
	| { status: 'not-found'; bookingId: string };

export interface CreateBookingsOptions {
	settings: SettingsAdapter;
	store: BookingStore;
	clock?: () => Date;
	logger?: Logger;
	generateId?: () => string;
}

export interface CreateSchedulerOptions extends CreateBookingsOptions {
	/** Widest range a single slot query may span, in days */
	maxRangeDays?: number;
}
