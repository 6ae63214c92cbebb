/**
 * @openslot/bookings
 *
 * Authoritative booking validation and conflict-free writes.
 * Given a proposed meeting, it answers the question:
 * "Can this be booked, and if not, why?"
 */

// ============================================================================
// Types
// ============================================================================

export type {
	BookingDecision,
	BookingRequest,
	BookingStore,
	CancelBookingRequest,
	CancelBookingResult,
	CreateBookingResult,
	CreateBookingsOptions,
	CreateSchedulerOptions,
	InsertResult,
	Rejection,
	RejectionReason,
	ValidateBookingRequest,
} from './types.js';

// ============================================================================
// Validation
// ============================================================================

export { rejectionToError, validateBooking, type ValidateBookingInput } from './validator.js';

// ============================================================================
// Engines
// ============================================================================

export { createBookings, type BookingsEngine } from './bookings.js';
export { createScheduler, type Scheduler } from './scheduler.js';

// ============================================================================
// Infrastructure
// ============================================================================

export { createOwnerLock, type OwnerLock } from './lock.js';
export { createMemoryBookingStore, type MemoryBookingStore } from './memory-store.js';
