/**
 * In-memory BookingStore for single-process deployments and tests.
 */

import { overlaps, type Booking, type BookingStatus } from '@openslot/availability';
import type { BookingStore, InsertResult } from './types.js';

function cloneBooking(booking: Booking): Booking {
	return {
		...booking,
		start: new Date(booking.start.getTime()),
		end: new Date(booking.end.getTime()),
		createdAt: new Date(booking.createdAt.getTime()),
		...(booking.cancelledAt ? { cancelledAt: new Date(booking.cancelledAt.getTime()) } : {}),
	};
}

export interface MemoryBookingStore extends BookingStore {
	/** Every stored booking, cancelled ones included, ordered by start */
	all(): Booking[];
}

/**
 * Creates a store whose conditional insert checks and writes without
 * yielding to the event loop, so no other insert can interleave.
 */
export function createMemoryBookingStore(seed: Booking[] = []): MemoryBookingStore {
	const bookings = new Map<string, Booking>();
	for (const booking of seed) {
		bookings.set(booking.id, cloneBooking(booking));
	}

	function confirmedFor(ownerId: string): Booking[] {
		return [...bookings.values()].filter(
			(booking) => booking.ownerId === ownerId && booking.status === 'confirmed',
		);
	}

	return {
		async getBookings({ ownerId, range }) {
			return confirmedFor(ownerId)
				.filter((booking) => overlaps(booking, range))
				.sort((a, b) => a.start.getTime() - b.start.getTime())
				.map(cloneBooking);
		},

		async findById(bookingId) {
			const booking = bookings.get(bookingId);
			return booking ? cloneBooking(booking) : null;
		},

		async insertIfFree(booking): Promise<InsertResult> {
			if (bookings.has(booking.id)) {
				throw new Error(`Booking id already exists: ${booking.id}`);
			}

			const conflicting = confirmedFor(booking.ownerId).find((existing) => overlaps(existing, booking));
			if (conflicting) {
				return { status: 'conflict', conflicting: cloneBooking(conflicting) };
			}

			bookings.set(booking.id, cloneBooking(booking));
			return { status: 'created', booking: cloneBooking(booking) };
		},

		async updateStatus(bookingId, status: BookingStatus, at) {
			const booking = bookings.get(bookingId);
			if (!booking) {
				return null;
			}

			const updated: Booking =
				status === 'cancelled'
					? { ...booking, status, cancelledAt: new Date(at.getTime()) }
					: { ...booking, status };
			bookings.set(bookingId, updated);
			return cloneBooking(updated);
		},

		all() {
			return [...bookings.values()]
				.sort((a, b) => a.start.getTime() - b.start.getTime())
				.map(cloneBooking);
		},
	};
}
