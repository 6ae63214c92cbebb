/**
 * Booking engine: validated, serialized booking writes.
 */

import { randomUUID } from 'node:crypto';
import {
	inflate,
	instantSchema,
	loadBookingContext,
	loadTimezoneDatabase,
	parseInput,
	resolvePolicy,
	type Booking,
	type EventType,
	type Interval,
} from '@openslot/availability';
import { ValidationError, silentLogger } from '@openslot/core';
import { z } from 'zod';
import { createOwnerLock } from './lock.js';
import type {
	BookingDecision,
	BookingRequest,
	CancelBookingRequest,
	CancelBookingResult,
	CreateBookingResult,
	CreateBookingsOptions,
	ValidateBookingRequest,
} from './types.js';
import { validateBooking } from './validator.js';

const bookingFields = z.object({
	ownerId: z.string().min(1),
	eventTypeId: z.string().min(1),
	start: instantSchema,
	end: instantSchema.optional(),
});

function endsAfterStart(request: { start: Date; end?: Date }): boolean {
	return request.end === undefined || request.start < request.end;
}

const endBeforeStartIssue = { message: 'Booking end must be after its start', path: ['end'] };

// Unknown keys are stripped: a write never takes its reference time from the caller.
const bookingRequestSchema = bookingFields.refine(endsAfterStart, endBeforeStartIssue);

const validateRequestSchema = bookingFields
	.extend({ at: instantSchema.optional() })
	.refine(endsAfterStart, endBeforeStartIssue);

const cancelRequestSchema = z.object({
	bookingId: z.string().min(1),
});

/**
 * Create a booking engine over a settings adapter and a booking store.
 *
 * Writes for the same owner are serialized in-process; the store's
 * conditional insert keeps the no-overlap invariant across processes.
 */
export function createBookings(options: CreateBookingsOptions) {
	const { settings, store } = options;
	const clock = options.clock ?? (() => new Date());
	const logger = options.logger ?? silentLogger;
	const generateId = options.generateId ?? randomUUID;
	const lock = createOwnerLock();
	const timezones = loadTimezoneDatabase();

	async function evaluate(
		ownerId: string,
		eventTypeId: string,
		start: Date,
		end: Date | undefined,
		now: Date,
	): Promise<{ decision: BookingDecision; eventType: EventType; proposal: Interval }> {
		const { calendar, eventType } = await loadBookingContext(settings, ownerId, eventTypeId);
		if (!eventType.active) {
			throw new ValidationError(`Event type ${eventTypeId} is not accepting bookings`, [
				{ path: 'eventTypeId', message: 'Event type is inactive' },
			]);
		}

		const proposal: Interval = {
			start,
			end: end ?? new Date(start.getTime() + eventType.duration),
		};
		const policy = resolvePolicy(calendar.bufferPolicy, eventType);
		const bookings = await store.getBookings({
			ownerId,
			range: inflate(proposal, policy.before, policy.after),
		});

		const decision = validateBooking({ calendar, eventType, bookings, proposal, now }, timezones);
		return { decision, eventType, proposal };
	}

	/**
	 * Dry run: checks a proposed booking without persisting anything.
	 */
	async function validate(input: ValidateBookingRequest): Promise<BookingDecision> {
		const request = parseInput(validateRequestSchema, input, 'booking request');
		const { decision } = await evaluate(
			request.ownerId,
			request.eventTypeId,
			request.start,
			request.end,
			request.at ?? clock(),
		);
		return decision;
	}

	/**
	 * Validates and persists a booking. Notice and advance are measured from
	 * the engine clock at the time of the write.
	 *
	 * Business rejections are returned, not thrown. A rejection with reason
	 * DoubleBooking may come from a concurrent writer that won; callers should
	 * list slots again before retrying.
	 *
	 * @throws ValidationError for malformed input or an inactive event type
	 * @throws NotFoundError for an unknown owner or event type
	 */
	async function createBooking(input: BookingRequest): Promise<CreateBookingResult> {
		const request = parseInput(bookingRequestSchema, input, 'booking request');
		const { ownerId, eventTypeId } = request;

		return lock.run<CreateBookingResult>(ownerId, async () => {
			const now = clock();
			const { decision, proposal } = await evaluate(ownerId, eventTypeId, request.start, request.end, now);

			if (decision.outcome === 'reject') {
				logger.debug('booking rejected', {
					ownerId,
					eventTypeId,
					start: proposal.start.toISOString(),
					reason: decision.reason,
				});
				const { outcome: _outcome, ...rejection } = decision;
				return { status: 'rejected', ...rejection };
			}

			const booking: Booking = {
				id: generateId(),
				ownerId,
				eventTypeId,
				start: proposal.start,
				end: proposal.end,
				status: 'confirmed',
				createdAt: now,
			};

			const result = await store.insertIfFree(booking);
			if (result.status === 'conflict') {
				logger.warn('booking lost a race to a concurrent writer', {
					ownerId,
					eventTypeId,
					start: proposal.start.toISOString(),
					conflictingBookingId: result.conflicting.id,
				});
				return {
					status: 'rejected',
					reason: 'DoubleBooking',
					explanation: 'Requested time was taken by another booking',
					conflictingBookingId: result.conflicting.id,
				};
			}

			logger.info('booking created', {
				bookingId: result.booking.id,
				ownerId,
				eventTypeId,
				start: result.booking.start.toISOString(),
				end: result.booking.end.toISOString(),
			});
			return { status: 'created', booking: result.booking };
		});
	}

	/**
	 * Cancels a booking. Cancelling twice succeeds both times; the second
	 * call changes nothing.
	 */
	async function cancelBooking(input: CancelBookingRequest): Promise<CancelBookingResult> {
		const request = parseInput(cancelRequestSchema, input, 'cancel request');
		const { bookingId } = request;

		const existing = await store.findById(bookingId);
		if (!existing) {
			return { status: 'not-found', bookingId };
		}

		return lock.run<CancelBookingResult>(existing.ownerId, async () => {
			// Re-read under the lock: a concurrent cancel may have landed first
			const current = await store.findById(bookingId);
			if (!current) {
				return { status: 'not-found', bookingId };
			}
			if (current.status === 'cancelled') {
				return { status: 'cancelled', booking: current, alreadyCancelled: true };
			}

			const updated = await store.updateStatus(bookingId, 'cancelled', clock());
			if (!updated) {
				return { status: 'not-found', bookingId };
			}

			logger.info('booking cancelled', { bookingId, ownerId: updated.ownerId });
			return { status: 'cancelled', booking: updated, alreadyCancelled: false };
		});
	}

	return {
		validate,
		createBooking,
		cancelBooking,
	};
}

export type BookingsEngine = ReturnType<typeof createBookings>;
