/**
 * Availability engine with adapter-based data loading.
 */

import { DAY, NotFoundError, ValidationError, silentLogger } from '@openslot/core';
import { z } from 'zod';
import { resolvePolicy } from './buffers.js';
import { resolveAvailability } from './schedule.js';
import { assertEventType, instantSchema, parseInput, rangeSchema } from './schemas.js';
import { getAvailableSlots, slotSearchRange } from './slots.js';
import { loadTimezoneDatabase } from './timezone.js';
import type {
	AvailabilityEngine,
	CreateAvailabilityOptions,
	DateRange,
	EventType,
	OwnerCalendar,
	OwnerId,
	SettingsAdapter,
	Slot,
	SlotQuery,
} from './types.js';

export const DEFAULT_MAX_RANGE_DAYS = 62;

const engineOptionsSchema = z.object({
	maxRangeDays: z.number().int().positive().max(366).default(DEFAULT_MAX_RANGE_DAYS),
});

const slotQuerySchema = z.object({
	ownerId: z.string().min(1),
	eventTypeId: z.string().min(1),
	range: rangeSchema,
	at: instantSchema.optional(),
});

const resolveQuerySchema = z.object({
	ownerId: z.string().min(1),
	range: rangeSchema,
});

export function parseEngineOptions(options: { maxRangeDays?: number }): { maxRangeDays: number } {
	return parseInput(engineOptionsSchema, { maxRangeDays: options.maxRangeDays }, 'engine options');
}

export function assertRangeSpan(range: DateRange, maxRangeDays: number): void {
	const span = range.end.getTime() - range.start.getTime();
	if (span > maxRangeDays * DAY) {
		throw new ValidationError(`Range spans more than ${maxRangeDays} days`, [
			{ path: 'range', message: `Range spans more than ${maxRangeDays} days` },
		]);
	}
}

/**
 * Loads an owner's calendar and one of their event types.
 *
 * @throws NotFoundError when either is missing, or the event type belongs to someone else
 * @throws SettingsError when the event type is malformed
 */
export async function loadBookingContext(
	settings: SettingsAdapter,
	ownerId: OwnerId,
	eventTypeId: string,
): Promise<{ calendar: OwnerCalendar; eventType: EventType }> {
	const [calendar, eventType] = await Promise.all([
		settings.getCalendar(ownerId),
		settings.getEventType(eventTypeId),
	]);

	if (!calendar) {
		throw new NotFoundError('owner', ownerId);
	}
	if (!eventType || eventType.ownerId !== ownerId) {
		throw new NotFoundError('event-type', eventTypeId);
	}
	assertEventType(eventType);

	return { calendar, eventType };
}

/**
 * Create an availability engine with the given adapter.
 *
 * Verifies the timezone database up front, so a runtime without zone data
 * fails here rather than on the first query.
 *
 * @throws TimezoneDataError
 * @throws ValidationError when the options are invalid
 */
export function createAvailability(options: CreateAvailabilityOptions): AvailabilityEngine {
	const { adapter } = options;
	const clock = options.clock ?? (() => new Date());
	const logger = options.logger ?? silentLogger;
	const { maxRangeDays } = parseEngineOptions(options);
	const timezones = loadTimezoneDatabase();

	async function resolve(input: Parameters<AvailabilityEngine['resolve']>[0]) {
		const { ownerId, range } = parseInput(resolveQuerySchema, input, 'availability query');
		assertRangeSpan(range, maxRangeDays);

		const calendar = await adapter.getCalendar(ownerId);
		if (!calendar) {
			throw new NotFoundError('owner', ownerId);
		}
		return resolveAvailability(calendar, range, timezones);
	}

	async function listSlots(input: SlotQuery): Promise<Slot[]> {
		const query = parseInput(slotQuerySchema, input, 'slot query');
		assertRangeSpan(query.range, maxRangeDays);
		const now = query.at ?? clock();

		const { calendar, eventType } = await loadBookingContext(adapter, query.ownerId, query.eventTypeId);
		if (!eventType.active) {
			logger.debug('event type inactive, no slots offered', {
				ownerId: query.ownerId,
				eventTypeId: eventType.id,
			});
			return [];
		}

		const policy = resolvePolicy(calendar.bufferPolicy, eventType);
		const bookings = await adapter.getBookings({
			ownerId: query.ownerId,
			range: slotSearchRange(query.range, policy, eventType.duration),
		});

		const slots = getAvailableSlots({ calendar, eventType, bookings, range: query.range }, now, timezones);

		logger.debug('listed slots', {
			ownerId: query.ownerId,
			eventTypeId: eventType.id,
			rangeStart: query.range.start.toISOString(),
			rangeEnd: query.range.end.toISOString(),
			count: slots.length,
		});

		return slots;
	}

	return {
		resolve,
		listSlots,
	};
}
