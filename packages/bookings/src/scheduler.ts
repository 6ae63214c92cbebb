/**
 * The scheduling surface exposed to an HTTP layer: slot listing plus
 * validated booking writes over one settings adapter and one store.
 */

import { createAvailability, type AvailabilityAdapter } from '@openslot/availability';
import { createBookings } from './bookings.js';
import type { CreateSchedulerOptions } from './types.js';

export function createScheduler(options: CreateSchedulerOptions) {
	const { settings, store, clock, logger, generateId, maxRangeDays } = options;

	const adapter: AvailabilityAdapter = {
		getCalendar: (ownerId) => settings.getCalendar(ownerId),
		getEventType: (eventTypeId) => settings.getEventType(eventTypeId),
		getBookings: (query) => store.getBookings(query),
	};

	const availability = createAvailability({ adapter, clock, logger, maxRangeDays });
	const bookings = createBookings({ settings, store, clock, logger, generateId });

	return {
		resolveAvailability: availability.resolve,
		listSlots: availability.listSlots,
		validate: bookings.validate,
		createBooking: bookings.createBooking,
		cancelBooking: bookings.cancelBooking,
	};
}

export type Scheduler = ReturnType<typeof createScheduler>;
