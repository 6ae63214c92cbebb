import type { Booking, EventType, OwnerCalendar, SettingsAdapter } from '@openslot/availability';

export const d = (iso: string) => new Date(iso);
export const minutes = (n: number) => n * 60 * 1000;
export const hours = (n: number) => n * 60 * 60 * 1000;

export const OWNER = 'owner-1';

/**
 * Monday 09:00-17:00 in UTC with no buffers, notice or advance limit.
 */
export function calendar(overrides: Partial<OwnerCalendar> = {}): OwnerCalendar {
	return {
		ownerId: OWNER,
		timezone: 'UTC',
		rules: [{ ownerId: OWNER, day: 'monday', startTime: '09:00', endTime: '17:00', timezone: 'UTC' }],
		exceptions: [],
		bufferPolicy: { ownerId: OWNER, before: 0, after: 0, minimumNotice: 0 },
		...overrides,
	};
}

export function eventType(overrides: Partial<EventType> = {}): EventType {
	return {
		id: 'intro',
		ownerId: OWNER,
		name: 'Intro call',
		duration: minutes(30),
		step: minutes(30),
		active: true,
		...overrides,
	};
}

export function booking(id: string, start: string, end: string, overrides: Partial<Booking> = {}): Booking {
	return {
		id,
		ownerId: OWNER,
		eventTypeId: 'intro',
		start: d(start),
		end: d(end),
		status: 'confirmed',
		createdAt: d('2024-01-01T00:00:00Z'),
		...overrides,
	};
}

export function createSettings(
	data: { calendars?: OwnerCalendar[]; eventTypes?: EventType[] } = {},
): SettingsAdapter {
	const calendars = data.calendars ?? [calendar()];
	const eventTypes = data.eventTypes ?? [eventType()];
	return {
		async getCalendar(ownerId) {
			return calendars.find((entry) => entry.ownerId === ownerId) ?? null;
		},
		async getEventType(eventTypeId) {
			return eventTypes.find((entry) => entry.id === eventTypeId) ?? null;
		},
	};
}

/**
 * Sequential ids: b-1, b-2, ...
 */
export function sequentialIds(prefix = 'b'): () => string {
	let next = 0;
	return () => `${prefix}-${++next}`;
}
