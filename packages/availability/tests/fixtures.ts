import type { Booking, EventType, OwnerCalendar, WorkingHourRule } from '../src/types.js';

export const d = (iso: string) => new Date(iso);
export const minutes = (n: number) => n * 60 * 1000;
export const hours = (n: number) => n * 60 * 60 * 1000;

export const OWNER = 'owner-1';

export function rule(
	day: WorkingHourRule['day'],
	startTime: string,
	endTime: string,
	timezone = 'UTC',
): WorkingHourRule {
	return { ownerId: OWNER, day, startTime, endTime, timezone };
}

/**
 * Monday 09:00-17:00 in UTC with no buffers, notice or advance limit.
 */
export function calendar(overrides: Partial<OwnerCalendar> = {}): OwnerCalendar {
	return {
		ownerId: OWNER,
		timezone: 'UTC',
		rules: [rule('monday', '09:00', '17:00')],
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
