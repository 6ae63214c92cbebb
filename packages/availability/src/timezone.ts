/**
 * Timezone database access.
 *
 * All local-time interpretation goes through here. The database is verified
 * once per process and then shared as a frozen, read-only object.
 */

import { TimezoneDataError } from '@openslot/core';
import { addDays as addCalendarDays, format, getDay, isValid, parse } from 'date-fns';
import { formatInTimeZone, fromZonedTime, getTimezoneOffset } from 'date-fns-tz';
import type { DayOfWeek, LocalDate, LocalTime } from './types.js';

const DAY_INDEX_TO_NAME: DayOfWeek[] = [
	'sunday',
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
];

const LOCAL_DATE_FORMAT = 'yyyy-MM-dd';
const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const LOCAL_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$|^24:00$/;

export interface TimezoneDatabase {
	/** Canonical zone identifiers known to the runtime */
	readonly zones: readonly string[];
	/** True for IANA identifiers (canonical or alias) the runtime can resolve */
	isKnown(timezone: string): boolean;
	/** The instant at which the wall clock in `timezone` reads `date` `time` */
	localToUtc(date: LocalDate, time: LocalTime, timezone: string): Date;
	/** The calendar date of `instant` in `timezone` */
	dateOf(instant: Date, timezone: string): LocalDate;
}

// Known offsets used to prove the runtime carries real zone rules, not just UTC.
const PROBES: { timezone: string; at: string; offsetMinutes: number }[] = [
	{ timezone: 'America/New_York', at: '2024-01-15T12:00:00Z', offsetMinutes: -300 },
	{ timezone: 'America/New_York', at: '2024-07-15T12:00:00Z', offsetMinutes: -240 },
	{ timezone: 'Asia/Kolkata', at: '2024-01-15T12:00:00Z', offsetMinutes: 330 },
];

let loaded: TimezoneDatabase | undefined;

function canonicalName(timezone: string): string | null {
	try {
		return new Intl.DateTimeFormat('en-US', { timeZone: timezone }).resolvedOptions().timeZone;
	} catch {
		// RangeError: the runtime does not know this identifier
		return null;
	}
}

function buildDatabase(): TimezoneDatabase {
	let zones: string[];
	try {
		zones = Intl.supportedValuesOf('timeZone');
	} catch (error) {
		throw new TimezoneDataError('Runtime does not expose a timezone list', { cause: error });
	}
	if (zones.length === 0) {
		throw new TimezoneDataError('Runtime timezone list is empty');
	}

	for (const probe of PROBES) {
		const offset = getTimezoneOffset(probe.timezone, new Date(probe.at));
		if (offset !== probe.offsetMinutes * 60 * 1000) {
			throw new TimezoneDataError(
				`Timezone rules for ${probe.timezone} are missing or wrong (offset ${offset}ms at ${probe.at})`,
			);
		}
	}

	const known = new Set<string>([...zones, 'UTC']);

	return Object.freeze({
		zones: Object.freeze([...zones]),
		isKnown(timezone: string): boolean {
			if (known.has(timezone)) return true;
			const canonical = canonicalName(timezone);
			return canonical !== null && known.has(canonical);
		},
		localToUtc(date: LocalDate, time: LocalTime, timezone: string): Date {
			if (time === '24:00') {
				return fromZonedTime(`${addDays(date, 1)}T00:00:00`, timezone);
			}
			return fromZonedTime(`${date}T${time}:00`, timezone);
		},
		dateOf(instant: Date, timezone: string): LocalDate {
			return formatInTimeZone(instant, timezone, LOCAL_DATE_FORMAT);
		},
	});
}

/**
 * Loads and verifies the timezone database. Later calls return the same
 * instance.
 *
 * @throws TimezoneDataError when the runtime lacks usable zone data
 */
export function loadTimezoneDatabase(): TimezoneDatabase {
	if (!loaded) {
		loaded = buildDatabase();
	}
	return loaded;
}

// ============================================================================
// Calendar Dates
// ============================================================================

export function isLocalDate(value: string): boolean {
	return LOCAL_DATE_PATTERN.test(value) && isValid(parseLocalDate(value));
}

export function isLocalTime(value: string): boolean {
	return LOCAL_TIME_PATTERN.test(value);
}

/**
 * Minutes since midnight for an HH:mm string ("24:00" is 1440).
 */
export function minutesOfDay(time: LocalTime): number {
	const [hours, minutes] = time.split(':').map(Number);
	return hours * 60 + minutes;
}

// Calendar dates are handled as host-local midnights; only the Y-M-D fields
// are ever read back, so the host timezone cancels out.
function parseLocalDate(date: LocalDate): Date {
	return parse(date, LOCAL_DATE_FORMAT, new Date(0));
}

/**
 * Calendar arithmetic on YYYY-MM-DD strings; independent of any timezone.
 */
export function addDays(date: LocalDate, days: number): LocalDate {
	return format(addCalendarDays(parseLocalDate(date), days), LOCAL_DATE_FORMAT);
}

export function dayOfWeek(date: LocalDate): DayOfWeek {
	return DAY_INDEX_TO_NAME[getDay(parseLocalDate(date))];
}

/**
 * Every calendar date from `first` to `last`, inclusive.
 */
export function* iterateDates(first: LocalDate, last: LocalDate): Generator<LocalDate> {
	for (let current = first; current <= last; current = addDays(current, 1)) {
		yield current;
	}
}
