/**
 * Expansion of weekly working hours and date exceptions into UTC intervals.
 */

import { clampIntervals, mergeIntervals } from './intervals.js';
import { assertOwnerCalendar } from './schemas.js';
import { dayOfWeek, iterateDates, loadTimezoneDatabase, type TimezoneDatabase } from './timezone.js';
import type {
	AvailabilityException,
	DateRange,
	DayOfWeek,
	Interval,
	LocalDate,
	LocalTime,
	OwnerCalendar,
	WorkingHourRule,
} from './types.js';

interface LocalWindow {
	startTime: LocalTime;
	endTime: LocalTime;
}

type DatedWindow = LocalWindow & Pick<WorkingHourRule, 'validFrom' | 'validUntil'>;

function groupRulesByDay(rules: WorkingHourRule[]): Map<DayOfWeek, DatedWindow[]> {
	const byDay = new Map<DayOfWeek, DatedWindow[]>();
	for (const rule of rules) {
		const windows = byDay.get(rule.day) ?? [];
		windows.push({
			startTime: rule.startTime,
			endTime: rule.endTime,
			validFrom: rule.validFrom,
			validUntil: rule.validUntil,
		});
		byDay.set(rule.day, windows);
	}
	return byDay;
}

function appliesOn(window: DatedWindow, date: LocalDate): boolean {
	return (
		(window.validFrom === undefined || window.validFrom <= date) &&
		(window.validUntil === undefined || date <= window.validUntil)
	);
}

function groupExceptionsByDate(
	exceptions: AvailabilityException[],
): Map<LocalDate, AvailabilityException[]> {
	const byDate = new Map<LocalDate, AvailabilityException[]>();
	for (const exception of exceptions) {
		const entries = byDate.get(exception.date) ?? [];
		entries.push(exception);
		byDate.set(exception.date, entries);
	}
	return byDate;
}

/**
 * The local windows in force on a date. Exceptions take precedence over the
 * weekly rules; a block-out beats any override on the same date.
 */
function windowsForDate(
	date: LocalDate,
	rulesByDay: Map<DayOfWeek, DatedWindow[]>,
	exceptionsByDate: Map<LocalDate, AvailabilityException[]>,
): LocalWindow[] {
	const exceptions = exceptionsByDate.get(date);
	if (!exceptions) {
		return (rulesByDay.get(dayOfWeek(date)) ?? []).filter((window) => appliesOn(window, date));
	}

	const windows: LocalWindow[] = [];
	for (const exception of exceptions) {
		if (exception.kind === 'blocked') {
			return [];
		}
		windows.push({ startTime: exception.startTime, endTime: exception.endTime });
	}
	return windows;
}

/**
 * Resolves an owner's calendar into UTC availability for a date range.
 *
 * For every calendar date (in the owner's timezone) the range touches:
 * 1. If exceptions exist for the date, they replace the weekly rules
 * 2. Otherwise the rules for that day of week whose validity period covers
 *    the date apply
 * 3. Each local window is converted to UTC with the timezone database, so a
 *    window crossing a DST change has its true length
 *
 * The result is merged (adjacent windows on consecutive dates join), sorted
 * and clipped to the range. A date with no rules and no exceptions simply
 * contributes nothing.
 *
 * @throws SettingsError when the calendar violates its invariants
 *
 * @example
 * ```typescript
 * const intervals = resolveAvailability(
 *   {
 *     ownerId: 'owner-1',
 *     timezone: 'America/New_York',
 *     rules: [
 *       { ownerId: 'owner-1', day: 'monday', startTime: '09:00', endTime: '17:00', timezone: 'America/New_York' },
 *     ],
 *     exceptions: [{ ownerId: 'owner-1', date: '2024-01-15', kind: 'blocked' }],
 *     bufferPolicy: { ownerId: 'owner-1', before: 0, after: 0, minimumNotice: 0 },
 *   },
 *   { start: new Date('2024-01-08T00:00:00Z'), end: new Date('2024-01-22T00:00:00Z') },
 * );
 * // [{ start: 2024-01-08T14:00:00Z, end: 2024-01-08T22:00:00Z }]
 * ```
 */
export function resolveAvailability(
	calendar: OwnerCalendar,
	range: DateRange,
	timezones: TimezoneDatabase = loadTimezoneDatabase(),
): Interval[] {
	assertOwnerCalendar(calendar, timezones);

	if (range.start >= range.end) {
		return [];
	}

	const { timezone } = calendar;
	const rulesByDay = groupRulesByDay(calendar.rules);
	const exceptionsByDate = groupExceptionsByDate(calendar.exceptions);

	const firstDate = timezones.dateOf(range.start, timezone);
	const lastDate = timezones.dateOf(new Date(range.end.getTime() - 1), timezone);

	const intervals: Interval[] = [];
	for (const date of iterateDates(firstDate, lastDate)) {
		for (const window of windowsForDate(date, rulesByDay, exceptionsByDate)) {
			intervals.push({
				start: timezones.localToUtc(date, window.startTime, timezone),
				end: timezones.localToUtc(date, window.endTime, timezone),
			});
		}
	}

	return clampIntervals(mergeIntervals(intervals), range);
}
