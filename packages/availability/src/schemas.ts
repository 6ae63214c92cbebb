/**
 * Runtime validation for data crossing the package boundary.
 *
 * Caller input that fails validation raises ValidationError. Settings loaded
 * through an adapter that fail validation raise SettingsError: they were
 * written by another module and are expected to be well formed.
 */

import { DAY, SettingsError, ValidationError, type ValidationIssue } from '@openslot/core';
import { z } from 'zod';
import { isLocalDate, isLocalTime, minutesOfDay, type TimezoneDatabase } from './timezone.js';
import type { DayOfWeek, EventType, OwnerCalendar } from './types.js';

const DAYS = [
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
	'sunday',
] as const satisfies readonly DayOfWeek[];

// ============================================================================
// Primitives
// ============================================================================

export const instantSchema = z.union([
	z.date(),
	z
		.string()
		.datetime({ offset: true, message: 'Expected an ISO-8601 instant with an explicit offset' })
		.transform((value) => new Date(value)),
]);

/** Longest buffer, notice, advance window, meeting or step a setting may hold */
export const MAX_SETTING_DURATION = 100 * 366 * DAY;

const durationSchema = z
	.number()
	.int()
	.nonnegative()
	.max(MAX_SETTING_DURATION, 'Must be at most 100 years');
const positiveDurationSchema = durationSchema.positive();
const idSchema = z.string().min(1);
const localTimeSchema = z.string().refine(isLocalTime, 'Expected HH:mm');
const localDateSchema = z.string().refine(isLocalDate, 'Expected YYYY-MM-DD');

export const rangeSchema = z
	.object({ start: instantSchema, end: instantSchema })
	.refine((range) => range.start < range.end, {
		message: 'Range start must be before range end',
		path: ['end'],
	});

// ============================================================================
// Settings
// ============================================================================

const workingHourRuleSchema = z.object({
	ownerId: idSchema,
	day: z.enum(DAYS),
	startTime: localTimeSchema,
	endTime: localTimeSchema,
	timezone: z.string().min(1),
	validFrom: localDateSchema.optional(),
	validUntil: localDateSchema.optional(),
});

const exceptionSchema = z.discriminatedUnion('kind', [
	z.object({ ownerId: idSchema, date: localDateSchema, kind: z.literal('blocked') }),
	z.object({
		ownerId: idSchema,
		date: localDateSchema,
		kind: z.literal('override'),
		startTime: localTimeSchema,
		endTime: localTimeSchema,
	}),
]);

const bufferPolicySchema = z.object({
	ownerId: idSchema,
	before: durationSchema,
	after: durationSchema,
	minimumNotice: durationSchema,
	maximumAdvance: durationSchema.optional(),
});

const ownerCalendarSchema = z.object({
	ownerId: idSchema,
	timezone: z.string().min(1),
	rules: z.array(workingHourRuleSchema),
	exceptions: z.array(exceptionSchema),
	bufferPolicy: bufferPolicySchema,
});

const eventTypeSchema = z.object({
	id: idSchema,
	ownerId: idSchema,
	name: z.string(),
	duration: positiveDurationSchema,
	step: positiveDurationSchema,
	active: z.boolean(),
	bufferBefore: durationSchema.optional(),
	bufferAfter: durationSchema.optional(),
	minimumNotice: durationSchema.optional(),
	maximumAdvance: durationSchema.optional(),
});

// ============================================================================
// Helpers
// ============================================================================

export function toIssues(error: z.ZodError): ValidationIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.join('.'),
		message: issue.message,
	}));
}

function describeIssues(issues: ValidationIssue[]): string {
	return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Parses caller input, raising ValidationError with every issue found.
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
	const result = schema.safeParse(value);
	if (!result.success) {
		const issues = toIssues(result.error);
		throw new ValidationError(`Invalid ${what}: ${describeIssues(issues)}`, issues);
	}
	return result.data;
}

/**
 * Checks shape and invariants of an owner's calendar settings.
 *
 * Invariants: every rule has start < end, the owner's timezone and
 * validFrom <= validUntil; rules on the same day with overlapping validity
 * periods do not overlap in time; override exceptions have start < end; the
 * timezone is known to the database.
 *
 * @throws SettingsError
 */
export function assertOwnerCalendar(calendar: OwnerCalendar, timezones: TimezoneDatabase): void {
	const parsed = ownerCalendarSchema.safeParse(calendar);
	if (!parsed.success) {
		throw new SettingsError(calendar.ownerId, describeIssues(toIssues(parsed.error)));
	}

	const { ownerId, timezone } = calendar;
	if (!timezones.isKnown(timezone)) {
		throw new SettingsError(ownerId, `unknown timezone "${timezone}"`);
	}

	const byDay = new Map<DayOfWeek, { start: number; end: number; from: string; until: string }[]>();
	for (const rule of calendar.rules) {
		if (rule.ownerId !== ownerId) {
			throw new SettingsError(ownerId, `rule on ${rule.day} belongs to ${rule.ownerId}`);
		}
		if (rule.timezone !== timezone) {
			throw new SettingsError(
				ownerId,
				`rule on ${rule.day} uses timezone "${rule.timezone}", calendar uses "${timezone}"`,
			);
		}

		const start = minutesOfDay(rule.startTime);
		const end = minutesOfDay(rule.endTime);
		if (start >= end) {
			throw new SettingsError(ownerId, `rule on ${rule.day} ends before it starts (${rule.startTime}-${rule.endTime})`);
		}

		// Absent bounds compare as the ends of the calendar
		const from = rule.validFrom ?? '0000-01-01';
		const until = rule.validUntil ?? '9999-12-31';
		if (from > until) {
			throw new SettingsError(ownerId, `rule on ${rule.day} is valid until ${until}, before ${from}`);
		}

		const sameDay = byDay.get(rule.day) ?? [];
		const concurrent = (other: { from: string; until: string }) => from <= other.until && other.from <= until;
		if (sameDay.some((other) => concurrent(other) && start < other.end && other.start < end)) {
			throw new SettingsError(ownerId, `rules overlap on ${rule.day}`);
		}
		sameDay.push({ start, end, from, until });
		byDay.set(rule.day, sameDay);
	}

	for (const exception of calendar.exceptions) {
		if (exception.ownerId !== ownerId) {
			throw new SettingsError(ownerId, `exception on ${exception.date} belongs to ${exception.ownerId}`);
		}
		if (
			exception.kind === 'override' &&
			minutesOfDay(exception.startTime) >= minutesOfDay(exception.endTime)
		) {
			throw new SettingsError(
				ownerId,
				`exception on ${exception.date} ends before it starts (${exception.startTime}-${exception.endTime})`,
			);
		}
	}

	if (calendar.bufferPolicy.ownerId !== ownerId) {
		throw new SettingsError(ownerId, `buffer policy belongs to ${calendar.bufferPolicy.ownerId}`);
	}
}

/**
 * @throws SettingsError
 */
export function assertEventType(eventType: EventType): void {
	const parsed = eventTypeSchema.safeParse(eventType);
	if (!parsed.success) {
		throw new SettingsError(
			eventType.ownerId,
			`event type ${eventType.id}: ${describeIssues(toIssues(parsed.error))}`,
		);
	}
}
