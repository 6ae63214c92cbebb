/**
 * OpenSlot Core
 *
 * Shared time primitives, errors and logging for OpenSlot packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * A date range for querying time-bounded data.
 * Semantically identical to Interval.
 */
export interface DateRange {
	start: Date;
	end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

/**
 * Opaque identifier for the user who owns calendars, event types and bookings.
 */
export type OwnerId = string;

export const MINUTE: DurationMs = 60 * 1000;
export const HOUR: DurationMs = 60 * MINUTE;
export const DAY: DurationMs = 24 * HOUR;

export {
	AvailabilityError,
	ConflictError,
	NotFoundError,
	SchedulingError,
	SettingsError,
	TimezoneDataError,
	ValidationError,
	isSchedulingError,
	type ErrorCode,
	type ValidationIssue,
} from './errors.js';

export {
	createConsoleLogger,
	silentLogger,
	type LogContext,
	type LogLevel,
	type Logger,
} from './logger.js';
