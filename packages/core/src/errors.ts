/**
 * Error taxonomy shared by every OpenSlot package.
 *
 * Expected business outcomes (a slot outside working hours, a double booking)
 * are returned as values by the engines. These classes exist for the caller
 * that wants to surface such an outcome as an error, and for the conditions
 * that really are failures (bad input, unknown records, corrupt settings).
 */

export type ErrorCode =
	| 'VALIDATION_ERROR'
	| 'OUTSIDE_AVAILABILITY'
	| 'BUFFER_VIOLATION'
	| 'NOTICE_VIOLATION'
	| 'ADVANCE_WINDOW_VIOLATION'
	| 'DURATION_MISMATCH'
	| 'DOUBLE_BOOKING'
	| 'NOT_FOUND'
	| 'TIMEZONE_DATA_ERROR'
	| 'SETTINGS_ERROR';

/**
 * A single problem found while validating input.
 */
export interface ValidationIssue {
	/** Dotted path to the offending field; empty for the input as a whole */
	path: string;
	message: string;
}

export class SchedulingError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * Malformed input, rejected before any availability logic runs.
 */
export class ValidationError extends SchedulingError {
	readonly issues: ValidationIssue[];

	constructor(message: string, issues: ValidationIssue[] = []) {
		super('VALIDATION_ERROR', message);
		this.issues = issues;
	}
}

/**
 * The requested time is not bookable. The user can retry with another slot.
 */
export class AvailabilityError extends SchedulingError {
	constructor(
		code:
			| 'OUTSIDE_AVAILABILITY'
			| 'BUFFER_VIOLATION'
			| 'NOTICE_VIOLATION'
			| 'ADVANCE_WINDOW_VIOLATION'
			| 'DURATION_MISMATCH',
		message: string,
	) {
		super(code, message);
	}
}

/**
 * The requested time is taken, possibly by a booking that won a race.
 * The caller should list slots again before resubmitting.
 */
export class ConflictError extends SchedulingError {
	readonly conflictingBookingId: string | undefined;

	constructor(message: string, conflictingBookingId?: string) {
		super('DOUBLE_BOOKING', message);
		this.conflictingBookingId = conflictingBookingId;
	}
}

export class NotFoundError extends SchedulingError {
	readonly resource: 'booking' | 'event-type' | 'owner';
	readonly id: string;

	constructor(resource: 'booking' | 'event-type' | 'owner', id: string) {
		super('NOT_FOUND', `${resource} not found: ${id}`);
		this.resource = resource;
		this.id = id;
	}
}

/**
 * The runtime has no usable timezone database. Fatal at startup.
 */
export class TimezoneDataError extends SchedulingError {
	constructor(message: string, options?: { cause?: unknown }) {
		super('TIMEZONE_DATA_ERROR', message, options);
	}
}

/**
 * Stored calendar settings violate their own invariants.
 */
export class SettingsError extends SchedulingError {
	readonly ownerId: string;

	constructor(ownerId: string, message: string, options?: { cause?: unknown }) {
		super('SETTINGS_ERROR', `Invalid calendar settings for ${ownerId}: ${message}`, options);
		this.ownerId = ownerId;
	}
}

export function isSchedulingError(error: unknown): error is SchedulingError {
	return error instanceof SchedulingError;
}
