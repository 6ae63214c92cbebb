import { describe, expect, test } from 'vitest';
import { applyBufferPolicy, bookingWindow, resolvePolicy } from '../src/buffers.js';
import type { EffectivePolicy } from '../src/types.js';
import { OWNER, d, hours, minutes } from './fixtures.js';

const noRules: EffectivePolicy = { before: 0, after: 0, minimumNotice: 0 };
const day = [
	{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T12:00:00Z') },
	{ start: d('2024-01-15T13:00:00Z'), end: d('2024-01-15T17:00:00Z') },
];
const earlyMorning = d('2024-01-15T00:00:00Z');

describe('resolvePolicy', () => {
	const owner = { ownerId: OWNER, before: minutes(10), after: minutes(5), minimumNotice: hours(1) };

	test('uses the owner policy when the event type overrides nothing', () => {
		expect(resolvePolicy(owner, {})).toEqual({
			before: minutes(10),
			after: minutes(5),
			minimumNotice: hours(1),
			maximumAdvance: undefined,
		});
	});

	test('event type overrides win, including zero', () => {
		expect(resolvePolicy(owner, { bufferBefore: 0, maximumAdvance: hours(48) })).toEqual({
			before: 0,
			after: minutes(5),
			minimumNotice: hours(1),
			maximumAdvance: hours(48),
		});
	});
});

describe('bookingWindow', () => {
	test('runs from now plus notice to now plus advance', () => {
		expect(
			bookingWindow({ ...noRules, minimumNotice: hours(2), maximumAdvance: hours(24) }, earlyMorning),
		).toEqual({ start: d('2024-01-15T02:00:00Z'), end: d('2024-01-16T00:00:00Z') });
	});

	test('has no practical end without an advance limit', () => {
		expect(bookingWindow(noRules, earlyMorning).end).toEqual(d('9999-12-31T23:59:59.999Z'));
	});

	test('never reaches past the last representable booking instant', () => {
		expect(
			bookingWindow(
				{ ...noRules, minimumNotice: Number.MAX_SAFE_INTEGER, maximumAdvance: Number.MAX_SAFE_INTEGER },
				earlyMorning,
			),
		).toEqual({ start: d('9999-12-31T23:59:59.999Z'), end: d('9999-12-31T23:59:59.999Z') });
	});
});

describe('applyBufferPolicy', () => {
	const options = { now: earlyMorning, minDuration: minutes(30) };

	test('leaves intervals alone without buffers', () => {
		expect(applyBufferPolicy(day, noRules, options)).toEqual(day);
	});

	test('shrinks each interval by the buffers', () => {
		expect(applyBufferPolicy(day, { ...noRules, before: minutes(15), after: minutes(15) }, options)).toEqual([
			{ start: d('2024-01-15T09:15:00Z'), end: d('2024-01-15T11:45:00Z') },
			{ start: d('2024-01-15T13:15:00Z'), end: d('2024-01-15T16:45:00Z') },
		]);
	});

	test('cuts time inside the notice period', () => {
		const now = d('2024-01-15T08:00:00Z');
		expect(applyBufferPolicy(day, { ...noRules, minimumNotice: hours(2) }, { ...options, now })).toEqual([
			{ start: d('2024-01-15T10:00:00Z'), end: d('2024-01-15T12:00:00Z') },
			{ start: d('2024-01-15T13:00:00Z'), end: d('2024-01-15T17:00:00Z') },
		]);
	});

	test('cuts time beyond the advance window', () => {
		const now = d('2024-01-15T08:00:00Z');
		expect(applyBufferPolicy(day, { ...noRules, maximumAdvance: hours(4) }, { ...options, now })).toEqual([
			{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T12:00:00Z') },
		]);
	});

	test('drops pieces too short for the meeting', () => {
		const short = [{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T09:40:00Z') }];
		expect(applyBufferPolicy(short, noRules, options)).toEqual(short);
		expect(applyBufferPolicy(short, { ...noRules, before: minutes(10) }, options)).toEqual([
			{ start: d('2024-01-15T09:10:00Z'), end: d('2024-01-15T09:40:00Z') },
		]);
		expect(applyBufferPolicy(short, { ...noRules, before: minutes(15) }, options)).toEqual([]);
	});

	test('returns nothing when the advance window is shorter than the notice', () => {
		expect(
			applyBufferPolicy(day, { ...noRules, minimumNotice: hours(10), maximumAdvance: hours(5) }, options),
		).toEqual([]);
	});
});
