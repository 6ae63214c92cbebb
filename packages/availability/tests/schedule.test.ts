import { SettingsError } from '@openslot/core';
import { describe, expect, test } from 'vitest';
import { resolveAvailability } from '../src/schedule.js';
import { OWNER, calendar, d, hours, rule } from './fixtures.js';

const week = { start: d('2024-01-15T00:00:00Z'), end: d('2024-01-22T00:00:00Z') };

describe('resolveAvailability', () => {
	describe('weekly rules', () => {
		test('expands a rule on its weekday only', () => {
			expect(resolveAvailability(calendar(), week)).toEqual([
				{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T17:00:00Z') },
			]);
		});

		test('keeps split shifts on the same day apart', () => {
			const result = resolveAvailability(
				calendar({ rules: [rule('monday', '09:00', '12:00'), rule('monday', '13:00', '17:00')] }),
				week,
			);
			expect(result).toEqual([
				{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T12:00:00Z') },
				{ start: d('2024-01-15T13:00:00Z'), end: d('2024-01-15T17:00:00Z') },
			]);
		});

		test('interprets local time in the owner timezone', () => {
			const result = resolveAvailability(
				calendar({
					timezone: 'America/New_York',
					rules: [rule('monday', '09:00', '17:00', 'America/New_York')],
				}),
				{ start: d('2024-01-15T00:00:00Z'), end: d('2024-01-16T00:00:00Z') },
			);
			expect(result).toEqual([{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-15T22:00:00Z') }]);
		});

		test('joins a window ending at 24:00 with one starting at 00:00 the next day', () => {
			const result = resolveAvailability(
				calendar({ rules: [rule('monday', '20:00', '24:00'), rule('tuesday', '00:00', '02:00')] }),
				week,
			);
			expect(result).toEqual([{ start: d('2024-01-15T20:00:00Z'), end: d('2024-01-16T02:00:00Z') }]);
		});

		test('clips windows to the range', () => {
			const result = resolveAvailability(calendar(), {
				start: d('2024-01-15T10:00:00Z'),
				end: d('2024-01-15T12:00:00Z'),
			});
			expect(result).toEqual([{ start: d('2024-01-15T10:00:00Z'), end: d('2024-01-15T12:00:00Z') }]);
		});

		test('returns nothing for an empty range', () => {
			expect(resolveAvailability(calendar(), { start: week.start, end: week.start })).toEqual([]);
		});
	});

	describe('rule validity periods', () => {
		const twoMondays = { start: d('2024-01-15T00:00:00Z'), end: d('2024-01-23T00:00:00Z') };

		test('a rule applies only between its first and last date', () => {
			const result = resolveAvailability(
				calendar({
					rules: [
						{ ...rule('monday', '09:00', '17:00'), validUntil: '2024-01-15' },
						{ ...rule('monday', '10:00', '12:00'), validFrom: '2024-01-16' },
					],
				}),
				twoMondays,
			);
			expect(result).toEqual([
				{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T17:00:00Z') },
				{ start: d('2024-01-22T10:00:00Z'), end: d('2024-01-22T12:00:00Z') },
			]);
		});

		test('a rule valid on a single date', () => {
			const result = resolveAvailability(
				calendar({ rules: [{ ...rule('monday', '09:00', '17:00'), validFrom: '2024-01-22', validUntil: '2024-01-22' }] }),
				twoMondays,
			);
			expect(result).toEqual([{ start: d('2024-01-22T09:00:00Z'), end: d('2024-01-22T17:00:00Z') }]);
		});

		test('rejects a period that ends before it begins', () => {
			const settings = calendar({
				rules: [{ ...rule('monday', '09:00', '17:00'), validFrom: '2024-02-01', validUntil: '2024-01-01' }],
			});
			expect(() => resolveAvailability(settings, week)).toThrow(
				'Invalid calendar settings for owner-1: rule on monday is valid until 2024-01-01, before 2024-02-01',
			);
		});

		test('rejects overlapping times when the periods overlap too', () => {
			const settings = calendar({
				rules: [
					{ ...rule('monday', '09:00', '17:00'), validUntil: '2024-01-22' },
					{ ...rule('monday', '10:00', '12:00'), validFrom: '2024-01-22' },
				],
			});
			expect(() => resolveAvailability(settings, week)).toThrow(
				new SettingsError(OWNER, 'rules overlap on monday'),
			);
		});
	});

	describe('daylight saving', () => {
		const newYork = (startTime: string, endTime: string) =>
			calendar({
				timezone: 'America/New_York',
				rules: [rule('sunday', startTime, endTime, 'America/New_York')],
			});

		test('a window across spring-forward is one hour shorter', () => {
			const [shift] = resolveAvailability(newYork('00:00', '12:00'), {
				start: d('2024-03-10T00:00:00Z'),
				end: d('2024-03-11T00:00:00Z'),
			});
			expect(shift).toEqual({ start: d('2024-03-10T05:00:00Z'), end: d('2024-03-10T16:00:00Z') });
			expect(shift.end.getTime() - shift.start.getTime()).toBe(hours(11));
		});

		test('a window across fall-back is one hour longer', () => {
			const [shift] = resolveAvailability(newYork('00:00', '12:00'), {
				start: d('2024-11-03T00:00:00Z'),
				end: d('2024-11-04T00:00:00Z'),
			});
			expect(shift).toEqual({ start: d('2024-11-03T04:00:00Z'), end: d('2024-11-03T17:00:00Z') });
			expect(shift.end.getTime() - shift.start.getTime()).toBe(hours(13));
		});
	});

	describe('exceptions', () => {
		const twoMondays = { start: d('2024-01-15T00:00:00Z'), end: d('2024-01-23T00:00:00Z') };

		test('a blocked date removes the weekly window', () => {
			const result = resolveAvailability(
				calendar({ exceptions: [{ ownerId: OWNER, date: '2024-01-15', kind: 'blocked' }] }),
				twoMondays,
			);
			expect(result).toEqual([{ start: d('2024-01-22T09:00:00Z'), end: d('2024-01-22T17:00:00Z') }]);
		});

		test('an override replaces the weekly window for its date', () => {
			const result = resolveAvailability(
				calendar({
					exceptions: [
						{ ownerId: OWNER, date: '2024-01-15', kind: 'override', startTime: '12:00', endTime: '13:00' },
					],
				}),
				twoMondays,
			);
			expect(result).toEqual([
				{ start: d('2024-01-15T12:00:00Z'), end: d('2024-01-15T13:00:00Z') },
				{ start: d('2024-01-22T09:00:00Z'), end: d('2024-01-22T17:00:00Z') },
			]);
		});

		test('an override opens a day without rules', () => {
			const result = resolveAvailability(
				calendar({
					exceptions: [
						{ ownerId: OWNER, date: '2024-01-20', kind: 'override', startTime: '10:00', endTime: '14:00' },
					],
				}),
				week,
			);
			expect(result).toEqual([
				{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T17:00:00Z') },
				{ start: d('2024-01-20T10:00:00Z'), end: d('2024-01-20T14:00:00Z') },
			]);
		});

		test('overrides on the same date are combined', () => {
			const result = resolveAvailability(
				calendar({
					exceptions: [
						{ ownerId: OWNER, date: '2024-01-15', kind: 'override', startTime: '10:00', endTime: '11:00' },
						{ ownerId: OWNER, date: '2024-01-15', kind: 'override', startTime: '09:00', endTime: '10:00' },
					],
				}),
				{ start: d('2024-01-15T00:00:00Z'), end: d('2024-01-16T00:00:00Z') },
			);
			expect(result).toEqual([{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T11:00:00Z') }]);
		});

		test('a block wins over an override on the same date', () => {
			const result = resolveAvailability(
				calendar({
					exceptions: [
						{ ownerId: OWNER, date: '2024-01-15', kind: 'override', startTime: '10:00', endTime: '11:00' },
						{ ownerId: OWNER, date: '2024-01-15', kind: 'blocked' },
					],
				}),
				{ start: d('2024-01-15T00:00:00Z'), end: d('2024-01-16T00:00:00Z') },
			);
			expect(result).toEqual([]);
		});
	});

	describe('invalid settings', () => {
		test('rejects overlapping rules on the same day', () => {
			const settings = calendar({ rules: [rule('monday', '09:00', '12:00'), rule('monday', '11:00', '13:00')] });
			expect(() => resolveAvailability(settings, week)).toThrow(
				new SettingsError(OWNER, 'rules overlap on monday'),
			);
		});

		test('rejects a rule that ends before it starts', () => {
			const settings = calendar({ rules: [rule('monday', '17:00', '09:00')] });
			expect(() => resolveAvailability(settings, week)).toThrow(
				'Invalid calendar settings for owner-1: rule on monday ends before it starts (17:00-09:00)',
			);
		});

		test('rejects an unknown timezone', () => {
			const settings = calendar({ timezone: 'Mars/Olympus_Mons', rules: [] });
			expect(() => resolveAvailability(settings, week)).toThrow(
				'Invalid calendar settings for owner-1: unknown timezone "Mars/Olympus_Mons"',
			);
		});

		test('rejects a rule in another timezone', () => {
			const settings = calendar({ rules: [rule('monday', '09:00', '17:00', 'Europe/Berlin')] });
			expect(() => resolveAvailability(settings, week)).toThrow(
				'Invalid calendar settings for owner-1: rule on monday uses timezone "Europe/Berlin", calendar uses "UTC"',
			);
		});

		test('rejects malformed local times', () => {
			const settings = calendar({ rules: [rule('monday', '9:00', '17:00')] });
			expect(() => resolveAvailability(settings, week)).toThrow(
				'Invalid calendar settings for owner-1: rules.0.startTime: Expected HH:mm',
			);
		});

		test('rejects an exception belonging to someone else', () => {
			const settings = calendar({ exceptions: [{ ownerId: 'owner-2', date: '2024-01-15', kind: 'blocked' }] });
			expect(() => resolveAvailability(settings, week)).toThrow(SettingsError);
		});
	});
});
