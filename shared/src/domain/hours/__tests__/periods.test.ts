/**
 * Unit tests for week construction and period resolution
 */

import {
    AmbiguousPeriodBoundaryError,
    InvalidWeekError,
    UnresolvedPeriodError,
} from '../../../errors/hours.js';
import { attachLeavePeriods, latestPeriodId, resolvePeriods } from '../periods.js';
import { createReportingWeek, previousReportingWeek, weekContaining } from '../week.js';
import { leavePeriod } from './fixtures.js';

describe('createReportingWeek', () => {
    it('builds 7 consecutive days', () => {
        const week = createReportingWeek('2025-10-13');
        expect(week.start).toBe('2025-10-13');
        expect(week.end).toBe('2025-10-19');
        expect(week.days).toEqual([
            '2025-10-13', '2025-10-14', '2025-10-15', '2025-10-16',
            '2025-10-17', '2025-10-18', '2025-10-19',
        ]);
    });

    it('is frozen', () => {
        const week = createReportingWeek('2025-10-13');
        expect(Object.isFrozen(week)).toBe(true);
        expect(Object.isFrozen(week.days)).toBe(true);
    });

    it('rejects malformed and impossible dates', () => {
        expect(() => createReportingWeek('2025-13-01')).toThrow(InvalidWeekError);
        expect(() => createReportingWeek('2025-02-30')).toThrow(InvalidWeekError);
        expect(() => createReportingWeek('13/10/2025')).toThrow(InvalidWeekError);
    });

    it('rejects a start that is not a Monday', () => {
        expect(() => createReportingWeek('2025-10-15')).toThrow('Week start must be a Monday: "2025-10-15"');
        expect(() => createReportingWeek('2025-10-19')).toThrow(InvalidWeekError);
    });
});

describe('weekContaining', () => {
    it('returns the Monday-Sunday week of a midweek date', () => {
        expect(weekContaining('2025-10-16').start).toBe('2025-10-13');
    });

    it('treats Sunday as the last day of the week', () => {
        expect(weekContaining('2025-10-19').start).toBe('2025-10-13');
    });
});

describe('previousReportingWeek', () => {
    it('returns last Monday to Sunday', () => {
        const week = previousReportingWeek(new Date('2025-10-15T10:00:00Z'), 'Asia/Kolkata');
        expect(week.start).toBe('2025-10-06');
        expect(week.end).toBe('2025-10-12');
    });

    it('uses the configured time zone for today', () => {
        // Sunday 20:00 UTC is already Monday 01:30 in Kolkata
        const now = new Date('2025-10-19T20:00:00Z');
        expect(previousReportingWeek(now, 'Asia/Kolkata').start).toBe('2025-10-13');
        expect(previousReportingWeek(now, 'UTC').start).toBe('2025-10-06');
    });
});

describe('resolvePeriods', () => {
    it('returns one period when the week sits in one month', () => {
        const periods = resolvePeriods(createReportingWeek('2025-10-13'));
        expect(periods).toHaveLength(1);
        expect(periods[0].id).toBe('2025-10');
        expect(periods[0].days).toEqual([13, 14, 15, 16, 17, 18, 19]);
    });

    it('splits a week crossing a month boundary in chronological order', () => {
        const periods = resolvePeriods(createReportingWeek('2025-09-29'));
        expect(periods.map((p) => p.id)).toEqual(['2025-09', '2025-10']);
        expect(periods[0].dates).toEqual(['2025-09-29', '2025-09-30']);
        expect(periods[0].days).toEqual([29, 30]);
        expect(periods[1].days).toEqual([1, 2, 3, 4, 5]);
    });

    it('handles a year boundary', () => {
        const periods = resolvePeriods(createReportingWeek('2025-12-29'));
        expect(periods.map((p) => p.id)).toEqual(['2025-12', '2026-01']);
        expect(periods[0].days).toEqual([29, 30, 31]);
        expect(periods[1].days).toEqual([1, 2, 3, 4]);
    });

    it('partitions the week with no gap or overlap', () => {
        for (const start of ['2025-09-29', '2025-10-27', '2024-02-26', '2025-12-29', '2025-10-06']) {
            const week = createReportingWeek(start);
            const assigned = resolvePeriods(week).flatMap((p) => p.dates);
            expect(assigned).toEqual([...week.days]);
            expect(new Set(assigned).size).toBe(7);
        }
    });

    it('reports the period owning the last day as latest', () => {
        expect(latestPeriodId(resolvePeriods(createReportingWeek('2025-09-29')))).toBe('2025-10');
    });
});

describe('attachLeavePeriods', () => {
    const week = createReportingWeek('2025-09-29');

    it('pairs each period with its matrix', () => {
        const attached = attachLeavePeriods(resolvePeriods(week), [
            leavePeriod(2025, 10, {}),
            leavePeriod(2025, 9, {}),
        ]);
        expect(attached.map((p) => p.matrix.id)).toEqual(['2025-09', '2025-10']);
    });

    it('fails with UnresolvedPeriodError when a month is missing', () => {
        let caught: unknown;
        try {
            attachLeavePeriods(resolvePeriods(week), [leavePeriod(2025, 10, {})]);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(UnresolvedPeriodError);
        expect(caught instanceof UnresolvedPeriodError && caught.periodId).toBe('2025-09');
    });

    it('rejects a matrix too short for the days it must cover', () => {
        const truncated = { ...leavePeriod(2025, 9, {}), daysInMonth: 29 };
        expect(() =>
            attachLeavePeriods(resolvePeriods(week), [truncated, leavePeriod(2025, 10, {})])
        ).toThrow(AmbiguousPeriodBoundaryError);
    });
});
