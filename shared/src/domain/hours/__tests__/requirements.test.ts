/**
 * Unit tests for requirement calculation and compliance classification
 */

import { round2 } from '../../../utils/dateHelpers.js';
import { classifyCompliance } from '../compliance.js';
import {
    acceptableHoursFor,
    computeRequirement,
    holidayTopUp,
    requiredHoursFor,
} from '../requirements.js';
import type { HolidaySet } from '../types.js';
import { createReportingWeek } from '../week.js';
import { HALF, LEAVE, WORK, weekDays } from './fixtures.js';

describe('computeRequirement', () => {
    it('requires the full week with no leave', () => {
        const req = computeRequirement(0, 0);
        expect(round2(req.requiredHours)).toBe(40);
        expect(round2(req.acceptableHours)).toBe(37);
    });

    it('reduces by the daily rate per leave day', () => {
        const req = computeRequirement(2, 0);
        expect(round2(req.requiredHours)).toBe(28.57);
        expect(round2(req.acceptableHours)).toBe(25.57);
    });

    it('counts holidays as effective leave', () => {
        const req = computeRequirement(0, 1);
        expect(req.effectiveLeaveDays).toBe(1);
        expect(round2(req.requiredHours)).toBe(34.29);
    });

    it('never goes below zero', () => {
        expect(requiredHoursFor(8)).toBe(0);
        expect(acceptableHoursFor(2)).toBe(0);
    });

    it('is monotonically non-increasing in effective leave', () => {
        let previous = Infinity;
        for (let days = 0; days <= 7; days += 0.5) {
            const required = requiredHoursFor(days);
            expect(required).toBeLessThanOrEqual(previous);
            previous = required;
        }
    });

    it('keeps acceptable at or below required', () => {
        for (const buffer of [0, 3, 50]) {
            const settings = { baseWeeklyHours: 40, buffer, weekDays: 7 };
            for (let days = 0; days <= 7; days++) {
                const required = requiredHoursFor(days, settings);
                expect(acceptableHoursFor(required, settings)).toBeLessThanOrEqual(required);
            }
        }
    });

    it('uses custom settings', () => {
        const req = computeRequirement(1, 0, { baseWeeklyHours: 35, buffer: 0, weekDays: 7 });
        expect(req.requiredHours).toBe(30);
        expect(req.acceptableHours).toBe(30);
    });
});

describe('holidayTopUp', () => {
    const week = createReportingWeek('2025-10-13');
    const holidays: HolidaySet = { dates: ['2025-10-16'], threshold: 0.7, stats: [] };

    it('adds a full day when the holiday was a working day', () => {
        expect(holidayTopUp(weekDays(week, [WORK, WORK, WORK, WORK, WORK]), holidays)).toBe(1);
    });

    it('adds nothing when the holiday was already full leave', () => {
        expect(holidayTopUp(weekDays(week, [WORK, WORK, WORK, LEAVE, WORK]), holidays)).toBe(0);
    });

    it('tops a half-day leave up to a full day', () => {
        expect(holidayTopUp(weekDays(week, [WORK, WORK, WORK, HALF, WORK]), holidays)).toBe(0.5);
    });
});

describe('classifyCompliance', () => {
    const base = { requiredHours: 40, acceptableHours: 37, coveredDays: 2, weekDays: 7 };

    it('reports a shortfall against acceptable hours', () => {
        expect(classifyCompliance({ ...base, activeHours: 36.5 })).toEqual({
            classification: 'non_compliant',
            shortfall: 0.5,
        });
    });

    it('is compliant at exactly the acceptable hours', () => {
        expect(classifyCompliance({ ...base, activeHours: 37 })).toEqual({
            classification: 'compliant',
            shortfall: null,
        });
    });

    it('rounds the shortfall to two decimals', () => {
        const result = classifyCompliance({
            ...base,
            requiredHours: requiredHoursFor(2),
            acceptableHours: acceptableHoursFor(requiredHoursFor(2)),
            activeHours: 20,
        });
        expect(result.shortfall).toBe(5.57);
    });

    it('is exempt whenever the whole week is covered', () => {
        for (const activeHours of [0, 10, 50]) {
            expect(
                classifyCompliance({ activeHours, requiredHours: 0, acceptableHours: 0, coveredDays: 7, weekDays: 7 })
            ).toEqual({ classification: 'exempt', shortfall: null });
        }
    });
});
