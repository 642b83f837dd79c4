/**
 * Unit tests for the unified leave record
 */

import { buildUnifiedLeaveRecord, countLeaveDays, countWeekendDays } from '../leaveIndex.js';
import { attachLeavePeriods, resolvePeriods } from '../periods.js';
import { createReportingWeek } from '../week.js';
import { employee, leavePeriod } from './fixtures.js';

describe('buildUnifiedLeaveRecord', () => {
    // Mon 29 Sep .. Sun 5 Oct 2025
    const week = createReportingWeek('2025-09-29');
    const september = leavePeriod(2025, 9, {
        'Asha Rao': { 29: 'CL' },
    });
    const october = leavePeriod(2025, 10, {
        'Asha Rao': { 1: 'Half SL', 3: 'holiday' },
        '  bina   DAS': { 2: 'EL' },
    });
    const periods = attachLeavePeriods(resolvePeriods(week), [september, october]);
    const asha = employee('a', 'Asha Rao');
    const bina = employee('b', 'Bina Das');

    it('reads each day from the month that owns it', () => {
        const record = buildUnifiedLeaveRecord(week, [asha], periods);
        const days = record.entries.get('a') ?? [];

        expect(days.map((d) => d.periodId)).toEqual([
            '2025-09', '2025-09', '2025-10', '2025-10', '2025-10', '2025-10', '2025-10',
        ]);
        expect(days.map((d) => d.marking.kind)).toEqual([
            'leave', 'working', 'leave', 'working', 'leave', 'weekend', 'weekend',
        ]);
        expect(countLeaveDays(days)).toBe(2.5);
        expect(countWeekendDays(days)).toBe(2);
    });

    it('marks days unknown and records a mismatch for a missing row', () => {
        const record = buildUnifiedLeaveRecord(week, [asha, bina], periods);
        const days = record.entries.get('b') ?? [];

        expect(days.map((d) => d.marking.kind)).toEqual([
            'unknown', 'unknown', 'working', 'leave', 'working', 'weekend', 'weekend',
        ]);
        expect(record.mismatches).toEqual([
            { employeeId: 'b', employeeName: 'Bina Das', periodId: '2025-09' },
        ]);
    });

    it('gives every employee exactly 7 entries', () => {
        const ghost = employee('g', 'Nobody Here');
        const record = buildUnifiedLeaveRecord(week, [asha, bina, ghost], periods);

        for (const days of record.entries.values()) {
            expect(days).toHaveLength(7);
        }
        expect(record.mismatches.filter((m) => m.employeeId === 'g').map((m) => m.periodId)).toEqual([
            '2025-09',
            '2025-10',
        ]);
    });
});
