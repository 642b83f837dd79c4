/**
 * LeaveIndex: stitch one or two monthly leave matrices into a per-employee week view.
 */

import { parseDayMarking } from './markings.js';
import { indexByNameKey, normalizeNameKey } from './names.js';
import type {
    AttachedPeriod,
    DayEntry,
    Employee,
    IdentityMismatch,
    ReportingWeek,
    UnifiedLeaveRecord,
} from './types.js';

/**
 * Build the unified record for a week.
 *
 * Each week day is read from the period that owns it. An employee missing from
 * a period's matrix gets `unknown` for those days and an IdentityMismatch entry;
 * that is never fatal. Every employee ends up with exactly 7 entries.
 */
export function buildUnifiedLeaveRecord(
    week: ReportingWeek,
    employees: Employee[],
    periods: AttachedPeriod[]
): UnifiedLeaveRecord {
    const owners = new Map<string, AttachedPeriod>();
    for (const period of periods) {
        for (const date of period.dates) owners.set(date, period);
    }

    const rowIndexes = new Map(
        periods.map((period) => [period.id, indexByNameKey(period.matrix.rows)] as const)
    );

    const entries = new Map<string, DayEntry[]>();
    const mismatches: IdentityMismatch[] = [];

    for (const employee of employees) {
        const key = normalizeNameKey(employee.name);
        const missingIn = new Set<string>();
        const days: DayEntry[] = [];

        week.days.forEach((date) => {
            const period = owners.get(date);
            if (!period) {
                days.push({ date, periodId: '', marking: { kind: 'unknown' } });
                return;
            }

            const row = rowIndexes.get(period.id)?.get(key);
            if (!row) {
                missingIn.add(period.id);
                days.push({ date, periodId: period.id, marking: { kind: 'unknown' } });
                return;
            }

            const dayIndex = period.days[period.dates.indexOf(date)] - 1;
            days.push({ date, periodId: period.id, marking: parseDayMarking(row[dayIndex], date) });
        });

        for (const periodId of missingIn) {
            mismatches.push({ employeeId: employee.id, employeeName: employee.name, periodId });
        }
        entries.set(employee.id, days);
    }

    return { week, entries, mismatches };
}

/** Sum of leave fractions over weekdays; weekends never count */
export function countLeaveDays(days: DayEntry[]): number {
    return days.reduce(
        (sum, entry) => sum + (entry.marking.kind === 'leave' ? entry.marking.fraction : 0),
        0
    );
}

export function countWeekendDays(days: DayEntry[]): number {
    return days.filter((entry) => entry.marking.kind === 'weekend').length;
}
