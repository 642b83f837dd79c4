/**
 * Builders for engine tests.
 */

import { daysInMonth, monthKey } from '../../../utils/dateHelpers.js';
import type {
    DayEntry,
    DayMarking,
    Employee,
    HourRecord,
    LeavePeriod,
    ReportingWeek,
    UnifiedLeaveRecord,
} from '../types.js';

export function employee(id: string, name: string, overrides: Partial<Employee> = {}): Employee {
    return { id, name, email: `${id}@example.test`, active: true, ...overrides };
}

/**
 * Leave matrix for a month.
 * `rows` maps a display name to { dayOfMonth: cell }; unspecified days are blank.
 */
export function leavePeriod(
    year: number,
    month: number,
    rows: Record<string, Record<number, string>>
): LeavePeriod {
    const length = daysInMonth(year, month);
    const matrix = new Map<string, string[]>();
    for (const [name, cells] of Object.entries(rows)) {
        const row = Array.from({ length }, (_, i) => cells[i + 1] ?? '');
        matrix.set(name, row);
    }
    return { id: monthKey(year, month), year, month, daysInMonth: length, rows: matrix };
}

export function hours(employeeId: string, activeHours: number, idleHours = 0): HourRecord {
    return { employeeId, activeHours, idleHours, totalHours: activeHours + idleHours };
}

export const LEAVE: DayMarking = { kind: 'leave', subtype: 'casual', fraction: 1 };
export const HALF: DayMarking = { kind: 'leave', subtype: 'sick', fraction: 0.5 };
export const WORK: DayMarking = { kind: 'working' };
export const WEEKEND: DayMarking = { kind: 'weekend' };
export const UNKNOWN: DayMarking = { kind: 'unknown' };

/** Monday–Friday markings plus a weekend */
export function weekDays(week: ReportingWeek, weekdays: DayMarking[]): DayEntry[] {
    return week.days.map((date, i) => ({
        date,
        periodId: date.slice(0, 7),
        marking: i < 5 ? weekdays[i] ?? WORK : WEEKEND,
    }));
}

export function unifiedRecord(week: ReportingWeek, rows: Record<string, DayMarking[]>): UnifiedLeaveRecord {
    const entries = new Map<string, DayEntry[]>();
    for (const [id, weekdays] of Object.entries(rows)) {
        entries.set(id, weekDays(week, weekdays));
    }
    return { week, entries, mismatches: [] };
}
