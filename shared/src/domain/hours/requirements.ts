/**
 * RequirementCalculator: per-employee required and acceptable hours.
 *
 *   effectiveLeaveDays = personal leave days + holidays not already taken as leave
 *   requiredHours      = baseWeeklyHours / weekDays × (weekDays − effectiveLeaveDays), ≥ 0
 *   acceptableHours    = requiredHours − buffer, ≥ 0
 *
 * All values stay unrounded; use round2() when presenting them.
 */

import type { DayEntry, HolidaySet, Requirement } from './types.js';

export interface RequirementSettings {
    baseWeeklyHours: number;
    buffer: number;
    weekDays: number;
}

export const DEFAULT_REQUIREMENT_SETTINGS: RequirementSettings = {
    baseWeeklyHours: 40,
    buffer: 3,
    weekDays: 7,
};

/** Required hours for a given number of effective leave days */
export function requiredHoursFor(
    effectiveLeaveDays: number,
    settings: RequirementSettings = DEFAULT_REQUIREMENT_SETTINGS
): number {
    const dailyRate = settings.baseWeeklyHours / settings.weekDays;
    return Math.max(dailyRate * (settings.weekDays - effectiveLeaveDays), 0);
}

export function acceptableHoursFor(
    requiredHours: number,
    settings: RequirementSettings = DEFAULT_REQUIREMENT_SETTINGS
): number {
    return Math.max(requiredHours - settings.buffer, 0);
}

/**
 * Holiday days the employee did not already take as leave.
 * A holiday on a half-day leave tops the day up to one full day.
 */
export function holidayTopUp(days: DayEntry[], holidays: HolidaySet): number {
    const holidayDates = new Set(holidays.dates);
    return days.reduce((sum, entry) => {
        if (!holidayDates.has(entry.date) || entry.marking.kind === 'weekend') return sum;
        const taken = entry.marking.kind === 'leave' ? entry.marking.fraction : 0;
        return sum + (1 - taken);
    }, 0);
}

/** Full requirement for one employee's week */
export function computeRequirement(
    leaveDays: number,
    holidayDays: number,
    settings: RequirementSettings = DEFAULT_REQUIREMENT_SETTINGS
): Requirement {
    const effectiveLeaveDays = leaveDays + holidayDays;
    const requiredHours = requiredHoursFor(effectiveLeaveDays, settings);
    return {
        leaveDays,
        holidayDays,
        effectiveLeaveDays,
        requiredHours,
        acceptableHours: acceptableHoursFor(requiredHours, settings),
    };
}
