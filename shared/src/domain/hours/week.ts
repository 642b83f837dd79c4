/**
 * Reporting week construction.
 */

import { InvalidWeekError } from '../../errors/hours.js';
import {
    addDays,
    calendarDateInZone,
    dayOfWeek,
    formatIsoDate,
    parseIsoDate,
    type CalendarDate,
} from '../../utils/dateHelpers.js';
import type { ReportingWeek } from './types.js';

export const WEEK_LENGTH = 7;

function buildWeek(start: CalendarDate): ReportingWeek {
    const days = Array.from({ length: WEEK_LENGTH }, (_, i) => formatIsoDate(addDays(start, i)));
    return Object.freeze({
        start: days[0],
        end: days[WEEK_LENGTH - 1],
        days: Object.freeze(days),
    });
}

/**
 * Build the Monday–Sunday week starting at `start` (YYYY-MM-DD).
 * @throws InvalidWeekError when `start` is malformed or not a Monday
 */
export function createReportingWeek(start: string): ReportingWeek {
    const date = parseIsoDate(start);
    if (!date) {
        throw new InvalidWeekError(`Invalid week start date: "${start}"`, { start });
    }
    if (dayOfWeek(date) !== 1) {
        throw new InvalidWeekError(`Week start must be a Monday: "${start}"`, { start });
    }
    return buildWeek(date);
}

/** Monday of the week containing `date` */
export function mondayOf(date: CalendarDate): CalendarDate {
    const offset = (dayOfWeek(date) + 6) % 7;
    return addDays(date, -offset);
}

/** The Monday–Sunday week containing an ISO date */
export function weekContaining(isoDate: string): ReportingWeek {
    const date = parseIsoDate(isoDate);
    if (!date) {
        throw new InvalidWeekError(`Invalid date: "${isoDate}"`, { date: isoDate });
    }
    return buildWeek(mondayOf(date));
}

/**
 * The completed Monday–Sunday week before the one containing `now`,
 * with "today" taken in the given time zone.
 */
export function previousReportingWeek(now: Date, timeZone: string): ReportingWeek {
    const today = calendarDateInZone(now, timeZone);
    return buildWeek(addDays(mondayOf(today), -WEEK_LENGTH));
}
