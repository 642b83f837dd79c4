/**
 * Calendar Date Utilities
 *
 * Works on plain calendar dates as ISO strings (YYYY-MM-DD).
 * Server-timezone agnostic: every Date built here is a UTC midnight and
 * only UTC methods are used to read it back.
 */

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const MONTH_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;
const MONTH_LONG = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
] as const;

/** Calendar components of an ISO date; month is 1-12 */
export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

/**
 * Parse YYYY-MM-DD into its components.
 * Returns null for malformed strings and impossible dates (2025-02-30).
 */
export function parseIsoDate(value: string): CalendarDate | null {
    const match = ISO_DATE_RE.exec(value.trim());
    if (!match) return null;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) return null;

    return { year, month, day };
}

/** Format components back to YYYY-MM-DD */
export function formatIsoDate(date: CalendarDate): string {
    const mm = String(date.month).padStart(2, '0');
    const dd = String(date.day).padStart(2, '0');
    return `${date.year}-${mm}-${dd}`;
}

/** Number of days in a month (month is 1-12) */
export function daysInMonth(year: number, month: number): number {
    return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toUtcMs(date: CalendarDate): number {
    return Date.UTC(date.year, date.month - 1, date.day);
}

function fromUtcMs(ms: number): CalendarDate {
    const d = new Date(ms);
    return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

/** Shift a calendar date by whole days */
export function addDays(date: CalendarDate, days: number): CalendarDate {
    return fromUtcMs(toUtcMs(date) + days * MS_PER_DAY);
}

/** Day of week, 0 = Sunday … 6 = Saturday */
export function dayOfWeek(date: CalendarDate): number {
    return new Date(toUtcMs(date)).getUTCDay();
}

export function isWeekendDate(date: CalendarDate): boolean {
    const dow = dayOfWeek(date);
    return dow === 0 || dow === 6;
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function diffInDays(from: CalendarDate, to: CalendarDate): number {
    return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

/** Month key used for leave periods, e.g. "2025-10" */
export function monthKey(year: number, month: number): string {
    return `${year}-${String(month).padStart(2, '0')}`;
}

/**
 * Tab-name candidates for a monthly leave sheet, most likely first.
 * e.g. October 2025 → ["Oct 25", "October 25", "October 2025"]
 */
export function monthTabNames(year: number, month: number): string[] {
    const yy = String(year % 100).padStart(2, '0');
    const short = MONTH_SHORT[month - 1];
    const long = MONTH_LONG[month - 1];
    return [`${short} ${yy}`, `${long} ${yy}`, `${long} ${year}`];
}

/**
 * Today's calendar date in an IANA time zone.
 * Uses Intl so the result is independent of the server's own zone.
 */
export function calendarDateInZone(now: Date, timeZone: string): CalendarDate {
    const parts = new Intl.DateTimeFormat('en-CA', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
    }).formatToParts(now);

    const read = (type: 'year' | 'month' | 'day'): number => {
        const part = parts.find((p) => p.type === type);
        return part ? Number(part.value) : NaN;
    };

    return { year: read('year'), month: read('month'), day: read('day') };
}

/** Hour of day (0-23) and weekday (0 = Sunday) in an IANA time zone */
export function clockInZone(now: Date, timeZone: string): { weekday: number; hour: number } {
    const today = calendarDateInZone(now, timeZone);
    const hourPart = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        hour: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(now).find((p) => p.type === 'hour');

    return { weekday: dayOfWeek(today), hour: hourPart ? Number(hourPart.value) : NaN };
}

function zoneOffsetMs(instant: Date, timeZone: string): number {
    const parts = new Intl.DateTimeFormat('en-GB', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(instant);

    const read = (type: Intl.DateTimeFormatPartTypes): number => {
        const part = parts.find((p) => p.type === type);
        return part ? Number(part.value) : NaN;
    };

    const wallClock = Date.UTC(read('year'), read('month') - 1, read('day'), read('hour'), read('minute'), read('second'));
    return wallClock - Math.floor(instant.getTime() / 1000) * 1000;
}

/** The instant a calendar date begins in an IANA time zone */
export function startOfDayInZone(date: CalendarDate, timeZone: string): Date {
    const guess = Date.UTC(date.year, date.month - 1, date.day);
    const firstPass = guess - zoneOffsetMs(new Date(guess), timeZone);
    // second pass settles dates where the offset changes overnight
    return new Date(guess - zoneOffsetMs(new Date(firstPass), timeZone));
}

/** "13 Oct 2025" */
export function toDisplayDate(iso: string): string {
    const date = parseIsoDate(iso);
    if (!date) return iso;
    return `${date.day} ${MONTH_SHORT[date.month - 1]} ${date.year}`;
}

/** Round to 2 decimal places (presentation only) */
export function round2(n: number): number {
    return Math.round(n * 100) / 100;
}
