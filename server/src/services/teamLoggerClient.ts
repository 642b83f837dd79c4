/**
 * Timesheet Client
 *
 * Reads the weekly employee summary report from the TeamLogger API:
 *   GET {base}/api/employee_summary_report?startTime=<ms>&endTime=<ms>
 * with a bearer token. Each item is one employee with total and idle hours;
 * active hours are total minus idle.
 */

import axios, { type AxiosInstance } from 'axios';
import {
    DataUnavailableError,
    TimesheetReportSchema,
    addDays,
    parseIsoDate,
    startOfDayInZone,
    type Employee,
    type HourRecord,
    type ReportingWeek,
    type TimesheetReportItem,
} from '@hours-monitor/shared';
import { env } from '../config/env.js';
import { errorMessage } from '../utils/errors.js';
import { timesheetLogger } from '../utils/logger.js';
import { statusCodeOf, withRetry } from '../utils/retry.js';

// ============================================
// CONFIGURATION
// ============================================

const REPORT_PATH = '/api/employee_summary_report';
const REQUEST_TIMEOUT_MS = 30_000;
const MAX_RETRIES = 2;
const SECONDS_PER_HOUR = 3600;

// ============================================
// TYPES
// ============================================

export interface TimesheetSnapshot {
    employees: Employee[];
    hours: HourRecord[];
}

// ============================================
// HTTP CLIENT
// ============================================

let httpClient: AxiosInstance | null = null;

/** Base URL without query string or trailing slash */
export function normalizeBaseUrl(url: string): string {
    return url.split('?')[0].replace(/\/+$/, '');
}

function getHttpClient(): AxiosInstance {
    if (httpClient) return httpClient;

    httpClient = axios.create({
        baseURL: normalizeBaseUrl(env.TEAMLOGGER_API_URL),
        timeout: REQUEST_TIMEOUT_MS,
        headers: {
            Authorization: `Bearer ${env.TEAMLOGGER_BEARER_TOKEN}`,
            'Content-Type': 'application/json',
        },
    });
    return httpClient;
}

/** Network failures, throttling and 5xx are retried; 4xx are not */
function isTransientHttpError(error: unknown): boolean {
    const status = statusCodeOf(error);
    if (status === undefined) return axios.isAxiosError(error);
    return status === 429 || status >= 500;
}

// ============================================
// HOURS EXTRACTION
// ============================================

/**
 * Hours for one report item.
 * Prefers the hour fields; falls back to the second counters.
 */
export function hoursFromReportItem(item: TimesheetReportItem): HourRecord {
    const totalHours =
        item.totalHours ??
        (item.totalSecondsCount !== undefined ? item.totalSecondsCount / SECONDS_PER_HOUR : 0);
    const idleHours =
        item.idleHours ??
        (item.inactiveSecondsCount !== undefined ? item.inactiveSecondsCount / SECONDS_PER_HOUR : 0);

    return {
        employeeId: item.id,
        totalHours,
        idleHours,
        activeHours: Math.max(totalHours - idleHours, 0),
    };
}

/** Report window in epoch ms: local midnight of the first day to the last ms of the last day */
export function reportWindow(week: ReportingWeek, timeZone: string): { startTime: number; endTime: number } {
    const first = parseIsoDate(week.start);
    const last = parseIsoDate(week.end);
    if (!first || !last) {
        throw new DataUnavailableError('timesheet', `Invalid week ${week.start}..${week.end}`);
    }
    return {
        startTime: startOfDayInZone(first, timeZone).getTime(),
        endTime: startOfDayInZone(addDays(last, 1), timeZone).getTime() - 1,
    };
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Fetch the roster and hours for a week.
 * @throws DataUnavailableError on transport failure, an unexpected payload or an empty report
 */
export async function fetchWeeklyHours(week: ReportingWeek, timeZone: string): Promise<TimesheetSnapshot> {
    const params = reportWindow(week, timeZone);
    timesheetLogger.info({ week: week.start, ...params }, 'Fetching timesheet summary report');

    let payload: unknown;
    try {
        const response = await withRetry(
            () => getHttpClient().get<unknown>(REPORT_PATH, { params }),
            {
                label: 'employee_summary_report',
                maxRetries: MAX_RETRIES,
                logger: timesheetLogger,
                isTransient: isTransientHttpError,
            }
        );
        payload = response.data;
    } catch (error: unknown) {
        throw new DataUnavailableError('timesheet', `Timesheet request failed: ${errorMessage(error)}`, {
            cause: error,
            context: { status: statusCodeOf(error) },
        });
    }

    const parsed = TimesheetReportSchema.safeParse(payload);
    if (!parsed.success) {
        throw new DataUnavailableError('timesheet', 'Timesheet report has an unexpected shape', {
            context: { issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`) },
        });
    }
    if (parsed.data.length === 0) {
        throw new DataUnavailableError('timesheet', `Timesheet report for ${week.start} is empty`);
    }

    const employees: Employee[] = [];
    const hours: HourRecord[] = [];
    for (const item of parsed.data) {
        if (!item.id) continue;
        employees.push({ id: item.id, name: item.title.trim(), email: item.email?.trim() ?? '', active: true });
        hours.push(hoursFromReportItem(item));
    }

    timesheetLogger.info({ employees: employees.length }, 'Timesheet report loaded');
    return { employees, hours };
}
