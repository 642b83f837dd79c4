/**
 * Weekly Hours Monitor
 *
 * One run:
 * 1. Resolve the reporting week (default: last Monday-Sunday in MONITOR_TIMEZONE)
 * 2. Fetch the timesheet report and every leave period the week touches
 * 3. Evaluate the week (filter, stitch leave, infer holidays, classify)
 * 4. Alert non-compliant employees, then email the summary
 *
 * Any fetch or evaluation failure aborts the run before a single email goes out.
 */

import {
    HOURS_ERROR_CODES,
    HoursMonitorError,
    createReportingWeek,
    evaluateWeek,
    previousReportingWeek,
    resolvePeriods,
    round2,
    type ComplianceClassification,
    type ExclusionReason,
    type IdentityMismatch,
    type MonitorRunRequest,
    type WeekEvaluation,
} from '@hours-monitor/shared';
import { loadAlertSettings, loadMonitorConfig, loadScheduleSettings } from '../config/monitor.js';
import { errorMessage } from '../utils/errors.js';
import { monitorLogger } from '../utils/logger.js';
import { fetchLeavePeriods } from './leaveSheetSource.js';
import { notifyLowHours, type NotificationSummary } from './lowHoursAlerts.js';
import { loadManagerDirectory } from './managerMapping.js';
import { fetchWeeklyHours } from './teamLoggerClient.js';

// ============================================
// TYPES
// ============================================

export interface VerdictSummary {
    employeeId: string;
    name: string;
    email: string;
    classification: ComplianceClassification;
    activeHours: number;
    totalHours: number;
    requiredHours: number;
    acceptableHours: number;
    leaveDays: number;
    holidayDays: number;
    shortfall: number | null;
}

export interface MonitorRunResult {
    startedAt: string;
    week: { start: string; end: string };
    periods: string[];
    preview: boolean;
    holidays: string[];
    counts: {
        evaluated: number;
        compliant: number;
        nonCompliant: number;
        exempt: number;
        excluded: number;
        mismatches: number;
    };
    verdicts: VerdictSummary[];
    excluded: Array<{ employeeId: string; name: string; reason: ExclusionReason }>;
    mismatches: IdentityMismatch[];
    notifications: NotificationSummary;
    durationMs: number;
}

export interface MonitorState {
    isRunning: boolean;
    lastRunAt: Date | null;
    lastResult: MonitorRunResult | null;
    lastError: { at: Date; code: string; message: string } | null;
}

// ============================================
// STATE MANAGEMENT
// ============================================

let isRunning = false;
let lastRunAt: Date | null = null;
let lastResult: MonitorRunResult | null = null;
let lastError: MonitorState['lastError'] = null;

export function getMonitorState(): MonitorState {
    return { isRunning, lastRunAt, lastResult, lastError };
}

// ============================================
// RESULT SHAPING
// ============================================

function summarize(
    evaluation: WeekEvaluation,
    notifications: NotificationSummary,
    startedAt: Date,
    preview: boolean
): MonitorRunResult {
    const byClass = (c: ComplianceClassification) =>
        evaluation.verdicts.filter((v) => v.classification === c).length;

    return {
        startedAt: startedAt.toISOString(),
        week: { start: evaluation.week.start, end: evaluation.week.end },
        periods: evaluation.periods.map((p) => p.id),
        preview,
        holidays: evaluation.holidays.dates,
        counts: {
            evaluated: evaluation.verdicts.length,
            compliant: byClass('compliant'),
            nonCompliant: byClass('non_compliant'),
            exempt: byClass('exempt'),
            excluded: evaluation.excluded.length,
            mismatches: evaluation.mismatches.length,
        },
        verdicts: evaluation.verdicts.map((v) => ({
            employeeId: v.employee.id,
            name: v.employee.name,
            email: v.employee.email,
            classification: v.classification,
            activeHours: round2(v.activeHours),
            totalHours: round2(v.totalHours),
            requiredHours: round2(v.requiredHours),
            acceptableHours: round2(v.acceptableHours),
            leaveDays: v.leaveDays,
            holidayDays: v.holidayDays,
            shortfall: v.shortfall,
        })),
        excluded: evaluation.excluded.map((x) => ({
            employeeId: x.employee.id,
            name: x.employee.name,
            reason: x.reason,
        })),
        mismatches: evaluation.mismatches,
        notifications,
        durationMs: Date.now() - startedAt.getTime(),
    };
}

// ============================================
// CORE RUN
// ============================================

/**
 * Run the monitor for one week.
 * @throws HoursMonitorError (RUN_IN_PROGRESS when another run is active, or any data/config failure)
 */
export async function runWeeklyMonitor(
    request: Partial<MonitorRunRequest> = {},
    now: Date = new Date()
): Promise<MonitorRunResult> {
    if (isRunning) {
        throw new HoursMonitorError(HOURS_ERROR_CODES.RUN_IN_PROGRESS);
    }

    isRunning = true;
    const startedAt = new Date();

    try {
        const config = loadMonitorConfig();
        const schedule = loadScheduleSettings();
        const alerts = loadAlertSettings();
        const preview = request.preview === true || !alerts.enabled;

        const week = request.weekStart
            ? createReportingWeek(request.weekStart)
            : previousReportingWeek(now, schedule.timeZone);
        const periods = resolvePeriods(week);

        monitorLogger.info(
            { week: week.start, periods: periods.map((p) => p.id), preview },
            'Starting weekly hours run'
        );

        const [timesheet, leavePeriods, managers] = await Promise.all([
            fetchWeeklyHours(week, schedule.timeZone),
            fetchLeavePeriods(periods),
            loadManagerDirectory(),
        ]);

        const evaluation = evaluateWeek({
            week,
            employees: timesheet.employees,
            leavePeriods,
            hours: timesheet.hours,
            config,
        });

        for (const mismatch of evaluation.mismatches) {
            monitorLogger.warn(mismatch, 'Employee missing from leave period, days treated as unknown');
        }
        for (const excluded of evaluation.excluded) {
            monitorLogger.info({ employee: excluded.employee.name, reason: excluded.reason }, 'Employee excluded');
        }
        if (evaluation.holidays.dates.length > 0) {
            monitorLogger.info({ holidays: evaluation.holidays.dates }, 'Holidays inferred');
        }

        const notifications = await notifyLowHours(evaluation, { preview, settings: alerts, managers });
        const result = summarize(evaluation, notifications, startedAt, preview);

        monitorLogger.info(
            { week: week.start, ...result.counts, sent: notifications.sent, failed: notifications.failed, durationMs: result.durationMs },
            'Weekly hours run completed'
        );

        lastRunAt = new Date();
        lastResult = result;
        lastError = null;
        return result;
    } catch (error: unknown) {
        const code = error instanceof HoursMonitorError ? error.code : 'UNEXPECTED';
        monitorLogger.error({ code, error: errorMessage(error) }, 'Weekly hours run failed, no alerts sent');
        lastError = { at: new Date(), code, message: errorMessage(error) };
        throw error;
    } finally {
        isRunning = false;
    }
}
