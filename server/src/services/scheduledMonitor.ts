/**
 * Scheduled Monitor Service
 *
 * Checks every 15 minutes whether the weekly run is due: on MONITOR_RUN_DAY at
 * or after MONITOR_RUN_HOUR (MONITOR_TIMEZONE), once per reporting week.
 * A failed run is retried on the next check of the same day.
 */

import { HOURS_ERROR_CODES, HoursMonitorError, clockInZone, previousReportingWeek } from '@hours-monitor/shared';
import { loadScheduleSettings, type ScheduleSettings } from '../config/monitor.js';
import { errorMessage } from '../utils/errors.js';
import { schedulerLogger } from '../utils/logger.js';
import { runWeeklyMonitor, type MonitorRunResult } from './hoursMonitor.js';

// ============================================
// TYPES & INTERFACES
// ============================================

export interface SchedulerStatus {
    schedulerActive: boolean;
    checkIntervalMinutes: number;
    timeZone: string;
    runDay: number;
    runHour: number;
    lastCheckAt: Date | null;
    lastScheduledWeek: string | null;
}

// ============================================
// CONFIGURATION
// ============================================

const CHECK_INTERVAL_MS = 15 * 60 * 1000;

// ============================================
// STATE MANAGEMENT
// ============================================

let checkInterval: NodeJS.Timeout | null = null;
let lastCheckAt: Date | null = null;
let lastScheduledWeek: string | null = null;

// ============================================
// CORE LOGIC
// ============================================

/**
 * Week start the scheduler should report at `now`, or null when nothing is due.
 */
export function dueWeek(now: Date, settings: ScheduleSettings, alreadyRun: string | null): string | null {
    const { weekday, hour } = clockInZone(now, settings.timeZone);
    if (weekday !== settings.runDay || hour < settings.runHour) return null;

    const week = previousReportingWeek(now, settings.timeZone).start;
    return week === alreadyRun ? null : week;
}

/**
 * One scheduler check. Returns the run result when a run happened.
 */
async function tick(now: Date = new Date()): Promise<MonitorRunResult | null> {
    lastCheckAt = now;
    const week = dueWeek(now, loadScheduleSettings(), lastScheduledWeek);
    if (!week) return null;

    try {
        schedulerLogger.info({ week }, 'Weekly run due');
        const result = await runWeeklyMonitor({ weekStart: week }, now);
        lastScheduledWeek = week;
        return result;
    } catch (error: unknown) {
        if (error instanceof HoursMonitorError && error.code === HOURS_ERROR_CODES.RUN_IN_PROGRESS) {
            schedulerLogger.debug('Run already in progress, skipping check');
            return null;
        }
        schedulerLogger.error({ week, error: errorMessage(error) }, 'Scheduled run failed, will retry on next check');
        return null;
    }
}

// ============================================
// SCHEDULER CONTROL
// ============================================

function runCheck(): void {
    tick().catch((error: unknown) => {
        schedulerLogger.error({ error: errorMessage(error) }, 'Scheduler check crashed');
    });
}

/**
 * Start the scheduler
 */
function start(): void {
    if (checkInterval) {
        schedulerLogger.debug('Scheduler already running');
        return;
    }

    const settings = loadScheduleSettings();
    schedulerLogger.info(
        { intervalMinutes: CHECK_INTERVAL_MS / 1000 / 60, runDay: settings.runDay, runHour: settings.runHour, timeZone: settings.timeZone },
        'Starting scheduler'
    );

    // Check immediately on start, then on every interval
    runCheck();
    checkInterval = setInterval(runCheck, CHECK_INTERVAL_MS);
}

/**
 * Stop the scheduler
 */
function stop(): void {
    if (checkInterval) {
        clearInterval(checkInterval);
        checkInterval = null;
        schedulerLogger.info('Scheduler stopped');
    }
}

function getStatus(): SchedulerStatus {
    const settings = loadScheduleSettings();
    return {
        schedulerActive: checkInterval !== null,
        checkIntervalMinutes: CHECK_INTERVAL_MS / 1000 / 60,
        timeZone: settings.timeZone,
        runDay: settings.runDay,
        runHour: settings.runHour,
        lastCheckAt,
        lastScheduledWeek,
    };
}

// ============================================
// EXPORTS
// ============================================

export default {
    start,
    stop,
    getStatus,
    tick,
};
