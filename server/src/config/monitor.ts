/**
 * Monitor Configuration
 *
 * Engine settings and alert recipients derived from the environment.
 * Engine values are validated by the shared schema; an invalid value
 * throws ConfigurationError instead of being clamped.
 */

import { parseMonitorConfig, type MonitorConfig } from '@hours-monitor/shared';
import { env, splitList, type Env } from './env.js';

export function loadMonitorConfig(source: Env = env): MonitorConfig {
    return parseMonitorConfig({
        baseWeeklyHours: source.BASE_WEEKLY_HOURS,
        buffer: source.HOURS_BUFFER,
        weekDays: source.WEEK_DAYS,
        holidayThreshold: source.HOLIDAY_THRESHOLD,
        minKnownHeadcount: source.HOLIDAY_MIN_HEADCOUNT,
        inactiveEmployees: splitList(source.INACTIVE_EMPLOYEES),
    });
}

export interface ScheduleSettings {
    timeZone: string;
    /** 0 = Sunday */
    runDay: number;
    runHour: number;
    enabled: boolean;
}

export function loadScheduleSettings(source: Env = env): ScheduleSettings {
    return {
        timeZone: source.MONITOR_TIMEZONE,
        runDay: source.MONITOR_RUN_DAY,
        runHour: source.MONITOR_RUN_HOUR,
        enabled: source.DISABLE_SCHEDULER !== 'true',
    };
}

export interface AlertSettings {
    enabled: boolean;
    from: string;
    cc: string[];
}

export function loadAlertSettings(source: Env = env): AlertSettings {
    return {
        enabled: source.ENABLE_EMAIL_ALERTS === 'true',
        from: source.ALERT_FROM_EMAIL,
        cc: splitList(source.ALERT_CC_EMAILS),
    };
}
