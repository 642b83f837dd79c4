/**
 * Hours Monitor Zod Schemas
 *
 * Engine configuration, manual run requests, and the timesheet report shape.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/hours.js';

// ============================================
// ENGINE CONFIGURATION
// ============================================

export const MonitorConfigSchema = z.object({
    baseWeeklyHours: z.number().positive('baseWeeklyHours must be positive').default(40),
    buffer: z.number().min(0, 'buffer must not be negative').default(3),
    weekDays: z.number().int().refine((days) => days === 7, 'weekDays must be 7').default(7),
    holidayThreshold: z
        .number()
        .gt(0, 'holidayThreshold must be greater than 0')
        .lt(1, 'holidayThreshold must be less than 1')
        .default(0.7),
    minKnownHeadcount: z.number().int().min(1, 'minKnownHeadcount must be at least 1').default(1),
    inactiveEmployees: z.array(z.string()).default([]),
});
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;
export type MonitorConfigInput = z.input<typeof MonitorConfigSchema>;

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = MonitorConfigSchema.parse({});

/**
 * Validate engine configuration.
 * @throws ConfigurationError listing every invalid field
 */
export function parseMonitorConfig(input: MonitorConfigInput = {}): MonitorConfig {
    const result = MonitorConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return result.data;
}

// ============================================
// RUN REQUEST
// ============================================

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const MonitorRunRequestSchema = z.object({
    weekStart: IsoDateSchema.optional(),
    preview: z.boolean().default(false),
});
export type MonitorRunRequest = z.infer<typeof MonitorRunRequestSchema>;

// ============================================
// TIMESHEET REPORT
// ============================================

/**
 * One item of the timesheet summary report.
 * Hour fields vary by account setup, so all of them are optional.
 */
export const TimesheetReportItemSchema = z
    .object({
        id: z.union([z.string(), z.number()]).transform(String),
        title: z.string().default('Unknown'),
        email: z.string().optional(),
        totalHours: z.number().nonnegative().optional(),
        idleHours: z.number().nonnegative().optional(),
        totalSecondsCount: z.number().nonnegative().optional(),
        activeSecondsCount: z.number().nonnegative().optional(),
        inactiveSecondsCount: z.number().nonnegative().optional(),
    })
    .passthrough();
export type TimesheetReportItem = z.infer<typeof TimesheetReportItemSchema>;

export const TimesheetReportSchema = z.array(TimesheetReportItemSchema);
