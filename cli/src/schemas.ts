/**
 * Response shapes of the monitor server, validated before display
 */

import { z } from 'zod';
import { COMPLIANCE_CLASSIFICATIONS } from '@hours-monitor/shared';

export const ErrorBodySchema = z
  .object({
    error: z.string(),
    code: z.string().optional(),
  })
  .passthrough();

export const VerdictSchema = z.object({
  employeeId: z.string(),
  name: z.string(),
  classification: z.enum(COMPLIANCE_CLASSIFICATIONS),
  activeHours: z.number(),
  requiredHours: z.number(),
  acceptableHours: z.number(),
  leaveDays: z.number(),
  holidayDays: z.number(),
  shortfall: z.number().nullable(),
});
export type VerdictRow = z.infer<typeof VerdictSchema>;

export const RunResultSchema = z.object({
  startedAt: z.string(),
  week: z.object({ start: z.string(), end: z.string() }),
  periods: z.array(z.string()),
  preview: z.boolean(),
  holidays: z.array(z.string()),
  counts: z.object({
    evaluated: z.number(),
    compliant: z.number(),
    nonCompliant: z.number(),
    exempt: z.number(),
    excluded: z.number(),
    mismatches: z.number(),
  }),
  verdicts: z.array(VerdictSchema),
  excluded: z.array(z.object({ employeeId: z.string(), name: z.string(), reason: z.string() })),
  mismatches: z.array(z.object({ employeeName: z.string(), periodId: z.string() })),
  notifications: z.object({
    sent: z.number(),
    failed: z.number(),
    skipped: z.number(),
    summaryEmail: z.string(),
  }),
  durationMs: z.number(),
});
export type RunResult = z.infer<typeof RunResultSchema>;

export const StatusSchema = z.object({
  isRunning: z.boolean(),
  lastRunAt: z.string().nullable(),
  lastError: z.object({ at: z.string(), code: z.string(), message: z.string() }).nullable(),
  scheduler: z.object({
    schedulerActive: z.boolean(),
    checkIntervalMinutes: z.number(),
    timeZone: z.string(),
    runDay: z.number(),
    runHour: z.number(),
    lastCheckAt: z.string().nullable(),
    lastScheduledWeek: z.string().nullable(),
  }),
});

export const HealthSchema = z.object({
  status: z.string(),
  uptimeSeconds: z.number(),
});
