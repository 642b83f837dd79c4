/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the process exits with the list of failing variables.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 * 3. Add it to .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const booleanFlag = z.enum(['true', 'false']);

export const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** Shared secret for the /api/monitor endpoints (x-api-key header) */
    MONITOR_API_KEY: z.string().min(1, 'MONITOR_API_KEY is required'),

    /** Timesheet service base URL; any query string or trailing slash is dropped */
    TEAMLOGGER_API_URL: z.string().url('TEAMLOGGER_API_URL must be a URL'),

    /** Bearer token for the timesheet service */
    TEAMLOGGER_BEARER_TOKEN: z.string().min(1, 'TEAMLOGGER_BEARER_TOKEN is required'),

    /** Leave workbook: spreadsheet id or full URL */
    LEAVE_SPREADSHEET_ID: z.string().min(1, 'LEAVE_SPREADSHEET_ID is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** pino level; defaults to debug in development, info otherwise */
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // ----------------------------------------
    // GOOGLE SHEETS
    // ----------------------------------------

    /** Service account key as a JSON string (takes precedence over the key file) */
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().optional(),

    /** Path to a service account key file */
    GOOGLE_SERVICE_ACCOUNT_PATH: z.string().default('config/google-service-account.json'),

    /** Manager mapping workbook (Employee Name | Manager Name | Manager Email) */
    MANAGER_SPREADSHEET_ID: z.string().optional(),

    /** Range holding the manager mapping, header row included */
    MANAGER_SHEET_RANGE: z.string().default('Sheet1!A:C'),

    // ----------------------------------------
    // RESEND
    // ----------------------------------------

    /** Resend API key for sending emails */
    RESEND_API_KEY: z.string().optional(),

    /** Sender for alerts, e.g. "Hours Monitor <alerts@example.com>" */
    ALERT_FROM_EMAIL: z.string().default('Hours Monitor <alerts@example.com>'),

    /** Comma-separated addresses copied on every alert and sent the weekly summary */
    ALERT_CC_EMAILS: z.string().default(''),

    /** When false every run is a preview: emails are rendered but not sent */
    ENABLE_EMAIL_ALERTS: booleanFlag.default('true'),

    // ----------------------------------------
    // HOURS POLICY
    // ----------------------------------------

    BASE_WEEKLY_HOURS: z.coerce.number().default(40),
    HOURS_BUFFER: z.coerce.number().default(3),
    WEEK_DAYS: z.coerce.number().default(7),

    /** Share of known employees on leave above which a day is a holiday */
    HOLIDAY_THRESHOLD: z.coerce.number().default(0.7),

    /** Known markings needed on a day before it can be a holiday */
    HOLIDAY_MIN_HEADCOUNT: z.coerce.number().default(1),

    /** Comma-separated names of people who have left */
    INACTIVE_EMPLOYEES: z.string().default(''),

    // ----------------------------------------
    // SCHEDULE
    // ----------------------------------------

    /** IANA zone for week boundaries and the schedule */
    MONITOR_TIMEZONE: z.string().default('Asia/Kolkata'),

    /** Weekday of the scheduled run, 0 = Sunday */
    MONITOR_RUN_DAY: z.coerce.number().int().min(0).max(6).default(1),

    /** Local hour (0-23) from which the scheduled run may start */
    MONITOR_RUN_HOUR: z.coerce.number().int().min(0).max(23).default(8),

    /** Disable the weekly scheduler (manual runs still work) */
    DISABLE_SCHEDULER: booleanFlag.default('false'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parsed and validated environment variables.
 *
 * Exits the process at startup if any required variables are missing
 * or if any variables fail validation.
 */
function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (result.success) return result.data;

    const issues = result.error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');

    console.error('Environment validation failed:\n' + issues);
    process.exit(1);
}

export const env = parseEnv();

/** Split a comma-separated variable into trimmed, non-empty entries */
export function splitList(value: string): string[] {
    return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}
