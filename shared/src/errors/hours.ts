/**
 * Hours Monitor Error Utilities
 *
 * Error codes, messages, and error classes for the weekly hours engine.
 * Every fatal condition of a monitoring run is one of these; identity
 * mismatches are not errors and travel as data instead.
 */

// ============================================
// ERROR CODES
// ============================================

export const HOURS_ERROR_CODES = {
    // Source data
    DATA_UNAVAILABLE: 'HOURS_DATA_UNAVAILABLE',
    UNRESOLVED_PERIOD: 'HOURS_UNRESOLVED_PERIOD',
    AMBIGUOUS_PERIOD_BOUNDARY: 'HOURS_AMBIGUOUS_PERIOD_BOUNDARY',

    // Input
    INVALID_WEEK: 'HOURS_INVALID_WEEK',
    CONFIGURATION: 'HOURS_CONFIGURATION',

    // Run
    RUN_IN_PROGRESS: 'HOURS_RUN_IN_PROGRESS',
} as const;

export type HoursErrorCode = (typeof HOURS_ERROR_CODES)[keyof typeof HOURS_ERROR_CODES];

// ============================================
// USER-FRIENDLY MESSAGES
// ============================================

export const HOURS_ERROR_MESSAGES: Record<HoursErrorCode, string> = {
    [HOURS_ERROR_CODES.DATA_UNAVAILABLE]: 'Required source data could not be fetched',
    [HOURS_ERROR_CODES.UNRESOLVED_PERIOD]: 'Leave data for a required month could not be located',
    [HOURS_ERROR_CODES.AMBIGUOUS_PERIOD_BOUNDARY]: 'The reporting week could not be split across leave periods',
    [HOURS_ERROR_CODES.INVALID_WEEK]: 'The reporting week is not a valid 7-day range',
    [HOURS_ERROR_CODES.CONFIGURATION]: 'Monitor configuration is invalid',
    [HOURS_ERROR_CODES.RUN_IN_PROGRESS]: 'A monitoring run is already in progress',
};

export function getHoursErrorMessage(code: HoursErrorCode): string {
    return HOURS_ERROR_MESSAGES[code];
}

// ============================================
// ERROR CLASSES
// ============================================

/**
 * Base error for the hours domain.
 * `message` is technical (for logs), `userMessage` is safe to show.
 */
export class HoursMonitorError extends Error {
    readonly code: HoursErrorCode;
    readonly userMessage: string;
    readonly context?: Record<string, unknown>;

    constructor(
        code: HoursErrorCode,
        options?: {
            technicalMessage?: string;
            context?: Record<string, unknown>;
            cause?: unknown;
        }
    ) {
        const userMessage = getHoursErrorMessage(code);
        super(options?.technicalMessage || userMessage, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'HoursMonitorError';
        this.code = code;
        this.userMessage = userMessage;
        this.context = options?.context;
        Object.setPrototypeOf(this, HoursMonitorError.prototype);
    }

    toResult(): HoursErrorResult {
        return {
            success: false,
            error: {
                code: this.code,
                message: this.userMessage,
            },
        };
    }
}

/** A leave period or hour report could not be fetched. Fatal for the run. */
export class DataUnavailableError extends HoursMonitorError {
    readonly source: string;

    constructor(
        source: string,
        technicalMessage: string,
        options?: { code?: HoursErrorCode; context?: Record<string, unknown>; cause?: unknown }
    ) {
        super(options?.code ?? HOURS_ERROR_CODES.DATA_UNAVAILABLE, {
            technicalMessage,
            context: { source, ...options?.context },
            cause: options?.cause,
        });
        this.name = 'DataUnavailableError';
        this.source = source;
        Object.setPrototypeOf(this, DataUnavailableError.prototype);
    }
}

/** A month the week touches has no leave matrix. */
export class UnresolvedPeriodError extends DataUnavailableError {
    readonly periodId: string;

    constructor(periodId: string, technicalMessage?: string, cause?: unknown) {
        super('leave', technicalMessage ?? `No leave data found for period ${periodId}`, {
            code: HOURS_ERROR_CODES.UNRESOLVED_PERIOD,
            context: { periodId },
            cause,
        });
        this.name = 'UnresolvedPeriodError';
        this.periodId = periodId;
        Object.setPrototypeOf(this, UnresolvedPeriodError.prototype);
    }
}

/** The week's days cannot be partitioned over the available periods. */
export class AmbiguousPeriodBoundaryError extends DataUnavailableError {
    constructor(technicalMessage: string, context?: Record<string, unknown>) {
        super('leave', technicalMessage, {
            code: HOURS_ERROR_CODES.AMBIGUOUS_PERIOD_BOUNDARY,
            context,
        });
        this.name = 'AmbiguousPeriodBoundaryError';
        Object.setPrototypeOf(this, AmbiguousPeriodBoundaryError.prototype);
    }
}

export class InvalidWeekError extends HoursMonitorError {
    constructor(technicalMessage: string, context?: Record<string, unknown>) {
        super(HOURS_ERROR_CODES.INVALID_WEEK, { technicalMessage, context });
        this.name = 'InvalidWeekError';
        Object.setPrototypeOf(this, InvalidWeekError.prototype);
    }
}

/** Invalid threshold/buffer/hours. Raised at startup, values are never clamped. */
export class ConfigurationError extends HoursMonitorError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(HOURS_ERROR_CODES.CONFIGURATION, {
            technicalMessage: `Invalid monitor configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
            context: { issues },
        });
        this.name = 'ConfigurationError';
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

export function isHoursMonitorError(error: unknown): error is HoursMonitorError {
    return error instanceof HoursMonitorError;
}

// ============================================
// RESULT TYPES
// ============================================

export interface HoursErrorResult {
    success: false;
    error: {
        code: string;
        message: string;
    };
}
