/**
 * Shared Error Utilities
 *
 * Export barrel for domain-specific error utilities.
 */

export {
    // Error codes
    HOURS_ERROR_CODES,
    type HoursErrorCode,
    // Messages
    HOURS_ERROR_MESSAGES,
    getHoursErrorMessage,
    // Error classes
    HoursMonitorError,
    DataUnavailableError,
    UnresolvedPeriodError,
    AmbiguousPeriodBoundaryError,
    InvalidWeekError,
    ConfigurationError,
    isHoursMonitorError,
    // Result types
    type HoursErrorResult,
} from './hours.js';
