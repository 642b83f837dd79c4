/**
 * HTTP error classes for the control surface
 * Domain failures of a monitoring run are HoursMonitorError (shared package);
 * these cover request-level problems only.
 */

/**
 * Base interface for custom errors with HTTP status codes
 */
export interface CustomError extends Error {
    readonly statusCode: number;
}

/**
 * Validation error - thrown when request input is malformed
 *
 * @example
 * throw new ValidationError('Invalid date', { date: '2025-13-01' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly statusCode = 400 as const;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Not found error - thrown when a requested resource does not exist yet
 *
 * @example
 * throw new NotFoundError('No monitoring run has completed yet', 'monitorRun');
 */
export class NotFoundError extends Error implements CustomError {
    readonly name = 'NotFoundError' as const;
    readonly statusCode = 404 as const;
    readonly resourceType: string | null;

    constructor(message: string = 'Resource not found', resourceType: string | null = null) {
        super(message);
        this.resourceType = resourceType;
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}

/**
 * Unauthorized error - missing or wrong API key
 */
export class UnauthorizedError extends Error implements CustomError {
    readonly name = 'UnauthorizedError' as const;
    readonly statusCode = 401 as const;

    constructor(message: string = 'Unauthorized') {
        super(message);
        Object.setPrototypeOf(this, UnauthorizedError.prototype);
    }
}

/**
 * Narrow an unknown into a printable message
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
