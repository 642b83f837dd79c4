/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HOURS_ERROR_CODES, HoursMonitorError, type HoursErrorCode } from '@hours-monitor/shared';
import { NotFoundError, UnauthorizedError, ValidationError } from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

/** HTTP status per monitor error code */
export const HOURS_ERROR_STATUS: Record<HoursErrorCode, number> = {
    [HOURS_ERROR_CODES.INVALID_WEEK]: 400,
    [HOURS_ERROR_CODES.AMBIGUOUS_PERIOD_BOUNDARY]: 422,
    [HOURS_ERROR_CODES.RUN_IN_PROGRESS]: 409,
    [HOURS_ERROR_CODES.DATA_UNAVAILABLE]: 503,
    [HOURS_ERROR_CODES.UNRESOLVED_PERIOD]: 503,
    [HOURS_ERROR_CODES.CONFIGURATION]: 500,
};

export interface ErrorResponse {
    status: number;
    body: Record<string, unknown>;
}

/**
 * Map any thrown value to a status and JSON body
 */
export function toErrorResponse(err: unknown, isDev: boolean = process.env.NODE_ENV === 'development'): ErrorResponse {
    if (err instanceof HoursMonitorError) {
        return {
            status: HOURS_ERROR_STATUS[err.code],
            body: { error: err.userMessage, type: err.name, code: err.code, details: err.message },
        };
    }

    if (err instanceof ValidationError) {
        return { status: 400, body: { error: err.message, type: 'ValidationError', details: err.details } };
    }

    if (err instanceof UnauthorizedError) {
        return { status: 401, body: { error: err.message, type: 'UnauthorizedError' } };
    }

    if (err instanceof NotFoundError) {
        return { status: 404, body: { error: err.message, type: 'NotFoundError', resourceType: err.resourceType } };
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        return {
            status: 400,
            body: {
                error: 'Validation failed',
                type: 'ValidationError',
                details: err.issues.map((issue) => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            },
        };
    }

    // Default 500 error
    const error = err instanceof Error ? err : new Error(String(err));
    return {
        status: 500,
        body: {
            error: error.message || 'Internal server error',
            type: error.name || 'Error',
            ...(isDev && { stack: error.stack }),
        },
    };
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const { status, body } = toErrorResponse(err);
    const logData = {
        method: req.method,
        path: req.path,
        status,
        error: err instanceof Error ? err.message : String(err),
        ...(err instanceof HoursMonitorError && { code: err.code }),
    };

    if (status >= 500) {
        httpLogger.error(logData, 'Request failed');
    } else if (status !== 401) {
        httpLogger.warn(logData, 'Request rejected');
    }

    res.status(status).json(body);
};

export default errorHandler;
