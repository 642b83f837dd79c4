import { z } from 'zod';
import {
    ConfigurationError,
    DataUnavailableError,
    HOURS_ERROR_CODES,
    HoursMonitorError,
    InvalidWeekError,
    UnresolvedPeriodError,
} from '@hours-monitor/shared';
import { NotFoundError, UnauthorizedError, ValidationError } from '../../utils/errors.js';
import { toErrorResponse } from '../errorHandler.js';
import { isValidApiKey } from '../apiKey.js';

describe('toErrorResponse', () => {
    it('maps monitor errors to their status with the user-facing message', () => {
        expect(toErrorResponse(new UnresolvedPeriodError('2025-09'))).toEqual({
            status: 503,
            body: {
                error: 'Leave data for a required month could not be located',
                type: 'UnresolvedPeriodError',
                code: 'HOURS_UNRESOLVED_PERIOD',
                details: 'No leave data found for period 2025-09',
            },
        });
    });

    it.each([
        [new InvalidWeekError('bad week'), 400],
        [new HoursMonitorError(HOURS_ERROR_CODES.AMBIGUOUS_PERIOD_BOUNDARY), 422],
        [new HoursMonitorError(HOURS_ERROR_CODES.RUN_IN_PROGRESS), 409],
        [new DataUnavailableError('timesheet', 'down'), 503],
        [new ConfigurationError(['buffer: must not be negative']), 500],
    ])('maps %s to %i', (error, status) => {
        expect(toErrorResponse(error).status).toBe(status);
    });

    it('maps request errors', () => {
        expect(toErrorResponse(new ValidationError('date must be YYYY-MM-DD', { date: 'x' }))).toEqual({
            status: 400,
            body: { error: 'date must be YYYY-MM-DD', type: 'ValidationError', details: { date: 'x' } },
        });
        expect(toErrorResponse(new UnauthorizedError()).status).toBe(401);
        expect(toErrorResponse(new NotFoundError('No run yet', 'monitorRun')).body).toEqual({
            error: 'No run yet',
            type: 'NotFoundError',
            resourceType: 'monitorRun',
        });
    });

    it('lists zod issues by path', () => {
        const result = z.object({ weekStart: z.string() }).safeParse({ weekStart: 1 });
        if (result.success) throw new Error('expected a parse failure');

        expect(toErrorResponse(result.error)).toEqual({
            status: 400,
            body: {
                error: 'Validation failed',
                type: 'ValidationError',
                details: [{ path: 'weekStart', message: 'Expected string, received number' }],
            },
        });
    });

    it('falls back to 500 and only shows the stack in development', () => {
        const error = new Error('boom');

        expect(toErrorResponse(error, false)).toEqual({ status: 500, body: { error: 'boom', type: 'Error' } });
        expect(toErrorResponse(error, true).body).toHaveProperty('stack');
        expect(toErrorResponse('plain string', false).body).toEqual({ error: 'plain string', type: 'Error' });
    });
});

describe('isValidApiKey', () => {
    it('accepts only the exact key', () => {
        expect(isValidApiKey('test-secret', 'test-secret')).toBe(true);
        expect(isValidApiKey('test-secreT', 'test-secret')).toBe(false);
        expect(isValidApiKey('test', 'test-secret')).toBe(false);
        expect(isValidApiKey(undefined, 'test-secret')).toBe(false);
        expect(isValidApiKey('', 'test-secret')).toBe(false);
    });
});
