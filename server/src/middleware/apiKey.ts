import crypto from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { env } from '../config/env.js';
import { UnauthorizedError } from '../utils/errors.js';

/** Constant-time comparison of a provided key against the expected one */
export function isValidApiKey(provided: string | undefined, expected: string): boolean {
    if (!provided) return false;
    const left = Buffer.from(provided);
    const right = Buffer.from(expected);
    return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * Require `x-api-key` to match MONITOR_API_KEY.
 */
export function requireApiKey(req: Request, _res: Response, next: NextFunction): void {
    if (!isValidApiKey(req.header('x-api-key'), env.MONITOR_API_KEY)) {
        next(new UnauthorizedError('Missing or invalid API key'));
        return;
    }

    next();
}
