/**
 * Retry with exponential backoff for transient upstream failures
 */

import type { Logger } from 'pino';

export interface RetryOptions {
    label: string;
    maxRetries: number;
    logger: Logger;
    /** Decides whether a failure is worth another attempt */
    isTransient: (error: unknown) => boolean;
    /** Runs before every attempt (rate limiting) */
    beforeAttempt?: () => Promise<void>;
    /** Delay before retry n is baseDelayMs × 2^n */
    baseDelayMs?: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
    const baseDelay = options.baseDelayMs ?? 1000;
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
        try {
            if (options.beforeAttempt) await options.beforeAttempt();
            return await operation();
        } catch (error: unknown) {
            lastError = error;

            if (!options.isTransient(error) || attempt === options.maxRetries) {
                throw error;
            }

            const delay = Math.pow(2, attempt) * baseDelay; // 1s, 2s, 4s
            options.logger.warn(
                { attempt: attempt + 1, delay, label: options.label },
                'Retrying after transient error'
            );
            await sleep(delay);
        }
    }

    throw lastError ?? new Error(`${options.label}: exhausted retries`);
}

/** HTTP status carried by a googleapis (`code`) or axios (`response.status`) error */
export function statusCodeOf(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;

    if ('response' in error && typeof error.response === 'object' && error.response !== null) {
        const response = error.response;
        if ('status' in response && typeof response.status === 'number') return response.status;
    }

    if ('code' in error) {
        const code = Number(error.code);
        if (Number.isInteger(code)) return code;
    }

    return undefined;
}
