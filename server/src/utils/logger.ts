/**
 * Centralized logger using Pino
 * Structured JSON in production, pino-pretty in development
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const isDev = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === undefined;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(): LevelWithSilent {
    const requested = LEVELS.find((level) => level === process.env.LOG_LEVEL);
    return requested ?? (isDev ? 'debug' : 'info');
}

// Create the logger instance
const logger: Logger = isDev
    ? pino({
        level: resolveLevel(),
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino({
        level: resolveLevel(),
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });

// Child loggers for different modules
export const monitorLogger: Logger = logger.child({ module: 'monitor' });
export const sheetsLogger: Logger = logger.child({ module: 'sheets' });
export const timesheetLogger: Logger = logger.child({ module: 'timesheet' });
export const emailLogger: Logger = logger.child({ module: 'email' });
export const schedulerLogger: Logger = logger.child({ module: 'scheduler' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
