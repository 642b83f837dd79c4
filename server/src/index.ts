/**
 * Server entry point
 *
 * Validates configuration, starts the HTTP control surface and the weekly
 * scheduler, and shuts both down on SIGINT/SIGTERM.
 */

import { env } from './config/env.js';
import { loadMonitorConfig, loadScheduleSettings } from './config/monitor.js';
import { createApp } from './app.js';
import scheduledMonitor from './services/scheduledMonitor.js';
import logger from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

function main(): void {
    // Fail fast on invalid hours policy before anything is scheduled
    const config = loadMonitorConfig();
    const schedule = loadScheduleSettings();
    logger.info({ config, schedule }, 'Monitor configuration loaded');

    const server = createApp().listen(env.PORT, () => {
        logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Hours monitor listening');
    });

    if (schedule.enabled) {
        scheduledMonitor.start();
    } else {
        logger.warn('Scheduler disabled via DISABLE_SCHEDULER');
    }

    const shutdown = (signal: string): void => {
        logger.info({ signal }, 'Shutting down');
        scheduledMonitor.stop();
        server.close(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
    main();
} catch (error: unknown) {
    logger.fatal({ error: errorMessage(error) }, 'Startup failed');
    process.exit(1);
}
