import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@hours-monitor/shared': fileURLToPath(new URL('./shared/src/index.ts', import.meta.url)),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['{shared,server,cli}/src/**/__tests__/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent',
            FORCE_COLOR: '0',
            MONITOR_API_KEY: 'test-secret',
            TEAMLOGGER_API_URL: 'http://timesheet.test',
            TEAMLOGGER_BEARER_TOKEN: 'test-token',
            LEAVE_SPREADSHEET_ID: 'test-sheet',
            RESEND_API_KEY: 'test-resend-key',
            ALERT_CC_EMAILS: 'lead@example.test',
            MONITOR_TIMEZONE: 'Asia/Kolkata',
        },
    },
});
