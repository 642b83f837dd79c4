/**
 * Low-hours notifications for a finished evaluation.
 *
 * Runs only after every fetch and the whole evaluation succeeded, so a
 * failed run never sends a partial set of alerts.
 */

import { nonCompliantVerdicts, type WeekEvaluation } from '@hours-monitor/shared';
import type { AlertSettings } from '../config/monitor.js';
import { emailLogger } from '../utils/logger.js';
import { renderLowHoursAlert, renderWeeklySummary, sendEmail, type RenderedEmail } from './email/index.js';
import { managerFor, type ManagerDirectory } from './managerMapping.js';

export interface AlertOutcome {
    employeeId: string;
    employeeName: string;
    to: string;
    cc: string[];
    status: 'sent' | 'failed' | 'skipped' | 'preview';
    error?: string;
}

export interface NotificationSummary {
    preview: boolean;
    sent: number;
    failed: number;
    skipped: number;
    alerts: AlertOutcome[];
    summaryEmail: 'sent' | 'failed' | 'skipped' | 'preview';
}

export interface NotifyOptions {
    preview: boolean;
    settings: AlertSettings;
    managers: ManagerDirectory;
}

function count(alerts: AlertOutcome[], status: AlertOutcome['status']): number {
    return alerts.filter((a) => a.status === status).length;
}

export async function notifyLowHours(evaluation: WeekEvaluation, options: NotifyOptions): Promise<NotificationSummary> {
    const alerts: AlertOutcome[] = [];

    for (const verdict of nonCompliantVerdicts(evaluation)) {
        const { employee } = verdict;
        const manager = managerFor(options.managers, employee.name);
        const cc = [...options.settings.cc, ...(manager ? [manager.email] : [])];
        const base = { employeeId: employee.id, employeeName: employee.name, to: employee.email, cc };

        if (!employee.email) {
            emailLogger.warn({ employee: employee.name }, 'No email address, alert skipped');
            alerts.push({ ...base, status: 'skipped', error: 'No email address' });
            continue;
        }

        const email = renderLowHoursAlert(verdict, evaluation.week);
        if (options.preview) {
            emailLogger.info({ to: employee.email, cc, subject: email.subject }, 'Preview: alert not sent');
            alerts.push({ ...base, status: 'preview' });
            continue;
        }

        const result = await sendEmail({
            to: employee.email,
            cc,
            from: options.settings.from,
            ...email,
            templateKey: 'low_hours_alert',
        });
        alerts.push(result.success ? { ...base, status: 'sent' } : { ...base, status: 'failed', error: result.error });
    }

    const sent = count(alerts, 'sent');
    const failed = count(alerts, 'failed');
    const summaryEmail = await sendSummary(
        renderWeeklySummary({ evaluation, preview: options.preview, alertsSent: sent, alertsFailed: failed }),
        options
    );

    return {
        preview: options.preview,
        sent,
        failed,
        skipped: count(alerts, 'skipped'),
        alerts,
        summaryEmail,
    };
}

async function sendSummary(email: RenderedEmail, options: NotifyOptions): Promise<NotificationSummary['summaryEmail']> {
    if (options.settings.cc.length === 0) return 'skipped';
    if (options.preview) return 'preview';

    const result = await sendEmail({
        to: options.settings.cc,
        from: options.settings.from,
        ...email,
        templateKey: 'weekly_summary',
    });
    return result.success ? 'sent' : 'failed';
}
