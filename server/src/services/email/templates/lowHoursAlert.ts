/**
 * Low-hours alert sent to an employee whose active hours fell short.
 */

import { toDisplayDate, type ComplianceVerdict, type ReportingWeek } from '@hours-monitor/shared';
import { wrapInLayout, heading, paragraph, detailTable, detailRow, escapeHtml, formatHours } from './layout.js';

export interface RenderedEmail {
    subject: string;
    html: string;
    text: string;
}

export function renderLowHoursAlert(verdict: ComplianceVerdict, week: ReportingWeek): RenderedEmail {
    const from = toDisplayDate(week.start);
    const to = toDisplayDate(week.end);
    const shortfall = verdict.shortfall ?? 0;
    const shortfallMinutes = Math.round(shortfall * 60);
    const name = verdict.employee.name;

    const subject = `Work Hours Reminder - Week of ${from}`;

    const rows = [
        detailRow('Week', `${from} to ${to}`),
        detailRow('Active hours', formatHours(verdict.activeHours)),
        detailRow('Required hours', formatHours(verdict.requiredHours)),
        detailRow('Acceptable minimum', formatHours(verdict.acceptableHours)),
        detailRow('Leave days', String(verdict.leaveDays)),
        detailRow('Holidays', String(verdict.holidayDays)),
        detailRow('Shortfall', `${formatHours(shortfall)} (${shortfallMinutes} min)`, { highlight: true }),
    ].join('');

    const html = wrapInLayout(
        [
            heading('Weekly hours below target'),
            paragraph(`Hi ${escapeHtml(name)},`),
            paragraph(
                `Your tracked active hours for the week of ${from} to ${to} are below the expected level.`
            ),
            detailTable(rows),
            paragraph('If a leave day is missing from the leave sheet, please update it and let your manager know.'),
        ].join('\n'),
        { preheader: `Shortfall of ${formatHours(shortfall)} for the week of ${from}` }
    );

    const text = [
        `Hi ${name},`,
        '',
        `Your tracked active hours for the week of ${from} to ${to} are below the expected level.`,
        '',
        `Active hours: ${formatHours(verdict.activeHours)}`,
        `Required hours: ${formatHours(verdict.requiredHours)}`,
        `Acceptable minimum: ${formatHours(verdict.acceptableHours)}`,
        `Leave days: ${verdict.leaveDays}`,
        `Holidays: ${verdict.holidayDays}`,
        `Shortfall: ${formatHours(shortfall)} (${shortfallMinutes} min)`,
        '',
        'If a leave day is missing from the leave sheet, please update it and let your manager know.',
    ].join('\n');

    return { subject, html, text };
}
