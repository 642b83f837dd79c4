/**
 * Weekly summary for the CC list: who fell short, which days were holidays.
 */

import { toDisplayDate, type ComplianceVerdict, type WeekEvaluation } from '@hours-monitor/shared';
import { wrapInLayout, heading, paragraph, detailTable, detailRow, divider, escapeHtml, formatHours } from './layout.js';
import type { RenderedEmail } from './lowHoursAlert.js';

export interface WeeklySummaryData {
    evaluation: WeekEvaluation;
    preview: boolean;
    alertsSent: number;
    alertsFailed: number;
}

function shortfallLine(verdict: ComplianceVerdict): string {
    return `${verdict.employee.name}: ${formatHours(verdict.activeHours)} of ${formatHours(verdict.acceptableHours)} (short ${formatHours(verdict.shortfall ?? 0)})`;
}

export function renderWeeklySummary(data: WeeklySummaryData): RenderedEmail {
    const { evaluation } = data;
    const from = toDisplayDate(evaluation.week.start);
    const to = toDisplayDate(evaluation.week.end);
    const flagged = evaluation.verdicts.filter((v) => v.classification === 'non_compliant');
    const exempt = evaluation.verdicts.filter((v) => v.classification === 'exempt').length;
    const holidays = evaluation.holidays.dates.map(toDisplayDate);

    const subject = `${data.preview ? '[Preview] ' : ''}Weekly Hours Summary - ${from} to ${to} - ${flagged.length} below target`;

    const counts = [
        detailRow('Employees evaluated', String(evaluation.verdicts.length)),
        detailRow('Below target', String(flagged.length), { highlight: flagged.length > 0 }),
        detailRow('Exempt (full week off)', String(exempt)),
        detailRow('Excluded', String(evaluation.excluded.length)),
        detailRow('Holidays inferred', holidays.length > 0 ? holidays.join(', ') : 'None'),
        detailRow('Alerts sent', data.preview ? 'Preview only' : `${data.alertsSent} sent, ${data.alertsFailed} failed`),
    ].join('');

    const flaggedHtml = flagged.length > 0
        ? `<ul style="margin:0 0 16px;padding-left:20px;font-size:14px;">${flagged
            .map((v) => `<li>${escapeHtml(shortfallLine(v))}</li>`)
            .join('')}</ul>`
        : paragraph('Everyone met the acceptable minimum.');

    const mismatchHtml = evaluation.mismatches.length > 0
        ? divider() + paragraph(
            `Not found in the leave sheet: ${escapeHtml(
                evaluation.mismatches.map((m) => `${m.employeeName} (${m.periodId})`).join(', ')
            )}`
        )
        : '';

    const html = wrapInLayout(
        [heading(`Week of ${from}`), detailTable(counts), flaggedHtml, mismatchHtml].join('\n'),
        { preheader: `${flagged.length} below target for the week of ${from}` }
    );

    const text = [
        `Weekly hours summary: ${from} to ${to}`,
        '',
        `Employees evaluated: ${evaluation.verdicts.length}`,
        `Below target: ${flagged.length}`,
        `Exempt (full week off): ${exempt}`,
        `Excluded: ${evaluation.excluded.length}`,
        `Holidays inferred: ${holidays.length > 0 ? holidays.join(', ') : 'None'}`,
        '',
        ...flagged.map(shortfallLine),
    ].join('\n');

    return { subject, html, text };
}
