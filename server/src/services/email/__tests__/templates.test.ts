/**
 * Tests for the alert and summary email templates.
 */

import { evaluation, shortVerdict, verdict, WEEK } from '../../__tests__/builders.js';
import { renderLowHoursAlert, renderWeeklySummary, formatHours, escapeHtml, uniqueAddresses } from '../index.js';

describe('layout helpers', () => {
    it('formats hours to two decimals', () => {
        expect(formatHours(36.5)).toBe('36.5 h');
        expect(formatHours(28.571428)).toBe('28.57 h');
        expect(formatHours(40)).toBe('40 h');
    });

    it('escapes markup characters', () => {
        expect(escapeHtml(`<b>"O'Neil" & Co</b>`)).toBe('&lt;b&gt;&quot;O&#39;Neil&quot; &amp; Co&lt;/b&gt;');
    });
});

describe('uniqueAddresses', () => {
    it('drops duplicates case-insensitively and anything excluded', () => {
        expect(
            uniqueAddresses(['Lead@example.test', ' lead@example.test', 'mgr@example.test', ''], ['MGR@example.test'])
        ).toEqual(['Lead@example.test']);
    });
});

describe('renderLowHoursAlert', () => {
    const alert = renderLowHoursAlert(shortVerdict('e1', 'Asha Rao', 36.5), WEEK);

    it('names the week in the subject', () => {
        expect(alert.subject).toBe('Work Hours Reminder - Week of 13 Oct 2025');
    });

    it('lists the figures and the shortfall in minutes', () => {
        expect(alert.text.split('\n')).toEqual([
            'Hi Asha Rao,',
            '',
            'Your tracked active hours for the week of 13 Oct 2025 to 19 Oct 2025 are below the expected level.',
            '',
            'Active hours: 36.5 h',
            'Required hours: 40 h',
            'Acceptable minimum: 37 h',
            'Leave days: 0',
            'Holidays: 0',
            'Shortfall: 0.5 h (30 min)',
            '',
            'If a leave day is missing from the leave sheet, please update it and let your manager know.',
        ]);
    });

    it('escapes the employee name in the HTML body', () => {
        const html = renderLowHoursAlert(shortVerdict('e2', 'Ravi <script>', 30), WEEK).html;

        expect(html).toContain('Hi Ravi &lt;script&gt;,');
        expect(html).not.toContain('<script>');
    });
});

describe('renderWeeklySummary', () => {
    const data = evaluation(
        [
            shortVerdict('e1', 'Asha Rao', 36.5),
            verdict('e2', 'Bina Shah'),
            verdict('e3', 'Chirag Jain', { classification: 'exempt', coveredDays: 7 }),
        ],
        {
            holidays: { dates: ['2025-10-16'], threshold: 0.7, stats: [] },
            mismatches: [{ employeeId: 'e4', employeeName: 'Dev Patel', periodId: '2025-10' }],
        }
    );

    it('marks a preview in the subject', () => {
        expect(renderWeeklySummary({ evaluation: data, preview: true, alertsSent: 0, alertsFailed: 0 }).subject).toBe(
            '[Preview] Weekly Hours Summary - 13 Oct 2025 to 19 Oct 2025 - 1 below target'
        );
        expect(renderWeeklySummary({ evaluation: data, preview: false, alertsSent: 1, alertsFailed: 0 }).subject).toBe(
            'Weekly Hours Summary - 13 Oct 2025 to 19 Oct 2025 - 1 below target'
        );
    });

    it('summarizes counts, holidays and each shortfall', () => {
        const { text } = renderWeeklySummary({ evaluation: data, preview: false, alertsSent: 1, alertsFailed: 0 });

        expect(text.split('\n')).toEqual([
            'Weekly hours summary: 13 Oct 2025 to 19 Oct 2025',
            '',
            'Employees evaluated: 3',
            'Below target: 1',
            'Exempt (full week off): 1',
            'Excluded: 0',
            'Holidays inferred: 16 Oct 2025',
            '',
            'Asha Rao: 36.5 h of 37 h (short 0.5 h)',
        ]);
    });

    it('lists leave-sheet mismatches in the HTML body', () => {
        const { html } = renderWeeklySummary({ evaluation: data, preview: false, alertsSent: 1, alertsFailed: 0 });

        expect(html).toContain('Not found in the leave sheet: Dev Patel (2025-10)');
        expect(html).toContain('1 sent, 0 failed');
    });

    it('says so when everyone met the minimum', () => {
        const { html, text } = renderWeeklySummary({
            evaluation: evaluation([verdict('e2', 'Bina Shah')]),
            preview: false,
            alertsSent: 0,
            alertsFailed: 0,
        });

        expect(html).toContain('Everyone met the acceptable minimum.');
        expect(text.split('\n').at(-1)).toBe('');
    });
});
