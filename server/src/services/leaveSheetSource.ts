/**
 * Leave Sheet Source
 *
 * Fetches monthly leave matrices from the leave workbook. One tab per month,
 * named "Oct 25", "October 25" or "October 2025". Column A holds employee
 * names, row 1 holds day-of-month numbers, every other cell is free text.
 */

import {
    DataUnavailableError,
    UnresolvedPeriodError,
    daysInMonth,
    monthKey,
    monthTabNames,
    type LeavePeriod,
    type ResolvedPeriod,
} from '@hours-monitor/shared';
import { env } from '../config/env.js';
import { LEAVE_TAB_COLUMNS } from '../config/sheets.js';
import { errorMessage } from '../utils/errors.js';
import { sheetsLogger } from '../utils/logger.js';
import { extractSpreadsheetId, listSheetTitles, readRange } from './googleSheetsClient.js';

const DAY_HEADER_RE = /^\d{1,2}$/;

// ============================================
// PARSING
// ============================================

/**
 * Turn the raw values of a leave tab into a LeavePeriod.
 * Rows are re-indexed by the header's day numbers, so extra columns
 * (totals, notes) are ignored. The first row for a name wins.
 *
 * @throws UnresolvedPeriodError when the header has no day numbers
 */
export function parseLeaveMatrix(year: number, month: number, values: string[][]): LeavePeriod {
    const id = monthKey(year, month);
    const length = daysInMonth(year, month);
    const header = values[0] ?? [];

    const dayColumns: Array<{ column: number; day: number }> = [];
    header.forEach((cell, column) => {
        if (column === 0) return;
        const text = cell.trim();
        if (!DAY_HEADER_RE.test(text)) return;
        const day = Number(text);
        if (day >= 1 && day <= length) dayColumns.push({ column, day });
    });

    if (dayColumns.length === 0) {
        throw new UnresolvedPeriodError(id, `Leave tab for ${id} has no day-number header row`);
    }

    const rows = new Map<string, string[]>();
    for (const row of values.slice(1)) {
        const name = (row[0] ?? '').trim();
        if (!name || rows.has(name)) continue;

        const cells = new Array<string>(length).fill('');
        for (const { column, day } of dayColumns) {
            cells[day - 1] = row[column] ?? '';
        }
        rows.set(name, cells);
    }

    return { id, year, month, daysInMonth: length, rows };
}

/** First candidate tab name present in the workbook, compared case-insensitively */
export function findMonthTab(titles: string[], year: number, month: number): string | undefined {
    const byKey = new Map(titles.map((title) => [title.trim().toLowerCase(), title] as const));
    for (const candidate of monthTabNames(year, month)) {
        const title = byKey.get(candidate.toLowerCase());
        if (title) return title;
    }
    return undefined;
}

// ============================================
// FETCHING
// ============================================

async function fetchSheet<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error: unknown) {
        throw new DataUnavailableError('leave', `${label} failed: ${errorMessage(error)}`, { cause: error });
    }
}

/** A1 range for a tab, with quotes in the title doubled */
export function tabRange(title: string, columns: string = LEAVE_TAB_COLUMNS): string {
    return `'${title.replace(/'/g, "''")}'!${columns}`;
}

/**
 * Fetch the leave matrix of every resolved period, reading the tabs in parallel.
 * Any failure is fatal for the run: a missing month never degrades to "no leave".
 */
export async function fetchLeavePeriods(periods: ResolvedPeriod[]): Promise<LeavePeriod[]> {
    const spreadsheetId = extractSpreadsheetId(env.LEAVE_SPREADSHEET_ID);
    const titles = await fetchSheet('Listing leave tabs', () => listSheetTitles(spreadsheetId));

    // Every month needs a tab before any of them is read
    const tabs = periods.map((period) => {
        const title = findMonthTab(titles, period.year, period.month);
        if (!title) {
            throw new UnresolvedPeriodError(
                period.id,
                `No leave tab for ${period.id}; tried ${monthTabNames(period.year, period.month).join(', ')}`
            );
        }
        return { period, title };
    });

    return Promise.all(
        tabs.map(async ({ period, title }) => {
            const values = await fetchSheet(`Reading leave tab "${title}"`, () =>
                readRange(spreadsheetId, tabRange(title))
            );
            const matrix = parseLeaveMatrix(period.year, period.month, values);
            sheetsLogger.info({ periodId: matrix.id, tab: title, employees: matrix.rows.size }, 'Leave tab loaded');
            return matrix;
        })
    );
}
