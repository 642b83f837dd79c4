/**
 * Manager Mapping
 *
 * Employee → manager lookup from a sheet with the columns
 * Employee Name | Manager Name | Manager Email (header row first).
 * Only used to copy managers on alerts; the run goes on without it.
 */

import { normalizeNameKey } from '@hours-monitor/shared';
import { z } from 'zod';
import { env } from '../config/env.js';
import { errorMessage } from '../utils/errors.js';
import { sheetsLogger } from '../utils/logger.js';
import { extractSpreadsheetId, readRange } from './googleSheetsClient.js';

export interface ManagerContact {
    name: string;
    email: string;
}

/** Keyed by normalized employee name */
export type ManagerDirectory = Map<string, ManagerContact>;

const EmailSchema = z.string().email();

export function parseManagerRows(values: string[][]): ManagerDirectory {
    const directory: ManagerDirectory = new Map();

    for (const row of values.slice(1)) {
        const key = normalizeNameKey(row[0] ?? '');
        const name = (row[1] ?? '').trim();
        const email = (row[2] ?? '').trim();
        if (!key || directory.has(key)) continue;

        if (!EmailSchema.safeParse(email).success) {
            sheetsLogger.debug({ employee: row[0], email }, 'Skipping manager row without a valid email');
            continue;
        }
        directory.set(key, { name, email });
    }

    return directory;
}

export function managerFor(directory: ManagerDirectory, employeeName: string): ManagerContact | undefined {
    return directory.get(normalizeNameKey(employeeName));
}

/**
 * Load the directory. Returns an empty directory when no mapping sheet is
 * configured or it cannot be read; the failure is logged.
 */
export async function loadManagerDirectory(): Promise<ManagerDirectory> {
    if (!env.MANAGER_SPREADSHEET_ID) return new Map();

    try {
        const values = await readRange(extractSpreadsheetId(env.MANAGER_SPREADSHEET_ID), env.MANAGER_SHEET_RANGE);
        const directory = parseManagerRows(values);
        sheetsLogger.info({ managers: directory.size }, 'Manager mapping loaded');
        return directory;
    } catch (error: unknown) {
        sheetsLogger.warn({ error: errorMessage(error) }, 'Manager mapping unavailable, alerts will not copy managers');
        return new Map();
    }
}
