/**
 * Google Sheets Configuration
 *
 * API quota, retry and range settings for reading the leave workbook
 * and the manager mapping.
 *
 * TO CHANGE SHEET SETTINGS:
 * Simply update the values below. Changes take effect on next run.
 */

import { isAbsolute, resolve } from 'path';
import { fileURLToPath } from 'url';
import { env } from './env.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));

// ============================================
// API LIMITS
// ============================================

/** Min delay between Sheets API calls (300/min quota, 250 safe) */
export const API_CALL_DELAY_MS = 200;

/** Retries on 429/500/503 before giving up */
export const API_MAX_RETRIES = 3;

// ============================================
// AUTH
// ============================================

/** Read-only: the monitor never writes to a sheet */
export const SHEETS_API_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly';

/** Key file location; relative paths resolve from the server package root */
export const GOOGLE_SERVICE_ACCOUNT_PATH = isAbsolute(env.GOOGLE_SERVICE_ACCOUNT_PATH)
    ? env.GOOGLE_SERVICE_ACCOUNT_PATH
    : resolve(__dirname, '../..', env.GOOGLE_SERVICE_ACCOUNT_PATH);

// ============================================
// LEAVE WORKBOOK LAYOUT
// ============================================

/**
 * Columns read from a monthly leave tab.
 * Column A holds names, row 1 holds day numbers. Day 31 sits in column AF;
 * BZ leaves room for extra columns some tabs carry.
 */
export const LEAVE_TAB_COLUMNS = 'A:BZ';
