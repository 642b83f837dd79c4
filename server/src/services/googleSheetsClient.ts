/**
 * Google Sheets API v4 Client (Authenticated, read-only)
 *
 * Reads the monthly leave tabs and the manager mapping with a service
 * account JWT.
 *
 * Features:
 * - Lazy auth: authenticates on first API call
 * - Rate limiter: respects 300 calls/min quota (250 safe limit)
 * - Retry: exponential backoff on 429/500/503
 * - Module-level singleton
 */

import { google, type sheets_v4 } from 'googleapis';
import { readFileSync, existsSync } from 'fs';
import { z } from 'zod';
import { env } from '../config/env.js';
import {
    GOOGLE_SERVICE_ACCOUNT_PATH,
    SHEETS_API_SCOPE,
    API_CALL_DELAY_MS,
    API_MAX_RETRIES,
} from '../config/sheets.js';
import { sheetsLogger } from '../utils/logger.js';
import { statusCodeOf, withRetry } from '../utils/retry.js';

// ============================================
// TYPES
// ============================================

const ServiceAccountKeySchema = z.object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
});

// ============================================
// SINGLETON STATE
// ============================================

let sheetsClient: sheets_v4.Sheets | null = null;
let lastCallAt = 0;

// ============================================
// AUTH
// ============================================

/**
 * Get or create the authenticated Sheets client.
 *
 * Credential sources (checked in order):
 *   1. GOOGLE_SERVICE_ACCOUNT_JSON env var (JSON string, for CI and hosted deploys)
 *   2. JSON key file at GOOGLE_SERVICE_ACCOUNT_PATH (local dev)
 */
function getClient(): sheets_v4.Sheets {
    if (sheetsClient) return sheetsClient;

    let rawKey: string;

    if (env.GOOGLE_SERVICE_ACCOUNT_JSON) {
        rawKey = env.GOOGLE_SERVICE_ACCOUNT_JSON;
        sheetsLogger.info('Using Google service account from GOOGLE_SERVICE_ACCOUNT_JSON env var');
    } else if (existsSync(GOOGLE_SERVICE_ACCOUNT_PATH)) {
        rawKey = readFileSync(GOOGLE_SERVICE_ACCOUNT_PATH, 'utf-8');
        sheetsLogger.info('Using Google service account from key file');
    } else {
        throw new Error(
            'Google service account credentials not found. ' +
            `Set GOOGLE_SERVICE_ACCOUNT_JSON or place a key file at ${GOOGLE_SERVICE_ACCOUNT_PATH}`
        );
    }

    const keyFile = ServiceAccountKeySchema.parse(JSON.parse(rawKey));

    const auth = new google.auth.JWT({
        email: keyFile.client_email,
        key: keyFile.private_key,
        scopes: [SHEETS_API_SCOPE],
    });

    sheetsClient = google.sheets({ version: 'v4', auth });
    sheetsLogger.info('Google Sheets API client initialized');
    return sheetsClient;
}

// ============================================
// RATE LIMITER
// ============================================

/**
 * Wait if needed to respect rate limit (min API_CALL_DELAY_MS between calls)
 */
async function rateLimit(): Promise<void> {
    const now = Date.now();
    const elapsed = now - lastCallAt;
    if (elapsed < API_CALL_DELAY_MS) {
        await new Promise((resolve) => setTimeout(resolve, API_CALL_DELAY_MS - elapsed));
    }
    lastCallAt = Date.now();
}

function isTransientSheetsError(error: unknown): boolean {
    const status = statusCodeOf(error);
    return status === 429 || status === 500 || status === 503;
}

function sheetsCall<T>(operation: () => Promise<T>, label: string): Promise<T> {
    return withRetry(operation, {
        label,
        maxRetries: API_MAX_RETRIES,
        logger: sheetsLogger,
        isTransient: isTransientSheetsError,
        beforeAttempt: rateLimit,
    });
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Accept a bare spreadsheet id or a full Sheets URL.
 */
export function extractSpreadsheetId(idOrUrl: string): string {
    const match = idOrUrl.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/);
    return match ? match[1] : idOrUrl.trim();
}

/**
 * Titles of every tab in a spreadsheet.
 */
export async function listSheetTitles(spreadsheetId: string): Promise<string[]> {
    const client = getClient();

    const response = await sheetsCall(
        () => client.spreadsheets.get({
            spreadsheetId,
            fields: 'sheets.properties.title',
        }),
        'listSheetTitles'
    );

    return (response.data.sheets ?? [])
        .map((sheet) => sheet.properties?.title ?? '')
        .filter((title) => title.length > 0);
}

/**
 * Read a range from a spreadsheet.
 * @returns 2D array of strings (empty cells are empty strings)
 */
export async function readRange(
    spreadsheetId: string,
    range: string
): Promise<string[][]> {
    const client = getClient();

    const response = await sheetsCall(
        () => client.spreadsheets.values.get({
            spreadsheetId,
            range,
            valueRenderOption: 'FORMATTED_VALUE',
        }),
        `readRange(${range})`
    );

    // Google Sheets API returns mixed types, coerce everything to strings
    const raw: unknown[][] = response.data.values ?? [];
    return raw.map((row) => row.map((cell) => String(cell ?? '')));
}
