/**
 * API client for the hours monitor server
 *
 * Every request carries the x-api-key header; every JSON body is validated
 * against the expected schema before a command prints it.
 */

import type { z } from 'zod';
import { ErrorBodySchema } from './schemas.js';

const BASE_URL = process.env.HOURS_MONITOR_URL || 'http://127.0.0.1:3001';

export function getBaseUrl(): string {
  return BASE_URL;
}

export function getApiKey(): string | null {
  return process.env.HOURS_MONITOR_API_KEY?.trim() || null;
}

export type ApiResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: string };

/**
 * Turn a status and decoded body into an ApiResponse.
 * Error bodies use the server's `{ error, code }` shape.
 */
export function parseApiResponse<T>(
  status: number,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): ApiResponse<T> {
  if (status < 200 || status >= 300) {
    const parsed = ErrorBodySchema.safeParse(body);
    const message = parsed.success
      ? `${parsed.data.error}${parsed.data.code ? ` (${parsed.data.code})` : ''}`
      : `HTTP ${status}`;
    return { ok: false, status, error: message };
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      status,
      error: `Unexpected response shape${issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : ''}`,
    };
  }
  return { ok: true, status, data: parsed.data };
}

export async function api<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { method?: string; body?: unknown } = {}
): Promise<ApiResponse<T>> {
  const apiKey = getApiKey();
  if (!apiKey) {
    console.error('HOURS_MONITOR_API_KEY is not set');
    process.exit(1);
  }

  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: options.method || 'GET',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': apiKey,
      },
      ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Connection failed: ${msg}`);
    console.error(`Is the server running at ${BASE_URL}?`);
    process.exit(1);
  }

  // Non-JSON responses (proxies, HTML error pages)
  const contentType = res.headers.get('content-type') || '';
  if (!contentType.includes('application/json')) {
    return { ok: false, status: res.status, error: `Non-JSON response (${res.status}): ${contentType}` };
  }

  const body: unknown = await res.json();
  return parseApiResponse(res.status, body, schema);
}
