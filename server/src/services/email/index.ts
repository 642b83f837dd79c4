/**
 * Email Service: sends monitor alerts through Resend.
 *
 * Never throws: a failed send comes back as `{ success: false }` and is logged,
 * so one bad address cannot stop the remaining alerts of a run.
 */

import { Resend } from 'resend';
import { env } from '../../config/env.js';
import { loadAlertSettings } from '../../config/monitor.js';
import { errorMessage } from '../../utils/errors.js';
import { emailLogger as log } from '../../utils/logger.js';

// ============================================
// TYPES
// ============================================

export interface SendOptions {
  to: string | string[];
  cc?: string[];
  subject: string;
  html: string;
  text?: string;
  from?: string;

  /** Template key for log filtering */
  templateKey?: string;
}

export interface SendResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

// ============================================
// RESEND CLIENT
// ============================================

let resendClient: Resend | null = null;
function getResend(): Resend {
  if (!resendClient) {
    resendClient = new Resend(env.RESEND_API_KEY);
  }
  return resendClient;
}

async function sendViaResend(options: {
  to: string[];
  cc: string[];
  from: string;
  subject: string;
  html: string;
  text?: string;
}): Promise<{ messageId: string }> {
  const { data, error } = await getResend().emails.send({
    from: options.from,
    to: options.to,
    ...(options.cc.length > 0 && { cc: options.cc }),
    subject: options.subject,
    html: options.html,
    text: options.text ?? '',
  });

  if (error) throw new Error(error.message);
  return { messageId: data?.id ?? '' };
}

// ============================================
// MAIN SEND FUNCTION
// ============================================

/** Case-insensitive de-duplication, dropping anything already in `exclude` */
export function uniqueAddresses(addresses: string[], exclude: string[] = []): string[] {
  const seen = new Set(exclude.map((a) => a.toLowerCase()));
  const result: string[] = [];
  for (const address of addresses) {
    const key = address.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(address.trim());
  }
  return result;
}

export async function sendEmail(options: SendOptions): Promise<SendResult> {
  const from = options.from ?? loadAlertSettings().from;
  const toArray = uniqueAddresses(Array.isArray(options.to) ? options.to : [options.to]);
  const cc = uniqueAddresses(options.cc ?? [], toArray);

  if (!env.RESEND_API_KEY) {
    log.error({ to: toArray, subject: options.subject }, 'RESEND_API_KEY is not configured');
    return { success: false, error: 'RESEND_API_KEY is not configured' };
  }

  if (toArray.length === 0) {
    return { success: false, error: 'No recipient address' };
  }

  try {
    const { messageId } = await sendViaResend({ to: toArray, cc, from, subject: options.subject, html: options.html, text: options.text });
    log.info({ messageId, to: toArray, cc, subject: options.subject, templateKey: options.templateKey }, 'Email sent');
    return { success: true, messageId };
  } catch (err: unknown) {
    const error = errorMessage(err);
    log.error({ error, to: toArray, subject: options.subject }, 'Email send failed');
    return { success: false, error };
  }
}

// Re-export templates
export * from './templates/index.js';
