/**
 * Shared email layout for monitor alerts.
 * Inline styles only (email clients don't support external CSS).
 */

const BRAND_COLOR = '#1a1a1a';
const ACCENT_COLOR = '#b45309';
const BG_COLOR = '#f5f5f4';
const FONT_STACK = "'Helvetica Neue', Helvetica, Arial, sans-serif";

/** Escape text taken from sheets before it goes into HTML */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function wrapInLayout(content: string, options?: { preheader?: string }): string {
  const preheader = options?.preheader ?? '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Weekly Hours Monitor</title>
</head>
<body style="margin:0;padding:0;background-color:${BG_COLOR};font-family:${FONT_STACK};color:${BRAND_COLOR};line-height:1.6;">
  ${preheader ? `<div style="display:none;max-height:0;overflow:hidden;">${escapeHtml(preheader)}</div>` : ''}

  <!-- Container -->
  <table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="background-color:${BG_COLOR};">
    <tr>
      <td align="center" style="padding:32px 16px;">
        <table role="presentation" width="600" cellpadding="0" cellspacing="0" style="background-color:#ffffff;border-radius:8px;overflow:hidden;max-width:600px;width:100%;">

          <!-- Header -->
          <tr>
            <td style="padding:24px 40px;border-bottom:1px solid #eee;">
              <h1 style="margin:0;font-size:18px;font-weight:600;letter-spacing:1px;color:${BRAND_COLOR};">
                Weekly Hours Monitor
              </h1>
            </td>
          </tr>

          <!-- Body -->
          <tr>
            <td style="padding:32px 40px;">
              ${content}
            </td>
          </tr>

          <!-- Footer -->
          <tr>
            <td style="padding:16px 40px 24px;border-top:1px solid #eee;">
              <p style="margin:0;font-size:12px;color:#888;">
                Automated message. Reply to this email if your leave or hours look wrong.
              </p>
            </td>
          </tr>

        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

/** Render a simple heading */
export function heading(text: string): string {
  return `<h2 style="margin:0 0 16px;font-size:20px;font-weight:600;color:${BRAND_COLOR};">${escapeHtml(text)}</h2>`;
}

/** Render a paragraph (content is trusted markup) */
export function paragraph(html: string): string {
  return `<p style="margin:0 0 16px;font-size:15px;color:#333;">${html}</p>`;
}

/** Render a key-value detail row */
export function detailRow(label: string, value: string, options?: { highlight?: boolean }): string {
  const color = options?.highlight ? ACCENT_COLOR : BRAND_COLOR;
  return `<tr>
    <td style="padding:8px 0;font-size:14px;color:#666;width:180px;vertical-align:top;">${escapeHtml(label)}</td>
    <td style="padding:8px 0;font-size:14px;color:${color};font-weight:500;">${escapeHtml(value)}</td>
  </tr>`;
}

/** Wrap detail rows in a table */
export function detailTable(rows: string): string {
  return `<table role="presentation" width="100%" cellpadding="0" cellspacing="0" style="margin:0 0 24px;">
    ${rows}
  </table>`;
}

/** Render a divider */
export function divider(): string {
  return `<hr style="border:none;border-top:1px solid #eee;margin:24px 0;">`;
}

/** "36.5 h" */
export function formatHours(hours: number): string {
  return `${Math.round(hours * 100) / 100} h`;
}
