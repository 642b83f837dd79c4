/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';
import type { ComplianceClassification } from '@hours-monitor/shared';
import type { VerdictRow } from './schemas.js';

export function heading(text: string): void {
  console.log(chalk.bold.cyan(`\n${text}`));
  console.log(chalk.dim('─'.repeat(Math.min(text.length + 4, 60))));
}

export function field(label: string, value: string | number | null | undefined): void {
  const display = value === null || value === undefined ? chalk.dim('—') : String(value);
  console.log(`  ${chalk.gray(label.padEnd(18))} ${display}`);
}

export function success(text: string): void {
  console.log(chalk.green(`✓ ${text}`));
}

export function error(text: string): void {
  console.log(chalk.red(`✗ ${text}`));
}

export function warn(text: string): void {
  console.log(chalk.yellow(`! ${text}`));
}

export function classificationColor(classification: ComplianceClassification): string {
  if (classification === 'compliant') return chalk.green(classification);
  if (classification === 'non_compliant') return chalk.red(classification);
  return chalk.blue(classification);
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** "36.5h" */
export function hours(value: number): string {
  return `${Math.round(value * 100) / 100}h`;
}

/** Table rows for verdicts, shortfalls first */
export function verdictRows(verdicts: VerdictRow[]): Record<string, string>[] {
  return [...verdicts]
    .sort((a, b) => (b.shortfall ?? -1) - (a.shortfall ?? -1))
    .map((v) => ({
      name: v.name,
      status: v.classification,
      active: hours(v.activeHours),
      required: hours(v.requiredHours),
      minimum: hours(v.acceptableHours),
      leave: String(v.leaveDays),
      holidays: String(v.holidayDays),
      short: v.shortfall === null ? '' : hours(v.shortfall),
    }));
}

export function table(rows: Record<string, string>[], columns?: string[]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('  No results'));
    return;
  }

  const cols = columns || Object.keys(rows[0]);
  const widths = cols.map((c) =>
    Math.max(c.length, ...rows.map((r) => (r[c] ?? '').length))
  );

  // Header
  const header = cols.map((c, i) => c.padEnd(widths[i])).join('  ');
  console.log(chalk.bold(`  ${header}`));
  console.log(chalk.dim(`  ${widths.map((w) => '─'.repeat(w)).join('──')}`));

  // Rows
  for (const row of rows) {
    const line = cols.map((c, i) => (row[c] ?? '').padEnd(widths[i])).join('  ');
    console.log(`  ${line}`);
  }
}
