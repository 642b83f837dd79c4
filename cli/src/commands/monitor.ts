import { Command } from 'commander';
import chalk from 'chalk';
import { api, getBaseUrl } from '../api.js';
import { heading, field, error, warn, success, table, json, verdictRows } from '../format.js';
import { HealthSchema, RunResultSchema, StatusSchema, type RunResult } from '../schemas.js';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

function printRunResult(result: RunResult): void {
  heading(`Week ${result.week.start} to ${result.week.end}${result.preview ? ' (preview)' : ''}`);
  field('Periods', result.periods.join(', '));
  field('Holidays', result.holidays.length > 0 ? result.holidays.join(', ') : 'None');
  field('Evaluated', result.counts.evaluated);
  field('Below target', result.counts.nonCompliant > 0 ? chalk.red(String(result.counts.nonCompliant)) : '0');
  field('Exempt', result.counts.exempt);
  field('Excluded', result.counts.excluded);
  field(
    'Alerts',
    result.preview
      ? 'Preview only'
      : `${result.notifications.sent} sent, ${result.notifications.failed} failed, ${result.notifications.skipped} skipped`
  );
  field('Summary email', result.notifications.summaryEmail);
  field('Duration', `${result.durationMs}ms`);

  for (const m of result.mismatches) {
    warn(`${m.employeeName} not found in leave sheet ${m.periodId}`);
  }

  console.log();
  table(verdictRows(result.verdicts));
  console.log();
}

export function registerMonitorCommands(program: Command): void {
  program
    .command('run')
    .description('Run the weekly hours check now')
    .option('-w, --week <date>', 'Monday starting the week (YYYY-MM-DD), defaults to last week')
    .option('-p, --preview', 'Evaluate without sending email')
    .option('--json', 'Print the raw result')
    .action(async (opts: { week?: string; preview?: boolean; json?: boolean }) => {
      const res = await api('/api/monitor/run', RunResultSchema, {
        method: 'POST',
        body: {
          ...(opts.week ? { weekStart: opts.week } : {}),
          preview: opts.preview === true,
        },
      });

      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      if (opts.json) {
        json(res.data);
        return;
      }
      printRunResult(res.data);
      success(res.data.preview ? 'Preview complete' : 'Run complete');
    });

  program
    .command('last')
    .description('Show the last completed run')
    .option('--json', 'Print the raw result')
    .action(async (opts: { json?: boolean }) => {
      const res = await api('/api/monitor/last', RunResultSchema);

      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      if (opts.json) {
        json(res.data);
        return;
      }
      printRunResult(res.data);
    });

  program
    .command('status')
    .description('Show scheduler and run state')
    .action(async () => {
      const res = await api('/api/monitor/status', StatusSchema);

      if (!res.ok) {
        error(res.error);
        process.exit(1);
      }

      const { scheduler } = res.data;
      heading('Hours Monitor');
      field('Running', res.data.isRunning ? chalk.yellow('Yes') : 'No');
      field('Last run', res.data.lastRunAt);
      if (res.data.lastError) {
        field('Last error', chalk.red(`${res.data.lastError.code}: ${res.data.lastError.message}`));
      }
      field('Scheduler', scheduler.schedulerActive ? chalk.green('Active') : chalk.dim('Stopped'));
      field('Schedule', `${WEEKDAYS[scheduler.runDay] ?? scheduler.runDay} ${String(scheduler.runHour).padStart(2, '0')}:00 ${scheduler.timeZone}`);
      field('Last check', scheduler.lastCheckAt);
      field('Last week run', scheduler.lastScheduledWeek);
      console.log();
    });

  program
    .command('health')
    .description('Check server health')
    .action(async () => {
      const start = Date.now();
      const res = await api('/api/health', HealthSchema);
      const elapsed = Date.now() - start;

      heading('Server Health');
      field('Server', getBaseUrl());
      field('Status', res.ok ? chalk.green('Healthy') : chalk.red(res.error));
      field('Response Time', `${elapsed}ms`);
      if (res.ok) field('Uptime', `${res.data.uptimeSeconds}s`);
      console.log();

      if (!res.ok) process.exit(1);
    });
}
