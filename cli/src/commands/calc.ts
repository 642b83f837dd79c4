import { Command, InvalidArgumentError } from 'commander';
import {
  HoursMonitorError,
  computeRequirement,
  parseMonitorConfig,
  previousReportingWeek,
  resolvePeriods,
  round2,
  weekContaining,
  type Requirement,
} from '@hours-monitor/shared';
import { heading, field, error } from '../format.js';

const DEFAULT_TIMEZONE = 'Asia/Kolkata';

/** Commander parser for non-negative numbers */
export function parseNonNegative(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return n;
}

export interface RequirementOptions {
  leave: number;
  holidays: number;
  base?: number;
  buffer?: number;
}

/** Required and acceptable hours for a week with the given days off */
export function requirementFor(opts: RequirementOptions): Requirement {
  const config = parseMonitorConfig({
    ...(opts.base !== undefined ? { baseWeeklyHours: opts.base } : {}),
    ...(opts.buffer !== undefined ? { buffer: opts.buffer } : {}),
  });
  return computeRequirement(opts.leave, opts.holidays, config);
}

function fail(err: unknown): never {
  error(err instanceof HoursMonitorError || err instanceof InvalidArgumentError ? err.message : String(err));
  process.exit(1);
}

export function registerCalcCommands(program: Command): void {
  program
    .command('week [date]')
    .description('Reporting week containing a date (default: last week) and its leave periods')
    .action((date: string | undefined) => {
      try {
        const week = date
          ? weekContaining(date)
          : previousReportingWeek(new Date(), process.env.MONITOR_TIMEZONE || DEFAULT_TIMEZONE);
        heading(`Week ${week.start} to ${week.end}`);
        for (const period of resolvePeriods(week)) {
          field(period.id, period.dates.join(', '));
        }
        console.log();
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('requirements <leaveDays>')
    .description('Required and acceptable hours for a week with leave and holidays')
    .option('-H, --holidays <days>', 'Holidays not taken as leave', parseNonNegative, 0)
    .option('--base <hours>', 'Base weekly hours', parseNonNegative)
    .option('--buffer <hours>', 'Buffer below required', parseNonNegative)
    .action((leaveDays: string, opts: Omit<RequirementOptions, 'leave'>) => {
      try {
        const r = requirementFor({ ...opts, leave: parseNonNegative(leaveDays) });
        heading('Weekly Requirement');
        field('Leave days', r.leaveDays);
        field('Holidays', r.holidayDays);
        field('Required', `${round2(r.requiredHours)}h`);
        field('Acceptable', `${round2(r.acceptableHours)}h`);
        console.log();
      } catch (err) {
        fail(err);
      }
    });
}
