#!/usr/bin/env node

import { Command } from 'commander';
import { registerMonitorCommands } from './commands/monitor.js';
import { registerCalcCommands } from './commands/calc.js';

const program = new Command();

program
  .name('hours-monitor')
  .description('Weekly hours monitor CLI: runs, status and local calculations')
  .version('1.0.0');

// Server commands
registerMonitorCommands(program);

// Local calculations
registerCalcCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
