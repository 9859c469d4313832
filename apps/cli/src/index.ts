#!/usr/bin/env node

/**
 * VitalGrid CLI
 *
 * Resamples vital-sign measurements onto a fixed interval grid.
 *
 * Commands:
 *   vitalgrid sample <file>   Resample measurements read from a JSON file
 *   vitalgrid generate        Generate random demonstration measurements
 *
 * Set VITALGRID_INTERVAL_MINUTES to change the default interval.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { toExitCode } from '@vitalgrid/core';
import { sampleCommand, type SampleOptions } from './commands/sample.js';
import { generateCommand, type GenerateOptions } from './commands/generate.js';

const program = new Command();

program
  .name('vitalgrid')
  .description('VitalGrid - resample vital-sign measurements onto a fixed interval')
  .version('0.1.0');

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(toExitCode(error));
}

// =============================================================================
// Commands
// =============================================================================

// Sample command - resample a file of measurements
program
  .command('sample <file>')
  .description('Resample measurements from a JSON file onto the interval grid')
  .option('-i, --interval <minutes>', 'Interval length in minutes')
  .option('-s, --start <timestamp>', 'Start of sampling (anchors the grid)')
  .option('-t, --type <type>', 'Only resample one measurement type (SPO2, HR, TEMP)')
  .option('--group-by-type', 'Print one section per measurement type')
  .option('--exclude-before-start', 'Drop measurements before --start')
  .option('--json', 'Output as JSON')
  .action(async (file: string, options: SampleOptions) => {
    try {
      await sampleCommand(file, options);
    } catch (error) {
      fail(error);
    }
  });

// Generate command - demonstration data
program
  .command('generate')
  .description('Generate random measurements spread over one hour')
  .option('-n, --count <count>', 'Number of measurements', '100')
  .option('-s, --start <timestamp>', 'Earliest timestamp (default: now)')
  .option('-i, --interval <minutes>', 'Interval length in minutes, with --sample')
  .option('--sample', 'Print the resampled measurements instead of raw JSON')
  .option('--group-by-type', 'With --sample, print one section per measurement type')
  .action(async (options: GenerateOptions) => {
    try {
      await generateCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// =============================================================================
// Help text
// =============================================================================

program.addHelpText('after', `
Examples:
  $ vitalgrid generate -n 50 -s 2017-01-03T10:00:00 > readings.json
  $ vitalgrid sample readings.json
  $ vitalgrid sample readings.json --interval 15 --group-by-type
  $ vitalgrid sample readings.json --type TEMP --json

Input:
  A JSON array of {"timestamp": "2017-01-03T10:04:45", "type": "TEMP", "value": 35.79}.
  Timestamps without an offset are read as wall-clock time.

Environment:
  VITALGRID_INTERVAL_MINUTES       Default interval (default: 5)
  VITALGRID_EXCLUDE_BEFORE_START   Drop measurements before --start (true/false)
  VITALGRID_DEBUG                  Emit debug logs
`);

// Parse and execute
program.parse();
