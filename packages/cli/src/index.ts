#!/usr/bin/env node

import { Command } from 'commander'
import { version } from '@gridline/core'
import { runBacktest } from './commands/backtest'
import { runConfigDefaults, runConfigValidate } from './commands/config'
import { runTrace } from './commands/trace'

const program = new Command()

program
  .name('gridline')
  .description('Hysteresis grid trading engine')
  .version(version)

const config = program
  .command('config')
  .description('Inspect and validate grid settings')

config
  .command('defaults')
  .description('Print the default settings as JSON')
  .action(runConfigDefaults)

config
  .command('validate <file>')
  .description('Validate a JSON settings file and print the effective settings')
  .option('-v, --verbose', 'Verbose output')
  .action(runConfigValidate)

program
  .command('trace <settings> <prices...>')
  .description('Evaluate a sequence of prices as bar closes and print the grid state after each')
  .option('-v, --verbose', 'Verbose output')
  .action(runTrace)

program
  .command('backtest <settings>')
  .description('Replay bar closes from a CSV file through the grid on a simulated gateway')
  .requiredOption('-f, --file <path>', 'Path to CSV file with price data')
  .option('--slippage <bps>', 'Simulated slippage in basis points', '0')
  .option('--log-dir <path>', 'Write combined.log and error.log to this directory')
  .option('-v, --verbose', 'Verbose output and fill list')
  .action(runBacktest)

program.parse()
