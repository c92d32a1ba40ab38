import { createReadStream } from 'node:fs'
import path from 'node:path'
import chalk from 'chalk'
import { parse } from 'csv-parse'
import ora from 'ora'
import { table } from 'table'
import {
  BacktestGateway,
  EventBus,
  EventTypes,
  GridStrategy,
  NoopLogger,
  registerStandardEvents,
  SimulatedTimeSource,
  WinstonLogger,
  createWinstonLogger,
  type GridConfig,
  type OrderFill
} from '@gridline/core'
import { epochToIso, toEpochDate, type Candle } from '@gridline/shared'
import type { Logger } from '@gridline/types'
import { loadGridConfig } from '../config-loader'
import { formatError } from '../format'

interface BacktestOptions {
  file: string
  slippage: string
  logDir?: string
  verbose?: boolean
}

interface CSVRow {
  Date?: string
  Close?: string
  'Adj Close'?: string
  Open?: string
  High?: string
  Low?: string
  Volume?: string
  timestamp?: string
  date?: string
  open?: string
  high?: string
  low?: string
  close?: string
  volume?: string
}

export interface BacktestSummary {
  readonly bars: number
  readonly fills: readonly OrderFill[]
  readonly boughtVolume: number
  readonly soldVolume: number
  /** Sell proceeds minus buy cost */
  readonly cashFlow: number
  readonly finalPosition: number
  readonly finalTrigger: number
  readonly lastClose: number | undefined
}

function parseTimestamp(value: string): number {
  return /^\d+$/.test(value) ? Number(value) : new Date(value).getTime()
}

function toCandle(row: CSVRow): Candle {
  let timestamp: number
  let fields: [string | undefined, string | undefined, string | undefined, string | undefined, string | undefined]

  // Yahoo Finance format
  if (row.Date && row.Close) {
    timestamp = parseTimestamp(row.Date)
    fields = [row.Open, row.High, row.Low, row['Adj Close'] ?? row.Close, row.Volume]
  } else if (row.timestamp ?? row.date) {
    timestamp = parseTimestamp(row.timestamp ?? row.date ?? '')
    fields = [row.open, row.high, row.low, row.close, row.volume]
  } else {
    throw new Error('Unrecognized CSV format')
  }

  const close = parseFloat(fields[3] ?? '')
  if (isNaN(timestamp) || !(close > 0)) {
    throw new Error('Invalid price data')
  }
  const orClose = (value: string | undefined): number => {
    const parsed = parseFloat(value ?? '')
    return isNaN(parsed) ? close : parsed
  }
  const volume = parseFloat(fields[4] ?? '0')

  return {
    timestamp: toEpochDate(timestamp),
    open: orClose(fields[0]),
    high: orClose(fields[1]),
    low: orClose(fields[2]),
    close,
    volume: isNaN(volume) ? 0 : volume
  }
}

/**
 * Read bars from a CSV file with either `timestamp,open,high,low,close,volume`
 * or Yahoo Finance `Date,Open,High,Low,Close,Adj Close,Volume` columns.
 * Rows that cannot be read are skipped and counted in a warning.
 */
export async function loadCandlesFromCSV(filePath: string, logger: Logger = new NoopLogger()): Promise<Candle[]> {
  const candles: Candle[] = []
  const absolutePath = path.resolve(filePath)
  let skipped = 0

  return new Promise((resolve, reject) => {
    const parser = parse({
      columns: true,
      skip_empty_lines: true,
      cast: false,
      trim: true
    })

    parser.on('data', (row: CSVRow) => {
      try {
        candles.push(toCandle(row))
      } catch (error) {
        skipped++
        logger.debug('Skipping CSV row', { error: error instanceof Error ? error.message : String(error) })
      }
    })

    parser.on('error', reject)
    parser.on('end', () => {
      if (skipped > 0) {
        logger.warn(`Skipped ${skipped} unreadable CSV rows`, { file: absolutePath })
      }
      candles.sort((a, b) => a.timestamp - b.timestamp)
      resolve(candles)
    })

    const stream = createReadStream(absolutePath)
    stream.on('error', reject)
    stream.pipe(parser)
  })
}

/**
 * Replay bar closes through a grid on a simulated gateway
 */
export function runGridBacktest(
  config: GridConfig,
  candles: readonly Candle[],
  options: { slippageBps?: number; logger?: Logger } = {}
): BacktestSummary {
  const first = candles[0]
  const timeSource = new SimulatedTimeSource(first ? first.timestamp : toEpochDate(0))
  const eventBus = registerStandardEvents(new EventBus(options.logger))
  const fills: OrderFill[] = []

  eventBus.subscribe(EventTypes.ORDER_FILLED, (data) => {
    const fill = data.fill
    if (isOrderFill(fill)) {
      fills.push(fill)
    }
  })

  const strategy = new GridStrategy(
    config,
    new BacktestGateway({ slippageBps: options.slippageBps, timeSource, logger: options.logger }),
    { eventBus, timeSource, logger: options.logger }
  )

  strategy.start()
  for (const candle of candles) {
    strategy.onBar(candle)
  }
  strategy.stop()

  let boughtVolume = 0
  let soldVolume = 0
  let cashFlow = 0
  for (const fill of fills) {
    if (fill.side === 'buy') {
      boughtVolume += fill.volume
      cashFlow -= fill.price * fill.volume
    } else {
      soldVolume += fill.volume
      cashFlow += fill.price * fill.volume
    }
  }

  const state = strategy.getState()
  return {
    bars: candles.length,
    fills,
    boughtVolume,
    soldVolume,
    cashFlow,
    finalPosition: state.position,
    finalTrigger: state.triggerPrice,
    lastClose: candles[candles.length - 1]?.close
  }
}

function isOrderFill(value: unknown): value is OrderFill {
  return typeof value === 'object' && value !== null && 'orderId' in value && 'side' in value
}

const money = (value: number): string =>
  value >= 0 ? chalk.green(`+${value.toFixed(2)}`) : chalk.red(`-${Math.abs(value).toFixed(2)}`)

export async function runBacktest(settingsFile: string, options: BacktestOptions): Promise<void> {
  const spinner = ora('Loading grid settings...').start()

  try {
    const config = await loadGridConfig(settingsFile)
    const slippageBps = parseFloat(options.slippage)
    if (!(slippageBps >= 0)) {
      throw new Error(`Invalid slippage: ${options.slippage}`)
    }

    const logger = new WinstonLogger('backtest', createWinstonLogger({
      level: options.verbose ? 'debug' : undefined,
      logDir: options.logDir,
      console: options.verbose === true
    }))

    spinner.text = 'Loading price data from CSV...'
    const candles = await loadCandlesFromCSV(options.file, logger)
    if (candles.length === 0) {
      throw new Error('No valid price data found in CSV')
    }

    spinner.text = `Replaying ${candles.length} bars...`
    const summary = runGridBacktest(config, candles, { slippageBps, logger })
    spinner.succeed(`Replayed ${summary.bars} bars`)

    const markToMarket = summary.lastClose === undefined ? 0 : summary.finalPosition * summary.lastClose

    console.log(chalk.cyan('\n=== Backtest Results ===\n'))
    console.log(table([
      ['Metric', 'Value'],
      ['Symbol', config.symbol],
      ['Bars', String(summary.bars)],
      ['Fills', String(summary.fills.length)],
      ['Bought volume', String(summary.boughtVolume)],
      ['Sold volume', String(summary.soldVolume)],
      ['Cash flow', money(summary.cashFlow)],
      ['Final position', String(summary.finalPosition)],
      ['Marked P&L', money(summary.cashFlow + markToMarket)],
      ['Final trigger', String(summary.finalTrigger)]
    ]))

    if (options.verbose && summary.fills.length > 0) {
      console.log(chalk.cyan('\n=== Fills ===\n'))
      console.log(table([
        ['Time', 'Side', 'Price', 'Volume'],
        ...summary.fills.map((fill) => [
          epochToIso(fill.timestamp),
          fill.side === 'buy' ? chalk.green('BUY') : chalk.red('SELL'),
          fill.price.toFixed(2),
          String(fill.volume)
        ])
      ]))
    }
  } catch (error) {
    spinner.fail('Backtest failed')
    console.error(chalk.red('\nError:'), formatError(error, options.verbose))
    process.exitCode = 1
  }
}
