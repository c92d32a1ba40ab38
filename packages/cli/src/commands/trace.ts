import chalk from 'chalk'
import { table } from 'table'
import {
  BacktestGateway,
  GridStrategy,
  NoopLogger,
  SimulatedTimeSource,
  type GridConfig,
  type GridNotification,
  type GridStateSnapshot
} from '@gridline/core'
import { toEpochDate } from '@gridline/shared'
import { loadGridConfig } from '../config-loader'
import { formatError } from '../format'

/** Bar spacing of a trace, one minute per price */
const STEP_MS = 60_000

export interface TraceRow {
  readonly step: number
  readonly price: number
  /** Corridor changes, suppressed releases and submitted intents of this step */
  readonly actions: string[]
  readonly state: GridStateSnapshot
}

interface TraceOptions {
  verbose?: boolean
}

function describeNotification(notification: GridNotification): string | undefined {
  switch (notification.type) {
    case 'sleep':
    case 'wake':
      return notification.type
    case 'suppressed':
      return `${notification.side} suppressed (${notification.reason})`
    case 'state':
      return undefined
  }
}

/**
 * Evaluate a list of prices as consecutive bar closes against a simulated
 * gateway that fills every intent at its price.
 */
export function traceGrid(config: GridConfig, prices: readonly number[]): TraceRow[] {
  const timeSource = new SimulatedTimeSource(toEpochDate(0))
  let notes: string[] = []
  const strategy = new GridStrategy(config, new BacktestGateway({ timeSource }), {
    timeSource,
    logger: new NoopLogger(),
    sink: {
      publish: (notification) => {
        const note = describeNotification(notification)
        if (note !== undefined) {
          notes.push(note)
        }
      }
    }
  })

  strategy.start()
  const rows = prices.map((price, index) => {
    notes = []
    const intents = strategy.onBar({
      timestamp: toEpochDate((index + 1) * STEP_MS),
      open: price,
      high: price,
      low: price,
      close: price,
      volume: 0
    })
    return {
      step: index + 1,
      price,
      actions: [...notes, ...intents.map((intent) => `${intent.side} ${intent.volume}@${intent.price}`)],
      state: strategy.getState()
    }
  })
  strategy.stop()
  return rows
}

/**
 * Parse price arguments
 * @throws Error on the first argument that is not a finite number
 */
export function parsePrices(args: readonly string[]): number[] {
  return args.map((arg) => {
    const price = Number(arg)
    if (arg.trim() === '' || !Number.isFinite(price)) {
      throw new Error(`Invalid price: ${arg}`)
    }
    return price
  })
}

const flag = (value: boolean): string => value ? chalk.yellow('yes') : '-'
const level = (value: number | undefined): string => value === undefined ? '-' : String(value)

function formatAction(action: string): string {
  if (action.startsWith('sell ')) return chalk.red(action)
  if (action.startsWith('buy ')) return chalk.green(action)
  return chalk.gray(action)
}

export async function runTrace(file: string, priceArgs: string[], options: TraceOptions): Promise<void> {
  try {
    const config = await loadGridConfig(file)
    const rows = traceGrid(config, parsePrices(priceArgs))

    console.log(chalk.cyan(`\n=== Grid trace: ${config.symbol} ===\n`))
    const data = [
      ['#', 'Price', 'Trigger', 'Up', 'High', 'Down', 'Low', 'Sleep', 'Position', 'Actions'],
      ...rows.map(({ step, price, actions, state }) => [
        String(step),
        String(price),
        String(state.triggerPrice),
        flag(state.touchUp),
        level(state.highestPrice),
        flag(state.touchDown),
        level(state.lowestPrice),
        flag(state.gridSleep),
        String(state.position),
        actions.map(formatAction).join(', ')
      ])
    ]
    console.log(table(data))
  } catch (error) {
    console.error(chalk.red('\nError:'), formatError(error, options.verbose))
    process.exitCode = 1
  }
}
