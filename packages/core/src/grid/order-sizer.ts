import type { GridConfig } from '@gridline/shared'
import type { GridState } from './grid-state'

/**
 * Price, volume and bias computed for one release
 */
export interface OrderSizing {
  /** Order price: the quote for market orders, last price plus/minus offset for limits */
  readonly price: number
  /** Order volume after notional, multiple and position clamps */
  readonly volume: number
  /** Distance of the last price from the trigger, percent, signed toward the trade */
  readonly bias: number
}

/**
 * Percentage move from `reference` to `price`.
 * Zero when the reference is unusable.
 */
export function percentFrom(reference: number, price: number): number {
  if (!(reference > 0)) {
    return 0
  }
  return (price - reference) / reference * 100
}

function notionalVolume(config: GridConfig, price: number): number {
  // Literal price / amount, pending confirmation of the notional formula
  return config.orderAmount > 0 ? price / config.orderAmount : config.orderVolume
}

/**
 * Size a sell released after price rose above the trigger.
 * Sells are capped so the position never drops below `minPosition`.
 */
export function sizeSell(
  config: GridConfig,
  state: Pick<GridState, 'triggerPrice' | 'position'>,
  lastPrice: number,
  bidPrice: number
): OrderSizing {
  const price = config.orderType === 'limit' ? lastPrice - config.sellOffset : bidPrice
  const risePct = percentFrom(state.triggerPrice, lastPrice)
  let volume = notionalVolume(config, price)

  if (config.multipleOrder && config.risePercent > 0) {
    volume *= Math.max(1, Math.floor(risePct / config.risePercent))
  }

  if (config.minPosition > 0) {
    volume = state.position > config.minPosition
      ? Math.min(volume, state.position - config.minPosition)
      : 0
  }

  return { price, volume, bias: risePct }
}

/**
 * Size a buy released after price fell below the trigger.
 * Buys are capped so the position never rises above `maxPosition`.
 */
export function sizeBuy(
  config: GridConfig,
  state: Pick<GridState, 'triggerPrice' | 'position'>,
  lastPrice: number,
  askPrice: number
): OrderSizing {
  const price = config.orderType === 'limit' ? lastPrice + config.buyOffset : askPrice
  const fallPct = -percentFrom(state.triggerPrice, lastPrice)
  let volume = notionalVolume(config, price)

  if (config.multipleOrder && config.fallPercent > 0) {
    volume *= Math.max(1, Math.ceil(fallPct / config.fallPercent))
  }

  if (config.maxPosition > 0) {
    volume = Math.max(0, Math.min(volume, config.maxPosition - state.position))
  }

  return { price, volume, bias: fallPct }
}

/**
 * Give-up rule: with a positive `giveUpBias`, trade only while
 * 0 < bias < giveUpBias. A zero setting disables the rule.
 */
export function withinGiveUpBias(giveUpBias: number, bias: number): boolean {
  if (giveUpBias <= 0) {
    return true
  }
  return bias > 0 && bias < giveUpBias
}
