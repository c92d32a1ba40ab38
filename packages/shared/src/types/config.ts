import type { OrderType, StockSymbol } from './orders'

/** Trading execution modes */
export type TradingMode = 'live' | 'backtest'

/**
 * Order validity window accepted by the grid.
 * Reserved: no component acts on it yet.
 */
export type GridDeadline = '5d' | '20d' | '60d' | 'gtc'

/**
 * Hysteresis grid configuration. Immutable once the grid is built.
 * All percent values are expressed as plain percent (1 = 1%).
 */
export interface GridConfig {
  /** Instrument traded by this grid */
  readonly symbol: StockSymbol
  /** Lower bound of the corridor; below it the grid sleeps */
  readonly lowerPrice: number
  /** Upper bound of the corridor; above it the grid sleeps */
  readonly upperPrice: number
  /** Initial reference price for rise/fall percentages */
  readonly triggerPrice: number
  /** Rise above trigger that arms the sell side */
  readonly risePercent: number
  /** Retrace from the high that releases a sell */
  readonly fallDown: number
  /** Fall below trigger that arms the buy side */
  readonly fallPercent: number
  /** Rebound from the low that releases a buy */
  readonly riseUp: number
  /** Limit orders price off the last trade, market orders off the quote */
  readonly orderType: OrderType
  /** Fixed order size */
  readonly orderVolume: number
  /** Notional order size, 0 disables */
  readonly orderAmount: number
  /** Position ceiling for buys, 0 disables */
  readonly maxPosition: number
  /** Position floor for sells, 0 disables */
  readonly minPosition: number
  /** Scale volume by how many thresholds price has travelled */
  readonly multipleOrder: boolean
  /** Reserved order validity window */
  readonly deadline: GridDeadline
  /** Largest tolerated move from trigger before a trade is abandoned, 0 disables */
  readonly giveUpBias: number
  /** Added to the last price for limit buys */
  readonly buyOffset: number
  /** Subtracted from the last price for limit sells */
  readonly sellOffset: number
}
