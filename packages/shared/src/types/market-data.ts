import type { EpochDate } from './dates'

/**
 * Represents a single candlestick in OHLCV format.
 * Bar-close driven runs feed the close price to the grid.
 */
export interface Candle {
  /** Unix timestamp in milliseconds */
  readonly timestamp: EpochDate
  /** Opening price at the start of the period */
  readonly open: number
  /** Highest price during the period */
  readonly high: number
  /** Lowest price during the period */
  readonly low: number
  /** Closing price at the end of the period */
  readonly close: number
  /** Total volume traded during the period */
  readonly volume: number
}

/**
 * Real-time market ticker data, level one only.
 */
export interface Ticker {
  /** Trading pair symbol (e.g., 'BTCUSDT.BINANCE') */
  readonly symbol: string
  /** Unix timestamp in milliseconds */
  readonly timestamp: EpochDate
  /** Best bid price */
  readonly bid: number
  /** Best ask price */
  readonly ask: number
  /** Last trade price */
  readonly last: number
}

/**
 * Normalized price view consumed by the grid on every cycle.
 * Produced from either a ticker or a candle close.
 */
export interface MarketSnapshot {
  /** Last traded price */
  readonly last: number
  /** Best bid price */
  readonly bid: number
  /** Best ask price */
  readonly ask: number
  /** Unix timestamp in milliseconds */
  readonly timestamp: EpochDate
}

/** Where a snapshot came from */
export type SnapshotSource = 'tick' | 'bar'
