import type { Candle, MarketSnapshot, Ticker } from '@gridline/shared'

/**
 * Snapshot from a level-one ticker. A missing side of the book (zero or
 * non-finite quote) falls back to the last price.
 */
export function fromTicker(ticker: Ticker): MarketSnapshot {
  const usable = (quote: number): boolean => Number.isFinite(quote) && quote > 0
  return {
    last: ticker.last,
    bid: usable(ticker.bid) ? ticker.bid : ticker.last,
    ask: usable(ticker.ask) ? ticker.ask : ticker.last,
    timestamp: ticker.timestamp
  }
}

/**
 * Snapshot from a closed bar: bid, ask and last all take the close
 */
export function fromCandle(candle: Candle): MarketSnapshot {
  return {
    last: candle.close,
    bid: candle.close,
    ask: candle.close,
    timestamp: candle.timestamp
  }
}

/**
 * A snapshot the grid can evaluate: the last price is finite and positive.
 * Bid and ask are checked only when a release is priced from them.
 */
export function isUsableSnapshot(snapshot: MarketSnapshot): boolean {
  return Number.isFinite(snapshot.last) && snapshot.last > 0
}
