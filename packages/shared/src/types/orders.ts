import type { EpochDate } from './dates'

export type StockSymbol = string // & { readonly __brand: 'StockSymbol' }

export function toStockSymbol(symbol: string | StockSymbol): StockSymbol {
  return symbol
}

/** Order direction - buy (long) or sell (short) */
export type OrderSide = 'buy' | 'sell'

/** Order types a grid can emit */
export type OrderType = 'limit' | 'market'

/** Position effect: buys open, sells close */
export type OrderOffset = 'open' | 'close'

/**
 * Decision produced by the grid for the order gateway.
 * Carries no identity; the gateway assigns the order id.
 */
export interface OrderIntent {
  /** Order direction */
  readonly side: OrderSide
  /** Trading pair symbol */
  readonly symbol: StockSymbol
  /** Limit price, or the reference quote for market orders */
  readonly price: number
  /** Order size/quantity */
  readonly volume: number
  /** Order execution type */
  readonly orderType: OrderType
  /** Position effect */
  readonly offset: OrderOffset
}

/**
 * Order status change reported by a gateway.
 * Only the active flag matters to the grid.
 */
export interface OrderUpdate {
  /** Gateway order id */
  readonly orderId: string
  /** False once the order is filled, cancelled or rejected */
  readonly active: boolean
  /** Terminal status when inactive */
  readonly status?: 'filled' | 'cancelled' | 'rejected'
  /** Rejection or cancellation reason */
  readonly reason?: string
  /** Unix timestamp of the update */
  readonly timestamp: EpochDate
}

/**
 * Represents a partial or complete order execution.
 */
export interface OrderFill {
  /** Parent order ID */
  readonly orderId: string
  /** Execution direction */
  readonly side: OrderSide
  /** Execution price */
  readonly price: number
  /** Fill size/quantity */
  readonly volume: number
  /** Unix timestamp of execution */
  readonly timestamp: EpochDate
}

/**
 * Externally reported position, overwrites the grid's own count.
 */
export interface PositionSync {
  /** Trading pair symbol */
  readonly symbol: StockSymbol
  /** Current position size (positive=long, negative=short) */
  readonly volume: number
  /** Average entry price, used to seed an unset trigger price */
  readonly price: number
}
