/**
 * Grid engine exports
 */

// Event system
export * from './events'

// Hysteresis grid
export * from './grid'

// Market data adapters
export * from './market-data'

// Order gateways
export * from './gateways'

// Strategy host
export * from './strategy'

// Logging
export { createWinstonLogger, NoopLogger, WinstonLogger } from './utils/logger'
export type { LoggerOptions } from './utils/logger'

// Re-export shared types for convenience
export type {
  Candle,
  GridConfig,
  GridDeadline,
  MarketSnapshot,
  OrderFill,
  OrderIntent,
  OrderSide,
  OrderType,
  OrderUpdate,
  PositionSync,
  Ticker,
  TradingMode,
} from '@gridline/shared'

export const version = '1.0.0'
