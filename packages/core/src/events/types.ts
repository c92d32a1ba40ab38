import type { GridConfig, OrderFill, OrderIntent, OrderUpdate, StockSymbol } from '@gridline/shared'
import type { EventData } from '@gridline/types'
import type { GridStateSnapshot } from '../grid/grid-state'

export type { EventData, EventHandler, EventSubscription } from '@gridline/types'

/**
 * Base event type
 */
export type EventType = string

// Grid events
export interface GridStateEvent extends EventData {
  readonly symbol: StockSymbol
  readonly state: GridStateSnapshot
}

export interface GridParametersEvent extends EventData {
  readonly symbol: StockSymbol
  readonly config: GridConfig
}

export interface GridCorridorEvent extends EventData {
  readonly symbol: StockSymbol
  readonly lastPrice: number
  readonly lowerPrice: number
  readonly upperPrice: number
}

export interface GridIntentEvent extends EventData {
  readonly intent: OrderIntent
}

export interface GridIntentSuppressedEvent extends EventData {
  readonly symbol: StockSymbol
  readonly side: OrderIntent['side']
  readonly reason: 'bias' | 'volume' | 'price'
  readonly price: number
  readonly volume: number
  readonly bias: number
}

// Order events
export interface OrderSubmittedEvent extends EventData {
  readonly orderId: string
  readonly intent: OrderIntent
}

export interface OrderInactiveEvent extends EventData {
  readonly update: OrderUpdate
}

export interface OrderFilledEvent extends EventData {
  readonly fill: OrderFill
}

export interface PositionSyncedEvent extends EventData {
  readonly symbol: StockSymbol
  readonly position: number
  readonly triggerPrice: number
}

// System events
export interface ErrorEvent extends EventData {
  readonly error: Error
  readonly context: string
  readonly severity: 'low' | 'medium' | 'high' | 'critical'
}

// Event type constants
export const EventTypes = {
  // Grid
  GRID_PARAMETERS: 'grid.parameters',
  GRID_STATE: 'grid.state',
  GRID_SLEEP: 'grid.sleep',
  GRID_WAKE: 'grid.wake',
  GRID_INTENT: 'grid.intent',
  GRID_INTENT_SUPPRESSED: 'grid.intent.suppressed',

  // Orders
  ORDER_SUBMITTED: 'order.submitted',
  ORDER_INACTIVE: 'order.inactive',
  ORDER_FILLED: 'order.filled',

  // Positions
  POSITION_SYNCED: 'position.synced',

  // System
  SYSTEM_ERROR: 'system.error',
} as const
