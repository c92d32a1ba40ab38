import type { EpochDate } from '@gridline/shared'

/**
 * Base event data interface
 * Use for all event payloads. Extend for custom event types.
 */
export interface EventData {
  /** Event timestamp (epoch) */
  readonly timestamp: EpochDate
  [key: string]: unknown
}

/**
 * Event handler function type
 * Handle event data, sync or async
 */
export type EventHandler<T extends EventData = EventData> = (data: T) => void | Promise<void>

/**
 * Event subscription interface
 * Manage event subscription lifecycle
 */
export interface EventSubscription {
  /** Unique subscription ID */
  readonly id: number
  /** Event type string */
  readonly eventType: string
  /** Unsubscribe from event */
  unsubscribe(): void
}

/**
 * Minimal publishing side of an event bus.
 * Grid components depend on this rather than on a concrete bus.
 */
export interface EventPublisher {
  /**
   * Emit an event
   * @param event - Event type string
   * @param data - Event payload
   */
  emit(event: string, data: EventData): void
}

/**
 * Logger interface for consistent logging across packages
 * Implement for debug/info/warn/error logging
 */
export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void
  /** Log warning */
  warn(message: string, context?: Record<string, unknown>): void
  /** Log error */
  error(message: string, context?: Record<string, unknown>): void
}
