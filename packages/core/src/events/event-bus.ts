import type { EventPublisher, Logger } from '@gridline/types'
import { epochDateNow } from '@gridline/shared'
import type { ErrorEvent, EventData, EventHandler, EventSubscription, EventType } from './types'
import { EventTypes } from './types'

/**
 * Core event bus for in-process communication between the grid,
 * its gateway and whatever displays or records grid state.
 * Implements pub-sub pattern with registered event types.
 */
export class EventBus implements EventPublisher {
  private readonly handlers = new Map<EventType, EventHandler[]>()
  private readonly eventTypes = new Set<EventType>()
  private subscriptionId = 0

  constructor(private readonly logger?: Logger) {}

  /**
   * Register a new event type
   */
  registerEvent(eventType: EventType): void {
    this.eventTypes.add(eventType)
  }

  /**
   * Subscribe to an event. Handlers run in subscription order.
   */
  subscribe(eventType: EventType, handler: EventHandler): EventSubscription {
    if (!this.eventTypes.has(eventType)) {
      throw new Error(`Event type '${eventType}' is not registered`)
    }

    let handlers = this.handlers.get(eventType)
    if (!handlers) {
      handlers = []
      this.handlers.set(eventType, handlers)
    }
    const list = handlers
    list.push(handler)

    const subscriptionId = ++this.subscriptionId

    return {
      id: subscriptionId,
      eventType,
      unsubscribe: () => {
        const index = list.indexOf(handler)
        if (index !== -1) {
          list.splice(index, 1)
          if (list.length === 0) {
            this.handlers.delete(eventType)
          }
        }
      },
    }
  }

  /**
   * Emit an event to all subscribers
   */
  emit<T extends EventData>(eventType: EventType, data: T): void {
    if (!this.eventTypes.has(eventType)) {
      throw new Error(`Event type '${eventType}' is not registered`)
    }

    const handlers = this.handlers.get(eventType)
    if (!handlers || handlers.length === 0) {
      return
    }

    const eventData: EventData = {
      ...data,
      timestamp: data.timestamp || epochDateNow(),
    }

    // Snapshot the list so handlers may unsubscribe while running
    for (const handler of [...handlers]) {
      try {
        const result = handler(eventData)
        if (result instanceof Promise) {
          void result.catch((error: unknown) => this.handleError(error, eventType, 'async'))
        }
      } catch (error) {
        this.handleError(error, eventType, 'sync')
      }
    }
  }

  /**
   * Handle errors from event handlers
   */
  private handleError(error: unknown, eventType: EventType, handlerType: 'sync' | 'async'): void {
    const err = error instanceof Error ? error : new Error(String(error))
    if (this.logger) {
      this.logger.error(`Error in ${handlerType} event handler for '${eventType}'`, { error: err.message })
    } else {
      console.error(`Error in ${handlerType} event handler for '${eventType}':`, err)
    }

    // Emit error event if it's registered and we're not already handling an error event
    if (eventType !== EventTypes.SYSTEM_ERROR && this.eventTypes.has(EventTypes.SYSTEM_ERROR)) {
      this.emit(EventTypes.SYSTEM_ERROR, {
        error: err,
        context: `Event handler for '${eventType}'`,
        severity: 'medium',
        timestamp: epochDateNow(),
      } satisfies ErrorEvent)
    }
  }
}

/**
 * Register every grid, order and system event type on a bus
 */
export function registerStandardEvents(bus: EventBus): EventBus {
  Object.values(EventTypes).forEach(eventType => {
    bus.registerEvent(eventType)
  })
  return bus
}
