import type { GridConfig } from '@gridline/shared'
import type { EventPublisher } from '@gridline/types'
import {
  EventTypes,
  type GridCorridorEvent,
  type GridIntentSuppressedEvent,
  type GridStateEvent
} from '../events/types'
import type { GridNotification, ObservabilitySink } from './grid-state-machine'

/**
 * Forwards grid notifications to an event bus as grid.* events
 */
export class EventBusGridSink implements ObservabilitySink {
  constructor(
    private readonly bus: EventPublisher,
    private readonly config: GridConfig
  ) {}

  publish(notification: GridNotification): void {
    const { symbol, lowerPrice, upperPrice } = this.config

    switch (notification.type) {
      case 'state':
        this.bus.emit(EventTypes.GRID_STATE, {
          symbol,
          state: notification.state,
          timestamp: notification.timestamp
        } satisfies GridStateEvent)
        break
      case 'sleep':
      case 'wake':
        this.bus.emit(notification.type === 'sleep' ? EventTypes.GRID_SLEEP : EventTypes.GRID_WAKE, {
          symbol,
          lastPrice: notification.lastPrice,
          lowerPrice,
          upperPrice,
          timestamp: notification.timestamp
        } satisfies GridCorridorEvent)
        break
      case 'suppressed':
        this.bus.emit(EventTypes.GRID_INTENT_SUPPRESSED, {
          symbol,
          side: notification.side,
          reason: notification.reason,
          price: notification.sizing.price,
          volume: notification.sizing.volume,
          bias: notification.sizing.bias,
          timestamp: notification.timestamp
        } satisfies GridIntentSuppressedEvent)
        break
    }
  }
}
