import type {
  Candle,
  GridConfig,
  MarketSnapshot,
  OrderFill,
  OrderIntent,
  OrderUpdate,
  PositionSync,
  Ticker
} from '@gridline/shared'
import type { EventData, EventPublisher, Logger } from '@gridline/types'
import {
  EventTypes,
  type GridIntentEvent,
  type GridParametersEvent,
  type OrderFilledEvent,
  type OrderInactiveEvent,
  type OrderSubmittedEvent,
  type PositionSyncedEvent
} from '../events/types'
import { RealTimeSource, SimulatedTimeSource, type TimeSource } from '../events/time-source'
import type { OrderGateway } from '../gateways/order-gateway'
import { EventBusGridSink } from '../grid/grid-event-sink'
import { toGridSettings } from '../grid/grid-config'
import { createGridState, snapshotGridState, type GridState, type GridStateSnapshot } from '../grid/grid-state'
import { GridStateMachine, type ObservabilitySink } from '../grid/grid-state-machine'
import { PositionLedger } from '../grid/position-ledger'
import { fromCandle, fromTicker } from '../market-data/snapshot-adapter'

export interface GridStrategyOptions {
  /** Bus receiving grid.*, order.* and position.* events */
  readonly eventBus?: EventPublisher
  /** Extra sink, e.g. a dashboard; receives the same notifications as the bus */
  readonly sink?: ObservabilitySink
  /** Clock for events not tied to a snapshot; a SimulatedTimeSource follows bar timestamps */
  readonly timeSource?: TimeSource
  readonly logger?: Logger
}

/**
 * Single owner of one grid.
 *
 * Adapts ticks and bars into snapshots, runs the state machine, routes its
 * intents to the gateway and feeds execution reports to the ledger. Reports
 * queued by the gateway are applied before every evaluation and right after
 * submitting, so a fill is always visible to the next evaluation.
 */
export class GridStrategy {
  private readonly state: GridState
  private readonly machine: GridStateMachine
  private readonly ledger: PositionLedger
  private readonly eventBus?: EventPublisher
  private readonly sink?: ObservabilitySink
  private readonly timeSource: TimeSource
  private readonly logger?: Logger
  private active = false

  constructor(
    readonly config: GridConfig,
    private readonly gateway: OrderGateway,
    options: GridStrategyOptions = {}
  ) {
    this.eventBus = options.eventBus
    this.timeSource = options.timeSource ?? new RealTimeSource()
    this.logger = options.logger
    this.state = createGridState(config)

    const sinks: ObservabilitySink[] = []
    if (options.eventBus) {
      sinks.push(new EventBusGridSink(options.eventBus, config))
    }
    if (options.sink) {
      sinks.push(options.sink)
    }

    if (sinks.length > 0) {
      this.sink = {
        publish: (notification) => sinks.forEach((sink) => sink.publish(notification))
      }
    }

    this.machine = new GridStateMachine(config, this.state, {
      canceller: gateway,
      sink: this.sink,
      logger: this.logger
    })
    this.ledger = new PositionLedger(this.state, this.logger)
  }

  /**
   * Begin reacting to market data
   */
  start(): void {
    if (this.active) {
      return
    }
    this.active = true
    const timestamp = this.timeSource.nowEpoch()

    this.logger?.info('Grid started', { ...toGridSettings(this.config), mode: this.gateway.mode })
    this.publish(EventTypes.GRID_PARAMETERS, {
      symbol: this.config.symbol,
      config: this.config,
      timestamp
    } satisfies GridParametersEvent)
    this.publishState()
  }

  /**
   * Stop reacting to market data and cancel working orders
   */
  stop(): void {
    if (!this.active) {
      return
    }
    this.active = false
    try {
      this.gateway.cancelAll()
    } catch (error) {
      this.logger?.error('Cancel-all on stop failed', {
        error: error instanceof Error ? error.message : String(error)
      })
    }
    this.logger?.info('Grid stopped', { position: this.state.position })
  }

  isActive(): boolean {
    return this.active
  }

  getState(): GridStateSnapshot {
    return snapshotGridState(this.state)
  }

  /**
   * Evaluate a live tick
   * @returns the intents submitted to the gateway
   */
  onTick(ticker: Ticker): OrderIntent[] {
    if (ticker.symbol !== this.config.symbol) {
      this.logger?.debug('Ignoring tick for another symbol', { symbol: ticker.symbol })
      return []
    }
    return this.onSnapshot(fromTicker(ticker))
  }

  /**
   * Evaluate a closed bar; only backtest gateways trade on bar closes
   * @returns the intents submitted to the gateway
   */
  onBar(candle: Candle): OrderIntent[] {
    if (this.gateway.mode !== 'backtest') {
      this.logger?.debug('Ignoring bar outside backtest mode', { timestamp: candle.timestamp })
      return []
    }
    if (this.timeSource instanceof SimulatedTimeSource && candle.timestamp > this.timeSource.nowEpoch()) {
      this.timeSource.advanceTo(candle.timestamp)
    }
    return this.onSnapshot(fromCandle(candle))
  }

  /**
   * Apply a fill delivered outside the gateway queue
   */
  onFill(fill: OrderFill): void {
    if (this.ledger.onFill(fill)) {
      this.publish(EventTypes.ORDER_FILLED, { fill, timestamp: fill.timestamp } satisfies OrderFilledEvent)
      this.publishState()
    }
  }

  /**
   * Apply an order status change delivered outside the gateway queue
   */
  onOrderUpdate(update: OrderUpdate): void {
    if (update.active) {
      return
    }
    this.ledger.onOrderUpdate(update)
    this.publish(EventTypes.ORDER_INACTIVE, { update, timestamp: update.timestamp } satisfies OrderInactiveEvent)
    this.publishState()
  }

  /**
   * Overwrite the position with the venue's view
   */
  onPositionSync(sync: PositionSync): void {
    if (sync.symbol !== this.config.symbol) {
      return
    }
    this.ledger.onPositionSync(sync)
    this.publish(EventTypes.POSITION_SYNCED, {
      symbol: sync.symbol,
      position: this.state.position,
      triggerPrice: this.state.triggerPrice,
      timestamp: this.timeSource.nowEpoch()
    } satisfies PositionSyncedEvent)
    this.publishState()
  }

  /**
   * Apply every report the gateway has queued
   */
  processReports(): void {
    for (const report of this.gateway.drainReports()) {
      if (report.type === 'fill') {
        this.onFill(report.fill)
      } else {
        this.onOrderUpdate(report.update)
      }
    }
  }

  private onSnapshot(snapshot: MarketSnapshot): OrderIntent[] {
    if (!this.active) {
      return []
    }

    this.processReports()
    const intents = this.machine.evaluate(snapshot)
    const submitted: OrderIntent[] = []

    for (const intent of intents) {
      this.publish(EventTypes.GRID_INTENT, { intent, timestamp: snapshot.timestamp } satisfies GridIntentEvent)
      const orderId = this.gateway.submit(intent)
      if (orderId === undefined) {
        this.logger?.warn('Gateway declined intent', { ...intent })
        continue
      }
      this.ledger.onOrderSubmitted(orderId)
      this.publish(EventTypes.ORDER_SUBMITTED, {
        orderId,
        intent,
        timestamp: snapshot.timestamp
      } satisfies OrderSubmittedEvent)
      submitted.push(intent)
    }

    if (intents.length > 0) {
      this.processReports()
    }
    return submitted
  }

  private publishState(): void {
    if (!this.sink) {
      return
    }
    try {
      this.sink.publish({
        type: 'state',
        state: snapshotGridState(this.state),
        timestamp: this.timeSource.nowEpoch()
      })
    } catch (error) {
      this.logger?.error('Observability sink failed', {
        error: error instanceof Error ? error.message : String(error)
      })
    }
  }

  private publish(eventType: string, data: EventData): void {
    if (!this.eventBus) {
      return
    }
    try {
      this.eventBus.emit(eventType, data)
    } catch (error) {
      this.logger?.error('Event publication failed', {
        eventType,
        error: error instanceof Error ? error.message : String(error)
      })
    }
  }
}
