import type { EpochDate, GridConfig, MarketSnapshot, OrderIntent, OrderSide } from '@gridline/shared'
import type { Logger } from '@gridline/types'
import { isUsableSnapshot } from '../market-data/snapshot-adapter'
import { armDown, armUp, disarmDown, disarmUp, snapshotGridState, type GridState, type GridStateSnapshot } from './grid-state'
import { percentFrom, sizeBuy, sizeSell, withinGiveUpBias, type OrderSizing } from './order-sizer'

/** Why a release was not turned into an intent */
export type SuppressionReason = 'bias' | 'volume' | 'price'

type ReleaseOutcome = 'send' | 'drop' | 'hold'

/**
 * Notifications published while evaluating a snapshot
 */
export type GridNotification =
  | { readonly type: 'sleep'; readonly lastPrice: number; readonly timestamp: EpochDate }
  | { readonly type: 'wake'; readonly lastPrice: number; readonly timestamp: EpochDate }
  | {
      readonly type: 'suppressed'
      readonly side: OrderSide
      readonly reason: SuppressionReason
      readonly sizing: OrderSizing
      readonly timestamp: EpochDate
    }
  | { readonly type: 'state'; readonly state: GridStateSnapshot; readonly timestamp: EpochDate }

/**
 * Receives grid notifications for display or logging.
 * Nothing inside the grid consumes them.
 */
export interface ObservabilitySink {
  publish(notification: GridNotification): void
}

/**
 * Fire-and-forget cancellation of every working order of the grid
 */
export interface OrderCanceller {
  cancelAll(): void
}

export interface GridStateMachineOptions {
  readonly canceller?: OrderCanceller
  readonly sink?: ObservabilitySink
  readonly logger?: Logger
}

/**
 * Hysteresis grid decision engine.
 *
 * Each call to {@link evaluate} runs the corridor check, arms either side
 * when price has moved far enough from the trigger, and releases an order
 * when price retraces from the recorded extreme. Steps run in a fixed order
 * and later steps see the mutations of earlier ones: a sell re-anchors the
 * trigger before the buy side is examined.
 *
 * The machine never performs I/O; order intents are returned to the caller
 * and the only outbound call is the cancel-all request on the canceller.
 */
export class GridStateMachine {
  private readonly canceller?: OrderCanceller
  private readonly sink?: ObservabilitySink
  private readonly logger?: Logger

  constructor(
    private readonly config: GridConfig,
    private readonly state: GridState,
    options: GridStateMachineOptions = {}
  ) {
    this.canceller = options.canceller
    this.sink = options.sink
    this.logger = options.logger
  }

  /**
   * Evaluate one normalized price update.
   * Returns at most one sell and one buy intent. Never throws.
   */
  evaluate(snapshot: MarketSnapshot): OrderIntent[] {
    const intents: OrderIntent[] = []

    if (!isUsableSnapshot(snapshot)) {
      this.logger?.warn('Skipping snapshot without a usable last price', { ...snapshot })
      this.publishState(snapshot.timestamp)
      return intents
    }

    this.checkCorridor(snapshot)

    if (!this.state.gridSleep) {
      if (this.state.triggerPrice > 0) {
        this.armUpside(snapshot.last)
        this.armDownside(snapshot.last)
      } else {
        this.logger?.warn('Trigger price unset, skipping arming', { triggerPrice: this.state.triggerPrice })
      }

      const sell = this.releaseUpside(snapshot)
      if (sell) {
        intents.push(sell)
      }

      const buy = this.releaseDownside(snapshot)
      if (buy) {
        intents.push(buy)
      }
    }

    this.publishState(snapshot.timestamp)
    return intents
  }

  /**
   * Sleep outside [lowerPrice, upperPrice]; the bounds themselves are inside.
   */
  private checkCorridor(snapshot: MarketSnapshot): void {
    const { last, timestamp } = snapshot
    const outside = last > this.config.upperPrice || last < this.config.lowerPrice

    if (outside) {
      if (!this.state.gridSleep) {
        this.state.gridSleep = true
        this.logger?.info('Grid sleeping', {
          lastPrice: last,
          upperPrice: this.config.upperPrice,
          lowerPrice: this.config.lowerPrice
        })
        this.notify({ type: 'sleep', lastPrice: last, timestamp })
        this.cancelAll()
      } else if (this.state.pendingOrderId !== undefined) {
        this.cancelAll()
      }
      return
    }

    if (this.state.gridSleep) {
      this.state.gridSleep = false
      this.logger?.info('Grid running', {
        lastPrice: last,
        upperPrice: this.config.upperPrice,
        lowerPrice: this.config.lowerPrice
      })
      this.notify({ type: 'wake', lastPrice: last, timestamp })
    }
  }

  private armUpside(last: number): void {
    const trigger = this.state.triggerPrice
    if (last > trigger && percentFrom(trigger, last) >= this.config.risePercent) {
      armUp(this.state, last)
    }
  }

  private armDownside(last: number): void {
    const trigger = this.state.triggerPrice
    if (last < trigger && -percentFrom(trigger, last) >= this.config.fallPercent) {
      armDown(this.state, last)
    }
  }

  private releaseUpside(snapshot: MarketSnapshot): OrderIntent | undefined {
    const highest = this.state.highestPrice
    if (!this.state.touchUp || highest === undefined) {
      return undefined
    }
    if (!(highest > 0)) {
      this.logger?.warn('Recorded high unusable, skipping sell release', { highestPrice: highest })
      return undefined
    }

    const fallDownPct = (highest - snapshot.last) / highest * 100
    if (fallDownPct < this.config.fallDown) {
      return undefined
    }

    const sizing = sizeSell(this.config, this.state, snapshot.last, snapshot.bid)
    const outcome = this.screen('sell', sizing, snapshot.timestamp)
    if (outcome === 'hold') {
      return undefined
    }

    disarmUp(this.state)
    this.state.triggerPrice = sizing.price
    return outcome === 'send' ? this.toIntent('sell', sizing) : undefined
  }

  private releaseDownside(snapshot: MarketSnapshot): OrderIntent | undefined {
    const lowest = this.state.lowestPrice
    if (!this.state.touchDown || lowest === undefined) {
      return undefined
    }
    if (!(lowest > 0)) {
      this.logger?.warn('Recorded low unusable, skipping buy release', { lowestPrice: lowest })
      return undefined
    }

    const riseUpPct = (snapshot.last - lowest) / lowest * 100
    if (riseUpPct < this.config.riseUp) {
      return undefined
    }

    const sizing = sizeBuy(this.config, this.state, snapshot.last, snapshot.ask)
    const outcome = this.screen('buy', sizing, snapshot.timestamp)
    if (outcome === 'hold') {
      return undefined
    }

    disarmDown(this.state)
    this.state.triggerPrice = sizing.price
    return outcome === 'send' ? this.toIntent('buy', sizing) : undefined
  }

  /**
   * Decide what a qualifying release turns into.
   * `hold` keeps the side armed for the next cycle (give-up rule, unusable
   * quote). `drop` completes the release without an order because the
   * position caps leave nothing to trade.
   */
  private screen(side: OrderSide, sizing: OrderSizing, timestamp: EpochDate): ReleaseOutcome {
    let reason: SuppressionReason | undefined
    if (!withinGiveUpBias(this.config.giveUpBias, sizing.bias)) {
      reason = 'bias'
    } else if (!Number.isFinite(sizing.price) || sizing.price <= 0) {
      reason = 'price'
    } else if (!Number.isFinite(sizing.volume) || sizing.volume <= 0) {
      reason = 'volume'
    }

    if (reason === undefined) {
      return 'send'
    }

    this.logger?.debug(reason === 'volume' ? 'Release sized to zero, re-anchoring without an order' : 'Release suppressed', {
      side,
      reason,
      ...sizing
    })
    this.notify({ type: 'suppressed', side, reason, sizing, timestamp })
    return reason === 'volume' ? 'drop' : 'hold'
  }

  private toIntent(side: OrderSide, sizing: OrderSizing): OrderIntent {
    return {
      side,
      symbol: this.config.symbol,
      price: sizing.price,
      volume: sizing.volume,
      orderType: this.config.orderType,
      offset: side === 'buy' ? 'open' : 'close'
    }
  }

  private cancelAll(): void {
    if (!this.canceller) {
      return
    }
    try {
      this.canceller.cancelAll()
    } catch (error) {
      this.logger?.error('Cancel-all request failed', {
        error: error instanceof Error ? error.message : String(error)
      })
    }
  }

  private publishState(timestamp: EpochDate): void {
    this.notify({ type: 'state', state: snapshotGridState(this.state), timestamp })
  }

  private notify(notification: GridNotification): void {
    if (!this.sink) {
      return
    }
    try {
      this.sink.publish(notification)
    } catch (error) {
      this.logger?.error('Observability sink failed', {
        notification: notification.type,
        error: error instanceof Error ? error.message : String(error)
      })
    }
  }
}
