import type { OrderFill, OrderUpdate, PositionSync } from '@gridline/shared'
import type { Logger } from '@gridline/types'
import { disarmDown, disarmUp, type GridState } from './grid-state'

/**
 * Applies gateway reports back into the grid state.
 *
 * Fills are the only event that clears armed flags. A rejected or cancelled
 * order only frees the pending slot, so the next qualifying evaluation trades
 * again without any retry bookkeeping.
 */
export class PositionLedger {
  /** Submitted orders not yet reported inactive, oldest first */
  private readonly working = new Set<string>()

  constructor(
    private readonly state: GridState,
    private readonly logger?: Logger
  ) {}

  /**
   * Record the id the gateway returned for a submitted intent
   */
  onOrderSubmitted(orderId: string): void {
    this.working.add(orderId)
    this.state.pendingOrderId = orderId
  }

  /**
   * Apply an execution. The trigger follows the realized fill price.
   * @returns false when the fill was ignored
   */
  onFill(fill: OrderFill): boolean {
    if (!Number.isFinite(fill.volume) || !Number.isFinite(fill.price) || fill.price <= 0) {
      this.logger?.warn('Ignoring malformed fill', { ...fill })
      return false
    }

    if (fill.side === 'buy') {
      this.state.position += fill.volume
      disarmUp(this.state)
    } else {
      this.state.position -= fill.volume
      disarmDown(this.state)
    }
    this.state.triggerPrice = fill.price

    this.logger?.info('Fill applied', {
      orderId: fill.orderId,
      side: fill.side,
      price: fill.price,
      volume: fill.volume,
      position: this.state.position
    })
    return true
  }

  /**
   * Forget an order once it is no longer working. The pending slot falls back
   * to the newest order still working, and is freed when none is left.
   */
  onOrderUpdate(update: OrderUpdate): void {
    if (update.active || !this.working.delete(update.orderId)) {
      return
    }
    this.state.pendingOrderId = [...this.working].pop()
    if (update.status === 'rejected') {
      this.logger?.warn('Order rejected', { orderId: update.orderId, reason: update.reason })
    }
  }

  /**
   * Overwrite the position with the externally reported one.
   * An unset trigger is seeded from the reported price.
   */
  onPositionSync(sync: PositionSync): void {
    this.state.position = sync.volume
    if (this.state.triggerPrice <= 0 && sync.price > 0) {
      this.state.triggerPrice = sync.price
      this.logger?.info('Trigger price seeded from position', { triggerPrice: sync.price })
    }
  }
}
