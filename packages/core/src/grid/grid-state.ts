import type { GridConfig } from '@gridline/shared'

/**
 * Mutable state of one grid. Owned by a single strategy instance and
 * mutated only by the state machine and the position ledger.
 *
 * `highestPrice` is defined exactly while `touchUp` is set, and
 * `lowestPrice` exactly while `touchDown` is set. Use the arm and
 * disarm helpers below rather than writing those fields directly.
 */
export interface GridState {
  /** Moving reference for rise/fall percentages */
  triggerPrice: number
  /** Sell side armed: price rose far enough above the trigger */
  touchUp: boolean
  /** Buy side armed: price fell far enough below the trigger */
  touchDown: boolean
  /** Running high since the sell side armed */
  highestPrice: number | undefined
  /** Running low since the buy side armed */
  lowestPrice: number | undefined
  /** Price is outside the corridor */
  gridSleep: boolean
  /** Signed position in the traded symbol */
  position: number
  /** Latest order id returned by the gateway and not yet reported inactive */
  pendingOrderId: string | undefined
}

/**
 * Read-only copy of the grid state published to observers
 */
export type GridStateSnapshot = Readonly<GridState>

export function createGridState(config: GridConfig): GridState {
  return {
    triggerPrice: config.triggerPrice,
    touchUp: false,
    touchDown: false,
    highestPrice: undefined,
    lowestPrice: undefined,
    gridSleep: false,
    position: 0,
    pendingOrderId: undefined
  }
}

export function snapshotGridState(state: GridState): GridStateSnapshot {
  return { ...state }
}

/** Arm the sell side and fold `price` into the running high */
export function armUp(state: GridState, price: number): void {
  state.touchUp = true
  state.highestPrice = state.highestPrice === undefined ? price : Math.max(state.highestPrice, price)
}

export function disarmUp(state: GridState): void {
  state.touchUp = false
  state.highestPrice = undefined
}

/** Arm the buy side and fold `price` into the running low */
export function armDown(state: GridState, price: number): void {
  state.touchDown = true
  state.lowestPrice = state.lowestPrice === undefined ? price : Math.min(state.lowestPrice, price)
}

export function disarmDown(state: GridState): void {
  state.touchDown = false
  state.lowestPrice = undefined
}
