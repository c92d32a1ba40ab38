/**
 * Hysteresis grid
 *
 * Corridor-bounded grid that arms on a move away from the trigger price
 * and releases an order on the retrace, with fixed, notional, multiple
 * and position-capped sizing.
 */

export { DEFAULT_GRID_SETTINGS, GridConfigError, gridSettingsSchema, parseGridConfig, toGridSettings } from './grid-config'
export type { GridSettings, GridSettingsInput } from './grid-config'
export { EventBusGridSink } from './grid-event-sink'
export { armDown, armUp, createGridState, disarmDown, disarmUp, snapshotGridState } from './grid-state'
export type { GridState, GridStateSnapshot } from './grid-state'
export { GridStateMachine } from './grid-state-machine'
export type {
  GridNotification, GridStateMachineOptions, ObservabilitySink, OrderCanceller, SuppressionReason
} from './grid-state-machine'
export { percentFrom, sizeBuy, sizeSell, withinGiveUpBias } from './order-sizer'
export type { OrderSizing } from './order-sizer'
export { PositionLedger } from './position-ledger'
