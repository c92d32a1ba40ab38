import type { OrderFill, OrderIntent, OrderUpdate, TradingMode } from '@gridline/shared'
import type { OrderCanceller } from '../grid/grid-state-machine'

/**
 * Execution report produced by a gateway, in the order it occurred
 */
export type GatewayReport =
  | { readonly type: 'update'; readonly update: OrderUpdate }
  | { readonly type: 'fill'; readonly fill: OrderFill }

/**
 * Order gateway capability.
 *
 * The mode is fixed at construction: `backtest` gateways are driven by bar
 * closes and report synchronously, `live` gateways by ticks and report
 * whenever the venue answers. Either way reports are queued and drained by
 * the strategy between evaluations.
 */
export interface OrderGateway extends OrderCanceller {
  readonly mode: TradingMode

  /**
   * Submit an intent.
   * @returns the gateway order id, or undefined when nothing was sent
   */
  submit(intent: OrderIntent): string | undefined

  /**
   * Request cancellation of every working order; never waits
   */
  cancelAll(): void

  /**
   * Take every report queued since the previous call
   */
  drainReports(): GatewayReport[]
}

/**
 * FIFO queue of reports shared by the gateway implementations
 */
export class ReportQueue {
  private reports: GatewayReport[] = []

  push(report: GatewayReport): void {
    this.reports.push(report)
  }

  drain(): GatewayReport[] {
    const drained = this.reports
    this.reports = []
    return drained
  }
}
