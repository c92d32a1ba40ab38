import type { OrderIntent, TradingMode } from '@gridline/shared'
import type { Logger } from '@gridline/types'
import { v4 as uuidv4 } from 'uuid'
import type { TimeSource } from '../events/time-source'
import { RealTimeSource } from '../events/time-source'
import { ReportQueue, type GatewayReport, type OrderGateway } from './order-gateway'

export interface BacktestGatewayConfig {
  /** Simulated slippage in basis points (100 = 1%), applied against the order */
  readonly slippageBps?: number
  /** Clock used to stamp reports, normally the simulated bar clock */
  readonly timeSource?: TimeSource
  readonly logger?: Logger
}

/**
 * Simulated gateway for bar-close runs.
 *
 * Every submitted intent fills in full at its own price, adjusted by the
 * configured slippage, and is reported as a fill followed by an inactive
 * update. Nothing rests on the simulated book, so cancel-all has no effect.
 */
export class BacktestGateway implements OrderGateway {
  readonly mode: TradingMode = 'backtest'
  private readonly queue = new ReportQueue()
  private readonly slippageBps: number
  private readonly timeSource: TimeSource
  private readonly logger?: Logger
  private submitted = 0

  constructor(config: BacktestGatewayConfig = {}) {
    this.slippageBps = config.slippageBps ?? 0
    this.timeSource = config.timeSource ?? new RealTimeSource()
    this.logger = config.logger
  }

  submit(intent: OrderIntent): string {
    const orderId = uuidv4()
    const timestamp = this.timeSource.nowEpoch()
    const slip = intent.price * this.slippageBps / 10_000
    const price = intent.side === 'buy' ? intent.price + slip : intent.price - slip

    this.submitted++
    this.logger?.info(`Simulated ${intent.side} ${intent.symbol}: ${intent.volume}@${price}`, { orderId })

    this.queue.push({
      type: 'fill',
      fill: { orderId, side: intent.side, price, volume: intent.volume, timestamp }
    })
    this.queue.push({
      type: 'update',
      update: { orderId, active: false, status: 'filled', timestamp }
    })
    return orderId
  }

  cancelAll(): void {
    this.logger?.debug('Cancel-all ignored, simulated orders fill on submission')
  }

  drainReports(): GatewayReport[] {
    return this.queue.drain()
  }

  /**
   * Number of intents submitted so far
   */
  get submittedCount(): number {
    return this.submitted
  }
}
