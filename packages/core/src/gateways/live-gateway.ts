import type { OrderFill, OrderIntent, OrderUpdate, StockSymbol, TradingMode } from '@gridline/shared'
import type { Logger } from '@gridline/types'
import { v4 as uuidv4 } from 'uuid'
import type { TimeSource } from '../events/time-source'
import { RealTimeSource } from '../events/time-source'
import { ReportQueue, type GatewayReport, type OrderGateway } from './order-gateway'

/**
 * Order placement request handed to the venue client
 */
export interface PlaceOrderRequest extends OrderIntent {
  /** Client-assigned order id, echoed back in reports */
  readonly clientOrderId: string
}

/**
 * Venue connection used by the live gateway. Implementations wrap an
 * exchange SDK; fills and status changes arrive through
 * {@link LiveGateway.reportFill} and {@link LiveGateway.reportUpdate}.
 */
export interface ExchangeClient {
  placeOrder(request: PlaceOrderRequest): Promise<void>
  cancelAllOrders(symbol: StockSymbol): Promise<void>
}

export interface LiveGatewayConfig {
  readonly client: ExchangeClient
  readonly symbol: StockSymbol
  readonly timeSource?: TimeSource
  readonly logger?: Logger
}

/**
 * Gateway for tick-driven live trading.
 *
 * Submission assigns a client order id immediately and sends the order in
 * the background. A placement failure is queued as a rejected update, so the
 * grid sees it exactly like a venue rejection.
 */
export class LiveGateway implements OrderGateway {
  readonly mode: TradingMode = 'live'
  private readonly queue = new ReportQueue()
  private readonly client: ExchangeClient
  private readonly symbol: StockSymbol
  private readonly timeSource: TimeSource
  private readonly logger?: Logger
  private readonly inFlight = new Set<Promise<void>>()

  constructor(config: LiveGatewayConfig) {
    this.client = config.client
    this.symbol = config.symbol
    this.timeSource = config.timeSource ?? new RealTimeSource()
    this.logger = config.logger
  }

  submit(intent: OrderIntent): string {
    const clientOrderId = uuidv4()
    this.logger?.info(`Sending ${intent.side} ${intent.symbol}: ${intent.volume}@${intent.price}`, {
      clientOrderId,
      orderType: intent.orderType
    })

    this.track(
      this.request(() => this.client.placeOrder({ ...intent, clientOrderId })).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error)
        this.logger?.error('Order placement failed', { clientOrderId, reason })
        this.reportUpdate({
          orderId: clientOrderId,
          active: false,
          status: 'rejected',
          reason,
          timestamp: this.timeSource.nowEpoch()
        })
      })
    )
    return clientOrderId
  }

  cancelAll(): void {
    this.track(
      this.request(() => this.client.cancelAllOrders(this.symbol)).catch((error: unknown) => {
        this.logger?.error('Cancel-all failed', {
          symbol: this.symbol,
          reason: error instanceof Error ? error.message : String(error)
        })
      })
    )
  }

  /**
   * Queue a fill pushed by the venue
   */
  reportFill(fill: OrderFill): void {
    this.queue.push({ type: 'fill', fill })
  }

  /**
   * Queue an order status change pushed by the venue
   */
  reportUpdate(update: OrderUpdate): void {
    this.queue.push({ type: 'update', update })
  }

  drainReports(): GatewayReport[] {
    return this.queue.drain()
  }

  /**
   * Wait for background requests; used on shutdown and in tests
   */
  async settle(): Promise<void> {
    await Promise.all(Array.from(this.inFlight))
  }

  /**
   * Call the client now, turning a synchronous throw into a rejection
   */
  private request(call: () => Promise<void>): Promise<void> {
    return new Promise<void>((resolve) => {
      resolve(call())
    })
  }

  private track(request: Promise<void>): void {
    this.inFlight.add(request)
    void request.finally(() => {
      this.inFlight.delete(request)
    })
  }
}
