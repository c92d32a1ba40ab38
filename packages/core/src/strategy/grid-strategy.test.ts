import assert from 'node:assert/strict'
import { beforeEach, describe, it, mock, type Mock } from 'node:test'
import { toEpochDate, type Candle, type EpochDate, type StockSymbol, type Ticker } from '@gridline/shared'
import { EventBus, registerStandardEvents } from '../events/event-bus'
import { SimulatedTimeSource } from '../events/time-source'
import { EventTypes, type EventData } from '../events/types'
import { BacktestGateway } from '../gateways/backtest-gateway'
import { LiveGateway, type PlaceOrderRequest } from '../gateways/live-gateway'
import { parseGridConfig } from '../grid/grid-config'
import type { GridNotification } from '../grid/grid-state-machine'
import { NoopLogger } from '../utils/logger'
import { GridStrategy } from './grid-strategy'

const SYMBOL = 'BTCUSDT.BINANCE'

function bar(close: number, timestamp: number): Candle {
  return { timestamp: toEpochDate(timestamp), open: close, high: close, low: close, close, volume: 1 }
}

function tick(last: number, symbol = SYMBOL): Ticker {
  return { symbol, timestamp: toEpochDate(1_000), last, bid: last - 10, ask: last + 10 }
}

function recordEvents(bus: EventBus, eventType: string): Mock<(data: EventData) => void> {
  const handler = mock.fn((_data: EventData) => {})
  bus.subscribe(eventType, handler)
  return handler
}

describe('GridStrategy', () => {
  let bus: EventBus
  const config = parseGridConfig({ order_type: 'MARKET', multiple_order: false })

  beforeEach(() => {
    bus = registerStandardEvents(new EventBus(new NoopLogger()))
  })

  describe('backtest', () => {
    let timeSource: SimulatedTimeSource
    let strategy: GridStrategy

    beforeEach(() => {
      timeSource = new SimulatedTimeSource(toEpochDate(0))
      strategy = new GridStrategy(config, new BacktestGateway({ timeSource }), {
        eventBus: bus,
        timeSource,
        logger: new NoopLogger()
      })
    })

    it('should publish its parameters on start', () => {
      const parameters = recordEvents(bus, EventTypes.GRID_PARAMETERS)
      strategy.start()
      strategy.start()

      assert.equal(strategy.isActive(), true)
      assert.equal(parameters.mock.callCount(), 1)
      assert.equal(parameters.mock.calls[0]?.arguments[0].symbol, SYMBOL)
    })

    it('should ignore bars until started', () => {
      assert.deepEqual(strategy.onBar(bar(47470, 60_000)), [])
      assert.equal(strategy.getState().touchUp, false)
    })

    it('should trade on bar closes and apply the simulated fills', () => {
      const filled = recordEvents(bus, EventTypes.ORDER_FILLED)
      const inactive = recordEvents(bus, EventTypes.ORDER_INACTIVE)
      strategy.start()

      const sells = strategy.onBar(bar(47470, 60_000))

      assert.deepEqual(sells.map((intent) => [intent.side, intent.price, intent.volume]), [['sell', 47470, 0.1]])
      assert.equal(strategy.getState().position, -0.1)
      assert.equal(strategy.getState().triggerPrice, 47470)
      assert.equal(strategy.getState().pendingOrderId, undefined)
      assert.equal(filled.mock.callCount(), 1)
      assert.equal(inactive.mock.callCount(), 1)

      const buys = strategy.onBar(bar(46990, 120_000))

      assert.deepEqual(buys.map((intent) => [intent.side, intent.price]), [['buy', 46990]])
      assert.equal(strategy.getState().position, 0)
      assert.equal(strategy.getState().triggerPrice, 46990)
    })

    it('should follow bar timestamps on a simulated clock', () => {
      strategy.start()
      strategy.onBar(bar(47100, 60_000))

      assert.equal(timeSource.nowEpoch(), 60_000)
    })

    it('should publish intents and submissions', () => {
      const intents = recordEvents(bus, EventTypes.GRID_INTENT)
      const submitted = recordEvents(bus, EventTypes.ORDER_SUBMITTED)
      strategy.start()

      strategy.onBar(bar(47470, 60_000))

      assert.equal(intents.mock.callCount(), 1)
      assert.equal(submitted.mock.callCount(), 1)
      assert.equal(typeof submitted.mock.calls[0]?.arguments[0].orderId, 'string')
    })

    it('should forward notifications to an extra sink', () => {
      const seen: GridNotification[] = []
      strategy = new GridStrategy(config, new BacktestGateway({ timeSource }), {
        sink: { publish: (notification) => seen.push(notification) },
        timeSource
      })

      strategy.start()
      strategy.onBar(bar(39000, 60_000))

      assert.deepEqual(seen.map((notification) => notification.type), ['state', 'sleep', 'state'])
    })
  })

  describe('live', () => {
    let placeOrder: Mock<(request: PlaceOrderRequest) => Promise<void>>
    let cancelAllOrders: Mock<(symbol: StockSymbol) => Promise<void>>
    let gateway: LiveGateway
    let strategy: GridStrategy

    beforeEach(() => {
      placeOrder = mock.fn(async (_request: PlaceOrderRequest) => {})
      cancelAllOrders = mock.fn(async (_symbol: StockSymbol) => {})
      gateway = new LiveGateway({ client: { placeOrder, cancelAllOrders }, symbol: SYMBOL, logger: new NoopLogger() })
      strategy = new GridStrategy(config, gateway, { eventBus: bus, logger: new NoopLogger() })
      strategy.start()
    })

    it('should trade on ticks and hold the pending order id', () => {
      const intents = strategy.onTick(tick(47470))

      assert.deepEqual(intents.map((intent) => [intent.side, intent.price]), [['sell', 47460]])
      assert.equal(placeOrder.mock.callCount(), 1)
      assert.equal(strategy.getState().pendingOrderId, placeOrder.mock.calls[0]?.arguments[0].clientOrderId)
    })

    it('should ignore bars', () => {
      assert.deepEqual(strategy.onBar(bar(47470, 60_000)), [])
      assert.equal(placeOrder.mock.callCount(), 0)
    })

    it('should ignore ticks for another symbol', () => {
      assert.deepEqual(strategy.onTick(tick(47470, 'ETHUSDT.BINANCE')), [])
      assert.equal(strategy.getState().touchUp, false)
    })

    it('should free the pending slot once the venue reports the order inactive', () => {
      strategy.onTick(tick(47470))
      const orderId = strategy.getState().pendingOrderId
      assert.equal(typeof orderId, 'string')

      gateway.reportUpdate({
        orderId: orderId ?? '',
        active: false,
        status: 'cancelled',
        timestamp: toEpochDate(2_000)
      })
      strategy.processReports()

      assert.equal(strategy.getState().pendingOrderId, undefined)
    })

    it('should apply venue fills to the position', () => {
      const timestamp: EpochDate = toEpochDate(2_000)
      gateway.reportFill({ orderId: 'order-1', side: 'buy', price: 46540, volume: 0.1, timestamp })
      strategy.processReports()

      assert.equal(strategy.getState().position, 0.1)
      assert.equal(strategy.getState().triggerPrice, 46540)
    })

    it('should cancel working orders and go quiet on stop', async () => {
      strategy.stop()
      await gateway.settle()

      assert.equal(strategy.isActive(), false)
      assert.equal(cancelAllOrders.mock.callCount(), 1)
      assert.deepEqual(strategy.onTick(tick(47470)), [])
      assert.equal(placeOrder.mock.callCount(), 0)
    })
  })

  describe('position sync', () => {
    it('should overwrite the position and seed an unset trigger', () => {
      const synced = recordEvents(bus, EventTypes.POSITION_SYNCED)
      const strategy = new GridStrategy(
        parseGridConfig({ lower_price: 0, trigger_price: 0 }),
        new BacktestGateway(),
        { eventBus: bus }
      )

      strategy.onPositionSync({ symbol: SYMBOL, volume: 1, price: 45000 })
      strategy.onPositionSync({ symbol: 'ETHUSDT.BINANCE', volume: 5, price: 3000 })

      assert.equal(strategy.getState().position, 1)
      assert.equal(strategy.getState().triggerPrice, 45000)
      assert.equal(synced.mock.callCount(), 1)
      assert.equal(synced.mock.calls[0]?.arguments[0].triggerPrice, 45000)
    })
  })
})
