import assert from 'node:assert/strict'
import { beforeEach, describe, it, mock, type Mock } from 'node:test'
import { toEpochDate, type OrderIntent, type StockSymbol } from '@gridline/shared'
import { SimulatedTimeSource } from '../events/time-source'
import { NoopLogger } from '../utils/logger'
import { LiveGateway, type ExchangeClient, type PlaceOrderRequest } from './live-gateway'

const sell: OrderIntent = {
  side: 'sell',
  symbol: 'BTCUSDT.BINANCE',
  price: 47460,
  volume: 0.1,
  orderType: 'limit',
  offset: 'close'
}

describe('LiveGateway', () => {
  let placeOrder: Mock<(request: PlaceOrderRequest) => Promise<void>>
  let cancelAllOrders: Mock<(symbol: StockSymbol) => Promise<void>>
  let gateway: LiveGateway

  beforeEach(() => {
    placeOrder = mock.fn(async (_request: PlaceOrderRequest) => {})
    cancelAllOrders = mock.fn(async (_symbol: StockSymbol) => {})
    const client: ExchangeClient = { placeOrder, cancelAllOrders }
    gateway = new LiveGateway({
      client,
      symbol: 'BTCUSDT.BINANCE',
      timeSource: new SimulatedTimeSource(toEpochDate(1_000)),
      logger: new NoopLogger()
    })
  })

  it('should run in live mode', () => {
    assert.equal(gateway.mode, 'live')
  })

  it('should send the intent with the returned client order id', async () => {
    const orderId = gateway.submit(sell)
    await gateway.settle()

    assert.equal(placeOrder.mock.callCount(), 1)
    assert.deepEqual(placeOrder.mock.calls[0]?.arguments[0], { ...sell, clientOrderId: orderId })
    assert.deepEqual(gateway.drainReports(), [])
  })

  it('should queue a rejected update when placement fails', async () => {
    placeOrder.mock.mockImplementation(async () => {
      throw new Error('insufficient balance')
    })

    const orderId = gateway.submit(sell)
    await gateway.settle()

    assert.deepEqual(gateway.drainReports(), [{
      type: 'update',
      update: { orderId, active: false, status: 'rejected', reason: 'insufficient balance', timestamp: 1_000 }
    }])
  })

  it('should queue a rejected update when the client throws before returning a promise', async () => {
    placeOrder.mock.mockImplementation(() => {
      throw new Error('venue offline')
    })

    const orderId = gateway.submit(sell)
    assert.equal(placeOrder.mock.callCount(), 1)
    await gateway.settle()

    assert.deepEqual(gateway.drainReports(), [{
      type: 'update',
      update: { orderId, active: false, status: 'rejected', reason: 'venue offline', timestamp: 1_000 }
    }])
  })

  it('should cancel every order of its symbol', async () => {
    gateway.cancelAll()
    await gateway.settle()

    assert.deepEqual(cancelAllOrders.mock.calls[0]?.arguments, ['BTCUSDT.BINANCE'])
  })

  it('should not surface a failed cancel-all', async () => {
    cancelAllOrders.mock.mockImplementation(async () => {
      throw new Error('timeout')
    })

    gateway.cancelAll()
    await gateway.settle()

    assert.deepEqual(gateway.drainReports(), [])
  })

  it('should not surface a cancel-all that throws synchronously', async () => {
    cancelAllOrders.mock.mockImplementation(() => {
      throw new Error('socket closed')
    })

    assert.doesNotThrow(() => gateway.cancelAll())
    await gateway.settle()

    assert.deepEqual(gateway.drainReports(), [])
  })

  it('should queue venue reports in arrival order', () => {
    const timestamp = toEpochDate(2_000)
    gateway.reportFill({ orderId: 'order-1', side: 'sell', price: 47455, volume: 0.1, timestamp })
    gateway.reportUpdate({ orderId: 'order-1', active: false, status: 'filled', timestamp })

    assert.deepEqual(gateway.drainReports().map((report) => report.type), ['fill', 'update'])
  })
})
