import assert from 'node:assert/strict'
import { beforeEach, describe, it } from 'node:test'
import { toEpochDate } from '@gridline/shared'
import { parseGridConfig } from './grid-config'
import { armDown, armUp, createGridState, type GridState } from './grid-state'
import { PositionLedger } from './position-ledger'

const timestamp = toEpochDate(1705321845000)

describe('PositionLedger', () => {
  let state: GridState
  let ledger: PositionLedger

  beforeEach(() => {
    state = createGridState(parseGridConfig({}))
    ledger = new PositionLedger(state)
  })

  describe('onFill', () => {
    it('should add a buy to the position and clear the sell side', () => {
      armUp(state, 47500)
      armDown(state, 46500)

      const applied = ledger.onFill({ orderId: 'order-1', side: 'buy', price: 46540, volume: 0.1, timestamp })

      assert.equal(applied, true)
      assert.equal(state.position, 0.1)
      assert.equal(state.triggerPrice, 46540)
      assert.equal(state.touchUp, false)
      assert.equal(state.highestPrice, undefined)
      assert.equal(state.touchDown, true)
      assert.equal(state.lowestPrice, 46500)
    })

    it('should subtract a sell from the position and clear the buy side', () => {
      state.position = 1
      armUp(state, 47500)
      armDown(state, 46500)

      ledger.onFill({ orderId: 'order-1', side: 'sell', price: 47460, volume: 0.25, timestamp })

      assert.equal(state.position, 0.75)
      assert.equal(state.triggerPrice, 47460)
      assert.equal(state.touchDown, false)
      assert.equal(state.lowestPrice, undefined)
      assert.equal(state.touchUp, true)
    })

    it('should ignore fills without a usable price or volume', () => {
      assert.equal(ledger.onFill({ orderId: 'order-1', side: 'buy', price: 0, volume: 0.1, timestamp }), false)
      assert.equal(ledger.onFill({ orderId: 'order-1', side: 'buy', price: 47000, volume: Number.NaN, timestamp }), false)
      assert.equal(state.position, 0)
      assert.equal(state.triggerPrice, 47000)
    })
  })

  describe('pending order', () => {
    it('should record the submitted order id', () => {
      ledger.onOrderSubmitted('order-1')
      assert.equal(state.pendingOrderId, 'order-1')
    })

    it('should free the slot when the pending order goes inactive', () => {
      ledger.onOrderSubmitted('order-1')
      ledger.onOrderUpdate({ orderId: 'order-1', active: false, status: 'cancelled', timestamp })
      assert.equal(state.pendingOrderId, undefined)
    })

    it('should keep the slot for active updates and other orders', () => {
      ledger.onOrderSubmitted('order-2')
      ledger.onOrderUpdate({ orderId: 'order-2', active: true, timestamp })
      ledger.onOrderUpdate({ orderId: 'order-1', active: false, status: 'filled', timestamp })
      assert.equal(state.pendingOrderId, 'order-2')
    })

    it('should track both orders when two are submitted in one evaluation', () => {
      ledger.onOrderSubmitted('order-1')
      ledger.onOrderSubmitted('order-2')

      ledger.onOrderUpdate({ orderId: 'order-2', active: false, status: 'filled', timestamp })
      assert.equal(state.pendingOrderId, 'order-1')

      ledger.onOrderUpdate({ orderId: 'order-1', active: false, status: 'cancelled', timestamp })
      assert.equal(state.pendingOrderId, undefined)
    })

    it('should free the slot only once every order has gone inactive', () => {
      ledger.onOrderSubmitted('order-1')
      ledger.onOrderSubmitted('order-2')

      ledger.onOrderUpdate({ orderId: 'order-1', active: false, status: 'rejected', reason: 'test', timestamp })
      assert.equal(state.pendingOrderId, 'order-2')

      ledger.onOrderUpdate({ orderId: 'order-2', active: false, status: 'filled', timestamp })
      assert.equal(state.pendingOrderId, undefined)
    })

    it('should leave armed flags alone on a rejection', () => {
      armUp(state, 47500)
      ledger.onOrderSubmitted('order-1')

      ledger.onOrderUpdate({ orderId: 'order-1', active: false, status: 'rejected', reason: 'test', timestamp })

      assert.equal(state.pendingOrderId, undefined)
      assert.equal(state.touchUp, true)
      assert.equal(state.highestPrice, 47500)
    })
  })

  describe('onPositionSync', () => {
    it('should overwrite the position and keep a set trigger', () => {
      state.position = 0.3
      ledger.onPositionSync({ symbol: 'BTCUSDT.BINANCE', volume: 2, price: 45000 })

      assert.equal(state.position, 2)
      assert.equal(state.triggerPrice, 47000)
    })

    it('should seed an unset trigger from the reported price', () => {
      state.triggerPrice = 0
      ledger.onPositionSync({ symbol: 'BTCUSDT.BINANCE', volume: 2, price: 45000 })

      assert.equal(state.triggerPrice, 45000)
    })

    it('should not seed the trigger from an unusable price', () => {
      state.triggerPrice = 0
      ledger.onPositionSync({ symbol: 'BTCUSDT.BINANCE', volume: 0, price: 0 })

      assert.equal(state.triggerPrice, 0)
    })
  })
})
