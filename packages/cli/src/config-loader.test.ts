import assert from 'node:assert/strict'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { after, before, describe, it } from 'node:test'
import { GridConfigError } from '@gridline/core'
import { ConfigLoadError, expandObjectEnvironmentVariables, loadGridConfig, loadGridSettings } from './config-loader'

describe('config loader', () => {
  let dir: string

  before(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'gridline-config-'))
  })

  after(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  async function writeSettings(name: string, content: string): Promise<string> {
    const file = path.join(dir, name)
    await writeFile(file, content, 'utf-8')
    return file
  }

  describe('expandObjectEnvironmentVariables', () => {
    it('should expand references inside strings', () => {
      process.env.GRIDLINE_TEST_VENUE = 'BINANCE'
      assert.deepEqual(
        expandObjectEnvironmentVariables({ vt_symbol: 'BTCUSDT.${GRIDLINE_TEST_VENUE}' }),
        { vt_symbol: 'BTCUSDT.BINANCE' }
      )
    })

    it('should type a value that is a whole reference', () => {
      process.env.GRIDLINE_TEST_TRIGGER = '48000'
      process.env.GRIDLINE_TEST_MULTIPLE = 'false'
      assert.deepEqual(
        expandObjectEnvironmentVariables({ trigger_price: '${GRIDLINE_TEST_TRIGGER}', multiple_order: '$GRIDLINE_TEST_MULTIPLE' }),
        { trigger_price: 48000, multiple_order: false }
      )
    })

    it('should expand unset variables to an empty string', () => {
      delete process.env.GRIDLINE_TEST_UNSET
      assert.deepEqual(expandObjectEnvironmentVariables(['${GRIDLINE_TEST_UNSET}', 1]), ['', 1])
    })
  })

  describe('loadGridConfig', () => {
    it('should load, expand and validate a settings file', async () => {
      process.env.GRIDLINE_TEST_TRIGGER = '48000'
      const file = await writeSettings('grid.json', JSON.stringify({
        trigger_price: '${GRIDLINE_TEST_TRIGGER}',
        order_type: 'MARKET'
      }))

      const config = await loadGridConfig(file)

      assert.equal(config.triggerPrice, 48000)
      assert.equal(config.orderType, 'market')
      assert.equal(config.upperPrice, 60000)
    })

    it('should reject invalid settings with every issue', async () => {
      const file = await writeSettings('invalid.json', JSON.stringify({ lower_price: 50000, upper_price: 45000 }))

      await assert.rejects(loadGridConfig(file), (error: unknown) => {
        assert.ok(error instanceof GridConfigError)
        assert.deepEqual(error.issues, [
          'lower_price: must not exceed upper_price',
          'trigger_price: must lie within [lower_price, upper_price]'
        ])
        return true
      })
    })
  })

  describe('loadGridSettings', () => {
    it('should fail on a missing file', async () => {
      await assert.rejects(loadGridSettings(path.join(dir, 'missing.json')), (error: unknown) => {
        assert.ok(error instanceof ConfigLoadError)
        assert.match(error.message, /^Settings file not found: /)
        assert.equal(error.filePath, path.join(dir, 'missing.json'))
        return true
      })
    })

    it('should fail on malformed JSON', async () => {
      const file = await writeSettings('broken.json', '{ "lower_price": ')
      await assert.rejects(loadGridSettings(file), /Failed to parse JSON settings/)
    })

    it('should fail on JSON that is not an object', async () => {
      const file = await writeSettings('array.json', '[1, 2]')
      await assert.rejects(loadGridSettings(file), /Settings must be a JSON object/)
    })
  })
})
