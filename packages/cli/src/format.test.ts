import assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { GridConfigError } from '@gridline/core'
import { ConfigLoadError } from './config-loader'
import { formatError } from './format'

describe('formatError', () => {
  it('should list configuration issues one per line', () => {
    const error = new GridConfigError(['lower_price: must not exceed upper_price', 'rise_percent: must not be negative'])

    assert.equal(
      formatError(error),
      'Invalid grid configuration\n  - lower_price: must not exceed upper_price\n  - rise_percent: must not be negative'
    )
  })

  it('should print the load failure message', () => {
    assert.equal(formatError(new ConfigLoadError('Settings file not found: /tmp/x.json', '/tmp/x.json')), 'Settings file not found: /tmp/x.json')
  })

  it('should print plain errors by message unless verbose', () => {
    const error = new Error('boom')
    assert.equal(formatError(error), 'boom')
    assert.equal(formatError(error, true), error.stack)
  })

  it('should stringify anything else', () => {
    assert.equal(formatError('plain'), 'plain')
  })
})
