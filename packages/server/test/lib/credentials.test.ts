import { describe, it, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { getApiKey } from '../../src/lib/credentials.js'
import { ConfigurationError } from '../../src/lib/errors.js'

describe('getApiKey', () => {
  let savedKey: string | undefined

  beforeEach(() => {
    savedKey = process.env.DASHSCOPE_API_KEY
    delete process.env.DASHSCOPE_API_KEY
  })

  afterEach(() => {
    if (savedKey === undefined) delete process.env.DASHSCOPE_API_KEY
    else process.env.DASHSCOPE_API_KEY = savedKey
  })

  it('prefers the explicit context key', () => {
    process.env.DASHSCOPE_API_KEY = 'env-key'
    const key = getApiKey('dashscope', {
      apiKey: 'context-key',
      headers: { 'x-dashscope-api-key': 'header-key' },
    })
    assert.equal(key, 'context-key')
  })

  it('falls back to the provider header, case-insensitively', () => {
    process.env.DASHSCOPE_API_KEY = 'env-key'
    assert.equal(getApiKey('dashscope', { headers: { 'X-DashScope-Api-Key': 'header-key' } }), 'header-key')
  })

  it('falls back to the environment', () => {
    process.env.DASHSCOPE_API_KEY = ' env-key '
    assert.equal(getApiKey('dashscope', {}), 'env-key')
  })

  it('throws ConfigurationError when nothing usable is set', () => {
    assert.throws(() => getApiKey('dashscope', {}), {
      name: 'ConfigurationError',
      message: 'Please set a valid DASHSCOPE_API_KEY',
    })
    process.env.DASHSCOPE_API_KEY = '   '
    assert.throws(() => getApiKey('dashscope', {}), ConfigurationError)
  })
})
