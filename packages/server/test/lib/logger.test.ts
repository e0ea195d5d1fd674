import { describe, it, mock } from 'node:test'
import assert from 'node:assert/strict'
import { createLogger, redactSensitive } from '../../src/lib/logger.js'

describe('redactSensitive', () => {
  it('masks credential keys at any depth', () => {
    const out = redactSensitive({
      requestId: 'r1',
      apiKey: 'test-secret',
      headers: { Authorization: 'Bearer test-secret', 'X-DashScope-Api-Key': 'test-secret' },
    })
    assert.deepEqual(out, {
      requestId: 'r1',
      apiKey: '[REDACTED]',
      headers: { Authorization: '[REDACTED]', 'X-DashScope-Api-Key': '[REDACTED]' },
    })
  })

  it('leaves arrays and other values alone', () => {
    assert.deepEqual(redactSensitive({ artifacts: ['https://x/1.png'], n: 2 }), {
      artifacts: ['https://x/1.png'],
      n: 2,
    })
  })
})

describe('createLogger', () => {
  it('stamps every line of a bound logger with its fields', () => {
    const write = mock.method(process.stderr, 'write', () => true)
    try {
      createLogger('Test').with({ requestId: 'r1' }).with({ taskId: 't1' }).warn('bound line')
    } finally {
      write.mock.restore()
    }

    assert.equal(write.mock.callCount(), 1)
    const line = String(write.mock.calls[0].arguments[0])
    assert.ok(line.endsWith(' [Test] (r1) bound line {"taskId":"t1"}\n'), line)
  })

  it('lets per-line fields override bound ones', () => {
    const write = mock.method(process.stderr, 'write', () => true)
    try {
      createLogger('Test').with({ requestId: 'r1' }).error('override', { requestId: 'r2' })
    } finally {
      write.mock.restore()
    }

    const line = String(write.mock.calls[0].arguments[0])
    assert.ok(line.endsWith(' [Test] (r2) override\n'), line)
  })
})
