import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import {
  TASK_STATUSES,
  PROVIDER_API_KEY_ENV,
  normalizeStatus,
  isTerminalStatus,
  isTerminalFailure,
  taskStatusSchema,
  componentNameSchema,
  taskOutputSchema,
  restReplySchema,
  clientReplySchema,
} from '../src/index.js'

// ─── Status normalization ───

describe('normalizeStatus', () => {
  it('passes the canonical vocabulary through', () => {
    for (const status of TASK_STATUSES) {
      assert.equal(normalizeStatus(status), status)
    }
  })

  it('is case-insensitive and trims', () => {
    assert.equal(normalizeStatus(' succeeded '), 'SUCCEEDED')
    assert.equal(normalizeStatus('Running'), 'RUNNING')
  })

  it('maps provider aliases', () => {
    assert.equal(normalizeStatus('QUEUED'), 'PENDING')
    assert.equal(normalizeStatus('in-progress'), 'RUNNING')
    assert.equal(normalizeStatus('in progress'), 'RUNNING')
    assert.equal(normalizeStatus('completed'), 'SUCCEEDED')
    assert.equal(normalizeStatus('CANCELLED'), 'CANCELED')
    assert.equal(normalizeStatus('error'), 'FAILED')
  })

  it('falls back to UNKNOWN', () => {
    assert.equal(normalizeStatus(undefined), 'UNKNOWN')
    assert.equal(normalizeStatus(null), 'UNKNOWN')
    assert.equal(normalizeStatus(''), 'UNKNOWN')
    assert.equal(normalizeStatus('SOMETHING_ELSE'), 'UNKNOWN')
  })
})

describe('terminal classification', () => {
  it('treats SUCCEEDED, FAILED and CANCELED as terminal', () => {
    assert.deepEqual(
      TASK_STATUSES.filter((s) => isTerminalStatus(s)),
      ['SUCCEEDED', 'FAILED', 'CANCELED'],
    )
  })

  it('only FAILED and CANCELED are terminal failures', () => {
    assert.deepEqual(
      TASK_STATUSES.filter((s) => isTerminalFailure(s)),
      ['FAILED', 'CANCELED'],
    )
  })

  it('UNKNOWN is non-terminal', () => {
    assert.equal(isTerminalStatus('UNKNOWN'), false)
  })
})

// ─── Validators ───

describe('validators', () => {
  it('taskStatusSchema rejects values outside the enum', () => {
    assert.ok(taskStatusSchema.safeParse('RUNNING').success)
    assert.ok(!taskStatusSchema.safeParse('running').success)
  })

  it('componentNameSchema accepts snake_case names', () => {
    assert.ok(componentNameSchema.safeParse('modelstudio_wan_video_fetch').success)
    assert.ok(!componentNameSchema.safeParse('Bad-Name').success)
    assert.ok(!componentNameSchema.safeParse('').success)
  })

  it('taskOutputSchema keeps unknown fields', () => {
    const parsed = taskOutputSchema.parse({ task_id: 't1', task_status: 'PENDING', extra: 1 })
    assert.equal(parsed.task_id, 't1')
    assert.equal(parsed.extra, 1)
  })

  it('taskOutputSchema rejects a non-string task id', () => {
    assert.ok(!taskOutputSchema.safeParse({ task_id: 42 }).success)
  })

  it('taskOutputSchema accepts a null task id and status', () => {
    const parsed = taskOutputSchema.parse({ task_id: null, task_status: null })
    assert.equal(parsed.task_id, null)
    assert.equal(parsed.task_status, null)
  })

  it('restReplySchema accepts a reply without output', () => {
    const parsed = restReplySchema.parse({ request_id: 'r1', code: 'InvalidParameter' })
    assert.equal(parsed.output, undefined)
    assert.equal(parsed.code, 'InvalidParameter')
  })

  it('clientReplySchema requires a numeric status code', () => {
    assert.ok(clientReplySchema.safeParse({ statusCode: 200 }).success)
    assert.ok(!clientReplySchema.safeParse({ statusCode: '200' }).success)
  })
})

describe('constants', () => {
  it('names the env var for every provider', () => {
    assert.equal(PROVIDER_API_KEY_ENV.dashscope, 'DASHSCOPE_API_KEY')
  })
})
