import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import {
  MAX_COLLECTION_SIZE,
  MAX_REPLY_DEPTH,
  isRecord,
  parseReplyBody,
  readString,
  safeJsonParse,
} from '../../src/lib/json.js'

describe('safeJsonParse', () => {
  it('parses within the depth limit', () => {
    const raw = JSON.stringify({ output: { results: [{ url: 'https://x/1.png' }] } })
    // root, output, results, item, url
    assert.deepEqual(safeJsonParse(raw, 4), { output: { results: [{ url: 'https://x/1.png' }] } })
  })

  it('throws when nesting exceeds maxDepth', () => {
    assert.throws(() => safeJsonParse(JSON.stringify({ a: { b: { c: 1 } } }), 2), {
      message: 'JSON nesting depth exceeded',
    })
  })

  it('throws when an array is larger than MAX_COLLECTION_SIZE', () => {
    const raw = JSON.stringify(new Array(MAX_COLLECTION_SIZE + 1).fill(0))
    assert.throws(() => safeJsonParse(raw, 2), { message: 'JSON collection size exceeded' })
  })

  it('accepts exactly MAX_COLLECTION_SIZE keys', () => {
    const obj: Record<string, number> = {}
    for (let i = 0; i < MAX_COLLECTION_SIZE; i++) obj[`k${i}`] = i
    assert.doesNotThrow(() => safeJsonParse(JSON.stringify(obj), 2))
  })

  it('throws SyntaxError for invalid JSON', () => {
    assert.throws(() => safeJsonParse('{bad', 2), SyntaxError)
  })
})

describe('parseReplyBody', () => {
  it('returns undefined for an empty or blank body', () => {
    assert.equal(parseReplyBody(''), undefined)
    assert.equal(parseReplyBody('  \n'), undefined)
  })

  it('parses JSON bodies', () => {
    assert.deepEqual(parseReplyBody('{"request_id":"r1"}'), { request_id: 'r1' })
  })

  it('returns non-JSON text unchanged', () => {
    assert.equal(parseReplyBody('<html>502</html>'), '<html>502</html>')
  })

  it('returns over-deep replies as text', () => {
    let nested = '1'
    for (let i = 0; i <= MAX_REPLY_DEPTH; i++) nested = `[${nested}]`
    assert.equal(parseReplyBody(nested), nested)
  })
})

describe('record helpers', () => {
  it('isRecord accepts plain objects only', () => {
    assert.equal(isRecord({}), true)
    assert.equal(isRecord([]), false)
    assert.equal(isRecord(null), false)
    assert.equal(isRecord('x'), false)
  })

  it('readString keeps non-empty strings only', () => {
    assert.equal(readString('r1'), 'r1')
    assert.equal(readString(''), undefined)
    assert.equal(readString(7), undefined)
  })
})
