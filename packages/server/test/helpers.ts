import type { ProviderName } from '@genmedia/shared'
import type { AdapterReply, BackendAdapter, CreateCall } from '../src/lib/providers/types.js'

export const BASE_URL = 'https://dashscope.test/api/v1'

export function reply(partial: Partial<AdapterReply> = {}): AdapterReply {
  return { transportOk: true, raw: { stub: true }, artifacts: [], ...partial }
}

type AdapterCall =
  | { op: 'create'; call: CreateCall; apiKey: string }
  | { op: 'lookup'; taskId: string; apiKey: string }

/** Backend adapter answering from a queue of canned replies and recording every call. */
export class FakeAdapter implements BackendAdapter {
  readonly provider: ProviderName = 'dashscope'
  readonly family = 'rest' as const
  readonly calls: AdapterCall[] = []
  private readonly queue: AdapterReply[]

  constructor(...replies: AdapterReply[]) {
    this.queue = replies
  }

  async create(call: CreateCall, apiKey: string): Promise<AdapterReply> {
    this.calls.push({ op: 'create', call, apiKey })
    return this.next()
  }

  async lookup(taskId: string, apiKey: string): Promise<AdapterReply> {
    this.calls.push({ op: 'lookup', taskId, apiKey })
    return this.next()
  }

  /** Payload of the n-th create call. */
  payload(index = 0) {
    const entry = this.calls.filter((c) => c.op === 'create')[index]
    if (!entry || entry.op !== 'create') throw new Error(`no create call #${index}`)
    return entry.call.payload
  }

  private next(): AdapterReply {
    const next = this.queue.shift()
    if (!next) throw new Error('FakeAdapter: no reply queued')
    return next
  }
}

export interface RecordedRequest {
  url: string
  method: string
  headers: Headers
  body: unknown
}

/**
 * A fetch stand-in that answers with the given responses in order and
 * records each request.
 */
export function recordingFetch(...responses: Array<() => Response>) {
  const requests: RecordedRequest[] = []
  const fetchImpl: typeof fetch = async (input, init) => {
    requests.push({
      url: String(input),
      method: init?.method ?? 'GET',
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    })
    const respond = responses.shift()
    if (!respond) throw new Error('recordingFetch: no response queued')
    return respond()
  }
  return { fetchImpl, requests }
}

export function jsonResponse(body: unknown, status = 200): () => Response {
  return () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    })
}
