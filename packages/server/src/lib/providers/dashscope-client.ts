import type { ClientReply, ProviderResource } from '@genmedia/shared'
import { config } from '../../config.js'
import { isRecord, parseReplyBody, readString } from '../json.js'

export const RESOURCE_PATHS: Record<ProviderResource, string> = {
  'video-synthesis': '/services/aigc/video-generation/video-synthesis',
  'multimodal-generation': '/services/aigc/multimodal-generation/generation',
}

/** Resources that only accept background jobs and answer with a task id. */
const ASYNC_RESOURCES: ReadonlySet<ProviderResource> = new Set(['video-synthesis'])

export function isAsyncResource(resource: ProviderResource): boolean {
  return ASYNC_RESOURCES.has(resource)
}

export function taskPath(taskId: string): string {
  return `/tasks/${encodeURIComponent(taskId)}`
}

export interface TransportOptions {
  baseUrl?: string
  timeoutMs?: number
  /** Swap the fetch implementation (tests, proxies). Defaults to the global fetch. */
  fetchImpl?: typeof fetch
}

export function buildHeaders(apiKey: string, asyncJob: boolean): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  }
  if (asyncJob) headers['X-DashScope-Async'] = 'enable'
  return headers
}

export interface GenerationParams {
  apiKey: string
  model: string
  input: Record<string, unknown>
  parameters: Record<string, unknown>
}

export interface TaskLookupParams {
  apiKey: string
  taskId: string
}

/**
 * Structured client surface: every call resolves to a ClientReply, including
 * non-2xx answers. Only transport exceptions (network, timeout) reject.
 */
export interface MediaClient {
  videoSynthesis: {
    asyncCall(params: GenerationParams): Promise<ClientReply>
    fetch(params: TaskLookupParams): Promise<ClientReply>
  }
  multiModalConversation: {
    call(params: GenerationParams): Promise<ClientReply>
  }
}

export class DashScopeClient implements MediaClient {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  readonly videoSynthesis: MediaClient['videoSynthesis']
  readonly multiModalConversation: MediaClient['multiModalConversation']

  constructor(opts: TransportOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? config.dashscopeBaseUrl).replace(/\/+$/, '')
    this.timeoutMs = opts.timeoutMs ?? config.requestTimeoutMs
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init))

    this.videoSynthesis = {
      asyncCall: (params) =>
        this.send('POST', RESOURCE_PATHS['video-synthesis'], params.apiKey, toBody(params), true),
      fetch: (params) => this.send('GET', taskPath(params.taskId), params.apiKey),
    }
    this.multiModalConversation = {
      call: (params) =>
        this.send('POST', RESOURCE_PATHS['multimodal-generation'], params.apiKey, toBody(params)),
    }
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    apiKey: string,
    body?: Record<string, unknown>,
    asyncJob = false,
  ): Promise<ClientReply> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: buildHeaders(apiKey, asyncJob),
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(this.timeoutMs),
    })
    const parsed = parseReplyBody(await response.text())
    const record = isRecord(parsed) ? parsed : {}
    return {
      statusCode: response.status,
      requestId: readString(record.request_id),
      code: readString(record.code),
      message: readString(record.message) ?? (typeof parsed === 'string' ? parsed : undefined),
      output: record.output,
      usage: record.usage,
    }
  }
}

function toBody(params: GenerationParams): Record<string, unknown> {
  return { model: params.model, input: params.input, parameters: params.parameters }
}
