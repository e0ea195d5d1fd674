import type { ProviderName } from '@genmedia/shared'
import { config } from '../../config.js'
import { BackendCallError, errorMessage } from '../errors.js'
import { parseReplyBody } from '../json.js'
import {
  RESOURCE_PATHS,
  buildHeaders,
  isAsyncResource,
  taskPath,
  type TransportOptions,
} from './dashscope-client.js'
import { parseReply } from './reply-parser.js'
import type { AdapterReply, BackendAdapter, CreateCall } from './types.js'

/**
 * Direct REST adapter: bearer-authenticated JSON POST for creation (with the
 * async header on job resources) and GET by task id for lookup.
 */
export class HttpAdapter implements BackendAdapter {
  readonly provider: ProviderName = 'dashscope'
  readonly family = 'rest' as const
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(opts: TransportOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? config.dashscopeBaseUrl).replace(/\/+$/, '')
    this.timeoutMs = opts.timeoutMs ?? config.requestTimeoutMs
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async create(call: CreateCall, apiKey: string): Promise<AdapterReply> {
    return this.send(`${this.baseUrl}${RESOURCE_PATHS[call.resource]}`, {
      method: 'POST',
      headers: buildHeaders(apiKey, isAsyncResource(call.resource)),
      body: JSON.stringify(call.payload),
    })
  }

  async lookup(taskId: string, apiKey: string): Promise<AdapterReply> {
    return this.send(`${this.baseUrl}${taskPath(taskId)}`, {
      method: 'GET',
      headers: buildHeaders(apiKey, false),
    })
  }

  private async send(url: string, init: RequestInit): Promise<AdapterReply> {
    let response: Response
    let text: string
    try {
      response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) })
      text = await response.text()
    } catch (err) {
      throw new BackendCallError(`${init.method} ${url} failed`, errorMessage(err), undefined, {
        cause: err,
      })
    }
    return parseReply({ family: 'rest', httpStatus: response.status, body: parseReplyBody(text) })
  }
}
