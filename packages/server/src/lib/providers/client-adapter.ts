import type { ClientReply, ProviderName } from '@genmedia/shared'
import { BackendCallError, errorMessage } from '../errors.js'
import { DashScopeClient, type GenerationParams, type MediaClient } from './dashscope-client.js'
import { parseReply } from './reply-parser.js'
import type { AdapterReply, BackendAdapter, CreateCall } from './types.js'

/** Adapter over a structured client whose calls already resolve to reply objects. */
export class ClientAdapter implements BackendAdapter {
  readonly provider: ProviderName = 'dashscope'
  readonly family = 'client' as const
  private readonly client: MediaClient

  constructor(client: MediaClient = new DashScopeClient()) {
    this.client = client
  }

  async create(call: CreateCall, apiKey: string): Promise<AdapterReply> {
    const params: GenerationParams = { apiKey, ...call.payload }
    switch (call.resource) {
      case 'video-synthesis':
        return this.send(`create ${call.resource}`, () => this.client.videoSynthesis.asyncCall(params))
      case 'multimodal-generation':
        return this.send(`create ${call.resource}`, () =>
          this.client.multiModalConversation.call(params),
        )
    }
  }

  async lookup(taskId: string, apiKey: string): Promise<AdapterReply> {
    return this.send(`lookup ${taskId}`, () => this.client.videoSynthesis.fetch({ apiKey, taskId }))
  }

  private async send(what: string, call: () => Promise<ClientReply>): Promise<AdapterReply> {
    let reply: ClientReply
    try {
      reply = await call()
    } catch (err) {
      throw new BackendCallError(`Client call failed (${what})`, errorMessage(err), undefined, {
        cause: err,
      })
    }
    return parseReply({ family: 'client', reply })
  }
}
