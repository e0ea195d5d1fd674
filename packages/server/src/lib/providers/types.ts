import type {
  ClientReply,
  ProviderName,
  ProviderResource,
  TransportFamily,
} from '@genmedia/shared'

export interface ProviderPayload {
  model: string
  input: Record<string, unknown>
  parameters: Record<string, unknown>
}

export interface CreateCall {
  resource: ProviderResource
  payload: ProviderPayload
}

/** A provider reply before reduction, tagged by the transport family that produced it. */
export type RawReply =
  | { family: 'client'; reply: ClientReply }
  | { family: 'rest'; httpStatus: number; body: unknown }

/** Provider-agnostic reduction of any reply. */
export interface AdapterReply {
  transportOk: boolean
  /** HTTP status (REST) or status code (client) the transport answered with. */
  httpStatus?: number
  taskId?: string
  status?: string
  requestId?: string
  /** The reply as received, kept for error payloads and trace hooks. */
  raw: unknown
  artifacts: string[]
  usage?: unknown
}

export interface BackendAdapter {
  readonly provider: ProviderName
  readonly family: TransportFamily

  /**
   * Create a job on an asynchronous resource, or run a one-shot generation on
   * a synchronous one. One round trip.
   */
  create(call: CreateCall, apiKey: string): Promise<AdapterReply>

  /** Look a task up by id. One round trip. */
  lookup(taskId: string, apiKey: string): Promise<AdapterReply>
}
