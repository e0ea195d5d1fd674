import { nanoid } from 'nanoid'
import {
  isTerminalFailure,
  normalizeStatus,
  type CorrelationContext,
  type FetchOutcome,
  type GenerationResult,
  type ProviderResource,
  type TaskHandle,
  type TaskStatus,
  type TraceEvent,
  type TraceHook,
} from '@genmedia/shared'
import { getApiKey, type CredentialResolver } from '../credentials.js'
import {
  BackendCallError,
  EmptyResultError,
  TerminalTaskFailure,
  errorMessage,
  isGenerationError,
} from '../errors.js'
import { createLogger } from '../logger.js'
import { buildPayload, type PayloadTemplate } from './field-mapping.js'
import type { AdapterReply, BackendAdapter } from './types.js'

const log = createLogger('TaskGateway')

/** What a capability sends: where, with which model, and how the request maps onto the payload. */
export interface Capability<TRequest> {
  resource: ProviderResource
  model: string
  template: PayloadTemplate<TRequest>
}

export interface CallOptions {
  context?: CorrelationContext
  trace?: TraceHook
  /** Trace label; defaults to `<provider>.<operation>`. */
  label?: string
}

export interface GatewayOptions {
  adapter: BackendAdapter
  credentials?: CredentialResolver
}

// Filled in as the call progresses so the trace hook sees what was known at failure time.
interface CallState {
  requestId?: string
  raw?: unknown
}

/**
 * Submit/fetch orchestration over one backend adapter.
 *
 * Every operation resolves the credential before touching the network,
 * performs exactly one provider round trip, and never retries or polls.
 */
export class AsyncTaskGateway {
  private readonly adapter: BackendAdapter
  private readonly credentials: CredentialResolver

  constructor(opts: GatewayOptions) {
    this.adapter = opts.adapter
    this.credentials = opts.credentials ?? getApiKey
  }

  async submit<TRequest extends object>(
    capability: Capability<TRequest>,
    request: TRequest,
    options: CallOptions = {},
  ): Promise<TaskHandle> {
    return this.traced<TaskHandle>('submit', options, async (state) => {
      const context = options.context ?? {}
      const apiKey = this.credentials(this.adapter.provider, context)
      const payload = buildPayload(capability.model, capability.template, request)
      const reply = await this.adapter.create({ resource: capability.resource, payload }, apiKey)
      state.raw = reply.raw
      state.requestId = resolveRequestId(context, reply)

      if (!reply.transportOk) {
        throw new BackendCallError('Task submission was rejected', reply.raw, reply.httpStatus)
      }
      const status = normalizeStatus(reply.status)
      if (isTerminalFailure(status)) {
        throw new TerminalTaskFailure(status, reply.taskId, reply.raw)
      }
      if (!reply.taskId) {
        throw new BackendCallError(
          'Submission reply carries no task id',
          reply.raw,
          reply.httpStatus,
        )
      }

      log.with({ requestId: state.requestId }).debug(
        `Submitted ${capability.model} task ${reply.taskId} (${status})`,
      )
      return freezeHandle(reply.taskId, status, state.requestId)
    })
  }

  /**
   * Read a task once. Non-terminal states come back as `{ kind: 'pending' }`;
   * the caller owns the polling loop and its give-up policy.
   */
  async fetch(taskId: string, options: CallOptions = {}): Promise<FetchOutcome> {
    return this.traced<FetchOutcome>('fetch', options, async (state) => {
      const context = options.context ?? {}
      const apiKey = this.credentials(this.adapter.provider, context)
      const reply = await this.adapter.lookup(taskId, apiKey)
      state.raw = reply.raw
      // Repeat lookups of one task must agree, so the fallback id derives from it.
      state.requestId = resolveRequestId(context, reply, () => `task-${taskId}`)

      if (!reply.transportOk) {
        throw new BackendCallError(`Lookup of task ${taskId} failed`, reply.raw, reply.httpStatus)
      }
      if (!reply.status) {
        throw new BackendCallError(
          `Lookup of task ${taskId} carries no status`,
          reply.raw,
          reply.httpStatus,
        )
      }

      const status = normalizeStatus(reply.status)
      const resolvedId = reply.taskId ?? taskId
      if (isTerminalFailure(status)) {
        throw new TerminalTaskFailure(status, resolvedId, reply.raw)
      }

      if (status !== 'SUCCEEDED') {
        return { kind: 'pending', handle: freezeHandle(resolvedId, status, state.requestId) }
      }
      return { kind: 'result', result: toResult(resolvedId, reply, state.requestId) }
    })
  }

  /**
   * One-shot generation on a synchronous resource. A transport-ok reply with
   * no task status counts as SUCCEEDED.
   */
  async invoke<TRequest extends object>(
    capability: Capability<TRequest>,
    request: TRequest,
    options: CallOptions = {},
  ): Promise<GenerationResult> {
    return this.traced<GenerationResult>('invoke', options, async (state) => {
      const context = options.context ?? {}
      const apiKey = this.credentials(this.adapter.provider, context)
      const payload = buildPayload(capability.model, capability.template, request)
      const reply = await this.adapter.create({ resource: capability.resource, payload }, apiKey)
      state.raw = reply.raw
      state.requestId = resolveRequestId(context, reply)

      if (!reply.transportOk) {
        throw new BackendCallError(
          `${capability.model} call was rejected`,
          reply.raw,
          reply.httpStatus,
        )
      }
      const status: TaskStatus = reply.status ? normalizeStatus(reply.status) : 'SUCCEEDED'
      if (isTerminalFailure(status)) {
        throw new TerminalTaskFailure(status, reply.taskId, reply.raw)
      }
      if (status !== 'SUCCEEDED') {
        throw new BackendCallError(
          `${capability.model} answered a synchronous call with status ${status}`,
          reply.raw,
          reply.httpStatus,
        )
      }

      return toResult(reply.taskId, reply, state.requestId)
    })
  }

  private async traced<T>(
    operation: string,
    options: CallOptions,
    run: (state: CallState) => Promise<T>,
  ): Promise<T> {
    const state: CallState = { requestId: options.context?.requestId }
    const label = options.label ?? `${this.adapter.provider}.${operation}`
    try {
      const value = await run(state)
      this.emit(options.trace, label, { requestId: state.requestId ?? nanoid(), payload: value })
      return value
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.emit(options.trace, label, {
        requestId: state.requestId ?? nanoid(),
        payload: state.raw ?? (isGenerationError(err) ? err.payload : undefined),
        error,
      })
      throw err
    }
  }

  // The hook observes; it must never change the outcome of the call.
  private emit(trace: TraceHook | undefined, label: string, event: TraceEvent): void {
    if (!trace) return
    try {
      trace(label, event)
    } catch (err) {
      log
        .with({ requestId: event.requestId })
        .warn(`Trace hook for ${label} threw: ${errorMessage(err)}`)
    }
  }
}

function resolveRequestId(
  context: CorrelationContext,
  reply: AdapterReply,
  fallback: () => string = nanoid,
): string {
  return context.requestId || reply.requestId || fallback()
}

function freezeHandle(taskId: string, status: TaskStatus, requestId: string): TaskHandle {
  return Object.freeze({ taskId, status, requestId })
}

function toResult(
  taskId: string | undefined,
  reply: AdapterReply,
  requestId: string,
): GenerationResult {
  if (reply.artifacts.length === 0) {
    throw new EmptyResultError(taskId, reply.raw)
  }
  return Object.freeze({
    ...(taskId ? { taskId } : {}),
    status: 'SUCCEEDED' as const,
    artifacts: Object.freeze([...reply.artifacts]),
    requestId,
    ...(reply.usage === undefined ? {} : { usage: reply.usage }),
  })
}
