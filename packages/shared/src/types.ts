import type { TaskStatus } from './constants.js'

// ─── Task lifecycle ───

export interface TaskHandle {
  readonly taskId: string
  readonly status: TaskStatus
  readonly requestId: string
}

export interface GenerationResult {
  readonly taskId?: string
  readonly status: 'SUCCEEDED'
  /** Provider-hosted references, in the order they appeared in the reply. Never empty. */
  readonly artifacts: readonly string[]
  readonly requestId: string
  readonly usage?: unknown
}

export type FetchOutcome =
  | { kind: 'result'; result: GenerationResult }
  | { kind: 'pending'; handle: TaskHandle }

// ─── Per-call context ───

/**
 * Caller-supplied metadata threaded explicitly through every call.
 * Nothing here is required; an empty object is a valid context.
 */
export interface CorrelationContext {
  requestId?: string
  /** Overrides the configured credential for this call only. */
  apiKey?: string
  /** Inbound headers from the hosting runtime (e.g. an MCP request). */
  headers?: Record<string, string | undefined>
}

export interface TraceEvent {
  requestId: string
  payload: unknown
  error?: Error
}

/** Around-call observer supplied by the host. Called at most once per run. */
export type TraceHook = (label: string, event: TraceEvent) => void

// ─── Capability discovery ───

export type JsonSchema = Record<string, unknown>

export interface ComponentSpec {
  name: string
  description: string
  inputSchema: JsonSchema
  outputSchema: JsonSchema
}

export interface CapabilityBundle {
  instructions: string
  components: readonly ComponentSpec[]
}

export type CapabilityExport = Readonly<Record<string, CapabilityBundle>>
