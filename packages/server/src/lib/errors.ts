import { MAX_ERROR_PAYLOAD_LENGTH, type TerminalFailureStatus } from '@genmedia/shared'

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  BACKEND_CALL_ERROR: 'BACKEND_CALL_ERROR',
  TERMINAL_TASK_FAILURE: 'TERMINAL_TASK_FAILURE',
  RESPONSE_PARSE_ERROR: 'RESPONSE_PARSE_ERROR',
  EMPTY_RESULT: 'EMPTY_RESULT',
  REGISTRY_CONFIGURATION_ERROR: 'REGISTRY_CONFIGURATION_ERROR',
} as const
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/** Render a provider payload for an error message, capped in length. */
export function summarizePayload(payload: unknown): string {
  let text: string
  try {
    text = typeof payload === 'string' ? payload : (JSON.stringify(payload) ?? String(payload))
  } catch {
    text = String(payload)
  }
  return text.length > MAX_ERROR_PAYLOAD_LENGTH
    ? `${text.slice(0, MAX_ERROR_PAYLOAD_LENGTH)}...[truncated]`
    : text
}

function withPayload(message: string, payload: unknown): string {
  return payload === undefined ? message : `${message}: ${summarizePayload(payload)}`
}

/**
 * Base class for every failure raised by a component, the gateway or an adapter.
 * `payload` holds the raw provider reply (or transport detail) untouched.
 */
export class GenerationError extends Error {
  readonly code: ErrorCode
  readonly payload: unknown

  constructor(code: ErrorCode, message: string, payload?: unknown, options?: ErrorOptions) {
    super(withPayload(message, payload), options)
    this.name = 'GenerationError'
    this.code = code
    this.payload = payload
  }
}

/** Missing or invalid credential. Raised before any network call. */
export class ConfigurationError extends GenerationError {
  constructor(message: string, options?: ErrorOptions) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, undefined, options)
    this.name = 'ConfigurationError'
  }
}

export class BackendCallError extends GenerationError {
  readonly httpStatus?: number

  constructor(message: string, payload?: unknown, httpStatus?: number, options?: ErrorOptions) {
    super(ERROR_CODES.BACKEND_CALL_ERROR, message, payload, options)
    this.name = 'BackendCallError'
    this.httpStatus = httpStatus
  }
}

export class TerminalTaskFailure extends GenerationError {
  readonly status: TerminalFailureStatus
  readonly taskId?: string

  constructor(status: TerminalFailureStatus, taskId: string | undefined, payload: unknown) {
    super(
      ERROR_CODES.TERMINAL_TASK_FAILURE,
      `Task ${taskId ?? '(no id)'} ended with status ${status}`,
      payload,
    )
    this.name = 'TerminalTaskFailure'
    this.status = status
    this.taskId = taskId
  }
}

export class ResponseParseError extends GenerationError {
  constructor(message: string, payload: unknown, options?: ErrorOptions) {
    super(ERROR_CODES.RESPONSE_PARSE_ERROR, message, payload, options)
    this.name = 'ResponseParseError'
  }
}

export class EmptyResultError extends GenerationError {
  constructor(taskId: string | undefined, payload: unknown) {
    super(
      ERROR_CODES.EMPTY_RESULT,
      `Task ${taskId ?? '(no id)'} succeeded but returned no artifacts`,
      payload,
    )
    this.name = 'EmptyResultError'
  }
}

/** Capability registry assembled with conflicting entries. A programming error. */
export class RegistryConfigurationError extends GenerationError {
  constructor(message: string) {
    super(ERROR_CODES.REGISTRY_CONFIGURATION_ERROR, message)
    this.name = 'RegistryConfigurationError'
  }
}

export function isGenerationError(err: unknown): err is GenerationError {
  return err instanceof GenerationError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
