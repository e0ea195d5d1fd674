import { TERMINAL_FAILURE_STATUSES, type TaskStatus, type TerminalFailureStatus } from './constants.js'

// Provider vocabularies seen across the supported backends, upper-cased.
const STATUS_ALIASES: Record<string, TaskStatus> = {
  PENDING: 'PENDING',
  QUEUED: 'PENDING',
  QUEUING: 'PENDING',
  SUBMITTED: 'PENDING',
  WAITING: 'PENDING',
  RUNNING: 'RUNNING',
  PROCESSING: 'RUNNING',
  IN_PROGRESS: 'RUNNING',
  SUCCEEDED: 'SUCCEEDED',
  SUCCESS: 'SUCCEEDED',
  SUCCEED: 'SUCCEEDED',
  COMPLETED: 'SUCCEEDED',
  FAILED: 'FAILED',
  FAILURE: 'FAILED',
  ERROR: 'FAILED',
  CANCELED: 'CANCELED',
  CANCELLED: 'CANCELED',
  UNKNOWN: 'UNKNOWN',
}

/**
 * Map a provider status string onto the closed task status set.
 * Anything unrecognized, including an absent status, becomes UNKNOWN.
 */
export function normalizeStatus(raw: string | undefined | null): TaskStatus {
  if (!raw) return 'UNKNOWN'
  const key = raw.trim().toUpperCase().replace(/[\s-]+/g, '_')
  return STATUS_ALIASES[key] ?? 'UNKNOWN'
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'SUCCEEDED' || isTerminalFailure(status)
}

export function isTerminalFailure(status: TaskStatus): status is TerminalFailureStatus {
  return TERMINAL_FAILURE_STATUSES.some((failure) => failure === status)
}
