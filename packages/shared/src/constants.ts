export const TASK_STATUSES = [
  'PENDING',
  'RUNNING',
  'SUCCEEDED',
  'FAILED',
  'CANCELED',
  'UNKNOWN',
] as const
export type TaskStatus = (typeof TASK_STATUSES)[number]

export const TERMINAL_FAILURE_STATUSES = ['FAILED', 'CANCELED'] as const satisfies readonly TaskStatus[]
export type TerminalFailureStatus = (typeof TERMINAL_FAILURE_STATUSES)[number]

export const PROVIDER_NAMES = ['dashscope'] as const
export type ProviderName = (typeof PROVIDER_NAMES)[number]

/** Environment variable holding each provider's API key. */
export const PROVIDER_API_KEY_ENV: Record<ProviderName, string> = {
  dashscope: 'DASHSCOPE_API_KEY',
}

export const TRANSPORT_FAMILIES = ['client', 'rest'] as const
export type TransportFamily = (typeof TRANSPORT_FAMILIES)[number]

export const PROVIDER_RESOURCES = ['video-synthesis', 'multimodal-generation'] as const
export type ProviderResource = (typeof PROVIDER_RESOURCES)[number]

export const MEDIA_KINDS = ['image', 'video', 'audio'] as const
export type MediaKind = (typeof MEDIA_KINDS)[number]

/** Prefixes a bare string must carry to count as an artifact reference. */
export const ARTIFACT_REFERENCE_PREFIXES = ['http://', 'https://', 'oss://', 'data:'] as const

/** Max characters of a provider payload embedded in an error message. */
export const MAX_ERROR_PAYLOAD_LENGTH = 2_000

export const COMPONENT_NAME_PATTERN = /^[a-z][a-z0-9_]*$/
export const MAX_COMPONENT_NAME_LENGTH = 128

// ─── Result artifacts ───

/** Provider-hosted artifact URLs expire after this long; they are never re-hosted. */
export const ARTIFACT_URL_TTL_HOURS = 24
