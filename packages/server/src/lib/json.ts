/**
 * JSON helpers for provider reply bodies: depth-limited parsing and
 * narrow accessors for untyped records.
 */

/** Maximum number of elements in an array or keys in an object at any level. */
export const MAX_COLLECTION_SIZE = 1000

/** Nesting limit for provider replies; real replies stay well under 10 levels. */
export const MAX_REPLY_DEPTH = 32

/** Parse JSON with a nesting depth limit and collection size guard. */
export function safeJsonParse(raw: string, maxDepth: number): unknown {
  const result = JSON.parse(raw)
  checkDepth(result, maxDepth, 0)
  return result
}

/**
 * Parse a reply body. Empty bodies become `undefined`; bodies that are not
 * JSON (gateway error pages, plain-text errors) are returned as the raw text
 * so they still reach the caller's error payload.
 */
export function parseReplyBody(text: string): unknown {
  if (!text.trim()) return undefined
  try {
    return safeJsonParse(text, MAX_REPLY_DEPTH)
  } catch {
    return text
  }
}

function checkDepth(value: unknown, maxDepth: number, current: number): void {
  if (current > maxDepth) {
    throw new Error('JSON nesting depth exceeded')
  }
  if (Array.isArray(value)) {
    if (value.length > MAX_COLLECTION_SIZE) {
      throw new Error('JSON collection size exceeded')
    }
    for (const item of value) {
      checkDepth(item, maxDepth, current + 1)
    }
  } else if (isRecord(value)) {
    const keys = Object.keys(value)
    if (keys.length > MAX_COLLECTION_SIZE) {
      throw new Error('JSON collection size exceeded')
    }
    for (const key of keys) {
      checkDepth(value[key], maxDepth, current + 1)
    }
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Return `value` when it is a non-empty string, else undefined. */
export function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}
