import type { ProviderPayload } from './types.js'

export type MappingTarget = 'input' | 'parameters' | 'content'

/**
 * One row of a capability's payload table: copy `request[from]` to
 * `payload.<target>.<to>`, optionally through `transform`.
 *
 * `content` rows become items of a single user message
 * (`input.messages[0].content`); an array value yields one item per element.
 */
export interface FieldMapping<TRequest> {
  from: keyof TRequest & string
  to: string
  target: MappingTarget
  /** Returning undefined drops the field. */
  transform?: (value: unknown) => unknown
}

export interface PayloadTemplate<TRequest> {
  fields: readonly FieldMapping<TRequest>[]
  /** Sent on every call, before mapped fields (which win on conflict). */
  fixedParameters?: Record<string, unknown>
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === ''
}

export function buildPayload<TRequest extends object>(
  model: string,
  template: PayloadTemplate<TRequest>,
  request: TRequest,
): ProviderPayload {
  const input: Record<string, unknown> = {}
  const parameters: Record<string, unknown> = { ...template.fixedParameters }
  const content: Record<string, unknown>[] = []

  for (const field of template.fields) {
    const raw: unknown = request[field.from]
    if (isAbsent(raw)) continue
    const value = field.transform ? field.transform(raw) : raw
    if (isAbsent(value)) continue

    switch (field.target) {
      case 'input':
        input[field.to] = value
        break
      case 'parameters':
        parameters[field.to] = value
        break
      case 'content':
        for (const item of Array.isArray(value) ? value : [value]) {
          content.push({ [field.to]: item })
        }
        break
    }
  }

  if (content.length > 0) {
    input.messages = [{ role: 'user', content }]
  }
  return { model, input, parameters }
}

// ─── Transforms ───

/** Accept booleans and the strings "true"/"1" (case-insensitive); anything else is false. */
export function toBoolean(value: unknown): boolean {
  if (typeof value === 'string') return ['true', '1'].includes(value.trim().toLowerCase())
  return Boolean(value)
}

/** Drop the field when it equals `skipped` (e.g. a provider default). */
export function unless(skipped: unknown): (value: unknown) => unknown {
  return (value) => (value === skipped ? undefined : value)
}
