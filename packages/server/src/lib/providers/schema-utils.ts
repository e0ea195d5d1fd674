import { z } from 'zod'
import type { JsonSchema } from '@genmedia/shared'

/**
 * Convert a Zod schema to the JSON-Schema-like description advertised to
 * tool-discovery hosts. Covers the constructs component schemas use; not a
 * full JSON Schema implementation.
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): JsonSchema {
  const json = walk(schema)
  // The outermost description wins over one set on a wrapped schema.
  return schema.description ? { ...json, description: schema.description } : json
}

function walk(schema: z.ZodTypeAny): JsonSchema {
  if (schema instanceof z.ZodObject) {
    const properties: Record<string, JsonSchema> = {}
    const required: string[] = []
    const shape: Record<string, z.ZodTypeAny> = schema.shape
    for (const [key, field] of Object.entries(shape)) {
      properties[key] = zodToJsonSchema(field)
      if (!field.isOptional()) required.push(key)
    }
    return { type: 'object', properties, required }
  }

  if (schema instanceof z.ZodString) {
    const result: JsonSchema = { type: 'string' }
    for (const check of schema._def.checks) {
      if (check.kind === 'min') result.minLength = check.value
      if (check.kind === 'max') result.maxLength = check.value
      if (check.kind === 'url') result.format = 'url'
    }
    return result
  }

  if (schema instanceof z.ZodNumber) {
    const result: JsonSchema = { type: 'number' }
    for (const check of schema._def.checks) {
      if (check.kind === 'min') result.minimum = check.value
      if (check.kind === 'max') result.maximum = check.value
      if (check.kind === 'int') result.type = 'integer'
    }
    return result
  }

  if (schema instanceof z.ZodEnum) {
    const values: string[] = schema.options
    return { type: 'string', enum: values }
  }

  if (schema instanceof z.ZodDefault) {
    return { ...zodToJsonSchema(schema._def.innerType), default: schema._def.defaultValue() }
  }

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodToJsonSchema(schema.unwrap())
  }

  if (schema instanceof z.ZodEffects) {
    return zodToJsonSchema(schema.innerType())
  }

  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options
    return { anyOf: options.map((option) => zodToJsonSchema(option)) }
  }

  if (schema instanceof z.ZodLiteral) {
    return { const: schema.value }
  }

  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' }
  }

  if (schema instanceof z.ZodArray) {
    const result: JsonSchema = { type: 'array', items: zodToJsonSchema(schema.element) }
    if (schema._def.minLength) result.minItems = schema._def.minLength.value
    if (schema._def.maxLength) result.maxItems = schema._def.maxLength.value
    return result
  }

  return {}
}
