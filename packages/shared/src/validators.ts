import { z } from 'zod'
import { COMPONENT_NAME_PATTERN, MAX_COMPONENT_NAME_LENGTH, TASK_STATUSES } from './constants.js'

export const taskStatusSchema = z.enum(TASK_STATUSES)

export const componentNameSchema = z
  .string()
  .min(1)
  .max(MAX_COMPONENT_NAME_LENGTH)
  .regex(COMPONENT_NAME_PATTERN, 'Component names are lower snake_case')

// ─── Provider reply bodies ───

// Only the fields the gateway branches on are typed strictly. Artifact-bearing
// fields stay `unknown` and are walked by the reply parser, which tolerates
// any shape. A null or empty task_id/task_status reads as absent.
export const taskOutputSchema = z
  .object({
    task_id: z.string().nullish(),
    task_status: z.string().nullish(),
    video_url: z.unknown().optional(),
    image_url: z.unknown().optional(),
    results: z.unknown().optional(),
    choices: z.unknown().optional(),
    audio: z.unknown().optional(),
    code: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough()
export type TaskOutput = z.infer<typeof taskOutputSchema>

export const restReplySchema = z
  .object({
    output: z.unknown().optional(),
    request_id: z.string().optional(),
    code: z.string().optional(),
    message: z.string().optional(),
    usage: z.unknown().optional(),
  })
  .passthrough()
export type RestReplyBody = z.infer<typeof restReplySchema>

export const clientReplySchema = z.object({
  statusCode: z.number().int(),
  requestId: z.string().optional(),
  code: z.string().optional(),
  message: z.string().optional(),
  output: z.unknown().optional(),
  usage: z.unknown().optional(),
})
export type ClientReply = z.infer<typeof clientReplySchema>

// ─── Correlation ───

export const correlationContextSchema = z.object({
  requestId: z.string().min(1).optional(),
  apiKey: z.string().optional(),
  headers: z.record(z.string(), z.string().optional()).optional(),
})
