import { z } from 'zod'
import { ARTIFACT_URL_TTL_HOURS, TASK_STATUSES } from '@genmedia/shared'

const taskId = z.string().min(1).describe('Task ID issued by the provider on submission.')
const taskStatus = z
  .enum(TASK_STATUSES)
  .describe(
    'PENDING: queued, RUNNING: processing, SUCCEEDED: done, FAILED: failed, ' +
      'CANCELED: canceled, UNKNOWN: the provider could not classify the task',
  )
const requestId = z.string().min(1).describe('Request ID for log and trace correlation.')

export const taskSubmitOutputSchema = z.object({
  task_id: taskId,
  task_status: taskStatus,
  request_id: requestId,
})

export const taskFetchInputSchema = z.object({
  task_id: taskId.describe('ID of the task to look up.'),
})

export const videoFetchOutputSchema = z.object({
  task_id: taskId,
  task_status: taskStatus,
  request_id: requestId,
  video_url: z
    .string()
    .optional()
    .describe(
      `Public URL of the generated video, present once SUCCEEDED. Expires after ${ARTIFACT_URL_TTL_HOURS} hours.`,
    ),
  artifacts: z
    .array(z.string())
    .optional()
    .describe('Every artifact reference in the reply, in order. Present once SUCCEEDED.'),
})

export const imageResultsOutputSchema = z.object({
  results: z.array(z.string()).min(1).describe('Generated image URLs.'),
  request_id: requestId,
})

export const speechOutputSchema = z.object({
  audio_url: z
    .string()
    .min(1)
    .describe(`URL of the synthesized audio. Expires after ${ARTIFACT_URL_TTL_HOURS} hours.`),
  request_id: requestId,
})

// ─── Shared input fields ───

export const promptField = z.string().min(1).describe('Positive prompt describing the desired content.')

export const negativePromptField = z
  .string()
  .optional()
  .describe('Negative prompt listing content to avoid, e.g. "blurry, watermark".')

export const seedField = z
  .number()
  .int()
  .min(0)
  .max(2_147_483_647)
  .optional()
  .describe('Random seed in [0, 2147483647]; improves reproducibility without guaranteeing it.')

export const promptExtendField = z
  .boolean()
  .optional()
  .describe('Let the provider rewrite the prompt for better results.')

export const watermarkField = z
  .boolean()
  .optional()
  .describe('Add the provider watermark to the output.')
