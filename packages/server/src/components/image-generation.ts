import { z } from 'zod'
import type { GenerationResult } from '@genmedia/shared'
import { config } from '../config.js'
import { ClientAdapter } from '../lib/providers/client-adapter.js'
import { toBoolean, unless, type PayloadTemplate } from '../lib/providers/field-mapping.js'
import type { ComponentDeps } from './base.js'
import {
  imageResultsOutputSchema,
  negativePromptField,
  promptExtendField,
  promptField,
  seedField,
  watermarkField,
} from './schemas.js'
import { GenerationComponent } from './task-components.js'

const imageCountField = z
  .number()
  .int()
  .min(1)
  .max(4)
  .default(1)
  .describe('Number of images to generate, 1 to 4.')

const sizeField = z
  .string()
  .optional()
  .describe("Output size as 'width*height'. Defaults to 1280*1280.")

function toImageResults(result: GenerationResult): z.input<typeof imageResultsOutputSchema> {
  return { results: [...result.artifacts], request_id: result.requestId }
}

// ─── Text to image ───

const imageGenerationInputSchema = z.object({
  prompt: promptField.describe('Detailed description of the image. Truncated past 800 characters.'),
  negative_prompt: negativePromptField,
  size: sizeField,
  prompt_extend: promptExtendField,
  n: imageCountField,
  seed: seedField,
  watermark: z
    .union([z.boolean(), z.string()])
    .optional()
    .describe('Add the provider watermark. Also accepts "true"/"1".'),
})

const imageGenerationTemplate: PayloadTemplate<z.output<typeof imageGenerationInputSchema>> = {
  fields: [
    { from: 'prompt', to: 'text', target: 'content' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'parameters' },
    // 1024*1024 is the provider default; leave it out.
    { from: 'size', to: 'size', target: 'parameters', transform: unless('1024*1024') },
    { from: 'n', to: 'n', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters', transform: toBoolean },
    { from: 'prompt_extend', to: 'prompt_extend', target: 'parameters' },
  ],
}

export class ImageGenerationWan26 extends GenerationComponent<
  typeof imageGenerationInputSchema,
  typeof imageResultsOutputSchema
> {
  readonly name = 'modelstudio_wanx26_image_generation'
  readonly description =
    '[wan2.6] Text-to-image (wan2.6-t2i). Generates images from a text description and ' +
    'returns their URLs. Any aspect ratio with an area between 768*768 and 1440*1440.'
  readonly inputSchema = imageGenerationInputSchema
  readonly outputSchema = imageResultsOutputSchema

  protected readonly resource = 'multimodal-generation' as const
  protected readonly defaultModel = config.models.imageGeneration
  protected readonly template = imageGenerationTemplate

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new ClientAdapter())
  }

  protected toOutput(result: GenerationResult) {
    return toImageResults(result)
  }
}

// ─── Image edit ───

const imageEditInputSchema = z.object({
  prompt: promptField,
  images: z
    .array(z.string().min(1))
    .min(1)
    .max(4)
    .describe('One to four reference image URLs to edit, restyle or keep consistent.'),
  negative_prompt: negativePromptField,
  size: sizeField,
  prompt_extend: promptExtendField,
  seed: seedField,
  watermark: watermarkField,
  n: imageCountField,
})

const imageEditTemplate: PayloadTemplate<z.output<typeof imageEditInputSchema>> = {
  fixedParameters: { enable_interleave: false },
  fields: [
    { from: 'prompt', to: 'text', target: 'content' },
    { from: 'images', to: 'image', target: 'content' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'parameters' },
    { from: 'size', to: 'size', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters' },
    { from: 'prompt_extend', to: 'prompt_extend', target: 'parameters' },
    { from: 'n', to: 'n', target: 'parameters' },
  ],
}

export class ImageEditWan26 extends GenerationComponent<
  typeof imageEditInputSchema,
  typeof imageResultsOutputSchema
> {
  readonly name = 'modelstudio_image_edit_wan26'
  readonly description =
    '[wan2.6] Image editing (wan2.6-image). Edits, restyles or generates subject-consistent ' +
    'images from one to four inputs and returns the edited image URLs.'
  readonly inputSchema = imageEditInputSchema
  readonly outputSchema = imageResultsOutputSchema

  protected readonly resource = 'multimodal-generation' as const
  protected readonly defaultModel = config.models.imageEdit
  protected readonly template = imageEditTemplate

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new ClientAdapter())
  }

  protected toOutput(result: GenerationResult) {
    return toImageResults(result)
  }
}
