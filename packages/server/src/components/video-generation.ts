import { z } from 'zod'
import { config } from '../config.js'
import type { PayloadTemplate } from '../lib/providers/field-mapping.js'
import { HttpAdapter } from '../lib/providers/http-adapter.js'
import type { ComponentDeps } from './base.js'
import {
  negativePromptField,
  promptExtendField,
  promptField,
  seedField,
  watermarkField,
} from './schemas.js'
import { TaskSubmitComponent, VideoFetchComponent } from './task-components.js'

// Wan 2.6 video models share one REST endpoint; each capability below is a
// schema plus a field table.

const durationField = z.number().int().optional().describe('Clip length in seconds: 5 or 10.')
const shotTypeField = z
  .string()
  .optional()
  .describe("'single' or 'multi' shot. Takes precedence over shot hints in the prompt.")

// ─── Text to video ───

const textToVideoInputSchema = z.object({
  prompt: promptField,
  negative_prompt: negativePromptField,
  audio_url: z.string().optional().describe('Optional soundtrack URL to sync the video with.'),
  size: z.string().optional().describe("Output size as 'width*height', e.g. '1280*720'."),
  duration: durationField,
  prompt_extend: promptExtendField,
  shot_type: shotTypeField,
  watermark: watermarkField,
  seed: seedField,
})

const textToVideoTemplate: PayloadTemplate<z.output<typeof textToVideoInputSchema>> = {
  fields: [
    { from: 'prompt', to: 'prompt', target: 'input' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'input' },
    { from: 'audio_url', to: 'audio_url', target: 'input' },
    { from: 'size', to: 'size', target: 'parameters' },
    { from: 'duration', to: 'duration', target: 'parameters' },
    { from: 'prompt_extend', to: 'prompt_extend', target: 'parameters' },
    { from: 'shot_type', to: 'shot_type', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
  ],
}

export class TextToVideoSubmit extends TaskSubmitComponent<typeof textToVideoInputSchema> {
  readonly name = 'modelstudio_text_to_video_wan26_submit_task'
  readonly description =
    '[wan2.6] Submit a text-to-video job (wan2.6-t2v). Returns a task_id; fetch the ' +
    'result with modelstudio_wan_video_fetch.'
  readonly inputSchema = textToVideoInputSchema

  protected readonly resource = 'video-synthesis' as const
  protected readonly defaultModel = config.models.textToVideo
  protected readonly template = textToVideoTemplate

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new HttpAdapter())
  }
}

// ─── Image to video ───

const imageToVideoInputSchema = z.object({
  img_url: z.string().min(1).describe('First frame image: public URL or Base64.'),
  prompt: z.string().optional().describe('Motion to apply to the image.'),
  negative_prompt: negativePromptField,
  audio_url: z.string().optional().describe('Optional soundtrack URL to sync the video with.'),
  resolution: z.string().optional().describe("Output resolution: '720P' or '1080P'."),
  duration: durationField,
  prompt_extend: promptExtendField,
  shot_type: shotTypeField,
  watermark: watermarkField,
  seed: seedField,
})

const imageToVideoTemplate: PayloadTemplate<z.output<typeof imageToVideoInputSchema>> = {
  fields: [
    { from: 'img_url', to: 'img_url', target: 'input' },
    { from: 'prompt', to: 'prompt', target: 'input' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'input' },
    { from: 'audio_url', to: 'audio_url', target: 'input' },
    { from: 'resolution', to: 'resolution', target: 'parameters' },
    { from: 'duration', to: 'duration', target: 'parameters' },
    { from: 'prompt_extend', to: 'prompt_extend', target: 'parameters' },
    { from: 'shot_type', to: 'shot_type', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
  ],
}

export class ImageToVideoSubmit extends TaskSubmitComponent<typeof imageToVideoInputSchema> {
  readonly name = 'modelstudio_image_to_video_wan26_submit_task'
  readonly description =
    '[wan2.6] Submit an image-to-video job (wan2.6-i2v) animating a first-frame image. ' +
    'Returns a task_id; fetch the result with modelstudio_wan_video_fetch.'
  readonly inputSchema = imageToVideoInputSchema

  protected readonly resource = 'video-synthesis' as const
  protected readonly defaultModel = config.models.imageToVideo
  protected readonly template = imageToVideoTemplate

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new HttpAdapter())
  }
}

// ─── Reference video to video ───

const videoToVideoInputSchema = z.object({
  prompt: promptField.describe(
    'Prompt describing the new video. Refer to the reference characters as character1, character2, ...',
  ),
  reference_video_urls: z
    .array(z.string().min(1))
    .min(1)
    .max(3)
    .describe(
      'One to three reference video URLs, one character each. Order defines character1, character2, ...',
    ),
  negative_prompt: negativePromptField,
  size: z.string().default('1920*1080').describe("Output size as 'width*height'."),
  duration: z.number().int().default(5).describe('Clip length in seconds: 5 or 10.'),
  shot_type: z.string().default('single').describe("'single' or 'multi' shot."),
  watermark: z.boolean().default(false).describe("Add the 'AI generated' watermark."),
  seed: seedField,
})

const videoToVideoTemplate: PayloadTemplate<z.output<typeof videoToVideoInputSchema>> = {
  fields: [
    { from: 'prompt', to: 'prompt', target: 'input' },
    { from: 'reference_video_urls', to: 'reference_video_urls', target: 'input' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'input' },
    { from: 'size', to: 'size', target: 'parameters' },
    { from: 'duration', to: 'duration', target: 'parameters' },
    { from: 'shot_type', to: 'shot_type', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
  ],
}

export class VideoToVideoSubmit extends TaskSubmitComponent<typeof videoToVideoInputSchema> {
  readonly name = 'modelstudio_video_to_video_wan26_submit_task'
  readonly description =
    '[wan2.6] Submit a reference video-to-video job (wan2.6-r2v) that casts the characters ' +
    'of the reference clips in a new video. Returns a task_id to poll.'
  readonly inputSchema = videoToVideoInputSchema

  protected readonly resource = 'video-synthesis' as const
  protected readonly defaultModel = config.models.videoToVideo
  protected readonly template = videoToVideoTemplate

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new HttpAdapter())
  }
}

// ─── Fetch ───

export class WanVideoFetch extends VideoFetchComponent {
  readonly name = 'modelstudio_wan_video_fetch'
  readonly description =
    'Look up any Wan video task (text, image or reference video to video) by task_id. ' +
    'Poll until task_status is SUCCEEDED; video_url is valid for 24 hours.'

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new HttpAdapter())
  }
}
