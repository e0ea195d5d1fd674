import { z } from 'zod'
import { config } from '../config.js'
import { ClientAdapter } from '../lib/providers/client-adapter.js'
import type { PayloadTemplate } from '../lib/providers/field-mapping.js'
import type { ComponentDeps } from './base.js'
import {
  negativePromptField,
  promptExtendField,
  seedField,
  watermarkField,
} from './schemas.js'
import { TaskSubmitComponent, VideoFetchComponent } from './task-components.js'

const keyframeToVideoInputSchema = z.object({
  first_frame_url: z.string().min(1).describe('First frame image: public URL or Base64.'),
  last_frame_url: z.string().min(1).describe('Last frame image: public URL or Base64.'),
  prompt: z
    .string()
    .optional()
    .describe('Motion or change to happen between the frames, e.g. "slow push-in, leaves in the wind".'),
  negative_prompt: negativePromptField,
  resolution: z.string().optional().describe("Output resolution: '480P', '720P' or '1080P'."),
  template: z.string().optional().describe('Effect template name supported by the model.'),
  prompt_extend: promptExtendField,
  watermark: watermarkField,
  seed: seedField,
})

type KeyframeToVideoInput = z.output<typeof keyframeToVideoInputSchema>

const template: PayloadTemplate<KeyframeToVideoInput> = {
  fields: [
    { from: 'first_frame_url', to: 'first_frame_url', target: 'input' },
    { from: 'last_frame_url', to: 'last_frame_url', target: 'input' },
    { from: 'prompt', to: 'prompt', target: 'input' },
    { from: 'negative_prompt', to: 'negative_prompt', target: 'input' },
    { from: 'resolution', to: 'resolution', target: 'parameters' },
    { from: 'prompt_extend', to: 'prompt_extend', target: 'parameters' },
    { from: 'watermark', to: 'watermark', target: 'parameters' },
    { from: 'seed', to: 'seed', target: 'parameters' },
    { from: 'template', to: 'template', target: 'parameters' },
  ],
}

/** Wan 2.2 first-and-last-frame video: submits through the structured client. */
export class KeyframeToVideoSubmit extends TaskSubmitComponent<typeof keyframeToVideoInputSchema> {
  readonly name = 'modelstudio_image_to_video_fl_wan22_submit_task'
  readonly description =
    '[wan2.2] Submit a keyframe-to-video job (wan2.2-kf2v-flash). Generates a silent clip ' +
    'that moves from the first frame to the last, guided by an optional prompt. ' +
    'Returns a task_id to poll.'
  readonly inputSchema = keyframeToVideoInputSchema

  protected readonly resource = 'video-synthesis' as const
  protected readonly defaultModel = config.models.keyframeToVideo
  protected readonly template = template

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new ClientAdapter())
  }
}

export class KeyframeToVideoFetch extends VideoFetchComponent {
  readonly name = 'modelstudio_image_to_video_by_first_and_last_frame_wan22_fetch_result'
  readonly description =
    'Look up a wan2.2-kf2v-flash keyframe-to-video task. Poll after submission until ' +
    'task_status is SUCCEEDED; video_url is valid for 24 hours.'

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new ClientAdapter())
  }
}
