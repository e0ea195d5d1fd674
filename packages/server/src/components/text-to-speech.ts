import { z } from 'zod'
import type { GenerationResult } from '@genmedia/shared'
import { config } from '../config.js'
import type { PayloadTemplate } from '../lib/providers/field-mapping.js'
import { HttpAdapter } from '../lib/providers/http-adapter.js'
import type { ComponentDeps } from './base.js'
import { speechOutputSchema } from './schemas.js'
import { GenerationComponent } from './task-components.js'

const textToSpeechInputSchema = z.object({
  text: z.string().min(1).describe('Text to synthesize.'),
  voice: z.string().default('Cherry').describe('Voice name, e.g. Cherry, Serena, Ethan, Chelsie.'),
})

const template: PayloadTemplate<z.output<typeof textToSpeechInputSchema>> = {
  fields: [
    { from: 'text', to: 'text', target: 'input' },
    { from: 'voice', to: 'voice', target: 'input' },
  ],
}

export class QwenTextToSpeech extends GenerationComponent<
  typeof textToSpeechInputSchema,
  typeof speechOutputSchema
> {
  readonly name = 'modelstudio_qwen_text_to_speech'
  readonly description =
    'Speech synthesis with Qwen TTS. Converts Chinese or English text to speech and ' +
    'returns the audio URL.'
  readonly inputSchema = textToSpeechInputSchema
  readonly outputSchema = speechOutputSchema

  protected readonly resource = 'multimodal-generation' as const
  protected readonly defaultModel = config.models.textToSpeech
  protected readonly template = template

  constructor(deps: ComponentDeps = {}) {
    super(deps, () => new HttpAdapter())
  }

  protected toOutput(result: GenerationResult) {
    return { audio_url: result.artifacts[0], request_id: result.requestId }
  }
}
