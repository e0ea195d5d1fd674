import { componentNameSchema, type CapabilityBundle, type CapabilityExport } from '@genmedia/shared'
import {
  ImageEditWan26,
  ImageGenerationWan26,
  ImageToVideoSubmit,
  KeyframeToVideoFetch,
  KeyframeToVideoSubmit,
  QwenTextToSpeech,
  TextToVideoSubmit,
  VideoToVideoSubmit,
  WanVideoFetch,
  type AnyComponent,
  type ComponentDeps,
} from './components/index.js'
import { RegistryConfigurationError } from './lib/errors.js'

export interface BundleDefinition {
  instructions: string
  components: readonly AnyComponent[]
}

export interface RegisteredBundle {
  readonly name: string
  readonly instructions: string
  readonly components: readonly AnyComponent[]
}

/**
 * Named bundles of components, fixed at construction.
 *
 * Component names are lower snake_case and unique across every bundle; a
 * violation is a programming error and fails construction with a
 * RegistryConfigurationError.
 */
export class CapabilityRegistry {
  private readonly bundles = new Map<string, RegisteredBundle>()
  private readonly components = new Map<string, AnyComponent>()

  constructor(definitions: Record<string, BundleDefinition>) {
    for (const [name, definition] of Object.entries(definitions)) {
      for (const component of definition.components) {
        if (!componentNameSchema.safeParse(component.name).success) {
          throw new RegistryConfigurationError(
            `Component name "${component.name}" must be lower snake_case (bundle "${name}")`,
          )
        }
        if (this.components.has(component.name)) {
          throw new RegistryConfigurationError(
            `Component "${component.name}" is registered more than once (bundle "${name}")`,
          )
        }
        this.components.set(component.name, component)
      }
      this.bundles.set(
        name,
        Object.freeze({
          name,
          instructions: definition.instructions,
          components: Object.freeze([...definition.components]),
        }),
      )
    }
    Object.freeze(this)
  }

  get(name: string): RegisteredBundle | undefined {
    return this.bundles.get(name)
  }

  /** Bundle names in registration order. */
  list(): string[] {
    return Array.from(this.bundles.keys())
  }

  entries(): RegisteredBundle[] {
    return Array.from(this.bundles.values())
  }

  findComponent(name: string): AnyComponent | undefined {
    return this.components.get(name)
  }

  toExport(): CapabilityExport {
    const out: Record<string, CapabilityBundle> = {}
    for (const bundle of this.bundles.values()) {
      out[bundle.name] = Object.freeze({
        instructions: bundle.instructions,
        components: Object.freeze(bundle.components.map((c) => c.toSpec())),
      })
    }
    return Object.freeze(out)
  }
}

// ─── Built-in bundles ───

export function createDefaultRegistry(deps: ComponentDeps = {}): CapabilityRegistry {
  return new CapabilityRegistry({
    modelstudio_wan_video: {
      instructions:
        'Video generation on the Wan large models from a first and a last frame. Jobs are ' +
        'asynchronous: submit, then poll the matching fetch tool with the returned task_id.',
      components: [new KeyframeToVideoSubmit(deps), new KeyframeToVideoFetch(deps)],
    },
    modelstudio_qwen_text_to_speech: {
      instructions: 'Speech synthesis on the Qwen large models for Chinese and English text.',
      components: [new QwenTextToSpeech(deps)],
    },
    modelstudio_wan26_media: {
      instructions:
        'Image and video generation on the Wan 2.6 models: text-to-image, image editing, ' +
        'text-to-video, image-to-video and reference video-to-video. Video jobs are ' +
        'asynchronous: submit, then poll modelstudio_wan_video_fetch with the returned task_id.',
      components: [
        new ImageGenerationWan26(deps),
        new TextToVideoSubmit(deps),
        new ImageToVideoSubmit(deps),
        new WanVideoFetch(deps),
        new ImageEditWan26(deps),
        new VideoToVideoSubmit(deps),
      ],
    },
  })
}

export const defaultRegistry = createDefaultRegistry()
