import type { z } from 'zod'
import type { GenerationResult, ProviderResource } from '@genmedia/shared'
import type { PayloadTemplate } from '../lib/providers/field-mapping.js'
import type { Capability } from '../lib/providers/task-gateway.js'
import { Component, type RunOptions } from './base.js'
import { taskFetchInputSchema, taskSubmitOutputSchema, videoFetchOutputSchema } from './schemas.js'

/** Everything a capability needs besides its schemas: one table entry. */
abstract class CapabilityComponent<
  TIn extends z.AnyZodObject,
  TOut extends z.ZodTypeAny,
> extends Component<TIn, TOut> {
  protected abstract readonly resource: ProviderResource
  protected abstract readonly defaultModel: string
  protected abstract readonly template: PayloadTemplate<z.output<TIn>>

  protected capability(options: RunOptions): Capability<z.output<TIn>> {
    return {
      resource: this.resource,
      model: options.model ?? this.defaultModel,
      template: this.template,
    }
  }
}

/** Submits an asynchronous job and answers with its task handle. */
export abstract class TaskSubmitComponent<TIn extends z.AnyZodObject> extends CapabilityComponent<
  TIn,
  typeof taskSubmitOutputSchema
> {
  readonly outputSchema = taskSubmitOutputSchema

  protected async execute(
    args: z.output<TIn>,
    options: RunOptions,
  ): Promise<z.input<typeof taskSubmitOutputSchema>> {
    const handle = await this.gateway.submit(this.capability(options), args, this.callOptions(options))
    return { task_id: handle.taskId, task_status: handle.status, request_id: handle.requestId }
  }
}

/** Runs a one-shot generation and shapes the result. */
export abstract class GenerationComponent<
  TIn extends z.AnyZodObject,
  TOut extends z.ZodTypeAny,
> extends CapabilityComponent<TIn, TOut> {
  protected abstract toOutput(result: GenerationResult): z.input<TOut>

  protected async execute(args: z.output<TIn>, options: RunOptions): Promise<z.input<TOut>> {
    const result = await this.gateway.invoke(this.capability(options), args, this.callOptions(options))
    return this.toOutput(result)
  }
}

/**
 * Reads a video task once. Non-terminal states are returned as-is without a
 * video URL; callers poll until SUCCEEDED.
 */
export abstract class VideoFetchComponent extends Component<
  typeof taskFetchInputSchema,
  typeof videoFetchOutputSchema
> {
  readonly inputSchema = taskFetchInputSchema
  readonly outputSchema = videoFetchOutputSchema

  protected async execute(
    args: z.output<typeof taskFetchInputSchema>,
    options: RunOptions,
  ): Promise<z.input<typeof videoFetchOutputSchema>> {
    const outcome = await this.gateway.fetch(args.task_id, this.callOptions(options))
    if (outcome.kind === 'pending') {
      const { handle } = outcome
      return { task_id: handle.taskId, task_status: handle.status, request_id: handle.requestId }
    }
    const { result } = outcome
    return {
      task_id: result.taskId ?? args.task_id,
      task_status: result.status,
      request_id: result.requestId,
      video_url: result.artifacts[0],
      artifacts: [...result.artifacts],
    }
  }
}
