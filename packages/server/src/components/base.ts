import type { z } from 'zod'
import type { ComponentSpec, CorrelationContext, TraceHook } from '@genmedia/shared'
import type { CredentialResolver } from '../lib/credentials.js'
import { zodToJsonSchema } from '../lib/providers/schema-utils.js'
import { AsyncTaskGateway, type CallOptions } from '../lib/providers/task-gateway.js'
import type { BackendAdapter } from '../lib/providers/types.js'

export interface RunOptions {
  context?: CorrelationContext
  trace?: TraceHook
  /** Overrides the configured model name for this call. */
  model?: string
}

export interface ComponentDeps {
  adapter?: BackendAdapter
  credentials?: CredentialResolver
}

/**
 * A single named, typed, asynchronous operation.
 *
 * `run` validates the input against `inputSchema`, delegates to `execute`
 * and validates what comes back against `outputSchema`. Failures from the
 * gateway and adapters propagate unchanged.
 */
export abstract class Component<TIn extends z.AnyZodObject, TOut extends z.ZodTypeAny> {
  abstract readonly name: string
  abstract readonly description: string
  abstract readonly inputSchema: TIn
  abstract readonly outputSchema: TOut

  protected readonly gateway: AsyncTaskGateway

  constructor(deps: ComponentDeps, defaultAdapter: () => BackendAdapter) {
    this.gateway = new AsyncTaskGateway({
      adapter: deps.adapter ?? defaultAdapter(),
      credentials: deps.credentials,
    })
  }

  protected abstract execute(input: z.output<TIn>, options: RunOptions): Promise<z.input<TOut>>

  async run(input: z.input<TIn>, options: RunOptions = {}): Promise<z.output<TOut>> {
    const args = this.inputSchema.parse(input)
    const output = await this.execute(args, options)
    return this.outputSchema.parse(output)
  }

  toSpec(): ComponentSpec {
    return {
      name: this.name,
      description: this.description,
      inputSchema: zodToJsonSchema(this.inputSchema),
      outputSchema: zodToJsonSchema(this.outputSchema),
    }
  }

  /** Gateway options for one run, labelled with this component's name. */
  protected callOptions(options: RunOptions): CallOptions {
    return { context: options.context, trace: options.trace, label: this.name }
  }
}

export type AnyComponent = Component<z.AnyZodObject, z.ZodTypeAny>
