import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { ZodRawShape } from 'zod'
import { correlationContextSchema, type CorrelationContext, type TraceHook } from '@genmedia/shared'
import { config } from '../config.js'
import type { AnyComponent } from '../components/index.js'
import { ConfigurationError, isGenerationError } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
import { version } from '../lib/version.js'
import { defaultRegistry, type CapabilityRegistry } from '../registry.js'

const log = createLogger('MCP')

export interface BundleServerOptions {
  registry?: CapabilityRegistry
  /** Server name announced to clients; defaults to GENMEDIA_MCP_NAME. */
  name?: string
  /** Correlation context applied to every tool call, e.g. an API key from the host. */
  context?: CorrelationContext
  trace?: TraceHook
}

function textResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: 'text', text }], isError }
}

function registerComponent(server: McpServer, component: AnyComponent, opts: BundleServerOptions) {
  server.tool<ZodRawShape>(component.name, component.description, component.inputSchema.shape, async (args) => {
    try {
      const output = await component.run(args, { context: opts.context, trace: opts.trace })
      return textResult(JSON.stringify(output))
    } catch (err) {
      if (!isGenerationError(err)) throw err
      log.warn(`${component.name} failed: ${err.message}`, { code: err.code })
      return textResult(`${err.code}: ${err.message}`, true)
    }
  })
}

/**
 * Build an MCP server exposing every component of one bundle as a tool.
 * The caller connects it to a transport.
 */
export function createBundleServer(bundleName: string, opts: BundleServerOptions = {}): McpServer {
  const registry = opts.registry ?? defaultRegistry
  const context = correlationContextSchema.parse(opts.context ?? {})
  const bundle = registry.get(bundleName)
  if (!bundle) {
    throw new ConfigurationError(
      `Unknown bundle "${bundleName}". Available: ${registry.list().join(', ')}`,
    )
  }

  const server = new McpServer(
    { name: opts.name ?? config.mcp.serverName, version },
    { instructions: bundle.instructions },
  )
  for (const component of bundle.components) {
    registerComponent(server, component, { ...opts, context })
  }
  log.info(`Bundle "${bundle.name}" ready with ${bundle.components.length} tools`)
  return server
}
