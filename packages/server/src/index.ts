export { config, type Config } from './config.js'
export * from './components/index.js'
export {
  CapabilityRegistry,
  createDefaultRegistry,
  defaultRegistry,
  type BundleDefinition,
  type RegisteredBundle,
} from './registry.js'
export { createBundleServer, type BundleServerOptions } from './mcp/bundle-server.js'
export { getApiKey, type CredentialResolver } from './lib/credentials.js'
export * from './lib/errors.js'
export { createLogger, type Logger } from './lib/logger.js'
export {
  AsyncTaskGateway,
  type Capability,
  type CallOptions,
  type GatewayOptions,
} from './lib/providers/task-gateway.js'
export { ClientAdapter } from './lib/providers/client-adapter.js'
export { HttpAdapter } from './lib/providers/http-adapter.js'
export {
  DashScopeClient,
  type MediaClient,
  type TransportOptions,
} from './lib/providers/dashscope-client.js'
export { parseReply } from './lib/providers/reply-parser.js'
export {
  buildPayload,
  toBoolean,
  unless,
  type FieldMapping,
  type PayloadTemplate,
} from './lib/providers/field-mapping.js'
export type {
  AdapterReply,
  BackendAdapter,
  CreateCall,
  ProviderPayload,
  RawReply,
} from './lib/providers/types.js'
export { normalizeStatus, isTerminalStatus, isTerminalFailure } from '@genmedia/shared'
