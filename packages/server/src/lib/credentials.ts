import {
  PROVIDER_API_KEY_ENV,
  type CorrelationContext,
  type ProviderName,
} from '@genmedia/shared'
import { ConfigurationError } from './errors.js'

/** Resolves the credential for a provider. Must throw ConfigurationError when none is usable. */
export type CredentialResolver = (provider: ProviderName, context: CorrelationContext) => string

function headerKey(provider: ProviderName): string {
  return `x-${provider}-api-key`
}

function findHeader(
  headers: CorrelationContext['headers'],
  name: string,
): string | undefined {
  if (!headers) return undefined
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) return value
  }
  return undefined
}

/**
 * Lookup order: explicit `context.apiKey`, then the `x-<provider>-api-key`
 * request header, then the provider's environment variable.
 */
export const getApiKey: CredentialResolver = (provider, context) => {
  const envName = PROVIDER_API_KEY_ENV[provider]
  const candidate =
    context.apiKey ?? findHeader(context.headers, headerKey(provider)) ?? process.env[envName]
  const key = candidate?.trim()
  if (!key) {
    throw new ConfigurationError(`Please set a valid ${envName}`)
  }
  return key
}
