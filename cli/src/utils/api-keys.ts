/**
 * API Keys Utility
 *
 * Centralized access to API keys with validation.
 */

import { ConfigError } from './errors'

export type ApiKeyName = 'DRVTRIAGE_API_KEY' | 'OPENROUTER_API_KEY'

/**
 * Get an API key from the environment, returning null if not set
 */
export function getApiKey(env: Record<string, string | undefined>, name: ApiKeyName): string | null {
  const value = env[name]
  return value && value.trim().length > 0 ? value.trim() : null
}

/**
 * Require the configured LLM key, throwing if it is not set
 */
export function requireApiKey(apiKey: string | undefined): string {
  if (!apiKey || apiKey.trim().length === 0) {
    throw new ConfigError('No LLM API key: set DRVTRIAGE_API_KEY or OPENROUTER_API_KEY, or "apiKey" in config.json')
  }
  return apiKey.trim()
}
