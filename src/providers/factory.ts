/**
 * Provider factory.
 * Resolves an LLMProviderConfig into a concrete LLMProvider instance.
 * Handles API key resolution from environment variables.
 */
import type { LLMProviderConfig } from '@/core/types.js';
import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import { createOpenAIProvider } from './openai.js';
import type { LLMProvider } from './types.js';

const logger = createLogger({ name: 'provider-factory' });

export const LMSTUDIO_DEFAULT_BASE_URL = 'http://localhost:1234/v1';
export const OLLAMA_DEFAULT_BASE_URL = 'http://localhost:11434/v1';

/**
 * Resolve an API key from an environment variable name.
 * Never logs or returns the actual key value, only whether it was found.
 */
function resolveApiKey(envVar: string | undefined, provider: string): string {
  if (!envVar) {
    throw new ProviderError(provider, 'No apiKeyEnvVar configured');
  }
  const key = process.env[envVar];
  if (!key) {
    throw new ProviderError(provider, `Environment variable "${envVar}" is not set or empty`);
  }
  return key;
}

/**
 * Create an LLMProvider from a configuration object.
 * Local servers (LM Studio, Ollama) ignore the key but the SDK requires one,
 * so a placeholder is sent unless an env var is configured.
 */
export function createProvider(config: LLMProviderConfig): LLMProvider {
  logger.info('Creating LLM provider', {
    component: 'provider-factory',
    provider: config.provider,
    model: config.model,
  });

  switch (config.provider) {
    case 'openai':
      return createOpenAIProvider({
        apiKey: resolveApiKey(config.apiKeyEnvVar, 'openai'),
        model: config.model,
        baseUrl: config.baseUrl,
        providerLabel: 'openai',
      });

    case 'lmstudio':
      return createOpenAIProvider({
        apiKey: config.apiKeyEnvVar ? resolveApiKey(config.apiKeyEnvVar, 'lmstudio') : 'not-needed',
        model: config.model,
        baseUrl: config.baseUrl ?? LMSTUDIO_DEFAULT_BASE_URL,
        providerLabel: 'lmstudio',
      });

    case 'ollama':
      return createOpenAIProvider({
        apiKey: 'ollama',
        model: config.model,
        baseUrl: config.baseUrl ?? OLLAMA_DEFAULT_BASE_URL,
        providerLabel: 'ollama',
      });

    default: {
      // Exhaustiveness check: TypeScript narrows to `never`
      const _exhaustive: never = config.provider;
      throw new ProviderError(String(_exhaustive), `Unknown provider: ${String(_exhaustive)}`);
    }
  }
}
