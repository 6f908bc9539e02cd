import type { AppConfig } from './config.js';
import { AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';

/**
 * Builds the provider selected by LLM_PROVIDER. Credentials are checked on the
 * first chat() call, not here, so the server can start without them.
 */
export function createProvider(config: AppConfig['llm']): LLMProvider {
  if (config.provider === 'anthropic') {
    return new AnthropicProvider({ apiKey: config.anthropicApiKey });
  }
  return new OpenAICompatibleProvider({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
  });
}

/** Default model name for the configured provider. */
export function getDefaultModel(config: AppConfig['llm']): string {
  return config.provider === 'anthropic' ? config.anthropicModel : config.openaiModel;
}

export function hasProviderKey(config: AppConfig['llm']): boolean {
  return config.provider === 'anthropic'
    ? Boolean(config.anthropicApiKey)
    : Boolean(config.openaiApiKey);
}
