import type { AppConfig } from './config.js';
import { getAnthropicClient } from './anthropic.js';
import { AnthropicProvider, OpenAIProvider, type LLMProvider } from './llm-provider.js';

/**
 * Construct the provider selected by `config.provider`. Called once per
 * process by the entry points, after configuration has loaded.
 */
export function createProvider(config: AppConfig): LLMProvider {
  if (config.provider === 'anthropic') {
    return new AnthropicProvider(getAnthropicClient(config.apiKey));
  }
  return new OpenAIProvider({ apiKey: config.apiKey, baseUrl: config.baseUrl });
}
