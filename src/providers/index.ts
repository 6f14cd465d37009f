/**
 * metaprompt-lab - Provider Module Exports
 */

import { ConfigurationError } from '../core/errors.js';
import type { LLMProvider, ProviderConfig } from '../types/index.js';
import { GeminiProvider } from './GeminiProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';

export { GeminiProvider, convertMessages, type GeminiProviderOptions } from './GeminiProvider.js';
export { OpenAIProvider, parseCompletionPayload, type OpenAIConfig } from './OpenAIProvider.js';

/**
 * Build the provider named by the configuration.
 * Gemini always needs a key; OpenAI-compatible servers may run without one
 * when a custom base URL is given.
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case 'gemini':
      if (!config.apiKey) {
        throw new ConfigurationError('GEMINI_API_KEY is not set', { context: { provider: 'gemini' } });
      }
      return new GeminiProvider(config.apiKey, config.model, { timeout: config.timeout });

    case 'openai':
      if (!config.apiKey && !config.baseUrl) {
        throw new ConfigurationError('OPENAI_API_KEY is not set', { context: { provider: 'openai' } });
      }
      return new OpenAIProvider({
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        model: config.model,
        timeout: config.timeout,
      });
  }
}
