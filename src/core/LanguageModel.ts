/**
 * metaprompt-lab - Language Model
 * Sends chat requests through a provider, retrying per RetryPolicy
 */

import { ProviderError } from './errors.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from './retry.js';
import { logger } from '../services/Logger.js';
import type { ChatMessage, LLMProvider, RoleParameters, TokenUsage } from '../types/index.js';

export interface GenerateOptions extends Partial<RoleParameters> {
  stop?: string[];
}

export class LanguageModel {
  private provider: LLMProvider;
  private policy: RetryPolicy;
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  private calls = 0;

  constructor(provider: LLMProvider, policy: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.provider = provider;
    this.policy = policy;
  }

  get modelName(): string {
    return this.provider.model;
  }

  /**
   * Request `numReturnSequences` completions for `messages` and return their
   * texts in order. Throws the last error once the retry policy is exhausted.
   */
  async generate(messages: ChatMessage[], options: GenerateOptions = {}): Promise<string[]> {
    const response = await withRetry(
      async () => {
        const result = await this.provider.createChatCompletion({
          messages,
          temperature: options.temperature,
          top_p: options.topP,
          max_tokens: options.maxTokens,
          n: options.numReturnSequences,
          stop: options.stop,
        });
        if (result.choices.length === 0) {
          throw new ProviderError(`${this.provider.name} returned no choices`, this.provider.name);
        }
        return result;
      },
      this.policy,
      {
        onRetry: ({ attempt, maxAttempts, error, delay }) => {
          logger.warn(`[${this.provider.name}] Attempt ${attempt}/${maxAttempts} failed: ${error.message}. Retrying in ${delay}ms`);
        },
      },
    );

    this.calls++;
    if (response.usage) {
      this.usage.promptTokens += response.usage.promptTokens;
      this.usage.completionTokens += response.usage.completionTokens;
      this.usage.totalTokens += response.usage.totalTokens;
    }

    return response.choices.map(choice => choice.message.content);
  }

  getUsage(): TokenUsage & { calls: number } {
    return { ...this.usage, calls: this.calls };
  }
}
