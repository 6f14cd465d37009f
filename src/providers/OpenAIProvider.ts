/**
 * metaprompt-lab - OpenAI Provider
 * Adapter for OpenAI-compatible /v1/chat/completions endpoints
 * (api.openai.com, Azure-style gateways, local OpenAI-compatible servers)
 */

import { OpenAIError, RateLimitError, getErrorMessage } from '../core/errors.js';
import { DEFAULT_MODELS, DEFAULT_OPENAI_BASE_URL, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/constants.js';
import type {
  ChatCompletionChoice,
  ChatCompletionRequest,
  ChatCompletionResponse,
  LLMProvider,
  TokenUsage,
} from '../types/index.js';

export interface OpenAIConfig {
  baseUrl?: string;
  model?: string;
  apiKey?: string;
  timeout?: number;
}

export class OpenAIProvider implements LLMProvider {
  name = 'openai';
  model: string;
  private baseUrl: string;
  private apiKey?: string;
  private timeout: number;

  constructor(config: OpenAIConfig = {}) {
    this.baseUrl = (config.baseUrl || DEFAULT_OPENAI_BASE_URL).replace(/\/$/, '');
    this.model = config.model || DEFAULT_MODELS.openai;
    this.apiKey = config.apiKey;
    this.timeout = config.timeout || DEFAULT_REQUEST_TIMEOUT_MS;
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const url = `${this.baseUrl}/v1/chat/completions`;

    const body = {
      model: request.model || this.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.max_tokens,
      top_p: request.top_p,
      n: request.n,
      stop: request.stop,
      stream: false,
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error: unknown) {
      throw new OpenAIError(`OpenAI request failed: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
        context: { url },
      });
    }

    if (!response.ok) {
      const detail = await response.text();
      if (response.status === 429) {
        const retryAfter = Number(response.headers.get('retry-after'));
        throw new RateLimitError(
          `OpenAI rate limit (${body.model}): ${detail}`,
          Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : undefined,
        );
      }
      throw new OpenAIError(`OpenAI API Error: ${response.status} - ${detail}`, {
        status: response.status,
        retryable: response.status === 408 || response.status >= 500,
        context: { model: body.model },
      });
    }

    const data: unknown = await response.json();
    return parseCompletionPayload(data, body.model);
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Validate a chat completion payload and map it to the internal shape.
 * Choices without text content are kept with an empty string.
 */
export function parseCompletionPayload(data: unknown, fallbackModel: string): ChatCompletionResponse {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    throw new OpenAIError('Malformed completion payload: missing choices');
  }

  const choices: ChatCompletionChoice[] = data.choices.map((choice: unknown, position: number) => {
    const message = isRecord(choice) && isRecord(choice.message) ? choice.message : {};
    const finish = isRecord(choice) ? choice.finish_reason : null;
    return {
      index: isRecord(choice) && typeof choice.index === 'number' ? choice.index : position,
      message: {
        role: 'assistant',
        content: typeof message.content === 'string' ? message.content : '',
      },
      finish_reason: finish === 'length' || finish === 'content_filter' || finish === 'stop' ? finish : null,
    };
  });

  let usage: TokenUsage | undefined;
  if (isRecord(data.usage)) {
    const { prompt_tokens, completion_tokens, total_tokens } = data.usage;
    usage = {
      promptTokens: typeof prompt_tokens === 'number' ? prompt_tokens : 0,
      completionTokens: typeof completion_tokens === 'number' ? completion_tokens : 0,
      totalTokens: typeof total_tokens === 'number' ? total_tokens : 0,
    };
  }

  return {
    id: typeof data.id === 'string' ? data.id : `openai-${Date.now()}`,
    object: 'chat.completion',
    created: typeof data.created === 'number' ? data.created : Math.floor(Date.now() / 1000),
    model: typeof data.model === 'string' ? data.model : fallbackModel,
    choices,
    usage,
  };
}
