/**
 * metaprompt-lab - Gemini Provider
 * Chat completions through the Google Generative AI SDK
 */

import {
  FinishReason,
  GoogleGenerativeAI,
  type Content,
  type GenerateContentCandidate,
} from '@google/generative-ai';
import { GeminiError, getErrorMessage, RateLimitError } from '../core/errors.js';
import { withTimeout } from '../core/retry.js';
import { DEFAULT_MODELS, DEFAULT_REQUEST_TIMEOUT_MS } from '../config/constants.js';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  LLMProvider,
} from '../types/index.js';

export interface GeminiProviderOptions {
  timeout?: number;
}

export class GeminiProvider implements LLMProvider {
  name = 'gemini';
  model: string;
  private client: GoogleGenerativeAI;
  private apiKey: string;
  private timeout: number;

  constructor(apiKey: string, model: string = DEFAULT_MODELS.gemini, options: GeminiProviderOptions = {}) {
    this.apiKey = apiKey;
    this.client = new GoogleGenerativeAI(apiKey);
    this.model = model;
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse> {
    const modelName = request.model ?? this.model;
    const model = this.client.getGenerativeModel({
      model: modelName,
      generationConfig: {
        temperature: request.temperature,
        topP: request.top_p,
        maxOutputTokens: request.max_tokens,
        candidateCount: request.n,
        stopSequences: request.stop,
      },
    });

    const { systemInstruction, contents } = convertMessages(request.messages);

    const chat = model.startChat({
      history: contents.slice(0, -1),
      systemInstruction: systemInstruction
        ? {
            role: 'system',
            parts: [{ text: systemInstruction }],
          }
        : undefined,
    });

    try {
      const lastMessage = contents[contents.length - 1];
      const result = await withTimeout(
        () => chat.sendMessage(lastMessage.parts),
        this.timeout,
        `Gemini request timed out after ${this.timeout}ms`,
      );
      const candidates = result.response.candidates ?? [];
      const usage = result.response.usageMetadata;

      return {
        id: `gemini-${Date.now()}`,
        object: 'chat.completion',
        created: Math.floor(Date.now() / 1000),
        model: modelName,
        choices: candidates.map((candidate, index) => ({
          index,
          message: {
            role: 'assistant',
            content: candidateText(candidate),
          },
          finish_reason: candidate.finishReason === FinishReason.MAX_TOKENS ? 'length' : 'stop',
        })),
        usage: {
          promptTokens: usage?.promptTokenCount ?? 0,
          completionTokens: usage?.candidatesTokenCount ?? 0,
          totalTokens: usage?.totalTokenCount ?? 0,
        },
      };
    } catch (error: unknown) {
      const msg = getErrorMessage(error);
      if (msg.includes('429') || msg.includes('rate limit') || msg.includes('RESOURCE_EXHAUSTED')) {
        throw new RateLimitError(`Gemini rate limit (${modelName}): ${msg}`);
      }
      throw new GeminiError(`Gemini API Error (${modelName}): ${msg}`, {
        cause: error instanceof Error ? error : undefined,
        context: { model: modelName },
      });
    }
  }
}

/**
 * Split chat messages into a system instruction and Gemini contents.
 * Multiple system messages are joined in order.
 */
export function convertMessages(messages: ChatMessage[]): {
  systemInstruction?: string;
  contents: Content[];
} {
  const systemParts: string[] = [];
  const contents: Content[] = [];

  for (const msg of messages) {
    if (msg.role === 'system') {
      systemParts.push(msg.content);
    } else {
      contents.push({
        role: msg.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: msg.content }],
      });
    }
  }

  if (contents.length === 0) {
    contents.push({ role: 'user', parts: [{ text: '' }] });
  }

  return {
    systemInstruction: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
    contents,
  };
}

function candidateText(candidate: GenerateContentCandidate): string {
  return candidate.content.parts.map(part => part.text ?? '').join('');
}
