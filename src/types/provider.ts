/**
 * metaprompt-lab - Provider Types
 * Type definitions for chat-completion providers
 */

// ============================================
// Chat Completion Types (OpenAI-compatible)
// ============================================

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * Chat message structure
 */
export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Chat completion request
 */
export interface ChatCompletionRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  /** Number of completions to sample */
  n?: number;
  stop?: string[];
}

/**
 * Chat completion response
 */
export interface ChatCompletionResponse {
  id: string;
  object: 'chat.completion';
  created: number;
  model: string;
  choices: ChatCompletionChoice[];
  usage?: TokenUsage;
}

/**
 * Chat completion choice
 */
export interface ChatCompletionChoice {
  index: number;
  message: ChatMessage;
  finish_reason: 'stop' | 'length' | 'content_filter' | null;
}

/**
 * Token usage information
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

// ============================================
// LLM Provider Interface
// ============================================

/**
 * Core LLM Provider interface
 * All providers must implement this interface
 */
export interface LLMProvider {
  name: string;
  model: string;
  createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
  isAvailable(): boolean;
}

export type ProviderType = 'gemini' | 'openai';

/**
 * Provider connection settings
 */
export interface ProviderConfig {
  type: ProviderType;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  timeout?: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
