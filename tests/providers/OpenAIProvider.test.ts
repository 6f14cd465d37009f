/**
 * Tests for OpenAI-compatible Provider
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OpenAIProvider, parseCompletionPayload } from '../../src/providers/OpenAIProvider.js';
import { OpenAIError, RateLimitError } from '../../src/core/errors.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' }, ...init });
}

const completion = {
  id: 'chatcmpl-1',
  created: 1700000000,
  model: 'test-model',
  choices: [
    { index: 0, message: { role: 'assistant', content: 'Hello!' }, finish_reason: 'stop' },
    { index: 1, message: { role: 'assistant', content: 'Hi!' }, finish_reason: 'length' },
  ],
  usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
};

describe('OpenAIProvider', () => {
  let provider: OpenAIProvider;

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
    provider = new OpenAIProvider({ baseUrl: 'http://localhost:8000/', model: 'test-model', apiKey: 'test-secret' });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('constructor', () => {
    it('should use default config', () => {
      const p = new OpenAIProvider();
      expect(p.name).toBe('openai');
      expect(p.model).toBe('gpt-3.5-turbo');
    });
  });

  describe('isAvailable', () => {
    it('should depend on the API key', () => {
      expect(provider.isAvailable()).toBe(true);
      expect(new OpenAIProvider({ baseUrl: 'http://localhost:8000' }).isAvailable()).toBe(false);
    });
  });

  describe('createChatCompletion', () => {
    it('should post the request and map the response', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(completion));

      const result = await provider.createChatCompletion({
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0.1,
        top_p: 0.95,
        max_tokens: 32,
        n: 2,
      });

      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('http://localhost:8000/v1/chat/completions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
      expect(JSON.parse(init.body)).toEqual({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0.1,
        max_tokens: 32,
        top_p: 0.95,
        n: 2,
        stream: false,
      });

      expect(result.choices.map(choice => choice.message.content)).toEqual(['Hello!', 'Hi!']);
      expect(result.choices[1].finish_reason).toBe('length');
      expect(result.usage).toEqual({ promptTokens: 12, completionTokens: 4, totalTokens: 16 });
    });

    it('should omit the authorization header without a key', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(completion));
      const local = new OpenAIProvider({ baseUrl: 'http://localhost:8000' });

      await local.createChatCompletion({ messages: [{ role: 'user', content: 'Hi' }] });

      expect(mockFetch.mock.calls[0][1].headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should raise RateLimitError on 429', async () => {
      mockFetch.mockResolvedValueOnce(new Response('slow down', { status: 429, headers: { 'retry-after': '2' } }));

      const error = await provider.createChatCompletion({ messages: [] }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfterMs: 2000, retryable: true });
    });

    it('should mark server errors retryable', async () => {
      mockFetch.mockResolvedValueOnce(new Response('overloaded', { status: 503 }));

      const error = await provider.createChatCompletion({ messages: [] }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(OpenAIError);
      expect(error).toMatchObject({ status: 503, retryable: true, message: 'OpenAI API Error: 503 - overloaded' });
    });

    it('should mark client errors fatal', async () => {
      mockFetch.mockResolvedValueOnce(new Response('bad key', { status: 401 }));

      const error = await provider.createChatCompletion({ messages: [] }).catch((e: unknown) => e);

      expect(error).toMatchObject({ status: 401, retryable: false });
    });

    it('should wrap network failures', async () => {
      mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'));

      await expect(provider.createChatCompletion({ messages: [] })).rejects.toThrow(
        'OpenAI request failed: ECONNREFUSED',
      );
    });
  });
});

describe('parseCompletionPayload', () => {
  it('should reject payloads without choices', () => {
    expect(() => parseCompletionPayload({ id: 'x' }, 'fallback')).toThrow('Malformed completion payload: missing choices');
    expect(() => parseCompletionPayload('text', 'fallback')).toThrow(OpenAIError);
  });

  it('should fill gaps with defaults', () => {
    const result = parseCompletionPayload({ choices: [{ message: { content: null } }, 'odd'] }, 'fallback');

    expect(result.model).toBe('fallback');
    expect(result.usage).toBeUndefined();
    expect(result.choices).toEqual([
      { index: 0, message: { role: 'assistant', content: '' }, finish_reason: null },
      { index: 1, message: { role: 'assistant', content: '' }, finish_reason: null },
    ]);
  });
});
