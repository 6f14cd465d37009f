/**
 * Tests for error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  MetaPromptError,
  ProviderError,
  GeminiError,
  OpenAIError,
  TimeoutError,
  RateLimitError,
  ConfigurationError,
  DatasetError,
  ValidationError,
  CodeExecutionError,
  getErrorMessage,
} from '../../src/core/errors.js';

describe('Error Hierarchy', () => {
  describe('MetaPromptError', () => {
    it('should create error with default options', () => {
      const error = new MetaPromptError('Test error');

      expect(error.message).toBe('Test error');
      expect(error.name).toBe('MetaPromptError');
      expect(error.code).toBe('METAPROMPT_ERROR');
      expect(error.recoverable).toBe(false);
      expect(error.retryable).toBe(false);
      expect(error.context).toEqual({});
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should set cause if provided', () => {
      const cause = new Error('Original error');
      const error = new MetaPromptError('Wrapped error', { cause });

      expect(error.cause).toBe(cause);
    });

    it('should serialize to JSON', () => {
      const error = new MetaPromptError('Test error', {
        code: 'TEST_CODE',
        recoverable: true,
        context: { foo: 'bar' },
      });

      const json = error.toJSON();

      expect(json.name).toBe('MetaPromptError');
      expect(json.message).toBe('Test error');
      expect(json.code).toBe('TEST_CODE');
      expect(json.recoverable).toBe(true);
      expect(json.retryable).toBe(false);
      expect(json.context).toEqual({ foo: 'bar' });
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });
  });

  describe('ProviderError', () => {
    it('should be retryable by default and record the provider', () => {
      const error = new ProviderError('Request failed', 'gemini');

      expect(error).toBeInstanceOf(MetaPromptError);
      expect(error.code).toBe('PROVIDER_ERROR');
      expect(error.retryable).toBe(true);
      expect(error.provider).toBe('gemini');
      expect(error.context).toEqual({ provider: 'gemini' });
    });

    it('should keep the HTTP status', () => {
      const error = new ProviderError('Bad request', 'openai', { status: 400, retryable: false });

      expect(error.status).toBe(400);
      expect(error.retryable).toBe(false);
      expect(error.context.status).toBe(400);
    });
  });

  describe('provider-specific errors', () => {
    it('GeminiError should carry its own code', () => {
      const error = new GeminiError('Quota');

      expect(error).toBeInstanceOf(ProviderError);
      expect(error.name).toBe('GeminiError');
      expect(error.code).toBe('GEMINI_ERROR');
      expect(error.provider).toBe('gemini');
    });

    it('OpenAIError should carry its own code', () => {
      const error = new OpenAIError('Server error', { status: 500 });

      expect(error.name).toBe('OpenAIError');
      expect(error.code).toBe('OPENAI_ERROR');
      expect(error.provider).toBe('openai');
      expect(error.status).toBe(500);
    });
  });

  describe('TimeoutError', () => {
    it('should record the timeout and be retryable', () => {
      const error = new TimeoutError('Timed out', 5000);

      expect(error.timeoutMs).toBe(5000);
      expect(error.retryable).toBe(true);
      expect(error.context.timeoutMs).toBe(5000);
    });
  });

  describe('RateLimitError', () => {
    it('should always be retryable', () => {
      const error = new RateLimitError('Slow down', 2000, { retryable: false });

      expect(error.retryable).toBe(true);
      expect(error.retryAfterMs).toBe(2000);
      expect(error.context.retryAfterMs).toBe(2000);
    });
  });

  describe('fatal errors', () => {
    it('ConfigurationError should never be recoverable or retryable', () => {
      const error = new ConfigurationError('Bad config', { retryable: true, recoverable: true });

      expect(error.code).toBe('CONFIG_ERROR');
      expect(error.retryable).toBe(false);
      expect(error.recoverable).toBe(false);
    });

    it('DatasetError should record the path', () => {
      const error = new DatasetError('Missing', 'data/x.jsonl');

      expect(error.code).toBe('DATASET_ERROR');
      expect(error.path).toBe('data/x.jsonl');
      expect(error.context.path).toBe('data/x.jsonl');
    });

    it('ValidationError should record the field', () => {
      const error = new ValidationError('Bad value', 'temperature');

      expect(error.field).toBe('temperature');
      expect(error.context.field).toBe('temperature');
    });
  });

  describe('CodeExecutionError', () => {
    it('should be recoverable', () => {
      const error = new CodeExecutionError('No temp dir');

      expect(error.code).toBe('CODE_EXECUTION_ERROR');
      expect(error.recoverable).toBe(true);
      expect(error.retryable).toBe(false);
    });
  });
});

describe('Error utilities', () => {
  describe('getErrorMessage', () => {
    it('should read Error messages and stringify everything else', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain')).toBe('plain');
      expect(getErrorMessage(42)).toBe('42');
    });
  });
});
