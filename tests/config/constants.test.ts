/**
 * Tests for Constants Configuration
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_ROUNDS,
  DEFAULT_CODE_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_MODELS,
  DEFAULT_FINAL_ANSWER_INDICATOR,
  DEFAULT_EXPERT_PYTHON_MESSAGE,
  DEFAULT_QUESTION_SUFFIX,
  LAST_ROUND_NOTICE,
  MAX_EXPERT_OUTPUT_WORDS,
  PYTHON_EXPERT_NAME,
  RUN_CODE_MARKER,
} from '../../src/config/constants.js';

describe('Scaffold Constants', () => {
  it('should allow sixteen conductor rounds', () => {
    expect(DEFAULT_MAX_ROUNDS).toBe(16);
  });

  it('should define the final answer indicator', () => {
    expect(DEFAULT_FINAL_ANSWER_INDICATOR).toBe('>> FINAL ANSWER:');
  });

  it('should define the last-round notice', () => {
    expect(LAST_ROUND_NOTICE).toBe('This is the last round; so, please present your final answer.');
  });

  it('should cap extracted expert output at 128 words', () => {
    expect(MAX_EXPERT_OUTPUT_WORDS).toBe(128);
  });

  it('should open the default suffix with a blank line', () => {
    expect(DEFAULT_QUESTION_SUFFIX.startsWith('\n\n')).toBe(true);
  });
});

describe('Python Expert Constants', () => {
  it('should name the Python expert', () => {
    expect(PYTHON_EXPERT_NAME).toBe('Expert Python');
  });

  it('should mention the run marker in the Python message', () => {
    expect(DEFAULT_EXPERT_PYTHON_MESSAGE).toContain(`"${RUN_CODE_MARKER}"`);
  });

  it('should give code three seconds', () => {
    expect(DEFAULT_CODE_TIMEOUT_MS).toBe(3000);
  });
});

describe('Retry Constants', () => {
  it('should make three attempts one second apart', () => {
    expect(DEFAULT_MAX_ATTEMPTS).toBe(3);
    expect(DEFAULT_RETRY_DELAY_MS).toBe(1000);
  });
});

describe('Model Constants', () => {
  it('should define a default model per provider', () => {
    expect(Object.keys(DEFAULT_MODELS)).toEqual(['gemini', 'openai']);
  });
});
