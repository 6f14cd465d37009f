/**
 * Question Building Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { buildQuestion, resolvePromptFragment, resolveStrategy } from '../../src/harness/prompts.js';
import { DEFAULT_QUESTION_SUFFIX } from '../../src/config/constants.js';
import { ConfigurationError } from '../../src/core/errors.js';

describe('resolvePromptFragment', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'fragments-'));
    await writeFile(path.join(dir, 'prefix.txt'), 'Think hard.\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return literal text unchanged', async () => {
    expect(await resolvePromptFragment('Answer briefly. ', dir)).toBe('Answer briefly. ');
  });

  it('should read .txt names from the prompts directory', async () => {
    expect(await resolvePromptFragment('prefix.txt', dir)).toBe('Think hard.\n');
  });

  it('should read .txt paths as given', async () => {
    expect(await resolvePromptFragment(path.join(dir, 'prefix.txt'), '/nowhere')).toBe('Think hard.\n');
  });

  it('should fail on a missing file', async () => {
    await expect(resolvePromptFragment('missing.txt', dir)).rejects.toBeInstanceOf(ConfigurationError);
  });
});

describe('resolveStrategy', () => {
  it('should resolve the zero-shot-cot suffix from its file', async () => {
    const strategy = await resolveStrategy('zero-shot-cot');

    expect(strategy).toEqual({
      name: 'zero-shot-cot',
      mode: 'single',
      questionPrefix: '',
      questionSuffix: "\n\nLet's think step by step.",
      expertPrompting: false,
    });
  });

  it('should load the meta instruction and default suffix', async () => {
    const strategy = await resolveStrategy('meta');

    expect(strategy.mode).toBe('scaffold');
    expect(strategy.questionPrefix.startsWith('You will act as the Conductor')).toBe(true);
    expect(strategy.questionSuffix).toBe(DEFAULT_QUESTION_SUFFIX);
  });

  it('should apply overrides', async () => {
    const strategy = await resolveStrategy('standard', { questionPrefix: 'Be careful. ', questionSuffix: ' Thanks.' });

    expect(strategy.questionPrefix).toBe('Be careful. ');
    expect(strategy.questionSuffix).toBe(' Thanks.');
  });

  it('should reject unknown strategies', async () => {
    await expect(resolveStrategy('few-shot')).rejects.toThrow('Unknown strategy: few-shot');
  });
});

describe('buildQuestion', () => {
  it('should join prefix, description, input and suffix', async () => {
    const strategy = await resolveStrategy('standard', { questionPrefix: 'P: ', questionSuffix: ' :S' });

    expect(buildQuestion(strategy, 'Sort the words.', 'pear apple')).toBe('P: Question: Sort the words.\n\npear apple :S');
  });
});
