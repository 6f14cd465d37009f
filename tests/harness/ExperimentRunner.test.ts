/**
 * ExperimentRunner Tests
 * Full runs against temp directories with a scripted provider
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ExperimentRunner, type ExperimentOptions } from '../../src/harness/ExperimentRunner.js';
import { resolveStrategy } from '../../src/harness/prompts.js';
import { evaluateRuns } from '../../src/evaluation/Evaluator.js';
import { LanguageModel } from '../../src/core/LanguageModel.js';
import { loadPromptConfig } from '../../src/config/promptConfig.js';
import { loadTaskCatalogue } from '../../src/config/tasks.js';
import { DEFAULT_PROMPT_CONFIG_PATH, datasetPath } from '../../src/config/paths.js';
import type { ScaffoldOptions } from '../../src/types/index.js';
import { ScriptedProvider, type ScriptStep } from '../__mocks__/providers.js';

const scaffold: ScaffoldOptions = {
  maxRounds: 4,
  maxTranscriptTokens: 100000,
  freshEyes: false,
  enableCodeExecution: false,
  includeExpertName: false,
  extractExpertOutput: false,
  zeroShotCotInExperts: false,
  expertPythonMessage: 'Use Python',
  intermediateFeedback: 'Keep going.',
  codeTimeoutMs: 1000,
};

describe('ExperimentRunner', () => {
  let root: string;
  let sortingDataset: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'experiment-'));
    sortingDataset = path.join(root, 'sorting.jsonl');
    await writeFile(
      sortingDataset,
      '{"input": "pear apple", "target": "apple pear"}\n{"input": "yak xerus", "target": "xerus yak"}\n',
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function setup(steps: ScriptStep[]) {
    const provider = new ScriptedProvider(steps);
    const runner = new ExperimentRunner({ model: new LanguageModel(provider, { maxAttempts: 1, delayMs: 0 }) });
    return { provider, runner };
  }

  async function options(strategy: string, overrides: Partial<ExperimentOptions> = {}): Promise<ExperimentOptions> {
    return {
      task: 'word_sorting',
      strategy: await resolveStrategy(strategy),
      configPath: DEFAULT_PROMPT_CONFIG_PATH,
      inputPath: sortingDataset,
      outputDirectory: path.join(root, 'outputs'),
      maxExamples: 10,
      concurrency: 1,
      scaffold,
      ...overrides,
    };
  }

  it('should solve GameOf24 with meta-prompting and score it correct', async () => {
    const { provider, runner } = setup(['>> FINAL ANSWER:\n"""\n(4+8)*(6-4)\n"""']);

    const summary = await runner.run(
      await options('meta', { task: 'GameOf24', inputPath: datasetPath('GameOf24'), maxExamples: 1 }),
    );

    expect(summary).toEqual({
      outputDirectory: path.join(root, 'outputs', 'GameOf24-meta'),
      completed: 1,
      failed: 0,
      skipped: 0,
    });
    expect(provider.requests[0].messages[1].content.startsWith('ROUND 1:\n\nYou will act as the Conductor')).toBe(true);
    expect(await readFile(path.join(summary.outputDirectory, '0000.txt'), 'utf-8')).toBe('(4+8)*(6-4)');

    const record = JSON.parse(await readFile(path.join(summary.outputDirectory, '0000.json'), 'utf-8'));
    expect(record).toMatchObject({ index: 0, status: 'completed', termination: 'final-answer', rounds: 1 });

    const [report] = await evaluateRuns({ directory: path.join(root, 'outputs', '*'), task: 'GameOf24' });
    expect(report).toMatchObject({ correct: 1, total: 1, accuracy: 1 });
  });

  it('should write a manifest', async () => {
    const { runner } = setup(['apple pear', 'xerus yak']);

    const summary = await runner.run(await options('standard'));

    const manifest = JSON.parse(await readFile(path.join(summary.outputDirectory, 'run.json'), 'utf-8'));
    expect(manifest).toMatchObject({ task: 'word_sorting', model: 'scripted-model', inputPath: sortingDataset, maxExamples: 10 });
    expect(manifest.strategy.name).toBe('standard');
    expect(await readdir(summary.outputDirectory)).toEqual(['0000.json', '0000.txt', '0001.json', '0001.txt', 'run.json']);
  });

  it('should answer single-call strategies in one request', async () => {
    const { provider, runner } = setup(['  apple pear\n', 'xerus yak']);
    const catalogue = await loadTaskCatalogue();
    const config = await loadPromptConfig(DEFAULT_PROMPT_CONFIG_PATH);

    const summary = await runner.run(await options('standard'));

    expect(provider.requests[0].messages).toEqual([
      ...config.conductor.messages,
      { role: 'user', content: `Question: ${catalogue.word_sorting}\n\npear apple` },
    ]);
    const record = JSON.parse(await readFile(path.join(summary.outputDirectory, '0000.json'), 'utf-8'));
    expect(record).toMatchObject({ answer: 'apple pear', rawOutput: '  apple pear\n', termination: 'round-limit', rounds: 1 });
  });

  it('should record a failed example and continue', async () => {
    const { runner } = setup([new Error('invalid api key'), '>> FINAL ANSWER: xerus yak']);

    const summary = await runner.run(await options('standard'));

    expect(summary).toMatchObject({ completed: 1, failed: 1 });
    const failed = JSON.parse(await readFile(path.join(summary.outputDirectory, '0000.json'), 'utf-8'));
    expect(failed).toMatchObject({ status: 'failed', answer: null, error: 'invalid api key', transcript: [] });
    expect(await readFile(path.join(summary.outputDirectory, '0001.txt'), 'utf-8')).toBe('xerus yak');
  });

  it('should generate an expert identity for dynamic-expert', async () => {
    const template = path.join(root, 'identity.txt');
    await writeFile(template, 'Template.\n');
    const { provider, runner } = setup(['You are a lexicographer.', 'apple pear']);
    const catalogue = await loadTaskCatalogue();

    await runner.run(await options('dynamic-expert', { maxExamples: 1, identityTemplatePath: template }));

    expect(provider.requests[0].messages).toEqual([
      { role: 'user', content: 'Template.\n\n[Instruction]: pear apple\n[Agent Description]:' },
    ]);
    expect(provider.requests[1].messages[provider.requests[1].messages.length - 1].content).toBe(
      'You are a lexicographer.\n\nNow given the above identity background, please answer the following question:' +
        `\n\nQuestion: ${catalogue.word_sorting}\n\npear apple`,
    );
  });

  it('should apply sampling overrides and report progress', async () => {
    const { provider, runner } = setup(['apple pear', 'xerus yak']);
    const onProgress = vi.fn();

    await runner.run(await options('standard', { parameterOverrides: { temperature: 0.7 }, onProgress }));

    expect(provider.requests.map(request => request.temperature)).toEqual([0.7, 0.7]);
    expect(onProgress.mock.calls).toEqual([[1, 2], [2, 2]]);
  });

  it('should count skipped dataset lines', async () => {
    await writeFile(sortingDataset, '{"input": "pear apple", "target": "apple pear"}\nnot json\n');
    const { runner } = setup(['apple pear']);

    const summary = await runner.run(await options('standard'));

    expect(summary).toMatchObject({ completed: 1, failed: 0, skipped: 1 });
  });

  it('should reject unknown tasks before writing anything', async () => {
    const { runner } = setup([]);

    await expect(runner.run(await options('standard', { task: 'Nope' }))).rejects.toThrow('Invalid task name: Nope');
    await expect(readdir(root)).resolves.toEqual(['sorting.jsonl']);
  });

  it('should name fresh-eyes runs separately', async () => {
    const { runner } = setup(['>> FINAL ANSWER: apple pear']);

    const summary = await runner.run(
      await options('meta-no-python', { maxExamples: 1, scaffold: { ...scaffold, freshEyes: true } }),
    );

    expect(path.basename(summary.outputDirectory)).toBe('word_sorting-meta-no-python-fresh-eyes');
  });
});
