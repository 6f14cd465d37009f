/**
 * metaprompt-lab - Experiment Runner
 *
 * Loads task, prompt configuration and dataset, then answers every example
 * with the selected strategy and writes one output record per example.
 * A failing example is recorded as failed; the run continues.
 */

import { readFile } from 'node:fs/promises';
import pLimit from 'p-limit';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import type { LanguageModel } from '../core/LanguageModel.js';
import type { CodeRunner } from '../core/execution/CodeExecutor.js';
import { MetaScaffold } from '../core/scaffold/MetaScaffold.js';
import { extractFinalAnswer } from '../core/scaffold/ReplyParser.js';
import { ExpertIdentityGenerator, buildExpertPromptingQuestion } from '../core/scaffold/ExpertIdentity.js';
import { applyParameterOverrides, loadPromptConfig } from '../config/promptConfig.js';
import { getTaskDescription, loadTaskCatalogue } from '../config/tasks.js';
import { EXPERT_IDENTITY_TEMPLATE_PATH, TASKS_FILE } from '../config/paths.js';
import { loadDataset } from './dataset.js';
import { buildQuestion } from './prompts.js';
import { prepareRunDirectory, runDirectoryName, writeManifest, writeOutputRecord } from './outputs.js';
import { logger } from '../services/Logger.js';
import { truncateInput } from '../utils/strings.js';
import type {
  OutputRecord,
  PromptConfig,
  RoleParameters,
  RunSummary,
  ScaffoldOptions,
  StrategyConfig,
  TaskExample,
  TerminationReason,
  TranscriptEntry,
} from '../types/index.js';

export interface ExperimentOptions {
  task: string;
  strategy: StrategyConfig;
  configPath: string;
  inputPath: string;
  outputDirectory: string;
  maxExamples: number;
  concurrency: number;
  scaffold: ScaffoldOptions;
  parameterOverrides?: Partial<RoleParameters>;
  tasksFile?: string;
  identityTemplatePath?: string;
  onProgress?: (done: number, total: number) => void;
}

export interface ExperimentRunnerDependencies {
  model: LanguageModel;
  /** Passed to every scaffold; defaults to a CodeExecutor */
  codeRunner?: CodeRunner;
}

interface RunContext {
  task: string;
  description: string;
  strategy: StrategyConfig;
  promptConfig: PromptConfig;
  scaffold: MetaScaffold;
  identity: ExpertIdentityGenerator | null;
  directory: string;
}

interface Solution {
  answer: string;
  rawOutput: string;
  termination: TerminationReason;
  rounds: number;
  transcript: TranscriptEntry[];
}

export class ExperimentRunner {
  private model: LanguageModel;
  private codeRunner?: CodeRunner;

  constructor(deps: ExperimentRunnerDependencies) {
    this.model = deps.model;
    this.codeRunner = deps.codeRunner;
  }

  async run(options: ExperimentOptions): Promise<RunSummary> {
    const catalogue = await loadTaskCatalogue(options.tasksFile ?? TASKS_FILE);
    const description = getTaskDescription(catalogue, options.task);

    const promptConfig = applyParameterOverrides(
      await loadPromptConfig(options.configPath),
      options.parameterOverrides ?? {},
    );

    const dataset = await loadDataset(options.inputPath);
    const examples = dataset.examples.slice(0, Math.max(0, options.maxExamples));

    const identity = options.strategy.expertPrompting
      ? new ExpertIdentityGenerator(
          this.model,
          await readTemplate(options.identityTemplatePath ?? EXPERT_IDENTITY_TEMPLATE_PATH),
          promptConfig.conductor.parameters,
        )
      : null;

    const directory = await prepareRunDirectory(
      options.outputDirectory,
      runDirectoryName(options.task, options.strategy.name, options.scaffold.freshEyes),
    );

    await writeManifest(directory, {
      task: options.task,
      strategy: options.strategy,
      model: this.model.modelName,
      inputPath: options.inputPath,
      maxExamples: options.maxExamples,
      scaffold: options.scaffold,
      promptConfig,
      startedAt: new Date().toISOString(),
    });

    const context: RunContext = {
      task: options.task,
      description,
      strategy: options.strategy,
      promptConfig,
      scaffold: new MetaScaffold({
        model: this.model,
        promptConfig,
        options: options.scaffold,
        codeRunner: this.codeRunner,
      }),
      identity,
      directory,
    };

    const limit = pLimit(Math.max(1, options.concurrency));
    let done = 0;

    const records = await Promise.all(
      examples.map(example =>
        limit(async () => {
          const record = await this.processExample(example, context);
          done++;
          options.onProgress?.(done, examples.length);
          return record;
        }),
      ),
    );

    const completed = records.filter(record => record.status === 'completed').length;
    return {
      outputDirectory: directory,
      completed,
      failed: records.length - completed,
      skipped: dataset.skipped.length,
    };
  }

  private async processExample(example: TaskExample, context: RunContext): Promise<OutputRecord> {
    const startTime = Date.now();
    logger.example(example.index, truncateInput(example.input));

    const base = {
      index: example.index,
      task: context.task,
      strategy: context.strategy.name,
      input: example.input,
      target: example.target ?? null,
    };

    let record: OutputRecord;
    try {
      const solution = await this.solve(example, context);
      record = {
        ...base,
        status: 'completed',
        answer: solution.answer,
        rawOutput: solution.rawOutput,
        termination: solution.termination,
        rounds: solution.rounds,
        transcript: solution.transcript,
        durationMs: Date.now() - startTime,
      };
      logger.exampleComplete(example.index, solution.answer);
    } catch (error: unknown) {
      const message = getErrorMessage(error);
      record = {
        ...base,
        status: 'failed',
        answer: null,
        rawOutput: null,
        termination: null,
        rounds: 0,
        transcript: [],
        error: message,
        durationMs: Date.now() - startTime,
      };
      logger.exampleFailed(example.index, message);
    }

    await writeOutputRecord(context.directory, record);
    return record;
  }

  private async solve(example: TaskExample, context: RunContext): Promise<Solution> {
    let question: string;
    if (context.identity) {
      const persona = await context.identity.generate(example.input);
      question = buildExpertPromptingQuestion(persona, context.description, example.input);
    } else {
      question = buildQuestion(context.strategy, context.description, example.input);
    }

    if (context.strategy.mode === 'scaffold') {
      const result = await context.scaffold.run(question);
      return {
        answer: result.answer,
        rawOutput: result.rawOutput,
        termination: result.status,
        rounds: result.rounds,
        transcript: result.transcript,
      };
    }

    return this.answerOnce(question, context.promptConfig);
  }

  /**
   * Single-call strategies: conductor prefix messages plus the question
   */
  private async answerOnce(question: string, promptConfig: PromptConfig): Promise<Solution> {
    const conductor = promptConfig.conductor;
    const transcript: TranscriptEntry[] = [
      ...conductor.messages.map((message): TranscriptEntry => ({ ...message, kind: 'instruction', round: 0 })),
      { role: 'user', content: question, kind: 'instruction', round: 0 },
    ];

    const [reply = ''] = await this.model.generate(
      transcript.map(({ role, content }) => ({ role, content })),
      { ...conductor.parameters, numReturnSequences: 1 },
    );
    transcript.push({ role: 'assistant', content: reply, kind: 'conductor', round: 1 });

    const extracted = extractFinalAnswer(reply, conductor.finalAnswerIndicator);
    return {
      answer: extracted ?? reply.trim(),
      rawOutput: reply,
      termination: extracted === null ? 'round-limit' : 'final-answer',
      rounds: 1,
      transcript,
    };
  }
}

async function readTemplate(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read expert identity template ${filePath}: ${getErrorMessage(error)}`, {
      context: { path: filePath },
    });
  }
}
