/**
 * metaprompt-lab - Task & Output Types
 */

import type { PromptConfig, ScaffoldOptions, TerminationReason, TranscriptEntry } from './scaffold.js';

/**
 * One dataset example. `index` is the position of its line among the
 * non-blank lines of the dataset file.
 */
export interface TaskExample {
  readonly index: number;
  readonly input: string;
  readonly target?: string;
}

export type ExampleStatus = 'completed' | 'failed';

/**
 * Persisted result of processing one example
 */
export interface OutputRecord {
  index: number;
  task: string;
  strategy: string;
  input: string;
  target: string | null;
  status: ExampleStatus;
  answer: string | null;
  rawOutput: string | null;
  termination: TerminationReason | null;
  rounds: number;
  transcript: TranscriptEntry[];
  error?: string;
  durationMs: number;
}

export type StrategyMode = 'scaffold' | 'single';

export type StrategyName =
  | 'meta'
  | 'meta-no-python'
  | 'multipersona'
  | 'zero-shot-cot'
  | 'static-expert'
  | 'dynamic-expert'
  | 'standard';

/**
 * Resolved prompting strategy for a run
 */
export interface StrategyConfig {
  name: StrategyName;
  mode: StrategyMode;
  questionPrefix: string;
  questionSuffix: string;
  expertPrompting: boolean;
}

/**
 * Written once per run directory as run.json
 */
export interface RunManifest {
  task: string;
  strategy: StrategyConfig;
  model: string;
  inputPath: string;
  maxExamples: number;
  scaffold: ScaffoldOptions;
  promptConfig: PromptConfig;
  startedAt: string;
}

export interface SkippedLine {
  line: number;
  reason: string;
}

export interface RunSummary {
  outputDirectory: string;
  completed: number;
  failed: number;
  skipped: number;
}
