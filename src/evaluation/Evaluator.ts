/**
 * metaprompt-lab - Evaluator
 * Scores the output records of run directories against their targets
 */

import { stat } from 'node:fs/promises';
import path from 'node:path';
import { glob } from 'glob';
import { CodeExecutor, type CodeRunner } from '../core/execution/CodeExecutor.js';
import { readOutputRecords } from '../harness/outputs.js';
import { getScorer, type Scorer } from './scorers.js';
import { logger } from '../services/Logger.js';

export interface ExampleScore {
  index: number | null;
  file: string;
  correct: boolean;
  answer: string | null;
  target: string | null;
  error?: string;
}

export interface EvaluationReport {
  directory: string;
  task: string;
  correct: number;
  total: number;
  accuracy: number;
  examples: ExampleScore[];
}

export interface EvaluateOptions {
  /** Glob of run directories, e.g. "outputs/*" */
  directory: string;
  /** Task name; also selects run directories whose name contains it */
  task: string;
  codeRunner?: CodeRunner;
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Run directories matching the glob whose name contains the task
 */
export async function findRunDirectories(pattern: string, task: string): Promise<string[]> {
  const matches = await glob(pattern);
  const directories: string[] = [];
  for (const match of matches.sort()) {
    if (path.basename(match).includes(task) && (await isDirectory(match))) {
      directories.push(match);
    }
  }
  return directories;
}

export async function evaluateDirectory(directory: string, task: string, scorer: Scorer, runner: CodeRunner): Promise<EvaluationReport> {
  const examples: ExampleScore[] = [];

  for (const result of await readOutputRecords(directory)) {
    if ('error' in result) {
      examples.push({ index: null, file: result.file, correct: false, answer: null, target: null, error: result.error });
      continue;
    }

    const { record } = result;
    if (record.status !== 'completed' || record.answer === null || (scorer.requiresTarget && record.target === null)) {
      examples.push({ index: record.index, file: result.file, correct: false, answer: record.answer, target: record.target });
      continue;
    }

    const answer = scorer.lowercase ? record.answer.toLowerCase().trim() : record.answer;
    const rawTarget = record.target ?? '';
    const target = scorer.lowercase ? rawTarget.toLowerCase() : rawTarget;
    const correct = await scorer.score({ input: record.input, answer, target }, runner);
    examples.push({ index: record.index, file: result.file, correct, answer: record.answer, target: record.target });
  }

  const correct = examples.filter(example => example.correct).length;
  return {
    directory,
    task,
    correct,
    total: examples.length,
    accuracy: examples.length === 0 ? 0 : correct / examples.length,
    examples,
  };
}

/**
 * Evaluate every matching run directory; directories without records are left out.
 */
export async function evaluateRuns(options: EvaluateOptions): Promise<EvaluationReport[]> {
  const scorer = getScorer(options.task);
  const runner = options.codeRunner ?? new CodeExecutor();
  const reports: EvaluationReport[] = [];

  for (const directory of await findRunDirectories(options.directory, options.task)) {
    const report = await evaluateDirectory(directory, options.task, scorer, runner);
    if (report.total === 0) {
      logger.debug(`No output records in ${directory}`);
      continue;
    }
    reports.push(report);
  }

  return reports;
}
