/**
 * metaprompt-lab - Dataset Loader
 * JSONL datasets: one {"input": ..., "target": ...} object per line
 */

import { readFile } from 'node:fs/promises';
import { DatasetError, getErrorMessage } from '../core/errors.js';
import { logger } from '../services/Logger.js';
import type { SkippedLine, TaskExample } from '../types/index.js';

export interface Dataset {
  path: string;
  examples: TaskExample[];
  skipped: SkippedLine[];
}

/**
 * Parse one dataset line. Returns the reason it is unusable instead of throwing.
 */
export function parseExampleLine(line: string, index: number): TaskExample | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error: unknown) {
    return `invalid JSON (${getErrorMessage(error)})`;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return 'not a JSON object';
  }
  if (!('input' in parsed) || typeof parsed.input !== 'string') {
    return 'missing string "input"';
  }

  const target = 'target' in parsed ? parsed.target : undefined;
  if (target === undefined || target === null) {
    return { index, input: parsed.input };
  }
  if (typeof target !== 'string' && typeof target !== 'number') {
    return '"target" must be a string or number';
  }
  return { index, input: parsed.input, target: String(target) };
}

/**
 * Load a dataset. Unreadable or empty files are fatal; malformed lines are
 * skipped with a warning and still consume their index.
 */
export async function loadDataset(filePath: string): Promise<Dataset> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new DatasetError(`Cannot read dataset ${filePath}: ${getErrorMessage(error)}`, filePath, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const examples: TaskExample[] = [];
  const skipped: SkippedLine[] = [];
  let index = 0;

  content.split(/\r?\n/).forEach((line, lineIndex) => {
    if (line.trim() === '') return;

    const result = parseExampleLine(line, index);
    if (typeof result === 'string') {
      skipped.push({ line: lineIndex + 1, reason: result });
      logger.warn(`Skipping ${filePath}:${lineIndex + 1}: ${result}`);
    } else {
      examples.push(result);
    }
    index++;
  });

  if (examples.length === 0) {
    throw new DatasetError(`Dataset ${filePath} contains no usable examples`, filePath);
  }

  return { path: filePath, examples, skipped };
}
