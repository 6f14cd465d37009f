/**
 * metaprompt-lab - Task Catalogue
 * Task descriptions keyed by task name, read from prompts/tasks.json
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { TASKS_FILE } from './paths.js';

export type TaskCatalogue = Readonly<Record<string, string>>;

export async function loadTaskCatalogue(filePath: string = TASKS_FILE): Promise<TaskCatalogue> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot load task catalogue ${filePath}: ${getErrorMessage(error)}`, {
      context: { path: filePath },
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Task catalogue ${filePath} must be an object of task descriptions`);
  }

  const catalogue: Record<string, string> = {};
  for (const [task, description] of Object.entries(parsed)) {
    if (typeof description !== 'string') {
      throw new ConfigurationError(`Task "${task}" in ${filePath} has no text description`, {
        context: { task },
      });
    }
    catalogue[task] = description;
  }
  return catalogue;
}

export function getTaskDescription(catalogue: TaskCatalogue, task: string): string {
  if (!Object.hasOwn(catalogue, task)) {
    throw new ConfigurationError(`Invalid task name: ${task}. Known tasks: ${Object.keys(catalogue).join(', ')}`, {
      context: { task },
    });
  }
  return catalogue[task];
}
