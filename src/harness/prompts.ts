/**
 * metaprompt-lab - Question Building
 * Prompt fragments, strategy resolution and the per-example question text
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { PROMPTS_DIR } from '../config/paths.js';
import { STRATEGY_PRESETS, isStrategyName } from '../config/strategies.js';
import type { StrategyConfig } from '../types/index.js';

/**
 * A value ending in `.txt` names a file (as given, else under prompts/)
 * whose content is used verbatim; anything else is literal text.
 */
export async function resolvePromptFragment(value: string, promptsDir: string = PROMPTS_DIR): Promise<string> {
  if (!value.endsWith('.txt')) {
    return value;
  }

  const filePath = existsSync(value) ? value : path.join(promptsDir, value);
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read prompt fragment ${value}: ${getErrorMessage(error)}`, {
      context: { path: filePath },
    });
  }
}

export interface StrategyOverrides {
  questionPrefix?: string;
  questionSuffix?: string;
}

/**
 * Preset for `name` with its prefix and suffix resolved to text
 */
export async function resolveStrategy(
  name: string,
  overrides: StrategyOverrides = {},
  promptsDir: string = PROMPTS_DIR,
): Promise<StrategyConfig> {
  if (!isStrategyName(name)) {
    throw new ConfigurationError(
      `Unknown strategy: ${name}. Available: ${Object.keys(STRATEGY_PRESETS).join(', ')}`,
      { context: { strategy: name } },
    );
  }

  const preset = STRATEGY_PRESETS[name];
  return {
    name,
    mode: preset.mode,
    questionPrefix: await resolvePromptFragment(overrides.questionPrefix ?? preset.questionPrefix, promptsDir),
    questionSuffix: await resolvePromptFragment(overrides.questionSuffix ?? preset.questionSuffix, promptsDir),
    expertPrompting: preset.expertPrompting,
  };
}

export function buildQuestion(strategy: StrategyConfig, description: string, input: string): string {
  return `${strategy.questionPrefix}Question: ${description}\n\n${input}${strategy.questionSuffix}`;
}
