/**
 * CLI Configuration - banner, option parsers, model setup and error exit
 *
 * @module bin/cli-config
 */

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { getConfig, isProviderType } from '../src/config/config.js';
import { LanguageModel } from '../src/core/LanguageModel.js';
import { MetaPromptError, getErrorMessage } from '../src/core/errors.js';
import { createProvider } from '../src/providers/index.js';
import { logger } from '../src/services/Logger.js';
import type { ProviderType } from '../src/types/index.js';

export const VERSION = '0.1.0';

export function printBanner(): void {
  logger.banner(`metaprompt v${VERSION}`);
}

// ═══════════════════════════════════════════════════════════════
// OPTION PARSERS
// ═══════════════════════════════════════════════════════════════

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return parsed;
}

export function parseProvider(value: string): ProviderType {
  if (!isProviderType(value)) {
    throw new InvalidArgumentError('Expected "gemini" or "openai".');
  }
  return value;
}

// ═══════════════════════════════════════════════════════════════
// MODEL SETUP
// ═══════════════════════════════════════════════════════════════

export function createLanguageModel(overrides: { provider?: ProviderType; model?: string }): LanguageModel {
  const config = getConfig();
  const providerConfig = config.applyOverrides({ type: overrides.provider, model: overrides.model });
  const provider = createProvider(providerConfig);
  logger.debug(`Provider ${provider.name} (${provider.model}), ${config.retry.maxAttempts} attempts, ${config.retry.delayMs}ms delay`);
  return new LanguageModel(provider, config.retry);
}

/**
 * Print a fatal error and exit with status 1
 */
export function exitWithError(error: unknown): never {
  const prefix = error instanceof MetaPromptError ? `[${error.code}] ` : '';
  console.error(chalk.red(`\n${prefix}${getErrorMessage(error)}`));
  if (logger.isVerbose() && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(1);
}
