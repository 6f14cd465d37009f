/**
 * metaprompt-lab - Prompt Configuration
 * Loads and validates role configuration files (prompts/meta-config.json)
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import type {
  ChatMessage,
  ConductorSettings,
  PromptConfig,
  RoleParameters,
  RoleSettings,
} from '../types/index.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fail(field: string, expected: string): never {
  throw new ConfigurationError(`Invalid prompt configuration: ${field} must be ${expected}`, {
    context: { field },
  });
}

function validateMessages(value: unknown, field: string): ChatMessage[] {
  if (!Array.isArray(value)) fail(field, 'an array of messages');

  return value.map((item: unknown, index: number): ChatMessage => {
    const at = `${field}[${index}]`;
    if (!isRecord(item)) fail(at, 'an object');
    const { role, content } = item;
    if (role !== 'system' && role !== 'user' && role !== 'assistant') {
      fail(`${at}.role`, '"system", "user" or "assistant"');
    }
    if (typeof content !== 'string') fail(`${at}.content`, 'a string');
    return { role, content };
  });
}

function validateNumber(value: unknown, field: string, min: number, max: number, integer = false): number {
  if (typeof value !== 'number' || Number.isNaN(value) || value < min || value > max) {
    fail(field, `a number between ${min} and ${max}`);
  }
  if (integer && !Number.isInteger(value)) fail(field, 'an integer');
  return value;
}

function validateParameters(value: unknown, field: string): RoleParameters {
  if (!isRecord(value)) fail(field, 'an object');
  return {
    temperature: validateNumber(value.temperature, `${field}.temperature`, 0, 2),
    topP: validateNumber(value.topP, `${field}.topP`, 0, 1),
    maxTokens: validateNumber(value.maxTokens, `${field}.maxTokens`, 1, 1_000_000, true),
    numReturnSequences: validateNumber(value.numReturnSequences, `${field}.numReturnSequences`, 1, 16, true),
  };
}

function validateRole(value: unknown, field: string): RoleSettings {
  if (!isRecord(value)) fail(field, 'an object');
  return {
    messages: validateMessages(value.messages, `${field}.messages`),
    parameters: validateParameters(value.parameters, `${field}.parameters`),
  };
}

/**
 * Validate parsed JSON as a PromptConfig
 */
export function validatePromptConfig(value: unknown): PromptConfig {
  if (!isRecord(value)) fail('root', 'an object');

  const conductorRole = validateRole(value.conductor, 'conductor');
  const conductorRaw: Record<string, unknown> = isRecord(value.conductor) ? value.conductor : {};
  const { errorMessage, finalAnswerIndicator } = conductorRaw;
  if (typeof errorMessage !== 'string' || errorMessage.trim() === '') {
    fail('conductor.errorMessage', 'a non-empty string');
  }
  if (typeof finalAnswerIndicator !== 'string' || finalAnswerIndicator.trim() === '') {
    fail('conductor.finalAnswerIndicator', 'a non-empty string');
  }

  const conductor: ConductorSettings = { ...conductorRole, errorMessage, finalAnswerIndicator };

  return {
    conductor,
    expert: validateRole(value.expert, 'expert'),
    summarizer: validateRole(value.summarizer, 'summarizer'),
  };
}

export async function loadPromptConfig(filePath: string): Promise<PromptConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read prompt configuration ${filePath}: ${getErrorMessage(error)}`, {
      context: { path: filePath },
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    throw new ConfigurationError(`Prompt configuration ${filePath} is not valid JSON: ${getErrorMessage(error)}`, {
      context: { path: filePath },
    });
  }

  return validatePromptConfig(parsed);
}

/**
 * Sampling overrides from the command line apply to the conductor and
 * expert roles; the summarizer keeps its own settings.
 */
export function applyParameterOverrides(config: PromptConfig, overrides: Partial<RoleParameters>): PromptConfig {
  const merge = (base: RoleParameters): RoleParameters => ({
    temperature: overrides.temperature ?? base.temperature,
    topP: overrides.topP ?? base.topP,
    maxTokens: overrides.maxTokens ?? base.maxTokens,
    numReturnSequences: overrides.numReturnSequences ?? base.numReturnSequences,
  });

  return {
    conductor: { ...config.conductor, parameters: merge(config.conductor.parameters) },
    expert: { ...config.expert, parameters: merge(config.expert.parameters) },
    summarizer: config.summarizer,
  };
}
