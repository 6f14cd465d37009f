/**
 * metaprompt-lab - Configuration Manager
 * Defaults, then environment (.env is loaded by the CLI through dotenv), then CLI overrides
 */

import { ConfigurationError } from '../core/errors.js';
import type { RetryPolicy } from '../core/retry.js';
import type { LogLevel, ProviderConfig, ProviderType } from '../types/index.js';
import {
  DEFAULT_CODE_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MODELS,
  DEFAULT_OUTPUT_DIRECTORY,
  DEFAULT_PYTHON_INTERPRETER,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_DELAY_MS,
} from './constants.js';

export interface ExecutionConfig {
  pythonInterpreter: string;
  codeTimeoutMs: number;
}

export interface AppConfig {
  provider: ProviderConfig;
  retry: RetryPolicy;
  execution: ExecutionConfig;
  logLevel: LogLevel;
  outputDirectory: string;
}

export interface ProviderOverrides {
  type?: ProviderType;
  model?: string;
}

type Env = Record<string, string | undefined>;

const PROVIDER_TYPES: readonly ProviderType[] = ['gemini', 'openai'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isProviderType(value: string): value is ProviderType {
  return PROVIDER_TYPES.some(type => type === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function parsePositiveInteger(value: string): number | null {
  if (!/^\d+$/.test(value.trim())) return null;
  const parsed = Number(value);
  return parsed > 0 ? parsed : null;
}

/**
 * Check the environment variables the configuration reads.
 * Returns a list of problems; empty when everything is usable.
 */
export function validateEnvVars(env: Env = process.env): string[] {
  const problems: string[] = [];

  const provider = env.METAPROMPT_PROVIDER;
  if (provider && !isProviderType(provider)) {
    problems.push(`METAPROMPT_PROVIDER must be one of ${PROVIDER_TYPES.join(', ')} (got "${provider}")`);
  }

  const level = env.METAPROMPT_LOG_LEVEL;
  if (level && !isLogLevel(level)) {
    problems.push(`METAPROMPT_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${level}")`);
  }

  const codeTimeout = env.METAPROMPT_CODE_TIMEOUT_MS;
  if (codeTimeout && parsePositiveInteger(codeTimeout) === null) {
    problems.push(`METAPROMPT_CODE_TIMEOUT_MS must be a positive integer (got "${codeTimeout}")`);
  }

  if (env.OPENAI_BASE_URL) {
    try {
      new URL(env.OPENAI_BASE_URL);
    } catch {
      problems.push(`OPENAI_BASE_URL is not a valid URL (got "${env.OPENAI_BASE_URL}")`);
    }
  }

  return problems;
}

export class ConfigManager {
  private config: AppConfig;
  private env: Env;

  constructor(env: Env = process.env) {
    this.env = env;

    const problems = validateEnvVars(env);
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid environment: ${problems.join('; ')}`);
    }

    const type = env.METAPROMPT_PROVIDER && isProviderType(env.METAPROMPT_PROVIDER)
      ? env.METAPROMPT_PROVIDER
      : 'gemini';
    const logLevel = env.METAPROMPT_LOG_LEVEL && isLogLevel(env.METAPROMPT_LOG_LEVEL)
      ? env.METAPROMPT_LOG_LEVEL
      : 'info';

    const codeTimeoutMs = env.METAPROMPT_CODE_TIMEOUT_MS
      ? parsePositiveInteger(env.METAPROMPT_CODE_TIMEOUT_MS)
      : null;

    this.config = {
      provider: this.providerFor(type, env.METAPROMPT_MODEL),
      retry: {
        maxAttempts: DEFAULT_MAX_ATTEMPTS,
        delayMs: DEFAULT_RETRY_DELAY_MS,
      },
      execution: {
        pythonInterpreter: env.METAPROMPT_PYTHON || DEFAULT_PYTHON_INTERPRETER,
        codeTimeoutMs: codeTimeoutMs ?? DEFAULT_CODE_TIMEOUT_MS,
      },
      logLevel,
      outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    };
  }

  /**
   * Connection settings for a provider. The API key always comes from the
   * variable belonging to that provider.
   */
  private providerFor(type: ProviderType, model?: string): ProviderConfig {
    if (type === 'openai') {
      return {
        type,
        model: model || DEFAULT_MODELS.openai,
        apiKey: this.env.OPENAI_API_KEY,
        baseUrl: this.env.OPENAI_BASE_URL,
        timeout: DEFAULT_REQUEST_TIMEOUT_MS,
      };
    }
    return {
      type,
      model: model || DEFAULT_MODELS.gemini,
      apiKey: this.env.GEMINI_API_KEY,
      timeout: DEFAULT_REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * Apply CLI provider/model flags. Switching provider without a model
   * falls back to METAPROMPT_MODEL only when the provider did not change.
   */
  applyOverrides(overrides: ProviderOverrides): ProviderConfig {
    const type = overrides.type ?? this.config.provider.type;
    const model = overrides.model
      ?? (type === this.config.provider.type ? this.config.provider.model : undefined);
    this.config.provider = this.providerFor(type, model);
    return this.config.provider;
  }

  get provider(): ProviderConfig {
    return this.config.provider;
  }

  get retry(): RetryPolicy {
    return this.config.retry;
  }

  get execution(): ExecutionConfig {
    return this.config.execution;
  }

  get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  get all(): AppConfig {
    return { ...this.config };
  }
}

// Singleton instance
let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
