/**
 * metaprompt-lab - Public API
 */

// Types
export * from './types/index.js';

// Core
export * from './core/errors.js';
export { withRetry, withTimeout, isRetryableError, DEFAULT_RETRY_POLICY, type RetryPolicy, type RetryOptions } from './core/retry.js';
export { LanguageModel, type GenerateOptions } from './core/LanguageModel.js';
export {
  CodeExecutor,
  formatExecutionOutput,
  type CodeRunner,
  type CodeExecutionResult,
  type CodeExecutorOptions,
} from './core/execution/CodeExecutor.js';
export * from './core/scaffold/index.js';

// Providers
export * from './providers/index.js';

// Configuration
export { ConfigManager, getConfig, resetConfig, validateEnvVars, type AppConfig } from './config/config.js';
export { loadPromptConfig, validatePromptConfig, applyParameterOverrides } from './config/promptConfig.js';
export { loadTaskCatalogue, getTaskDescription, type TaskCatalogue } from './config/tasks.js';
export { STRATEGY_PRESETS, listStrategies, isStrategyName, type StrategyPreset } from './config/strategies.js';

// Harness & evaluation
export * from './harness/index.js';
export * from './evaluation/index.js';

// Services
export { Logger, logger } from './services/Logger.js';
