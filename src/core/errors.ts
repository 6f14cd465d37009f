/**
 * metaprompt-lab - Error Hierarchy
 * Error classes shared by providers, scaffold, harness and evaluator
 */

/**
 * Error options for MetaPromptError
 */
export interface MetaPromptErrorOptions {
  code?: string;
  recoverable?: boolean;
  retryable?: boolean;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  recoverable: boolean;
  retryable: boolean;
  context: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all metaprompt-lab errors
 */
export class MetaPromptError extends Error {
  code: string;
  recoverable: boolean;
  retryable: boolean;
  context: Record<string, unknown>;
  timestamp: Date;

  constructor(message: string, options: MetaPromptErrorOptions = {}) {
    super(message);
    this.name = 'MetaPromptError';
    this.code = options.code ?? 'METAPROMPT_ERROR';
    this.recoverable = options.recoverable ?? false;
    this.retryable = options.retryable ?? false;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    if (options.cause) {
      this.cause = options.cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging and output records
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      retryable: this.retryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack
    };
  }
}

/**
 * Provider-related errors
 */
export class ProviderError extends MetaPromptError {
  provider: string;
  status?: number;

  constructor(message: string, provider: string, options: MetaPromptErrorOptions & { status?: number } = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'PROVIDER_ERROR',
      retryable: options.retryable ?? true
    });
    this.name = 'ProviderError';
    this.provider = provider;
    this.context.provider = provider;
    if (options.status !== undefined) {
      this.status = options.status;
      this.context.status = options.status;
    }
  }
}

/**
 * Gemini-specific errors
 */
export class GeminiError extends ProviderError {
  constructor(message: string, options: MetaPromptErrorOptions & { status?: number } = {}) {
    super(message, 'gemini', {
      ...options,
      code: options.code ?? 'GEMINI_ERROR'
    });
    this.name = 'GeminiError';
  }
}

/**
 * OpenAI-compatible endpoint errors
 */
export class OpenAIError extends ProviderError {
  constructor(message: string, options: MetaPromptErrorOptions & { status?: number } = {}) {
    super(message, 'openai', {
      ...options,
      code: options.code ?? 'OPENAI_ERROR'
    });
    this.name = 'OpenAIError';
  }
}

/**
 * Timeout errors
 */
export class TimeoutError extends MetaPromptError {
  timeoutMs: number;

  constructor(message: string, timeoutMs: number, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'TIMEOUT_ERROR',
      retryable: options.retryable ?? true
    });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.context.timeoutMs = timeoutMs;
  }
}

/**
 * Rate limit errors
 */
export class RateLimitError extends MetaPromptError {
  retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'RATE_LIMIT_ERROR',
      retryable: true
    });
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
    if (retryAfterMs) {
      this.context.retryAfterMs = retryAfterMs;
    }
  }
}

/**
 * Configuration errors (fatal for a run)
 */
export class ConfigurationError extends MetaPromptError {
  constructor(message: string, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'CONFIG_ERROR',
      recoverable: false,
      retryable: false
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Dataset loading errors (fatal for a run)
 */
export class DatasetError extends MetaPromptError {
  path: string;

  constructor(message: string, path: string, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'DATASET_ERROR',
      recoverable: false,
      retryable: false
    });
    this.name = 'DatasetError';
    this.path = path;
    this.context.path = path;
  }
}

/**
 * Validation errors
 */
export class ValidationError extends MetaPromptError {
  field?: string;

  constructor(message: string, field?: string, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'VALIDATION_ERROR',
      recoverable: false,
      retryable: false
    });
    this.name = 'ValidationError';
    this.field = field;
    if (field) {
      this.context.field = field;
    }
  }
}

/**
 * Raised when the interpreter process cannot be prepared at all
 */
export class CodeExecutionError extends MetaPromptError {
  constructor(message: string, options: MetaPromptErrorOptions = {}) {
    super(message, {
      ...options,
      code: options.code ?? 'CODE_EXECUTION_ERROR',
      recoverable: true
    });
    this.name = 'CodeExecutionError';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
