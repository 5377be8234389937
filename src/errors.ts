/**
 * Base error class for the context manager
 */
export class AdaptiveContextError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'AdaptiveContextError';
    this.code = code;
    this.context = context;

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Thrown when configuration is invalid
 */
export class ConfigurationError extends AdaptiveContextError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      `Invalid configuration: ${message}`,
      'CONFIGURATION_ERROR',
      context
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationError extends AdaptiveContextError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(
      `Validation failed: ${message}`,
      'VALIDATION_ERROR',
      context
    );
    this.name = 'ValidationError';
  }
}

/**
 * Thrown when a session is not found
 */
export class SessionNotFoundError extends AdaptiveContextError {
  constructor(sessionId: string) {
    super(
      `Session not found: ${sessionId}`,
      'SESSION_NOT_FOUND',
      { sessionId }
    );
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Check if an error belongs to this library
 */
export function isAdaptiveContextError(error: unknown): error is AdaptiveContextError {
  return error instanceof AdaptiveContextError;
}

/**
 * Wrap an unknown error in an AdaptiveContextError
 */
export function wrapError(error: unknown, operation: string): AdaptiveContextError {
  if (error instanceof AdaptiveContextError) {
    return error;
  }

  if (error instanceof Error) {
    return new AdaptiveContextError(
      `${operation} failed: ${error.message}`,
      'OPERATION_FAILED',
      { operation, originalError: error.message }
    );
  }

  return new AdaptiveContextError(
    `Unknown error during ${operation}: ${String(error)}`,
    'UNKNOWN_ERROR',
    { operation, originalError: error }
  );
}
