import type { ContextSource } from './types.js';

/**
 * Base error class for context-fusion
 */
export class ContextFusionError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ContextFusionError';
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
export class ConfigurationError extends ContextFusionError {
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
 * A host collaborator (OCR, web search, window detection) failed
 */
export class CollaboratorError extends ContextFusionError {
  readonly source: ContextSource;
  readonly originalError?: Error;

  constructor(source: ContextSource, operation: string, originalError?: Error) {
    super(
      `${source} collaborator failed during ${operation}${originalError ? ` - ${originalError.message}` : ''}`,
      'COLLABORATOR_ERROR',
      { source, operation }
    );
    this.name = 'CollaboratorError';
    this.source = source;
    this.originalError = originalError;
  }
}

/**
 * Thrown when a circuit breaker rejects a call without attempting it
 */
export class CircuitOpenError extends ContextFusionError {
  readonly source: ContextSource;

  constructor(source: ContextSource, retryAt: number) {
    super(
      `${source} circuit is open until ${new Date(retryAt).toISOString()}`,
      'CIRCUIT_OPEN',
      { source, retryAt }
    );
    this.name = 'CircuitOpenError';
    this.source = source;
  }
}

/**
 * Check if an error is a context-fusion error
 */
export function isContextFusionError(error: unknown): error is ContextFusionError {
  return error instanceof ContextFusionError;
}

/**
 * Normalize anything a collaborator threw into a CollaboratorError
 */
export function wrapError(error: unknown, source: ContextSource, operation: string): CollaboratorError {
  if (error instanceof CollaboratorError) {
    return error;
  }

  if (error instanceof Error) {
    return new CollaboratorError(source, operation, error);
  }

  return new CollaboratorError(source, operation, new Error(String(error)));
}
