/**
 * Application error types
 * Each error type maps to a specific HTTP status code; pipeline errors also carry
 * the classification recorded on a failed job.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type ErrorClassification =
  | 'ValidationError'
  | 'DependencyError'
  | 'GenerationUnavailableError'
  | 'GenerationParseError'
  | 'PersistenceError'
  | 'NotifyError'
  | 'Cancelled';

/**
 * Base for errors raised inside a pipeline stage
 */
export abstract class PipelineError extends AppError {
  abstract readonly classification: ErrorClassification;
  abstract readonly retriable: boolean;
}

/**
 * Bad input (400 Bad Request) - never retried
 */
export class ValidationError extends PipelineError {
  readonly classification = 'ValidationError';
  readonly retriable = false;

  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * External lookup or missing credentials (502 Bad Gateway)
 */
export class DependencyError extends PipelineError {
  readonly classification = 'DependencyError';

  constructor(
    message: string,
    details?: unknown,
    public readonly retriable: boolean = true
  ) {
    super(message, 'DEPENDENCY_ERROR', 502, details);
  }
}

/**
 * Generation backend could not be reached, timed out or rate limited (503)
 */
export class GenerationUnavailableError extends PipelineError {
  readonly classification = 'GenerationUnavailableError';
  readonly retriable = true;

  constructor(message: string, details?: unknown) {
    super(message, 'GENERATION_UNAVAILABLE', 503, details);
  }
}

/**
 * Generation backend answered with unusable output (502)
 */
export class GenerationParseError extends PipelineError {
  readonly classification = 'GenerationParseError';
  readonly retriable = false;

  constructor(message: string, details?: unknown) {
    super(message, 'GENERATION_PARSE_ERROR', 502, details);
  }
}

/**
 * Storage read/write failed or timed out (500)
 */
export class PersistenceError extends PipelineError {
  readonly classification = 'PersistenceError';
  readonly retriable = false;

  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', 500, details);
  }
}

export class NotifyError extends PipelineError {
  readonly classification = 'NotifyError';
  readonly retriable = false;

  constructor(message: string, details?: unknown) {
    super(message, 'NOTIFY_ERROR', 502, details);
  }
}

/**
 * Cancellation observed at a stage boundary (409 Conflict)
 */
export class CancelledError extends PipelineError {
  readonly classification = 'Cancelled';
  readonly retriable = false;

  constructor(message = 'Job was cancelled') {
    super(message, 'CANCELLED', 409);
  }
}

/**
 * LLM provider errors (502 Bad Gateway)
 */
export type LLMErrorReason = 'unavailable' | 'invalid_output' | 'not_configured';

export class LLMError extends AppError {
  constructor(
    message: string,
    public readonly reason: LLMErrorReason = 'unavailable',
    details?: unknown
  ) {
    super(message, 'LLM_API_ERROR', 502, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Job status change not allowed by the state graph (409 Conflict)
 */
export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid job status transition: ${from} -> ${to}`, 'INVALID_TRANSITION', 409, {
      from,
      to,
    });
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}

/**
 * Map anything thrown inside a stage to a pipeline error.
 * Unclassified errors take the stage's fallback classification.
 */
export function classifyError(
  error: unknown,
  fallback: (message: string, cause: unknown) => PipelineError
): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  return fallback(errorMessage(error), error);
}
