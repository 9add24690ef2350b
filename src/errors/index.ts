/**
 * Error Types
 *
 * Typed errors for the explorer. Missing upstream data is never an error
 * (it becomes `null`); these cover invalid input and failed collaborators.
 */

/** Upstream platforms the explorer talks to */
export type UpstreamPlatform = 'kalshi' | 'odds-api' | 'espn' | 'gemini' | 'openai';

/** Base error for all explorer errors */
export class ExplorerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExplorerError';
  }
}

/** Error fetching data from an upstream API */
export class ApiError extends ExplorerError {
  constructor(
    message: string,
    public readonly platform: UpstreamPlatform,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { platform, statusCode, ...context });
    this.name = 'ApiError';
  }
}

/** Error parsing or validating configuration and request data */
export class DataValidationError extends ExplorerError {
  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { field, ...context });
    this.name = 'DataValidationError';
  }
}

/** American odds that cannot be converted (zero or non-finite) */
export class InvalidOddsError extends ExplorerError {
  constructor(public readonly odds: number) {
    super(`Invalid American odds: ${odds}`, 'INVALID_ODDS', { odds });
    this.name = 'InvalidOddsError';
  }
}

export type ProviderErrorKind = 'auth' | 'rate_limit' | 'server' | 'empty';

/** Failure of a text-generation provider */
export class ProviderError extends ExplorerError {
  constructor(
    public readonly provider: 'gemini' | 'openai',
    message: string,
    public readonly kind: ProviderErrorKind
  ) {
    super(message, 'PROVIDER_ERROR', { provider, kind });
    this.name = 'ProviderError';
  }
}

/** Requested sport, market or event does not exist */
export class NotFoundError extends ExplorerError {
  constructor(
    public readonly resource: 'sport' | 'market' | 'event',
    public readonly id: string
  ) {
    super(`Unknown ${resource}: ${id}`, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
  }
}

/**
 * Type guard to check if an error is an ExplorerError
 */
export function isExplorerError(error: unknown): error is ExplorerError {
  return error instanceof ExplorerError;
}

/**
 * Classify an HTTP status from a provider response.
 */
export function classifyHttpError(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  return 'server';
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
