/**
 * Language Model Error Types
 *
 * One subclass per failure class so callers can branch with `instanceof`
 * or the `isXError` guards instead of comparing codes.
 */

import {
  type LLMProvider,
  type LLMErrorInfo,
  LLMErrorCode,
} from './types.js';

// =============================================================================
// Base Error
// =============================================================================

export class LLMError extends Error {
  readonly info: LLMErrorInfo;

  constructor(info: LLMErrorInfo) {
    super(info.message);
    this.name = 'LLMError';
    this.info = info;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }

  get code(): LLMErrorCode {
    return this.info.code;
  }

  get provider(): LLMProvider {
    return this.info.provider;
  }

  get retryable(): boolean {
    return this.info.retryable;
  }

  get retryAfterMs(): number | undefined {
    return this.info.retryAfterMs;
  }

  /**
   * Wrap an arbitrary thrown value. LLMErrors pass through unchanged.
   */
  static fromError(error: unknown, provider: LLMProvider): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    return new LLMError({
      code: LLMErrorCode.UNKNOWN,
      message: error instanceof Error ? error.message : String(error),
      provider,
      retryable: false,
      originalError: error,
    });
  }
}

// =============================================================================
// Specific Errors
// =============================================================================

/**
 * HTTP 429 from the provider. Retryable after `retryAfterMs`.
 */
export class RateLimitError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.RATE_LIMIT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 60000,
      originalError,
    });
    this.name = 'RateLimitError';
  }
}

export class AuthenticationError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.AUTH_ERROR,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_REQUEST,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidRequestError';
  }
}

export class ModelNotFoundError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.MODEL_NOT_FOUND,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'ModelNotFoundError';
  }
}

/**
 * The request exceeded its configured duration. Self-hosted servers that
 * scale to zero hit this on a cold start, so it is retryable.
 */
export class TimeoutError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.TIMEOUT,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 1000,
      originalError,
    });
    this.name = 'TimeoutError';
  }
}

export class ServerError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.SERVER_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 5000,
      originalError,
    });
    this.name = 'ServerError';
  }
}

/**
 * No response at all: refused connection, DNS failure, reset socket.
 */
export class NetworkError extends LLMError {
  constructor(
    message: string,
    provider: LLMProvider,
    retryAfterMs?: number,
    originalError?: unknown
  ) {
    super({
      code: LLMErrorCode.NETWORK_ERROR,
      message,
      provider,
      retryable: true,
      retryAfterMs: retryAfterMs ?? 2000,
      originalError,
    });
    this.name = 'NetworkError';
  }
}

export class InvalidResponseError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.INVALID_RESPONSE,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'InvalidResponseError';
  }
}

/**
 * The caller's AbortSignal fired. Never retried.
 */
export class AbortedError extends LLMError {
  constructor(message: string, provider: LLMProvider, originalError?: unknown) {
    super({
      code: LLMErrorCode.ABORTED,
      message,
      provider,
      retryable: false,
      originalError,
    });
    this.name = 'AbortedError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isRetryableError(error: unknown): boolean {
  return isLLMError(error) && error.retryable;
}

// =============================================================================
// HTTP Status Mapping
// =============================================================================

/**
 * Map an HTTP status from a provider to a typed error. Returns undefined for
 * statuses that are not errors.
 */
export function errorFromHttpStatus(
  status: number,
  message: string,
  provider: LLMProvider,
  originalError?: unknown,
  retryAfterMs?: number
): LLMError | undefined {
  if (status === 401 || status === 403) {
    return new AuthenticationError(`Authentication failed: ${message}`, provider, originalError);
  }
  if (status === 429) {
    return new RateLimitError(`Rate limit exceeded: ${message}`, provider, retryAfterMs, originalError);
  }
  if (status === 404) {
    return new ModelNotFoundError(`Model not found: ${message}`, provider, originalError);
  }
  if (status >= 500) {
    return new ServerError(`Server error: ${message}`, provider, retryAfterMs, originalError);
  }
  if (status >= 400) {
    return new InvalidRequestError(`Invalid request: ${message}`, provider, originalError);
  }
  return undefined;
}
