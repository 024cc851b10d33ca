/**
 * Retry with exponential backoff and jitter for transient language model
 * failures (rate limits, timeouts, 5xx, dropped connections).
 */

import {
  type LLMProvider,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
  RetryConfigSchema,
} from './types.js';
import { AbortedError, LLMError } from './errors.js';

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before retry number `attemptNumber` (1-based). A provider supplied
 * retry-after wins over the computed backoff; both are capped at maxDelayMs.
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: RetryConfig,
  errorRetryAfterMs?: number,
  random: () => number = Math.random
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  let delay = Math.min(
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1),
    config.maxDelayMs
  );

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay = Math.max(0, delay + (random() - 0.5) * jitterRange);
  }

  return Math.round(delay);
}

export function shouldRetry(error: LLMError, config: RetryConfig): boolean {
  if (!error.retryable) {
    return false;
  }
  return config.retryableErrorCodes.some((code) => code === error.code);
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): RetryConfig {
  return RetryConfigSchema.parse(config ?? {});
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// withRetry
// ============================================================================

export interface WithRetryOptions {
  /** Provider used to wrap non-LLM errors */
  provider: LLMProvider;
  config?: Partial<RetryConfig> | undefined;
  onRetryEvent?: RetryEventHandler | undefined;
  /** No further attempt starts once this is aborted */
  signal?: AbortSignal | undefined;
}

/**
 * Run `fn`, retrying retryable LLMErrors until `maxRetries` is used up.
 * Anything thrown by `fn` that is not an LLMError is wrapped as UNKNOWN and
 * not retried.
 *
 * @example
 * ```typescript
 * const text = await withRetry(() => postCompletion(body), {
 *   provider: 'llama-cpp',
 *   config: { maxRetries: 2, initialDelayMs: 500 },
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions
): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const emit = (event: Omit<RetryEvent, 'timestamp' | 'maxRetries'>): void => {
    options.onRetryEvent?.({ ...event, maxRetries: config.maxRetries, timestamp: new Date() });
  };

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new AbortedError('Request aborted', options.provider, options.signal.reason);
    }

    try {
      return await fn();
    } catch (error) {
      const llmError = LLMError.fromError(error, options.provider);
      emit({ type: 'attempt_failed', attemptNumber: attempt, error: llmError.info });

      if (!shouldRetry(llmError, config)) {
        throw llmError;
      }

      if (attempt > config.maxRetries) {
        if (config.maxRetries > 0) {
          emit({ type: 'max_retries_exceeded', attemptNumber: attempt, error: llmError.info });
        }
        throw llmError;
      }

      const delayMs = calculateRetryDelay(attempt, config, llmError.retryAfterMs);
      emit({ type: 'retrying', attemptNumber: attempt, error: llmError.info, nextDelayMs: delayMs });
      await sleep(delayMs);
    }
  }
}
