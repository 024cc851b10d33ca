/**
 * Tests for retry backoff and withRetry
 */

import { describe, it, expect, vi } from 'vitest';
import {
  AuthenticationError,
  LLMError,
  ServerError,
  TimeoutError,
  calculateRetryDelay,
  mergeRetryConfig,
  shouldRetry,
  withRetry,
} from '../../lib/src/llm/index.js';
import type { RetryEvent } from '../../lib/src/llm/types.js';

const NO_JITTER = mergeRetryConfig({ jitter: false });

describe('calculateRetryDelay', () => {
  it('should back off exponentially', () => {
    expect(calculateRetryDelay(1, NO_JITTER)).toBe(1000);
    expect(calculateRetryDelay(2, NO_JITTER)).toBe(2000);
    expect(calculateRetryDelay(3, NO_JITTER)).toBe(4000);
  });

  it('should cap the delay at maxDelayMs', () => {
    const config = mergeRetryConfig({ jitter: false, maxDelayMs: 3000 });

    expect(calculateRetryDelay(5, config)).toBe(3000);
  });

  it('should prefer a provider retry-after', () => {
    expect(calculateRetryDelay(3, NO_JITTER, 2500)).toBe(2500);
    expect(calculateRetryDelay(1, NO_JITTER, 120000)).toBe(60000);
  });

  it('should apply jitter around the base delay', () => {
    const config = mergeRetryConfig({ jitterFactor: 0.25 });

    expect(calculateRetryDelay(1, config, undefined, () => 0.5)).toBe(1000);
    expect(calculateRetryDelay(1, config, undefined, () => 1)).toBe(1125);
    expect(calculateRetryDelay(1, config, undefined, () => 0)).toBe(875);
  });
});

describe('shouldRetry', () => {
  it('should retry transient errors', () => {
    expect(shouldRetry(new TimeoutError('slow', 'llama-cpp'), NO_JITTER)).toBe(true);
    expect(shouldRetry(new ServerError('down', 'llama-cpp'), NO_JITTER)).toBe(true);
  });

  it('should not retry permanent errors', () => {
    expect(shouldRetry(new AuthenticationError('bad key', 'anthropic'), NO_JITTER)).toBe(false);
  });

  it('should only retry configured codes', () => {
    const config = mergeRetryConfig({ retryableErrorCodes: ['rate_limit'] });

    expect(shouldRetry(new TimeoutError('slow', 'llama-cpp'), config)).toBe(false);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(fn, { provider: 'llama-cpp' })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry a transient failure', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TimeoutError('slow', 'llama-cpp', 0))
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, {
      provider: 'llama-cpp',
      config: { maxRetries: 2, initialDelayMs: 0, jitter: false },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should not retry a permanent failure', async () => {
    const error = new AuthenticationError('bad key', 'anthropic');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { provider: 'anthropic', config: { maxRetries: 3 } })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should emit events and rethrow once retries are used up', async () => {
    const events: RetryEvent[] = [];
    const fn = vi.fn().mockRejectedValue(new ServerError('down', 'llama-cpp', 0));

    await expect(
      withRetry(fn, {
        provider: 'llama-cpp',
        config: { maxRetries: 2, initialDelayMs: 0, jitter: false },
        onRetryEvent: (event) => {
          events.push(event);
        },
      })
    ).rejects.toBeInstanceOf(ServerError);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(events.map((e) => [e.type, e.attemptNumber])).toEqual([
      ['attempt_failed', 1],
      ['retrying', 1],
      ['attempt_failed', 2],
      ['retrying', 2],
      ['attempt_failed', 3],
      ['max_retries_exceeded', 3],
    ]);
    expect(events[1]?.nextDelayMs).toBe(0);
    expect(events.every((e) => e.maxRetries === 2)).toBe(true);
  });

  it('should make a single attempt when retries are disabled', async () => {
    const events: RetryEvent[] = [];
    const fn = vi.fn().mockRejectedValue(new TimeoutError('slow', 'llama-cpp'));

    await expect(
      withRetry(fn, {
        provider: 'llama-cpp',
        config: { maxRetries: 0 },
        onRetryEvent: (event) => {
          events.push(event);
        },
      })
    ).rejects.toBeInstanceOf(TimeoutError);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(events.map((e) => e.type)).toEqual(['attempt_failed']);
  });

  it('should wrap unknown errors without retrying', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('unexpected'));

    const error = await withRetry(fn, { provider: 'llama-cpp' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMError);
    if (error instanceof LLMError) {
      expect(error.code).toBe('unknown');
      expect(error.message).toBe('unexpected');
      expect(error.provider).toBe('llama-cpp');
    }
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
