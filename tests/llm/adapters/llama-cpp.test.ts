/**
 * Unit Tests for the llama.cpp Adapter
 *
 * The HTTP client is replaced by a mock `post`, so no server is needed.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AxiosError, AxiosHeaders, CanceledError } from 'axios';
import {
  COLD_START_TIMEOUT_MESSAGE,
  LlamaCppAdapter,
  createLlamaCppAdapter,
} from '../../../lib/src/llm/adapters/llama-cpp.js';
import {
  AbortedError,
  InvalidRequestError,
  InvalidResponseError,
  NetworkError,
  ServerError,
  TimeoutError,
} from '../../../lib/src/llm/errors.js';
import { createSilentLogger } from '../../../lib/src/logging/index.js';

// =============================================================================
// Mock Setup
// =============================================================================

function createHttpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    status,
    statusText: 'Error',
    data: { error: 'boom' },
    headers: {},
    config,
  });
}

function createCompletionResponse(content: string, extra: Record<string, unknown> = {}) {
  return { data: { content, ...extra }, status: 200 };
}

describe('LlamaCppAdapter', () => {
  let http: { post: ReturnType<typeof vi.fn> };
  let adapter: LlamaCppAdapter;

  beforeEach(() => {
    http = { post: vi.fn() };
    adapter = new LlamaCppAdapter(
      { baseUrl: 'http://localhost:8080/' },
      { http, logger: createSilentLogger(), retry: { maxRetries: 0 } }
    );
  });

  // ===========================================================================
  // Configuration
  // ===========================================================================

  describe('constructor', () => {
    it('should apply defaults', () => {
      const config = adapter.getConfig();

      expect(adapter.provider).toBe('llama-cpp');
      expect(adapter.model).toBe('llama-cpp');
      expect(config.maxTokens).toBe(512);
      expect(config.temperature).toBe(0.3);
      expect(config.timeoutMs).toBe(60000);
    });

    it('should strip trailing slashes from the base URL', () => {
      expect(adapter.baseUrl).toBe('http://localhost:8080');
    });

    it('should reject an invalid base URL', () => {
      expect(() => createLlamaCppAdapter({ baseUrl: 'not-a-url' })).toThrow();
    });
  });

  // ===========================================================================
  // complete
  // ===========================================================================

  describe('complete', () => {
    it('should post the prompt to /completion', async () => {
      http.post.mockResolvedValue(createCompletionResponse('1. What is CDD?'));

      await adapter.complete('Break this down', {
        maxTokens: 300,
        temperature: 0.3,
        stopSequences: ['\n\n', '###'],
      });

      expect(http.post).toHaveBeenCalledWith(
        '/completion',
        {
          prompt: 'Break this down',
          n_predict: 300,
          temperature: 0.3,
          stop: ['\n\n', '###'],
        },
        { signal: undefined }
      );
    });

    it('should pass the abort signal to the request', async () => {
      http.post.mockResolvedValue(createCompletionResponse('ok'));
      const controller = new AbortController();

      await adapter.complete('Hello', { maxTokens: 10, temperature: 0, signal: controller.signal });

      expect(http.post.mock.calls[0]?.[2]).toEqual({ signal: controller.signal });
    });

    it('should fall back to configured defaults', async () => {
      http.post.mockResolvedValue(createCompletionResponse('ok'));

      await adapter.complete('Hello');

      expect(http.post).toHaveBeenCalledWith(
        '/completion',
        { prompt: 'Hello', n_predict: 512, temperature: 0.3, stop: [] },
        { signal: undefined }
      );
    });

    it('should return the trimmed content', async () => {
      http.post.mockResolvedValue(createCompletionResponse('  An answer.\n'));

      await expect(adapter.complete('Hello')).resolves.toBe('An answer.');
    });

    it('should report token usage', async () => {
      http.post.mockResolvedValue(
        createCompletionResponse('An answer.', { tokens_evaluated: 12, tokens_predicted: 34 })
      );

      const response = await adapter.completeWithMetadata('Hello');

      expect(response.content).toBe('An answer.');
      expect(response.model).toBe('llama-cpp');
      expect(response.usage).toEqual({ inputTokens: 12, outputTokens: 34 });
      expect(response.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('should reject an empty prompt without a request', async () => {
      await expect(adapter.complete('   ')).rejects.toThrow(InvalidRequestError);
      expect(http.post).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  describe('error handling', () => {
    it('should map a request timeout to TimeoutError', async () => {
      http.post.mockRejectedValue(new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED'));

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toHaveProperty('message', COLD_START_TIMEOUT_MESSAGE);
    });

    it('should map a refused connection to NetworkError', async () => {
      http.post.mockRejectedValue(new AxiosError('connect ECONNREFUSED 127.0.0.1:8080', 'ECONNREFUSED'));

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toHaveProperty('message', 'LLM request failed: connect ECONNREFUSED 127.0.0.1:8080');
    });

    it('should map a 5xx status to ServerError', async () => {
      http.post.mockRejectedValue(createHttpError(503));

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toHaveProperty('message', 'Server error: LLM request failed with status 503');
    });

    it('should map a 4xx status to InvalidRequestError', async () => {
      http.post.mockRejectedValue(createHttpError(400));

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidRequestError);
      expect(error).toHaveProperty('message', 'Invalid request: LLM request failed with status 400');
    });

    it('should reject a body without content', async () => {
      http.post.mockResolvedValue({ data: { text: 'wrong field' }, status: 200 });

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidResponseError);
      expect(error).toHaveProperty('message', 'Malformed completion response: content: Required');
    });

    it('should map a cancelled request to AbortedError', async () => {
      http.post.mockRejectedValue(new CanceledError());

      const error = await adapter.complete('Hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AbortedError);
      expect(error).toMatchObject({ code: 'aborted', retryable: false, message: 'LLM request aborted' });
    });

    it('should not send a request once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await adapter
        .complete('Hello', { maxTokens: 10, temperature: 0, signal: controller.signal })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AbortedError);
      expect(http.post).not.toHaveBeenCalled();
    });

    it('should retry transient failures when configured', async () => {
      const retrying = new LlamaCppAdapter(
        { baseUrl: 'http://localhost:8080' },
        { http, logger: createSilentLogger(), retry: { maxRetries: 2, maxDelayMs: 1 } }
      );
      http.post
        .mockRejectedValueOnce(createHttpError(502))
        .mockResolvedValueOnce(createCompletionResponse('Recovered.'));

      await expect(retrying.complete('Hello')).resolves.toBe('Recovered.');
      expect(http.post).toHaveBeenCalledTimes(2);
    });
  });
});
