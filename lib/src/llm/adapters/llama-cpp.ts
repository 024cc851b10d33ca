/**
 * llama.cpp Adapter
 *
 * Talks to a llama.cpp HTTP server (`llama-server`) through its native
 * `POST /completion` endpoint. The server is typically a scale-to-zero
 * container, so the first request after idle can take far longer than the
 * rest; the request timeout is what bounds that wait.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import {
  type LLMConfig,
  type LLMResponse,
  LLMProvider,
} from '../types.js';
import {
  type LLMError,
  AbortedError,
  InvalidResponseError,
  NetworkError,
  TimeoutError,
  errorFromHttpStatus,
} from '../errors.js';

// =============================================================================
// Configuration
// =============================================================================

export const LlamaCppConfigSchema = z.object({
  /** Server base URL, e.g. `http://localhost:8080` */
  baseUrl: z.string().url(),
  model: z.string().min(1).default('llama-cpp'),
  maxTokens: z.number().int().positive().default(512),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().positive().default(60000),
});

export type LlamaCppConfig = z.infer<typeof LlamaCppConfigSchema>;

export interface LlamaCppAdapterOptions extends LLMAdapterOptions {
  /** Pre-built HTTP client; defaults to an axios instance bound to `baseUrl` */
  http?: Pick<AxiosInstance, 'post'>;
}

/**
 * Subset of the `/completion` response body the adapter reads
 */
const CompletionResponseSchema = z.object({
  content: z.string(),
  model: z.string().optional(),
  tokens_predicted: z.number().int().nonnegative().optional(),
  tokens_evaluated: z.number().int().nonnegative().optional(),
});

export const COLD_START_TIMEOUT_MESSAGE =
  'LLM request timeout - the completion server may be cold starting';

// =============================================================================
// LlamaCppAdapter
// =============================================================================

/**
 * @example
 * ```typescript
 * const llm = new LlamaCppAdapter({ baseUrl: 'http://localhost:8080', timeoutMs: 60000 });
 * const text = await llm.complete('Summarize export controls.', {
 *   maxTokens: 300,
 *   temperature: 0.3,
 *   stopSequences: ['\n\n'],
 * });
 * ```
 */
export class LlamaCppAdapter extends LLMAdapter {
  private readonly http: Pick<AxiosInstance, 'post'>;
  readonly baseUrl: string;

  constructor(config: Partial<LlamaCppConfig> & Pick<LlamaCppConfig, 'baseUrl'>, options: LlamaCppAdapterOptions = {}) {
    const parsed = LlamaCppConfigSchema.parse(config);
    const base: LLMConfig = {
      provider: LLMProvider.LLAMA_CPP,
      model: parsed.model,
      maxTokens: parsed.maxTokens,
      temperature: parsed.temperature,
      timeoutMs: parsed.timeoutMs,
    };
    super(base, options);

    this.baseUrl = parsed.baseUrl.replace(/\/+$/, '');
    this.http =
      options.http ??
      axios.create({
        baseURL: this.baseUrl,
        timeout: parsed.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
      });
  }

  protected async generate(
    prompt: string,
    options: ResolvedCompletionOptions
  ): Promise<Omit<LLMResponse, 'latencyMs'>> {
    let body: unknown;
    try {
      const response = await this.http.post(
        '/completion',
        {
          prompt,
          n_predict: options.maxTokens,
          temperature: options.temperature,
          stop: options.stopSequences,
        },
        { signal: options.signal }
      );
      body = response.data;
    } catch (error) {
      throw this.handleError(error);
    }

    const parsed = CompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new InvalidResponseError(
        `Malformed completion response: ${parsed.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ')}`,
        LLMProvider.LLAMA_CPP
      );
    }

    return {
      content: parsed.data.content.trim(),
      model: parsed.data.model ?? this.config.model,
      usage: {
        inputTokens: parsed.data.tokens_evaluated ?? 0,
        outputTokens: parsed.data.tokens_predicted ?? 0,
      },
    };
  }

  /**
   * Translate axios failures into typed LLM errors
   */
  private handleError(error: unknown): LLMError {
    if (axios.isCancel(error)) {
      return new AbortedError('LLM request aborted', LLMProvider.LLAMA_CPP, error);
    }

    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new TimeoutError(COLD_START_TIMEOUT_MESSAGE, LLMProvider.LLAMA_CPP, undefined, error);
      }

      if (error.response) {
        const mapped = errorFromHttpStatus(
          error.response.status,
          `LLM request failed with status ${error.response.status}`,
          LLMProvider.LLAMA_CPP,
          error
        );
        if (mapped) {
          return mapped;
        }
      }

      return new NetworkError(
        `LLM request failed: ${error.message}`,
        LLMProvider.LLAMA_CPP,
        undefined,
        error
      );
    }

    return new NetworkError(
      `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
      LLMProvider.LLAMA_CPP,
      undefined,
      error
    );
  }
}

export function createLlamaCppAdapter(
  config: Partial<LlamaCppConfig> & Pick<LlamaCppConfig, 'baseUrl'>,
  options?: LlamaCppAdapterOptions
): LlamaCppAdapter {
  return new LlamaCppAdapter(config, options);
}
