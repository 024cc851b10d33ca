/**
 * Anthropic Adapter
 *
 * Hosted alternative to the self-hosted llama.cpp server. Each prompt is sent
 * as a single user turn to the Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';

import { LLMAdapter, type LLMAdapterOptions, type ResolvedCompletionOptions } from '../adapter.js';
import { type LLMResponse, LLMProvider } from '../types.js';
import {
  AbortedError,
  LLMError,
  NetworkError,
  TimeoutError,
  errorFromHttpStatus,
} from '../errors.js';

// =============================================================================
// Configuration
// =============================================================================

export const AnthropicConfigSchema = z.object({
  model: z.string().min(1).default('claude-3-5-haiku-20241022'),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive().default(512),
  temperature: z.number().min(0).max(1).default(0.3),
  timeoutMs: z.number().int().positive().default(60000),
});

export type AnthropicConfig = z.infer<typeof AnthropicConfigSchema>;

/**
 * The slice of the SDK client the adapter calls
 */
export interface AnthropicMessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal | undefined }
    ): Promise<Anthropic.Message>;
  };
}

export interface AnthropicAdapterOptions extends LLMAdapterOptions {
  client?: AnthropicMessagesClient;
}

// =============================================================================
// AnthropicAdapter
// =============================================================================

/**
 * @example
 * ```typescript
 * const llm = new AnthropicAdapter({ apiKey: process.env.ANTHROPIC_API_KEY });
 * const answer = await llm.complete(prompt, { maxTokens: 600, temperature: 0.5 });
 * ```
 */
export class AnthropicAdapter extends LLMAdapter {
  private readonly client: AnthropicMessagesClient;

  constructor(config: Partial<AnthropicConfig> = {}, options: AnthropicAdapterOptions = {}) {
    const parsed = AnthropicConfigSchema.parse(config);
    super(
      {
        provider: LLMProvider.ANTHROPIC,
        model: parsed.model,
        maxTokens: parsed.maxTokens,
        temperature: parsed.temperature,
        timeoutMs: parsed.timeoutMs,
      },
      options
    );

    this.client =
      options.client ??
      new Anthropic({
        apiKey: parsed.apiKey ?? process.env['ANTHROPIC_API_KEY'],
        baseURL: parsed.baseUrl,
        timeout: parsed.timeoutMs,
        // Retries are owned by withRetry
        maxRetries: 0,
      });
  }

  protected async generate(
    prompt: string,
    options: ResolvedCompletionOptions
  ): Promise<Omit<LLMResponse, 'latencyMs'>> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.config.model,
      max_tokens: options.maxTokens,
      // The Messages API caps temperature at 1
      temperature: Math.min(options.temperature, 1),
      messages: [{ role: 'user', content: prompt }],
    };

    // Whitespace-only stop sequences are rejected by the API
    const stopSequences = options.stopSequences.filter((s) => s.trim().length > 0);
    if (stopSequences.length > 0) {
      params.stop_sequences = stopSequences;
    }

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(params, { signal: options.signal });
    } catch (error) {
      throw this.handleError(error);
    }

    return {
      content: extractText(response.content).trim(),
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private handleError(error: unknown): LLMError {
    if (error instanceof Anthropic.APIUserAbortError) {
      return new AbortedError(`Request aborted: ${error.message}`, LLMProvider.ANTHROPIC, error);
    }

    // Timeout extends APIConnectionError, so it is checked first
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError(`Request timeout: ${error.message}`, LLMProvider.ANTHROPIC, undefined, error);
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return new NetworkError(`Connection error: ${error.message}`, LLMProvider.ANTHROPIC, undefined, error);
    }

    if (error instanceof Anthropic.APIError && error.status !== undefined) {
      const mapped = errorFromHttpStatus(
        error.status,
        error.message,
        LLMProvider.ANTHROPIC,
        error,
        parseRetryAfter(error.headers)
      );
      if (mapped) {
        return mapped;
      }
    }

    return LLMError.fromError(error, LLMProvider.ANTHROPIC);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function extractText(content: Anthropic.ContentBlock[]): string {
  return content
    .filter((block): block is Anthropic.TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}

/**
 * `retry-after` is given in seconds
 */
export function parseRetryAfter(
  headers: Record<string, string | null | undefined> | undefined
): number | undefined {
  const value = headers?.['retry-after'];
  if (!value) {
    return undefined;
  }
  const seconds = Number.parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}
