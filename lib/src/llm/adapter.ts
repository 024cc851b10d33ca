/**
 * LLM Adapter Base Class
 *
 * Common behavior for provider adapters: option defaults, prompt validation,
 * retry wiring and logging. Subclasses implement `generate` against their
 * provider and translate provider failures into typed LLMErrors.
 */

import {
  type CompletionOptions,
  type LanguageModelService,
  type LLMConfig,
  type LLMProvider,
  type LLMResponse,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
  LLMConfigSchema,
} from './types.js';
import { InvalidRequestError, LLMError } from './errors.js';
import { withRetry } from './retry.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';

/**
 * Options shared by every adapter on top of the provider configuration
 */
export interface LLMAdapterOptions {
  retry?: Partial<RetryConfig> | undefined;
  onRetryEvent?: RetryEventHandler | undefined;
  logger?: Logger | undefined;
}

/**
 * Resolved parameters for one request
 */
export interface ResolvedCompletionOptions {
  maxTokens: number;
  temperature: number;
  stopSequences: string[];
  signal: AbortSignal | undefined;
}

export abstract class LLMAdapter implements LanguageModelService {
  protected readonly config: LLMConfig;
  protected readonly logger: Logger;
  private readonly retry: Partial<RetryConfig> | undefined;
  private readonly onRetryEvent: RetryEventHandler | undefined;

  constructor(config: Partial<LLMConfig> & Pick<LLMConfig, 'provider' | 'model'>, options: LLMAdapterOptions = {}) {
    this.config = LLMConfigSchema.parse(config);
    this.retry = options.retry;
    this.onRetryEvent = options.onRetryEvent;
    this.logger = (options.logger ?? getGlobalLogger()).child(this.constructor.name);
  }

  // ===========================================================================
  // Provider Hook
  // ===========================================================================

  /**
   * Perform a single request. Throw LLMErrors; retries are handled here.
   */
  protected abstract generate(
    prompt: string,
    options: ResolvedCompletionOptions
  ): Promise<Omit<LLMResponse, 'latencyMs'>>;

  // ===========================================================================
  // Public API
  // ===========================================================================

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<LLMConfig> {
    return { ...this.config };
  }

  /**
   * Generate text for `prompt`. Resolves with the trimmed completion.
   *
   * @throws {LLMError} typed by failure class once retries are exhausted
   */
  async complete(prompt: string, options?: Partial<CompletionOptions>): Promise<string> {
    const response = await this.completeWithMetadata(prompt, options);
    return response.content;
  }

  /**
   * Like `complete`, with token usage and latency
   */
  async completeWithMetadata(
    prompt: string,
    options?: Partial<CompletionOptions>
  ): Promise<LLMResponse> {
    this.validatePrompt(prompt);
    const resolved = this.mergeOptions(options);
    const startTime = performance.now();

    this.logger.debug('Completion requested', {
      promptLength: prompt.length,
      maxTokens: resolved.maxTokens,
      temperature: resolved.temperature,
    });

    try {
      const response = await withRetry(() => this.generate(prompt, resolved), {
        provider: this.config.provider,
        config: this.retry,
        onRetryEvent: (event) => this.handleRetryEvent(event),
        signal: resolved.signal,
      });
      const latencyMs = Math.round(performance.now() - startTime);

      this.logger.debug('Completion finished', {
        latencyMs,
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
      });

      return { ...response, latencyMs };
    } catch (error) {
      const llmError = LLMError.fromError(error, this.config.provider);
      this.logger.warn('Completion failed', {
        code: llmError.code,
        message: llmError.message,
        latencyMs: Math.round(performance.now() - startTime),
      });
      throw llmError;
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  protected mergeOptions(options?: Partial<CompletionOptions>): ResolvedCompletionOptions {
    return {
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      temperature: options?.temperature ?? this.config.temperature,
      stopSequences: options?.stopSequences ?? [],
      signal: options?.signal,
    };
  }

  protected validatePrompt(prompt: string): void {
    if (prompt.trim().length === 0) {
      throw new InvalidRequestError('Prompt must not be empty', this.config.provider);
    }
  }

  private handleRetryEvent(event: RetryEvent): void {
    if (event.type === 'retrying') {
      this.logger.warn('Retrying completion', {
        attempt: event.attemptNumber,
        maxRetries: event.maxRetries,
        code: event.error.code,
        nextDelayMs: event.nextDelayMs,
      });
    }
    this.onRetryEvent?.(event);
  }
}
