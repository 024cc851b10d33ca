/**
 * Language Model Factory
 *
 * Single entry point for building the configured completion backend.
 */

import { z } from 'zod';

import { type LLMAdapter, type LLMAdapterOptions } from './adapter.js';
import { LlamaCppAdapter, LlamaCppConfigSchema, type LlamaCppAdapterOptions } from './adapters/llama-cpp.js';
import { AnthropicAdapter, AnthropicConfigSchema, type AnthropicAdapterOptions } from './adapters/anthropic.js';
import { InvalidRequestError } from './errors.js';
import { LLMProvider } from './types.js';

// =============================================================================
// Factory Input
// =============================================================================

export const CreateLanguageModelInputSchema = z.discriminatedUnion('provider', [
  LlamaCppConfigSchema.extend({ provider: z.literal('llama-cpp') }),
  AnthropicConfigSchema.extend({ provider: z.literal('anthropic') }),
]);

export type CreateLanguageModelInput = z.input<typeof CreateLanguageModelInputSchema>;

export type CreateLanguageModelOptions = LLMAdapterOptions &
  Pick<LlamaCppAdapterOptions, 'http'> &
  Pick<AnthropicAdapterOptions, 'client'>;

// =============================================================================
// Factory
// =============================================================================

/**
 * Build the adapter for `config.provider`.
 *
 * @throws {InvalidRequestError} when the configuration does not validate
 *
 * @example
 * ```typescript
 * const llm = createLanguageModel({ provider: 'llama-cpp', baseUrl: 'http://localhost:8080' });
 * ```
 */
export function createLanguageModel(
  config: CreateLanguageModelInput,
  options: CreateLanguageModelOptions = {}
): LLMAdapter {
  const result = CreateLanguageModelInputSchema.safeParse(config);

  if (!result.success) {
    throw new InvalidRequestError(
      `Invalid LLM configuration: ${result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`,
      config.provider
    );
  }

  const { http, client, ...shared } = options;
  const validated = result.data;

  switch (validated.provider) {
    case LLMProvider.LLAMA_CPP:
      return new LlamaCppAdapter(validated, { ...shared, http });
    case LLMProvider.ANTHROPIC:
      return new AnthropicAdapter(validated, { ...shared, client });
  }
}
