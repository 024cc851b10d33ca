/**
 * Language Model Types
 *
 * Contracts for the text-completion service the pipeline consumes, plus the
 * configuration, response and error shapes shared by the provider adapters.
 */

import { z } from 'zod';

// ============================================================================
// Providers
// ============================================================================

export const LLMProvider = {
  /** Self-hosted llama.cpp server exposing `POST /completion` */
  LLAMA_CPP: 'llama-cpp',
  ANTHROPIC: 'anthropic',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

export const LLMProviderSchema = z.enum(['llama-cpp', 'anthropic']);

// ============================================================================
// Service Contract
// ============================================================================

/**
 * Generation parameters for a single completion call
 */
export const CompletionOptionsSchema = z.object({
  /** Upper bound on generated tokens */
  maxTokens: z.number().int().positive().max(100000),
  /** Sampling temperature (0-2) */
  temperature: z.number().min(0).max(2),
  /** Generation stops at the first of these sequences */
  stopSequences: z.array(z.string()).optional(),
});

export type CompletionOptions = z.infer<typeof CompletionOptionsSchema> & {
  /** Cancels the request, including any pending retry */
  signal?: AbortSignal | undefined;
};

/**
 * Text-completion endpoint consumed by the pipeline stages.
 *
 * Implementations reject with a `TimeoutError` when the configured duration
 * elapses and with a `NetworkError` when the server cannot be reached.
 */
export interface LanguageModelService {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

// ============================================================================
// Configuration
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: LLMProviderSchema,
  /** Model identifier; informational for llama.cpp, which serves one model */
  model: z.string().min(1),
  /** Default max tokens when a call does not specify one */
  maxTokens: z.number().int().positive().max(100000).default(512),
  /** Default temperature when a call does not specify one */
  temperature: z.number().min(0).max(2).default(0.3),
  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60000),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

// ============================================================================
// Responses
// ============================================================================

export const LLMTokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
});

export type LLMTokenUsage = z.infer<typeof LLMTokenUsageSchema>;

export const LLMResponseSchema = z.object({
  /** Generated text, trimmed */
  content: z.string(),
  usage: LLMTokenUsageSchema,
  model: z.string().min(1),
  /** Wall-clock time of the request, retries included */
  latencyMs: z.number().nonnegative(),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

// ============================================================================
// Errors
// ============================================================================

export const LLMErrorCode = {
  RATE_LIMIT: 'rate_limit',
  AUTH_ERROR: 'auth_error',
  INVALID_REQUEST: 'invalid_request',
  MODEL_NOT_FOUND: 'model_not_found',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  /** Server answered 2xx with a body we cannot read */
  INVALID_RESPONSE: 'invalid_response',
  /** The caller cancelled the request */
  ABORTED: 'aborted',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export const LLMErrorCodeSchema = z.enum([
  'rate_limit',
  'auth_error',
  'invalid_request',
  'model_not_found',
  'timeout',
  'server_error',
  'network_error',
  'invalid_response',
  'aborted',
  'unknown',
]);

export const LLMErrorInfoSchema = z.object({
  code: LLMErrorCodeSchema,
  message: z.string(),
  provider: LLMProviderSchema,
  retryable: z.boolean(),
  /** Suggested delay before retrying */
  retryAfterMs: z.number().int().nonnegative().optional(),
  originalError: z.unknown().optional(),
});

export type LLMErrorInfo = z.infer<typeof LLMErrorInfoSchema>;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RetryableErrorCodeSchema = z.enum([
  'rate_limit',
  'timeout',
  'server_error',
  'network_error',
]);

export type RetryableErrorCode = z.infer<typeof RetryableErrorCodeSchema>;

export const RetryConfigSchema = z.object({
  /** Retries after the initial request */
  maxRetries: z.number().int().nonnegative().default(3),
  initialDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().positive().default(60000),
  backoffMultiplier: z.number().positive().default(2),
  jitter: z.boolean().default(true),
  /** Maximum jitter as a fraction of the delay */
  jitterFactor: z.number().min(0).max(1).default(0.25),
  retryableErrorCodes: z.array(RetryableErrorCodeSchema).default([
    'rate_limit',
    'timeout',
    'server_error',
    'network_error',
  ]),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Emitted by `withRetry` for logging
 */
export interface RetryEvent {
  type: 'attempt_failed' | 'retrying' | 'max_retries_exceeded';
  /** 1-based */
  attemptNumber: number;
  maxRetries: number;
  error: LLMErrorInfo;
  /** Only for 'retrying' events */
  nextDelayMs?: number | undefined;
  timestamp: Date;
}

export type RetryEventHandler = (event: RetryEvent) => void;
