/**
 * Service Configuration
 *
 * Reads the environment once at startup into a validated, typed object.
 *
 * @example
 * ```typescript
 * const config = loadComplianceConfig();
 * config.llm.provider; // 'llama-cpp'
 * config.qdrant.url; // 'http://localhost:6333'
 * ```
 */

import { z } from 'zod';

import { LLMProviderSchema } from '../llm/types.js';
import { QdrantConfigSchema, resolveQdrantUrl } from '../qdrant/config.js';
import { LogFormatSchema, LogLevelSchema, parseLogLevel } from '../logging/index.js';

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_LLM_URL = 'http://localhost:8080';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';
export const DEFAULT_LLAMA_CPP_MODEL = 'llama-cpp';

export const ComplianceConfigSchema = z
  .object({
    llm: z.object({
      provider: LLMProviderSchema.default('llama-cpp'),
      /** llama.cpp server base URL */
      url: z.string().url().default(DEFAULT_LLM_URL),
      model: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().default(60000),
      maxRetries: z.number().int().nonnegative().default(0),
      anthropicApiKey: z.string().min(1).optional(),
    }),
    qdrant: QdrantConfigSchema,
    embedding: z.object({
      model: z.string().min(1).default('Xenova/bge-m3'),
      dimensions: z.number().int().positive().default(1024),
      /** Directory of pre-downloaded models */
      localModelPath: z.string().min(1).optional(),
      allowRemoteModels: z.boolean().default(true),
      cacheDir: z.string().min(1).optional(),
    }),
    pipeline: z.object({
      topK: z.number().int().positive().default(3),
      /** Whole-invocation budget; 0 disables the timeout */
      timeoutMs: z.number().int().nonnegative().default(180000),
    }),
    logging: z.object({
      level: LogLevelSchema,
      format: LogFormatSchema.default('pretty'),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.llm.provider === 'anthropic' && !config.llm.anthropicApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['llm', 'anthropicApiKey'],
        message: 'ANTHROPIC_API_KEY is required when LLM_PROVIDER is anthropic',
      });
    }
  });

export type ComplianceConfig = z.infer<typeof ComplianceConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Integer from an env var. Blank means unset; anything else that is not an
 * integer is kept as NaN so the schema reports it against the right key.
 */
function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return /^-?\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
}

/**
 * `true`/`1`/`yes` and `false`/`0`/`no`, case-insensitive. Other values are
 * passed through for the schema to reject.
 */
function readBool(value: string | undefined): boolean | string | undefined {
  const normalized = readString(value)?.toLowerCase();
  if (normalized === undefined) {
    return undefined;
  }
  if (['true', '1', 'yes'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return false;
  }
  return normalized;
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * @throws {ConfigError} listing every invalid or missing variable
 */
export function loadComplianceConfig(env: NodeJS.ProcessEnv = process.env): ComplianceConfig {
  const raw = {
    llm: {
      provider: readString(env['LLM_PROVIDER'])?.toLowerCase(),
      url: readString(env['LLM_URL']) ?? readString(env['CLOUD_RUN_LLM_URL']),
      model: readString(env['LLM_MODEL']),
      timeoutMs: readInt(env['LLM_TIMEOUT_MS']),
      maxRetries: readInt(env['LLM_MAX_RETRIES']),
      anthropicApiKey: readString(env['ANTHROPIC_API_KEY']),
    },
    qdrant: {
      url: resolveQdrantUrl(env),
      apiKey: readString(env['QDRANT_API_KEY']),
      collectionName: readString(env['QDRANT_COLLECTION_NAME']),
      timeout: readInt(env['QDRANT_TIMEOUT']),
    },
    embedding: {
      model: readString(env['EMBEDDING_MODEL']),
      dimensions: readInt(env['EMBEDDING_DIMENSIONS']),
      localModelPath: readString(env['EMBEDDING_MODEL_PATH']),
      allowRemoteModels: readBool(env['EMBEDDING_ALLOW_REMOTE_MODELS']),
      cacheDir: readString(env['EMBEDDING_CACHE_DIR']),
    },
    pipeline: {
      topK: readInt(env['RETRIEVAL_TOP_K']),
      timeoutMs: readInt(env['PIPELINE_TIMEOUT_MS']),
    },
    logging: {
      level: parseLogLevel(env['LOG_LEVEL'] ?? 'info'),
      format: readString(env['LOG_FORMAT'])?.toLowerCase(),
    },
  };

  const result = ComplianceConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

/**
 * Model label for the configured provider
 */
export function resolveLLMModel(config: ComplianceConfig): string {
  if (config.llm.model) {
    return config.llm.model;
  }
  return config.llm.provider === 'anthropic' ? DEFAULT_ANTHROPIC_MODEL : DEFAULT_LLAMA_CPP_MODEL;
}
