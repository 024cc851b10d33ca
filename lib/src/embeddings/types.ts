/**
 * Embedding Types and Schemas
 *
 * Query embedding contract consumed by the retrieval stage, and the
 * configuration and errors of the local BGE-M3 embedder.
 */

import { z } from 'zod';

// =============================================================================
// Service Contract
// =============================================================================

/**
 * Maps text to a fixed-length vector in the space of the indexed documents.
 * Rejects on empty input or when the model cannot run.
 */
export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

// =============================================================================
// Embedding Model Configuration
// =============================================================================

export const EmbeddingModel = {
  /** ONNX export of BAAI/bge-m3, multilingual, 1024 dimensions */
  BGE_M3: 'Xenova/bge-m3',
  /** Smaller English model, 384 dimensions */
  BGE_SMALL_EN: 'Xenova/bge-small-en-v1.5',
} as const;

export type EmbeddingModel = (typeof EmbeddingModel)[keyof typeof EmbeddingModel];

export const MODEL_DIMENSIONS: Record<EmbeddingModel, number> = {
  [EmbeddingModel.BGE_M3]: 1024,
  [EmbeddingModel.BGE_SMALL_EN]: 384,
};

export const DEFAULT_EMBEDDING_MODEL = EmbeddingModel.BGE_M3;

export const BgeEmbedderConfigSchema = z.object({
  /**
   * Hugging Face model id loadable by transformers.js
   * @default 'Xenova/bge-m3'
   */
  model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),

  /**
   * Expected vector length; every output is checked against it
   * @default 1024
   */
  dimensions: z.number().int().positive().default(1024),

  /** Use the 8-bit quantized ONNX weights instead of fp32 */
  quantized: z.boolean().default(true),

  /**
   * Directory holding pre-downloaded models, laid out as `<dir>/<model id>/`.
   * Local lookup is off when unset.
   */
  localModelPath: z.string().min(1).optional(),

  /** Fetch missing weights from the Hugging Face Hub */
  allowRemoteModels: z.boolean().default(true),

  /** Where downloaded weights are stored */
  cacheDir: z.string().min(1).optional(),

  /** L2-normalize outputs (cosine collections expect unit vectors) */
  normalize: z.boolean().default(true),

  /**
   * Load the model on first `embed` instead of requiring `initialize()`
   * @default true
   */
  autoInitialize: z.boolean().default(true),

  enableCache: z.boolean().default(true),

  maxCacheSize: z.number().int().positive().default(1000),

  /** Cache entry lifetime; 0 keeps entries until evicted */
  cacheTtlMs: z.number().int().nonnegative().default(0),
});

export type BgeEmbedderConfig = z.infer<typeof BgeEmbedderConfigSchema>;

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  MODEL_LOAD_ERROR: 'MODEL_LOAD_ERROR',
  MODEL_NOT_INITIALIZED: 'MODEL_NOT_INITIALIZED',
  EMPTY_INPUT: 'EMPTY_INPUT',
  COMPUTATION_ERROR: 'COMPUTATION_ERROR',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode =
  (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: EmbeddingErrorCode,
    options?: { cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  /**
   * Wrap a thrown value, prefixing its message with `context`. EmbeddingErrors
   * pass through unchanged.
   */
  static fromError(
    error: unknown,
    code?: EmbeddingErrorCode,
    context?: string
  ): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new EmbeddingError(context ? `${context}: ${message}` : message, code ?? EmbeddingErrorCode.UNKNOWN, {
      cause,
    });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

export function getModelDimensions(model: string): number | undefined {
  return Object.entries(MODEL_DIMENSIONS).find(([id]) => id === model)?.[1];
}

export function vectorMagnitude(vector: number[]): number {
  return Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
}

/**
 * Normalize a vector to unit length (L2). Zero vectors are returned as is.
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = vectorMagnitude(vector);

  if (magnitude === 0) {
    return vector;
  }

  return vector.map((val) => val / magnitude);
}

export function isNormalized(vector: number[], tolerance = 0.001): boolean {
  return Math.abs(vectorMagnitude(vector) - 1) < tolerance;
}
