/**
 * Vector Index Types
 *
 * Similarity-search contract consumed by the retrieval stage, and the error
 * type raised by the Qdrant implementation.
 */

import { z } from 'zod';

// =============================================================================
// Service Contract
// =============================================================================

/**
 * One scored match. Payload keys are whatever the ingestion side stored;
 * the retrieval stage reads `text_preview`/`content`, `document_ID`,
 * `section_number`, `effective_date` and `jurisdiction`.
 */
export interface VectorHit {
  id?: string | number;
  score: number;
  payload: Record<string, unknown>;
}

/**
 * Nearest-neighbour search over stored document chunks. Results are ordered
 * by descending score and hold at most `limit` hits.
 */
export interface VectorIndex {
  search(vector: number[], limit: number, collection?: string): Promise<VectorHit[]>;
}

// =============================================================================
// Vector Store Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: VectorStoreErrorCode,
    options?: { cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  /**
   * Wrap a client failure, prefixing its message with `context`. The code is
   * classified from the message. VectorStoreErrors pass through unchanged.
   */
  static fromError(error: unknown, context?: string): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new VectorStoreError(context ? `${context}: ${message}` : message, classifyVectorStoreError(message), {
      cause,
    });
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

/**
 * Classify a client failure by its message. The REST client surfaces
 * transport and API failures as plain Errors.
 */
export function classifyVectorStoreError(message: string): VectorStoreErrorCode {
  const lower = message.toLowerCase();

  if (lower.includes('timeout') || lower.includes('timed out')) {
    return VectorStoreErrorCode.TIMEOUT;
  }
  if (lower.includes('econnrefused') || lower.includes('connection') || lower.includes('fetch failed')) {
    return VectorStoreErrorCode.CONNECTION_ERROR;
  }
  if (lower.includes('collection') && lower.includes('not found')) {
    return VectorStoreErrorCode.COLLECTION_NOT_FOUND;
  }
  if (lower.includes('dimension')) {
    return VectorStoreErrorCode.DIMENSION_MISMATCH;
  }
  return VectorStoreErrorCode.UNKNOWN;
}

// =============================================================================
// Index Configuration
// =============================================================================

export const VectorIndexConfigSchema = z.object({
  /** Collection searched when a call names none */
  collectionName: z.string().min(1).default('compliance_kb'),
  /** Expected query vector length; 0 skips the check */
  vectorDimensions: z.number().int().nonnegative().default(1024),
  /** Drop hits scoring below this */
  scoreThreshold: z.number().optional(),
});

export type VectorIndexConfig = z.infer<typeof VectorIndexConfigSchema>;

/**
 * Result of a cluster reachability check
 */
export interface ClusterHealthResult {
  healthy: boolean;
  collectionsCount?: number;
  error?: string;
}
