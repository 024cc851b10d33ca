/**
 * Pipeline Types
 *
 * State, stage contract, results and errors of the compliance query
 * pipeline (decompose, retrieve, synthesize, validate).
 */

import { z } from 'zod';

// =============================================================================
// Retrieved Context
// =============================================================================

/**
 * One retrieved passage with its provenance
 */
export interface ContextItem {
  content: string;
  documentId: string;
  sectionNumber: string;
  effectiveDate: string;
  jurisdiction: string;
  /** Similarity score from the vector index */
  score: number;
  /** The sub-question whose search produced this passage */
  subQuery: string;
}

// =============================================================================
// Citations
// =============================================================================

export interface CitationRecord {
  documentId: string;
  sectionNumber: string;
  effectiveDate: string;
  jurisdiction: string;
  /** Score rounded to three decimals */
  relevanceScore: number;
  /** First 200 characters of the passage followed by `...` */
  snippet: string;
}

/**
 * Keys are `source_1` .. `source_n` in context order
 */
export type CitationMap = Record<string, CitationRecord>;

/**
 * Citations of a failed invocation carry the failure message instead
 */
export interface ErrorCitations {
  error: string;
}

export type PipelineCitations = CitationMap | ErrorCitations;

export function isErrorCitations(citations: PipelineCitations): citations is ErrorCitations {
  return typeof citations['error'] === 'string';
}

// =============================================================================
// State
// =============================================================================

/**
 * The record threaded through every stage of one invocation. Each stage
 * assigns the fields it owns; `error` holds the first failure diagnostic and
 * is never overwritten.
 */
export interface PipelineState {
  readonly originalQuery: string;
  readonly userId: string;
  readonly traceId: string;
  decomposedQueries: string[];
  retrievedContexts: ContextItem[];
  synthesizedAnswer: string;
  citations: CitationMap;
  validationPassed: boolean;
  error: string | undefined;
}

/**
 * What callers receive, on success and on failure alike
 */
export interface PipelineResult {
  answer: string;
  citations: PipelineCitations;
}

// =============================================================================
// Errors
// =============================================================================

export const PipelineErrorCode = {
  /** A stage's precondition on the state does not hold */
  INVALID_STATE: 'INVALID_STATE',
  /** A stage threw */
  STAGE_FAILED: 'STAGE_FAILED',
  TIMEOUT: 'TIMEOUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCode)[keyof typeof PipelineErrorCode];

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  /** Stage that failed, when known */
  readonly stage: StageName | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: PipelineErrorCode,
    options?: { stage?: StageName | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options?.stage;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }

  static fromError(error: unknown, stage?: StageName): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new PipelineError(message, PipelineErrorCode.STAGE_FAILED, { stage, cause });
  }
}

// =============================================================================
// Stages
// =============================================================================

export const StageName = {
  DECOMPOSE: 'decompose',
  RETRIEVE: 'retrieve',
  SYNTHESIZE: 'synthesize',
  VALIDATE: 'validate',
} as const;

export type StageName = (typeof StageName)[keyof typeof StageName];

/**
 * Outcome of one stage run. Recovered failures are reported as diagnostics on
 * a successful result; `ok: false` ends the invocation.
 */
export type StageResult =
  | { ok: true; state: PipelineState; diagnostics: string[] }
  | { ok: false; error: PipelineError };

/**
 * One step of the workflow. `run` receives a working copy of the state; the
 * orchestrator keeps the returned state only if `signal` has not fired.
 */
export interface PipelineStage {
  readonly name: StageName;
  run(state: PipelineState, signal?: AbortSignal): Promise<StageResult>;
}

/**
 * Timing and diagnostics of one executed stage
 */
export interface StageRecord {
  stage: StageName;
  durationMs: number;
  diagnostics: string[];
}

/**
 * Everything `WorkflowOrchestrator.run` observed for one invocation
 */
export interface PipelineRun {
  result: PipelineResult;
  state: PipelineState;
  stages: StageRecord[];
  timedOut: boolean;
}

// =============================================================================
// Configuration
// =============================================================================

export const PipelineConfigSchema = z.object({
  /** Passages kept per sub-question */
  topK: z.number().int().positive().default(3),
  /** Collection searched; the index default when unset */
  collection: z.string().min(1).optional(),
  /** Upper bound on parsed sub-questions */
  maxSubQueries: z.number().int().positive().default(3),
  /** Answers must be longer than this to pass validation */
  minAnswerLength: z.number().int().nonnegative().default(50),
  /** Whole-invocation budget in milliseconds; 0 disables it */
  timeoutMs: z.number().int().nonnegative().default(180000),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
