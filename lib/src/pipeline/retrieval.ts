/**
 * Retrieval Stage
 *
 * Embeds each sub-question and collects its top passages from the vector
 * index. A failing sub-question is skipped; the others still contribute.
 */

import { type EmbeddingService } from '../embeddings/types.js';
import { type VectorHit, type VectorIndex } from '../qdrant/types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import {
  type ContextItem,
  type PipelineStage,
  type PipelineState,
  type StageResult,
  PipelineError,
  PipelineErrorCode,
  StageName,
} from './types.js';

// =============================================================================
// Payload Mapping
// =============================================================================

function payloadString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return fallback;
}

/**
 * Map an index hit to a context item. Missing fields take the defaults the
 * citation output expects (`Unknown`, `N/A`).
 */
export function toContextItem(hit: VectorHit, subQuery: string): ContextItem {
  const payload = hit.payload;
  const text = payload['text_preview'] ?? payload['content'];

  return {
    content: payloadString(text, ''),
    documentId: payloadString(payload['document_ID'], 'Unknown'),
    sectionNumber: payloadString(payload['section_number'], 'N/A'),
    effectiveDate: payloadString(payload['effective_date'], 'Unknown'),
    jurisdiction: payloadString(payload['jurisdiction'], 'Unknown'),
    score: hit.score,
    subQuery,
  };
}

// =============================================================================
// RetrievalStage
// =============================================================================

export interface RetrievalStageDependencies {
  embedder: EmbeddingService;
  vectorIndex: VectorIndex;
  logger?: Logger;
}

export interface RetrievalStageOptions {
  /** Passages kept per sub-question */
  topK?: number;
  /** Collection to search; the index default when unset */
  collection?: string | undefined;
}

export class RetrievalStage implements PipelineStage {
  readonly name = StageName.RETRIEVE;
  private readonly embedder: EmbeddingService;
  private readonly vectorIndex: VectorIndex;
  private readonly logger: Logger;
  private readonly topK: number;
  private readonly collection: string | undefined;

  constructor(deps: RetrievalStageDependencies, options: RetrievalStageOptions = {}) {
    this.embedder = deps.embedder;
    this.vectorIndex = deps.vectorIndex;
    this.logger = deps.logger ?? getGlobalLogger().child('RetrievalStage');
    this.topK = options.topK ?? 3;
    this.collection = options.collection;
  }

  async run(state: PipelineState, signal?: AbortSignal): Promise<StageResult> {
    if (state.decomposedQueries.length === 0) {
      return {
        ok: false,
        error: new PipelineError(
          'Retrieval requires at least one decomposed query',
          PipelineErrorCode.INVALID_STATE,
          { stage: this.name }
        ),
      };
    }

    const contexts: ContextItem[] = [];
    const diagnostics: string[] = [];

    // Sequential: one embedding model instance, and results stay in sub-query order
    for (const subQuery of state.decomposedQueries) {
      if (signal?.aborted) {
        break;
      }

      try {
        const vector = await this.embedder.embed(subQuery);
        const hits = await this.vectorIndex.search(vector, this.topK, this.collection);

        for (const hit of hits.slice(0, this.topK)) {
          contexts.push(toContextItem(hit, subQuery));
        }

        this.logger.debug('Sub-query retrieved', {
          traceId: state.traceId,
          subQuery,
          hits: hits.length,
        });
      } catch (error) {
        diagnostics.push(`Retrieval error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    state.retrievedContexts = contexts;

    return { ok: true, state, diagnostics };
  }
}
