/**
 * Decomposition Stage
 *
 * Splits the user question into a few numbered sub-questions so retrieval
 * can search each facet separately. Model failures degrade to searching the
 * original question.
 */

import { type LanguageModelService } from '../llm/types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { DECOMPOSITION_OPTIONS, buildDecompositionPrompt } from './prompts.js';
import {
  type PipelineStage,
  type PipelineState,
  type StageResult,
  PipelineError,
  PipelineErrorCode,
  StageName,
} from './types.js';

export const DECOMPOSITION_FALLBACK_MESSAGE =
  'Decomposition fallback: no numbered sub-questions in model output';

/**
 * Numbered lines from a decomposition completion.
 *
 * A line counts when it is non-blank and a digit appears among its first
 * three characters (`1. ...`, `2) ...`, ` 3. ...`). Lines are returned
 * trimmed with their numbering, at most `maxSubQueries` of them.
 *
 * @example
 * ```typescript
 * parseSubQueries('1. What is X?\n2. When does Y apply?');
 * // ['1. What is X?', '2. When does Y apply?']
 * ```
 */
export function parseSubQueries(text: string, maxSubQueries = 3): string[] {
  return text
    .trim()
    .split('\n')
    .filter((line) => line.trim().length > 0 && /\d/.test(line.slice(0, 3)))
    .map((line) => line.trim())
    .slice(0, maxSubQueries);
}

export interface DecompositionStageDependencies {
  llm: LanguageModelService;
  logger?: Logger;
}

export class DecompositionStage implements PipelineStage {
  readonly name = StageName.DECOMPOSE;
  private readonly llm: LanguageModelService;
  private readonly logger: Logger;
  private readonly maxSubQueries: number;

  constructor(deps: DecompositionStageDependencies, options: { maxSubQueries?: number } = {}) {
    this.llm = deps.llm;
    this.logger = deps.logger ?? getGlobalLogger().child('DecompositionStage');
    this.maxSubQueries = options.maxSubQueries ?? 3;
  }

  async run(state: PipelineState, signal?: AbortSignal): Promise<StageResult> {
    const query = state.originalQuery;

    if (query.trim().length === 0) {
      return {
        ok: false,
        error: new PipelineError('Cannot decompose an empty query', PipelineErrorCode.INVALID_STATE, {
          stage: this.name,
        }),
      };
    }

    const diagnostics: string[] = [];
    let subQueries: string[];

    try {
      const completion = await this.llm.complete(buildDecompositionPrompt(query), {
        ...DECOMPOSITION_OPTIONS,
        ...(signal && { signal }),
      });
      subQueries = parseSubQueries(completion, this.maxSubQueries);

      if (subQueries.length === 0) {
        diagnostics.push(DECOMPOSITION_FALLBACK_MESSAGE);
        subQueries = [query];
      }
    } catch (error) {
      const message = `Decomposition error: ${error instanceof Error ? error.message : String(error)}`;
      diagnostics.push(message);
      subQueries = [query];
    }

    state.decomposedQueries = subQueries;

    this.logger.debug('Query decomposed', {
      traceId: state.traceId,
      subQueries,
    });

    return { ok: true, state, diagnostics };
  }
}
