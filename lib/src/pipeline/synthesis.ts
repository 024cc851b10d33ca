/**
 * Synthesis Stage
 *
 * Asks the model for an answer grounded in the retrieved passages and builds
 * the citation map that accompanies it.
 */

import { type LanguageModelService } from '../llm/types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { SYNTHESIS_OPTIONS, buildSynthesisPrompt } from './prompts.js';
import {
  type CitationMap,
  type ContextItem,
  type PipelineStage,
  type PipelineState,
  type StageResult,
  StageName,
} from './types.js';

export const SYNTHESIS_FAILURE_ANSWER = 'Error generating answer.';

const SNIPPET_LENGTH = 200;

/**
 * One citation per context, keyed `source_1` .. `source_n` in context order,
 * whether or not the answer mentions the source. Snippets are cut at a code
 * point boundary.
 */
export function buildCitations(contexts: ContextItem[]): CitationMap {
  const citations: CitationMap = {};

  contexts.forEach((ctx, i) => {
    citations[`source_${i + 1}`] = {
      documentId: ctx.documentId,
      sectionNumber: ctx.sectionNumber,
      effectiveDate: ctx.effectiveDate,
      jurisdiction: ctx.jurisdiction,
      relevanceScore: Math.round(ctx.score * 1000) / 1000,
      snippet: `${Array.from(ctx.content).slice(0, SNIPPET_LENGTH).join('')}...`,
    };
  });

  return citations;
}

export interface SynthesisStageDependencies {
  llm: LanguageModelService;
  logger?: Logger;
}

export class SynthesisStage implements PipelineStage {
  readonly name = StageName.SYNTHESIZE;
  private readonly llm: LanguageModelService;
  private readonly logger: Logger;

  constructor(deps: SynthesisStageDependencies) {
    this.llm = deps.llm;
    this.logger = deps.logger ?? getGlobalLogger().child('SynthesisStage');
  }

  async run(state: PipelineState, signal?: AbortSignal): Promise<StageResult> {
    const contexts = state.retrievedContexts;
    const prompt = buildSynthesisPrompt(state.originalQuery, contexts);

    this.logger.trace('Synthesis prompt built', {
      traceId: state.traceId,
      sources: contexts.length,
      promptLength: prompt.length,
    });

    try {
      state.synthesizedAnswer = await this.llm.complete(prompt, {
        ...SYNTHESIS_OPTIONS,
        ...(signal && { signal }),
      });
      state.citations = buildCitations(contexts);
    } catch (error) {
      state.synthesizedAnswer = SYNTHESIS_FAILURE_ANSWER;
      state.citations = {};
      return {
        ok: true,
        state,
        diagnostics: [`Synthesis error: ${error instanceof Error ? error.message : String(error)}`],
      };
    }

    this.logger.debug('Answer synthesized', {
      traceId: state.traceId,
      answerLength: state.synthesizedAnswer.length,
      citations: contexts.length,
    });

    return { ok: true, state, diagnostics: [] };
  }
}
