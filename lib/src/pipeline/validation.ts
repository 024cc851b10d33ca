/**
 * Validation Stage
 */

import { type Logger, getGlobalLogger } from '../logging/index.js';
import {
  type CitationMap,
  type PipelineStage,
  type PipelineState,
  type StageResult,
  StageName,
} from './types.js';

/**
 * An answer passes when it is longer than `minLength` characters (code points)
 * and cites at least one source.
 */
export function isAnswerAcceptable(answer: string, citations: CitationMap, minLength = 50): boolean {
  return Array.from(answer).length > minLength && Object.keys(citations).length > 0;
}

export interface ValidationStageDependencies {
  logger?: Logger;
}

/**
 * Sets `validationPassed`. Advisory: the answer and citations are returned
 * unchanged either way.
 */
export class ValidationStage implements PipelineStage {
  readonly name = StageName.VALIDATE;
  private readonly logger: Logger;
  private readonly minAnswerLength: number;

  constructor(deps: ValidationStageDependencies = {}, options: { minAnswerLength?: number } = {}) {
    this.logger = deps.logger ?? getGlobalLogger().child('ValidationStage');
    this.minAnswerLength = options.minAnswerLength ?? 50;
  }

  async run(state: PipelineState): Promise<StageResult> {
    state.validationPassed = isAnswerAcceptable(
      state.synthesizedAnswer,
      state.citations,
      this.minAnswerLength
    );

    this.logger.info(state.validationPassed ? 'Answer validated' : 'Answer failed validation', {
      traceId: state.traceId,
      answerLength: state.synthesizedAnswer.length,
      citations: Object.keys(state.citations).length,
    });

    return { ok: true, state, diagnostics: [] };
  }
}
