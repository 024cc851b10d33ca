/**
 * Workflow Orchestrator
 *
 * Runs decompose, retrieve, synthesize and validate in that order over one
 * fresh state per invocation. Hard stage failures, exceptions and an overrun
 * of the invocation budget all end in the same error-shaped result, so
 * callers never see a rejection.
 *
 * @example
 * ```typescript
 * const orchestrator = new WorkflowOrchestrator({ embedder, vectorIndex, llm });
 * const { answer, citations } = await orchestrator.invoke(
 *   'What are the customer due diligence requirements for money transmitters?',
 *   'analyst-7'
 * );
 * ```
 */

import { type EmbeddingService } from '../embeddings/types.js';
import { type VectorIndex } from '../qdrant/types.js';
import { type LanguageModelService } from '../llm/types.js';
import { type Logger, getGlobalLogger } from '../logging/index.js';
import { DecompositionStage } from './decomposition.js';
import { RetrievalStage } from './retrieval.js';
import { SynthesisStage } from './synthesis.js';
import { ValidationStage } from './validation.js';
import { cloneState, commitState, createPipelineState, recordError } from './state.js';
import {
  type PipelineConfig,
  type PipelineResult,
  type PipelineRun,
  type PipelineStage,
  type PipelineState,
  type StageName,
  type StageRecord,
  PipelineConfigSchema,
  PipelineError,
  PipelineErrorCode,
} from './types.js';

export const ERROR_ANSWER_PREFIX = 'I encountered an error processing your compliance query: ';

/**
 * Result returned for any failed invocation
 */
export function createErrorResult(message: string): PipelineResult {
  return {
    answer: `${ERROR_ANSWER_PREFIX}${message}`,
    citations: { error: message },
  };
}

export interface WorkflowOrchestratorDependencies {
  embedder: EmbeddingService;
  vectorIndex: VectorIndex;
  llm: LanguageModelService;
  logger?: Logger;
  /** Replace individual stages; the order stays fixed */
  stages?: Partial<Record<StageName, PipelineStage>>;
}

type ExecutionOutcome =
  | { status: 'completed' }
  | { status: 'failed'; error: PipelineError }
  | { status: 'timed_out'; error: PipelineError };

// =============================================================================
// WorkflowOrchestrator
// =============================================================================

export class WorkflowOrchestrator {
  private readonly config: PipelineConfig;
  private readonly logger: Logger;
  private readonly stages: readonly PipelineStage[];

  constructor(deps: WorkflowOrchestratorDependencies, config?: Partial<PipelineConfig>) {
    this.config = PipelineConfigSchema.parse(config ?? {});
    this.logger = deps.logger ?? getGlobalLogger().child('WorkflowOrchestrator');

    const stageLogger = (name: string): Logger => this.logger.child(name);

    this.stages = [
      deps.stages?.decompose ??
        new DecompositionStage(
          { llm: deps.llm, logger: stageLogger('DecompositionStage') },
          { maxSubQueries: this.config.maxSubQueries }
        ),
      deps.stages?.retrieve ??
        new RetrievalStage(
          {
            embedder: deps.embedder,
            vectorIndex: deps.vectorIndex,
            logger: stageLogger('RetrievalStage'),
          },
          { topK: this.config.topK, collection: this.config.collection }
        ),
      deps.stages?.synthesize ??
        new SynthesisStage({ llm: deps.llm, logger: stageLogger('SynthesisStage') }),
      deps.stages?.validate ??
        new ValidationStage(
          { logger: stageLogger('ValidationStage') },
          { minAnswerLength: this.config.minAnswerLength }
        ),
    ];
  }

  /**
   * Answer a compliance question. Never rejects.
   */
  async invoke(query: string, userId: string, traceId?: string): Promise<PipelineResult> {
    try {
      const run = await this.run(query, userId, traceId);
      return run.result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        'Pipeline invocation failed',
        error instanceof Error ? error : new Error(message),
        { userId, traceId }
      );
      return createErrorResult(message);
    }
  }

  /**
   * Answer a compliance question and report the final state and per-stage
   * timings alongside the result.
   */
  async run(query: string, userId: string, traceId?: string): Promise<PipelineRun> {
    const state = createPipelineState(query, userId, traceId);
    const log = this.logger.withContext({ traceId: state.traceId, userId });
    const records: StageRecord[] = [];
    const startTime = performance.now();

    log.info('Pipeline started', { queryLength: query.length });

    const outcome = await this.executeWithTimeout(state, records, log);
    const durationMs = Math.round(performance.now() - startTime);

    if (outcome.status !== 'completed') {
      recordError(state, outcome.error.message);
      log.error('Pipeline failed', outcome.error, {
        code: outcome.error.code,
        stage: outcome.error.stage,
        durationMs,
      });

      return {
        result: createErrorResult(outcome.error.message),
        state,
        stages: records,
        timedOut: outcome.status === 'timed_out',
      };
    }

    log.info('Pipeline completed', {
      durationMs,
      subQueries: state.decomposedQueries.length,
      contexts: state.retrievedContexts.length,
      validationPassed: state.validationPassed,
    });

    return {
      result: { answer: state.synthesizedAnswer, citations: state.citations },
      state,
      stages: records,
      timedOut: false,
    };
  }

  getConfig(): Readonly<PipelineConfig> {
    return { ...this.config };
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  private async executeWithTimeout(
    state: PipelineState,
    records: StageRecord[],
    log: Logger
  ): Promise<ExecutionOutcome> {
    const timeoutMs = this.config.timeoutMs;
    const abort = new AbortController();
    const execution = this.execute(state, records, log, abort.signal);

    if (timeoutMs === 0) {
      return execution;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ExecutionOutcome>((resolve) => {
      timer = setTimeout(() => {
        abort.abort();
        resolve({
          status: 'timed_out',
          error: new PipelineError(`Pipeline timed out after ${timeoutMs}ms`, PipelineErrorCode.TIMEOUT),
        });
      }, timeoutMs);
    });

    try {
      return await Promise.race([execution, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Run the stages in order. Resolves with the first hard failure; stops
   * early without a result once `signal` is aborted. Each stage works on a
   * copy, which is committed only while `signal` is live, so a stage that
   * finishes after a timeout never touches the returned state.
   */
  private async execute(
    state: PipelineState,
    records: StageRecord[],
    log: Logger,
    signal: AbortSignal
  ): Promise<ExecutionOutcome> {
    for (const stage of this.stages) {
      if (signal.aborted) {
        break;
      }

      const stageStart = performance.now();
      const working = cloneState(state);
      let output = working;
      let error: PipelineError | undefined;
      let diagnostics: string[] = [];

      try {
        const result = await stage.run(working, signal);
        if (result.ok) {
          output = result.state;
          diagnostics = result.diagnostics;
        } else {
          error = result.error;
        }
      } catch (thrown) {
        error = PipelineError.fromError(thrown, stage.name);
      }

      if (signal.aborted) {
        break;
      }

      commitState(state, output);

      for (const diagnostic of diagnostics) {
        recordError(state, diagnostic);
        log.warn(diagnostic, { stage: stage.name });
      }

      records.push({
        stage: stage.name,
        durationMs: Math.round(performance.now() - stageStart),
        diagnostics: error ? [...diagnostics, error.message] : diagnostics,
      });

      if (error) {
        return { status: 'failed', error };
      }

      log.debug('Stage finished', { stage: stage.name });
    }

    return { status: 'completed' };
  }
}

export function createWorkflowOrchestrator(
  deps: WorkflowOrchestratorDependencies,
  config?: Partial<PipelineConfig>
): WorkflowOrchestrator {
  return new WorkflowOrchestrator(deps, config);
}
