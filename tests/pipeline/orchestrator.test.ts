/**
 * End-to-End Tests for WorkflowOrchestrator
 *
 * Drives the four stages over fake embedding, vector index and language
 * model services:
 * - Successful runs and per-stage records
 * - Recovered failures (decomposition fallback, retrieval and synthesis errors)
 * - Hard failures and thrown stage exceptions becoming error results
 * - The invocation time budget and late stage results
 * - Isolation between invocations
 */

import { describe, it, expect, vi } from 'vitest';
import { AxiosError } from 'axios';
import {
  COLD_START_TIMEOUT_MESSAGE,
  DECOMPOSITION_FALLBACK_MESSAGE,
  ERROR_ANSWER_PREFIX,
  LogLevel,
  LlamaCppAdapter,
  Logger,
  SYNTHESIS_FAILURE_ANSWER,
  StageName,
  WorkflowOrchestrator,
  createErrorResult,
  createSilentLogger,
  createWorkflowOrchestrator,
  isErrorCitations,
  type CompletionOptions,
  type PipelineStage,
  type PipelineState,
  type StageResult,
  type VectorHit,
} from '../../lib/src/index.js';

// =============================================================================
// Mock Setup
// =============================================================================

const QUERY = 'What are the customer due diligence requirements for money transmitters?';

const SUB_QUESTIONS = '1. What is customer due diligence?\n2. Which businesses are money transmitters?';

const ANSWER =
  'Money transmitters must verify customer identity and keep records of transfers [Source 1].';

function createHit(documentId: string, score: number): VectorHit {
  return {
    id: documentId,
    score,
    payload: {
      text_preview: `Passage from ${documentId}`,
      document_ID: documentId,
      section_number: '1022.210',
      effective_date: '2018-05-11',
      jurisdiction: 'US-Federal',
    },
  };
}

/**
 * Fake model that answers decomposition and synthesis prompts differently
 */
function createMockLLM(options: { decomposition?: string | Error; synthesis?: string | Error } = {}) {
  const decomposition = options.decomposition ?? SUB_QUESTIONS;
  const synthesis = options.synthesis ?? ANSWER;

  const complete = vi.fn(async (prompt: string, _options: CompletionOptions): Promise<string> => {
    const reply = prompt.startsWith('Task: Break') ? decomposition : synthesis;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });

  return { complete };
}

function createMockServices() {
  return {
    embedder: {
      embed: vi.fn<(text: string) => Promise<number[]>>().mockResolvedValue([0.1, 0.2, 0.3]),
    },
    vectorIndex: {
      search: vi
        .fn<(vector: number[], limit: number, collection?: string) => Promise<VectorHit[]>>()
        .mockResolvedValue([createHit('31-CFR-1022', 0.91), createHit('FFIEC-MSB', 0.84)]),
    },
    llm: createMockLLM(),
    logger: createSilentLogger(),
  };
}

function createStage(
  name: StageName,
  run: (state: PipelineState, signal?: AbortSignal) => Promise<StageResult>
): PipelineStage {
  return { name, run: vi.fn(run) };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

// =============================================================================
// Successful Runs
// =============================================================================

describe('WorkflowOrchestrator', () => {
  describe('successful run', () => {
    it('should return the synthesized answer with citations', async () => {
      const services = createMockServices();
      const orchestrator = new WorkflowOrchestrator(services);

      const result = await orchestrator.invoke(QUERY, 'analyst-7');

      expect(result.answer).toBe(ANSWER);
      expect(isErrorCitations(result.citations)).toBe(false);
      // two sub-questions x two hits each
      expect(Object.keys(result.citations)).toEqual(['source_1', 'source_2', 'source_3', 'source_4']);
      expect(result.citations).toMatchObject({
        source_1: { documentId: '31-CFR-1022', relevanceScore: 0.91 },
        source_2: { documentId: 'FFIEC-MSB', relevanceScore: 0.84 },
      });
    });

    it('should expose the final state and stage records', async () => {
      const orchestrator = new WorkflowOrchestrator(createMockServices());

      const run = await orchestrator.run(QUERY, 'analyst-7', 'trace-fixed');

      expect(run.timedOut).toBe(false);
      expect(run.state.traceId).toBe('trace-fixed');
      expect(run.state.userId).toBe('analyst-7');
      expect(run.state.decomposedQueries).toEqual([
        '1. What is customer due diligence?',
        '2. Which businesses are money transmitters?',
      ]);
      expect(run.state.retrievedContexts).toHaveLength(4);
      expect(run.state.validationPassed).toBe(true);
      expect(run.state.error).toBeUndefined();
      expect(run.stages.map((s) => s.stage)).toEqual(['decompose', 'retrieve', 'synthesize', 'validate']);
      expect(run.stages.every((s) => s.diagnostics.length === 0)).toBe(true);
    });

    it('should generate a trace id when none is given', async () => {
      const orchestrator = new WorkflowOrchestrator(createMockServices());

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.state.traceId).toMatch(/^trace-\d+-[a-z0-9]+$/);
    });

    it('should search with the configured top-k and collection', async () => {
      const services = createMockServices();
      const orchestrator = createWorkflowOrchestrator(services, { topK: 1, collection: 'aml_kb' });

      const result = await orchestrator.invoke(QUERY, 'analyst-7');

      expect(services.vectorIndex.search).toHaveBeenCalledWith([0.1, 0.2, 0.3], 1, 'aml_kb');
      expect(Object.keys(result.citations)).toEqual(['source_1', 'source_2']);
    });
  });

  // ===========================================================================
  // Single Sub-question
  // ===========================================================================

  describe('single sub-question', () => {
    const ITAR_ANSWER =
      'ITAR regulates the export of defense articles and services listed on the USML [Source 1].';

    it('should cite every hit of a question that needs no decomposition', async () => {
      const services = {
        ...createMockServices(),
        llm: createMockLLM({ decomposition: '1. What is ITAR?', synthesis: ITAR_ANSWER }),
      };
      services.vectorIndex.search.mockResolvedValue([
        createHit('22-CFR-120', 0.93),
        createHit('22-CFR-121', 0.88),
        createHit('DDTC-FAQ', 0.71),
      ]);
      const orchestrator = new WorkflowOrchestrator(services);

      const run = await orchestrator.run('What is ITAR?', 'analyst-7');

      expect(run.state.decomposedQueries).toEqual(['1. What is ITAR?']);
      expect(services.embedder.embed).toHaveBeenCalledTimes(1);
      expect(run.result.answer).toBe(ITAR_ANSWER);
      expect(Object.keys(run.result.citations)).toEqual(['source_1', 'source_2', 'source_3']);
      expect(run.result.citations).toMatchObject({
        source_1: { documentId: '22-CFR-120', relevanceScore: 0.93 },
        source_3: { documentId: 'DDTC-FAQ', relevanceScore: 0.71 },
      });
      expect(run.state.validationPassed).toBe(true);
      expect(run.state.error).toBeUndefined();
    });
  });

  // ===========================================================================
  // Recovered Failures
  // ===========================================================================

  describe('recovered failures', () => {
    it('should search the original query when decomposition yields nothing', async () => {
      const services = { ...createMockServices(), llm: createMockLLM({ decomposition: 'No.' }) };
      const orchestrator = new WorkflowOrchestrator(services);

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(services.embedder.embed).toHaveBeenCalledWith(QUERY);
      expect(run.state.decomposedQueries).toEqual([QUERY]);
      expect(run.state.error).toBe(DECOMPOSITION_FALLBACK_MESSAGE);
      expect(run.result.answer).toBe(ANSWER);
      expect(run.stages[0]?.diagnostics).toEqual([DECOMPOSITION_FALLBACK_MESSAGE]);
    });

    it('should answer without sources when every search fails', async () => {
      const services = createMockServices();
      services.vectorIndex.search.mockRejectedValue(new Error('fetch failed'));
      services.llm = createMockLLM({ synthesis: 'The sources do not cover this question.' });
      const orchestrator = new WorkflowOrchestrator(services);

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.result).toEqual({
        answer: 'The sources do not cover this question.',
        citations: {},
      });
      expect(run.state.validationPassed).toBe(false);
      expect(run.state.error).toBe('Retrieval error: fetch failed');
      expect(run.stages[1]?.diagnostics).toEqual([
        'Retrieval error: fetch failed',
        'Retrieval error: fetch failed',
      ]);
    });

    it('should return the synthesis failure answer without error citations', async () => {
      const services = {
        ...createMockServices(),
        llm: createMockLLM({ synthesis: new Error('LLM request failed with status 503') }),
      };
      const orchestrator = new WorkflowOrchestrator(services);

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.result).toEqual({ answer: SYNTHESIS_FAILURE_ANSWER, citations: {} });
      expect(run.state.error).toBe('Synthesis error: LLM request failed with status 503');
      expect(run.state.validationPassed).toBe(false);
    });

    it('should recover from a completion server timeout during synthesis', async () => {
      const post = vi.fn();
      post.mockImplementation(async (_url: string, body: { prompt: string }) => {
        if (body.prompt.startsWith('Task: Break')) {
          return { data: { content: '1. What is ITAR?' }, status: 200 };
        }
        throw new AxiosError('timeout of 60000ms exceeded', 'ECONNABORTED');
      });
      const llm = new LlamaCppAdapter(
        { baseUrl: 'http://localhost:8080' },
        { http: { post }, logger: createSilentLogger(), retry: { maxRetries: 0 } }
      );
      const orchestrator = new WorkflowOrchestrator({ ...createMockServices(), llm });

      const run = await orchestrator.run('What is ITAR?', 'analyst-7');

      expect(post).toHaveBeenCalledTimes(2);
      expect(run.timedOut).toBe(false);
      expect(run.result).toEqual({ answer: SYNTHESIS_FAILURE_ANSWER, citations: {} });
      expect(run.state.error).toBe(`Synthesis error: ${COLD_START_TIMEOUT_MESSAGE}`);
      expect(run.state.retrievedContexts).toHaveLength(2);
      expect(run.state.validationPassed).toBe(false);
    });

    it('should keep the first diagnostic when several stages recover', async () => {
      const services = {
        ...createMockServices(),
        llm: createMockLLM({ decomposition: 'No.', synthesis: new Error('Server error') }),
      };
      const orchestrator = new WorkflowOrchestrator(services);

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.state.error).toBe(DECOMPOSITION_FALLBACK_MESSAGE);
      expect(run.stages[2]?.diagnostics).toEqual(['Synthesis error: Server error']);
    });

    it('should log each diagnostic as a warning with its stage', async () => {
      const lines: string[] = [];
      const logger = new Logger({
        level: LogLevel.WARN,
        format: 'json',
        output: (line) => {
          lines.push(line);
        },
      });
      const services = { ...createMockServices(), logger, llm: createMockLLM({ decomposition: 'No.' }) };
      const orchestrator = new WorkflowOrchestrator(services);

      await orchestrator.invoke(QUERY, 'analyst-7', 'trace-warn');

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        level: 'WARN',
        message: DECOMPOSITION_FALLBACK_MESSAGE,
        context: { traceId: 'trace-warn', userId: 'analyst-7', stage: 'decompose' },
      });
    });
  });

  // ===========================================================================
  // Hard Failures
  // ===========================================================================

  describe('hard failures', () => {
    it('should return an error result for a blank query', async () => {
      const services = createMockServices();
      const orchestrator = new WorkflowOrchestrator(services);

      const result = await orchestrator.invoke('   ', 'analyst-7');

      expect(result).toEqual({
        answer: `${ERROR_ANSWER_PREFIX}Cannot decompose an empty query`,
        citations: { error: 'Cannot decompose an empty query' },
      });
      expect(services.llm.complete).not.toHaveBeenCalled();
    });

    it('should turn a thrown stage exception into an error result', async () => {
      const services = createMockServices();
      const synthesize = createStage(StageName.SYNTHESIZE, async () => {
        throw new Error('boom');
      });
      const validate = createStage(StageName.VALIDATE, async (state) => ({
        ok: true,
        state,
        diagnostics: [],
      }));
      const orchestrator = new WorkflowOrchestrator({ ...services, stages: { synthesize, validate } });

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.result).toEqual(createErrorResult('boom'));
      expect(run.result.answer).toBe(
        'I encountered an error processing your compliance query: boom'
      );
      expect(run.state.error).toBe('boom');
      expect(run.stages.map((s) => s.stage)).toEqual(['decompose', 'retrieve', 'synthesize']);
      expect(run.stages[2]?.diagnostics).toEqual(['boom']);
      expect(validate.run).not.toHaveBeenCalled();
    });

    it('should never reject from invoke', async () => {
      const services = createMockServices();
      const decompose = createStage(StageName.DECOMPOSE, () => Promise.reject(new Error('unexpected')));
      const orchestrator = new WorkflowOrchestrator({ ...services, stages: { decompose } });

      await expect(orchestrator.invoke(QUERY, 'analyst-7')).resolves.toEqual({
        answer: `${ERROR_ANSWER_PREFIX}unexpected`,
        citations: { error: 'unexpected' },
      });
    });
  });

  // ===========================================================================
  // Time Budget
  // ===========================================================================

  describe('time budget', () => {
    it('should return a timeout result and skip the remaining stages', async () => {
      const services = createMockServices();
      const decompose = createStage(StageName.DECOMPOSE, async (state) => {
        await delay(60);
        state.decomposedQueries = [QUERY];
        return { ok: true, state, diagnostics: [] };
      });
      const retrieve = createStage(StageName.RETRIEVE, async (state) => ({
        ok: true,
        state,
        diagnostics: [],
      }));
      const orchestrator = new WorkflowOrchestrator(
        { ...services, stages: { decompose, retrieve } },
        { timeoutMs: 10 }
      );

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.timedOut).toBe(true);
      expect(run.result).toEqual({
        answer: `${ERROR_ANSWER_PREFIX}Pipeline timed out after 10ms`,
        citations: { error: 'Pipeline timed out after 10ms' },
      });
      expect(run.state.error).toBe('Pipeline timed out after 10ms');

      await delay(100);
      expect(retrieve.run).not.toHaveBeenCalled();
    });

    it('should not let a stage that finishes late change the returned state', async () => {
      const services = createMockServices();
      let stageSignal: AbortSignal | undefined;
      const synthesize = createStage(StageName.SYNTHESIZE, async (state, signal) => {
        stageSignal = signal;
        await delay(50);
        state.synthesizedAnswer = 'A late answer.';
        state.citations = {};
        return { ok: true, state, diagnostics: [] };
      });
      const orchestrator = new WorkflowOrchestrator(
        { ...services, stages: { synthesize } },
        { timeoutMs: 10 }
      );

      const run = await orchestrator.run(QUERY, 'analyst-7');
      const returned = structuredClone(run.state);

      await delay(100);
      expect(run.timedOut).toBe(true);
      expect(run.state).toEqual(returned);
      expect(run.state.synthesizedAnswer).toBe('');
      expect(run.state.citations).toEqual({});
      expect(stageSignal?.aborted).toBe(true);
    });

    it('should not time out when the budget is disabled', async () => {
      const orchestrator = new WorkflowOrchestrator(createMockServices(), { timeoutMs: 0 });

      const run = await orchestrator.run(QUERY, 'analyst-7');

      expect(run.timedOut).toBe(false);
      expect(run.result.answer).toBe(ANSWER);
      expect(orchestrator.getConfig().timeoutMs).toBe(0);
    });
  });

  // ===========================================================================
  // Isolation
  // ===========================================================================

  describe('isolation', () => {
    it('should produce equal results for repeated invocations', async () => {
      const orchestrator = new WorkflowOrchestrator(createMockServices());

      const first = await orchestrator.run(QUERY, 'analyst-7');
      const second = await orchestrator.run(QUERY, 'analyst-7');

      expect(second.result).toEqual(first.result);
      expect(second.state).not.toBe(first.state);
      expect(second.state.retrievedContexts).toHaveLength(4);
    });

    it('should not carry state from a failed invocation into the next', async () => {
      const services = createMockServices();
      services.vectorIndex.search.mockRejectedValueOnce(new Error('fetch failed'));
      const orchestrator = new WorkflowOrchestrator(services, { maxSubQueries: 1 });

      const failed = await orchestrator.run(QUERY, 'analyst-7');
      const recovered = await orchestrator.run(QUERY, 'analyst-7');

      expect(failed.state.error).toBe('Retrieval error: fetch failed');
      expect(recovered.state.error).toBeUndefined();
      expect(Object.keys(recovered.result.citations)).toEqual(['source_1', 'source_2']);
    });
  });
});
