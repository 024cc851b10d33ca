/**
 * Pipeline State
 */

import { type PipelineState } from './types.js';

/**
 * `trace-<epoch ms>-<7 base36 chars>`
 */
export function generateTraceId(now: number = Date.now(), random: () => number = Math.random): string {
  return `trace-${now}-${random().toString(36).substring(2, 9)}`;
}

/**
 * Fresh state for one invocation. Nothing is shared between invocations.
 */
export function createPipelineState(
  originalQuery: string,
  userId: string,
  traceId?: string
): PipelineState {
  return {
    originalQuery,
    userId,
    traceId: traceId && traceId.trim().length > 0 ? traceId : generateTraceId(),
    decomposedQueries: [],
    retrievedContexts: [],
    synthesizedAnswer: '',
    citations: {},
    validationPassed: false,
    error: undefined,
  };
}

/**
 * Record a failure diagnostic. The first one wins.
 */
export function recordError(state: PipelineState, message: string): void {
  if (state.error === undefined) {
    state.error = message;
  }
}

/**
 * Working copy handed to a stage
 */
export function cloneState(state: PipelineState): PipelineState {
  return structuredClone(state);
}

/**
 * Copy a stage's output fields back onto the invocation state.
 */
export function commitState(target: PipelineState, source: PipelineState): void {
  target.decomposedQueries = source.decomposedQueries;
  target.retrievedContexts = source.retrievedContexts;
  target.synthesizedAnswer = source.synthesizedAnswer;
  target.citations = source.citations;
  target.validationPassed = source.validationPassed;
}
