/**
 * Compliance Query Pipeline
 */

export * from './types.js';
export * from './state.js';
export * from './prompts.js';
export * from './decomposition.js';
export * from './retrieval.js';
export * from './synthesis.js';
export * from './validation.js';
export * from './orchestrator.js';
