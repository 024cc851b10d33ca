/**
 * LLM Module
 *
 * Completion service contract, typed errors, retry, and the llama.cpp and
 * Anthropic adapters.
 */

export * from './types.js';
export * from './errors.js';
export * from './retry.js';
export * from './adapter.js';
export * from './factory.js';
export * from './adapters/index.js';
