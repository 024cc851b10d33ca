/**
 * LLM Adapters
 */

export * from './llama-cpp.js';
export * from './anthropic.js';
