/**
 * Compliance Query Pipeline
 *
 * Agentic retrieval-augmented answering for regulatory compliance questions:
 * decompose the question, retrieve passages per sub-question, synthesize a
 * cited answer and validate it.
 *
 * @example
 * ```typescript
 * import { createComplianceRuntime, loadComplianceConfig } from 'compliance-query-pipeline';
 *
 * const runtime = createComplianceRuntime(loadComplianceConfig());
 * const { answer, citations } = await runtime.orchestrator.invoke(
 *   'Which transactions trigger a currency transaction report?',
 *   'analyst-7'
 * );
 * ```
 */

export * from './logging/index.js';
export * from './llm/index.js';
export * from './embeddings/index.js';
export * from './qdrant/index.js';
export * from './config/index.js';
export * from './pipeline/index.js';
export * from './runtime/index.js';
export * from './http/index.js';
