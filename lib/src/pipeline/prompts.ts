/**
 * Prompt Templates
 *
 * Plain completion prompts. They end with a cue line ("Sub-questions:",
 * "Answer:") that the model continues from.
 */

import { type CompletionOptions } from '../llm/types.js';
import { type ContextItem } from './types.js';

/**
 * Shared by every pipeline completion call
 */
export const STOP_SEQUENCES: readonly string[] = ['\n\n', '###'];

export const DECOMPOSITION_OPTIONS: CompletionOptions = {
  maxTokens: 300,
  temperature: 0.3,
  stopSequences: [...STOP_SEQUENCES],
};

export const SYNTHESIS_OPTIONS: CompletionOptions = {
  maxTokens: 600,
  temperature: 0.5,
  stopSequences: [...STOP_SEQUENCES],
};

export function buildDecompositionPrompt(query: string): string {
  return `Task: Break this regulatory question into 2-3 specific sub-questions.

Question: ${query}

Format: Return only numbered sub-questions, one per line.

Sub-questions:`;
}

/**
 * `[Source n] Doc: <id>, Section: <section>` header followed by the passage,
 * blocks separated by a blank line
 */
export function formatSources(contexts: ContextItem[]): string {
  return contexts
    .map(
      (ctx, i) =>
        `[Source ${i + 1}] Doc: ${ctx.documentId}, Section: ${ctx.sectionNumber}\n${ctx.content}`
    )
    .join('\n\n');
}

export function buildSynthesisPrompt(query: string, contexts: ContextItem[]): string {
  return `You are a regulatory compliance expert. Answer this question using ONLY the provided sources.

Question: ${query}

Sources:
${formatSources(contexts)}

Instructions:
1. Answer directly and accurately
2. Cite sources as [Source X]
3. If information is missing, state it clearly
4. Be concise but complete

Answer:`;
}
