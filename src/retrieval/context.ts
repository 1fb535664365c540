import type { ContextPassage, RetrievalResult } from './types.js';

export const GROUNDED_SYSTEM_PROMPT =
  'Answer using only the numbered context passages. If they do not contain the answer, say so.';

/**
 * Keeps passages in similarity order and cuts from the least similar end
 * until the combined text length fits the budget.
 */
export function fitToBudget(results: readonly RetrievalResult[], budget: number): ContextPassage[] {
  const passages: ContextPassage[] = results.map((r) => ({
    document_ref: r.document_ref,
    similarity_score: r.similarity_score,
    text: r.content,
    truncated: false,
  }));

  let excess = passages.reduce((sum, p) => sum + p.text.length, 0) - budget;
  while (excess > 0 && passages.length > 0) {
    const last = passages[passages.length - 1];
    if (last.text.length <= excess) {
      passages.pop();
      excess -= last.text.length;
    } else {
      last.text = last.text.slice(0, last.text.length - excess);
      last.truncated = true;
      excess = 0;
    }
  }
  return passages;
}

export function buildGroundedPrompt(question: string, passages: readonly ContextPassage[]): string {
  const context = passages
    .map((p, i) => `[${i + 1}] (${p.document_ref.source_type}:${p.document_ref.source_id}) ${p.text}`)
    .join('\n');
  return `Context:\n${context}\n\nQuestion: ${question}`;
}
