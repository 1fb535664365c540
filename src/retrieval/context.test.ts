import { describe, it, expect } from 'vitest';
import { fitToBudget, buildGroundedPrompt } from './context.js';
import type { RetrievalResult } from './types.js';

function result(id: string, score: number, content: string): RetrievalResult {
  return {
    document_ref: { source_type: 'comment', source_id: id },
    similarity_score: score,
    snapshot_timestamp: new Date(0),
    content,
    metadata: {},
  };
}

describe('fitToBudget', () => {
  const results = [result('a', 0.9, 'aaaaaaaaaa'), result('b', 0.8, 'bbbbbbbbbb'), result('c', 0.7, 'cccccccccc')];

  it('keeps everything within budget', () => {
    const out = fitToBudget(results, 30);
    expect(out.map((p) => p.text)).toEqual(['aaaaaaaaaa', 'bbbbbbbbbb', 'cccccccccc']);
    expect(out.some((p) => p.truncated)).toBe(false);
  });

  it('cuts the least similar passage first', () => {
    const out = fitToBudget(results, 25);
    expect(out.map((p) => p.text)).toEqual(['aaaaaaaaaa', 'bbbbbbbbbb', 'ccccc']);
    expect(out[2].truncated).toBe(true);
  });

  it('drops whole passages before touching more similar ones', () => {
    const out = fitToBudget(results, 14);
    expect(out.map((p) => p.text)).toEqual(['aaaaaaaaaa', 'bbbb']);
  });

  it('can truncate the best passage when the budget is tiny', () => {
    const out = fitToBudget(results, 3);
    expect(out.map((p) => p.text)).toEqual(['aaa']);
  });

  it('does not mutate the input results', () => {
    fitToBudget(results, 3);
    expect(results[2].content).toBe('cccccccccc');
  });
});

describe('buildGroundedPrompt', () => {
  it('numbers passages and appends the question', () => {
    const passages = fitToBudget([result('a', 0.9, 'first'), result('b', 0.8, 'second')], 100);
    expect(buildGroundedPrompt('why?', passages)).toBe(
      'Context:\n[1] (comment:a) first\n[2] (comment:b) second\n\nQuestion: why?',
    );
  });
});
