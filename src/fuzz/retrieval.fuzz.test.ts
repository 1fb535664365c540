/**
 * Property-based tests for retrieval: result bounds, ordering, filters and
 * the context budget.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { fitToBudget } from '../retrieval/context.js';
import { HashingEmbedder } from '../retrieval/hashing-embedder.js';
import { RetrievalIndex } from '../retrieval/retrieval-index.js';
import type { RetrievalResult } from '../retrieval/types.js';

// ---------------------------------------------------------------------------
// Arbitrary generators
// ---------------------------------------------------------------------------

const WORDS = ['coffee', 'tea', 'price', 'delivery', 'quality', 'refund', 'taste', 'store', 'late', 'fresh'];

const arbText = fc.array(fc.constantFrom(...WORDS), { minLength: 1, maxLength: 6 }).map((w) => w.join(' '));

const arbDocs = fc.array(
  fc.record({ text: arbText, user: fc.constantFrom('u1', 'u2', 'u3') }),
  { minLength: 1, maxLength: 15 },
);

const arbResult: fc.Arbitrary<RetrievalResult> = fc.record({
  document_ref: fc.record({ source_type: fc.constant('comment'), source_id: fc.stringMatching(/^c[0-9]{1,3}$/) }),
  similarity_score: fc.double({ min: -1, max: 1, noNaN: true }),
  snapshot_timestamp: fc.constant(new Date('2024-01-01T00:00:00Z')),
  content: fc.string({ maxLength: 40 }),
  metadata: fc.constant({}),
});

async function buildIndex(docs: ReadonlyArray<{ text: string; user: string }>): Promise<RetrievalIndex> {
  const index = new RetrievalIndex({ embedder: new HashingEmbedder(64) });
  await index.upsertMany(docs.map((d, i) => ({
    source_type: 'comment',
    source_id: `c${i}`,
    content: d.text,
    metadata: { user_id: d.user },
  })));
  return index;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Retrieval fuzz tests', () => {
  it('returns at most top_k results above the threshold, most similar first', async () => {
    await fc.assert(
      fc.asyncProperty(
        arbDocs,
        arbText,
        fc.integer({ min: 1, max: 6 }),
        fc.double({ min: -1, max: 1, noNaN: true }),
        async (docs, query, top_k, threshold) => {
          const index = await buildIndex(docs);
          const results = await index.search(query, { top_k, threshold });
          expect(results.length).toBeLessThanOrEqual(top_k);
          for (const r of results) {
            expect(r.similarity_score).toBeGreaterThanOrEqual(threshold);
          }
          for (let i = 1; i < results.length; i++) {
            expect(results[i - 1].similarity_score).toBeGreaterThanOrEqual(results[i].similarity_score);
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it('a threshold of -1 returns min(top_k, documents) results', async () => {
    await fc.assert(
      fc.asyncProperty(arbDocs, arbText, fc.integer({ min: 1, max: 20 }), async (docs, query, top_k) => {
        const index = await buildIndex(docs);
        const results = await index.search(query, { top_k, threshold: -1 });
        expect(results).toHaveLength(Math.min(top_k, docs.length));
      }),
      { numRuns: 50 },
    );
  });

  it('metadata filters hold for every result', async () => {
    await fc.assert(
      fc.asyncProperty(arbDocs, arbText, fc.constantFrom('u1', 'u2', 'u3'), async (docs, query, user) => {
        const index = await buildIndex(docs);
        const results = await index.search(query, { top_k: 20, threshold: -1, filter: { metadata: { user_id: user } } });
        expect(results.every((r) => r.metadata.user_id === user)).toBe(true);
        expect(results).toHaveLength(docs.filter((d) => d.user === user).length);
      }),
      { numRuns: 50 },
    );
  });

  it('fitted passages never exceed the budget and keep their order', () => {
    fc.assert(
      fc.property(fc.array(arbResult, { maxLength: 10 }), fc.nat({ max: 200 }), (results, budget) => {
        const passages = fitToBudget(results, budget);
        const total = passages.reduce((sum, p) => sum + p.text.length, 0);
        expect(total).toBeLessThanOrEqual(budget);
        expect(passages.map((p) => p.document_ref)).toEqual(results.slice(0, passages.length).map((r) => r.document_ref));
        passages.slice(0, -1).forEach((p) => expect(p.truncated).toBe(false));
      }),
      { numRuns: 300 },
    );
  });
});
