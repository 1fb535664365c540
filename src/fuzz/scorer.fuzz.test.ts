/**
 * Property-based tests for the user value scorer.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { MAX_SCORE, rankUsers, resolvePolicy, retrievalContribution, score } from '../scoring/scorer.js';
import type { RetrievedContext, UserRecord, VisitedPolicy } from '../scoring/types.js';

// ---------------------------------------------------------------------------
// Arbitrary generators
// ---------------------------------------------------------------------------

const arbDate = fc.date({ min: new Date('2023-01-01T00:00:00Z'), max: new Date('2025-01-01T00:00:00Z') });

const arbRecord: fc.Arbitrary<UserRecord> = fc.record(
  {
    user_id: fc.stringMatching(/^u[0-9a-z]{1,6}$/),
    sentiment: fc.constantFrom('positive' as const, 'neutral' as const, 'negative' as const),
    unmet_need: fc.boolean(),
    interaction_count: fc.nat({ max: 5000 }),
    aips_tier: fc.constantFrom('awareness' as const, 'interest' as const, 'purchase' as const, 'share' as const),
    visited: fc.boolean(),
    last_activity_at: arbDate,
  },
  { requiredKeys: ['user_id'] },
);

const arbContext: fc.Arbitrary<RetrievedContext> = fc.record({
  similarities: fc.array(fc.double({ min: -1, max: 1, noNaN: true }), { maxLength: 8 }),
});

const arbVisited = fc.constantFrom<VisitedPolicy>('exclude', 'zero', 'penalize', 'ignore');

const arbPolicy = fc.tuple(arbVisited, fc.option(arbDate, { nil: undefined })).map(([visited, as_of]) =>
  resolvePolicy(as_of ? { visited, as_of } : { visited }),
);

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Scorer fuzz tests', () => {
  it('scores stay within [0, 10] under every visited policy', () => {
    fc.assert(
      fc.property(arbRecord, fc.option(arbContext, { nil: undefined }), arbPolicy, (record, context, policy) => {
        const value = score(record, context, policy);
        expect(value.score).toBeGreaterThanOrEqual(0);
        expect(value.score).toBeLessThanOrEqual(MAX_SCORE);
      }),
      { numRuns: 500 },
    );
  });

  it('is deterministic', () => {
    fc.assert(
      fc.property(arbRecord, fc.option(arbContext, { nil: undefined }), arbPolicy, (record, context, policy) => {
        expect(score(record, context, policy)).toEqual(score(record, context, policy));
      }),
      { numRuns: 200 },
    );
  });

  it('more interactions never lower the score', () => {
    fc.assert(
      fc.property(arbRecord, fc.nat({ max: 1000 }), fc.nat({ max: 1000 }), arbPolicy, (record, a, b, policy) => {
        const [low, high] = a <= b ? [a, b] : [b, a];
        const lowScore = score({ ...record, interaction_count: low }, undefined, policy).score;
        const highScore = score({ ...record, interaction_count: high }, undefined, policy).score;
        expect(highScore).toBeGreaterThanOrEqual(lowScore);
      }),
      { numRuns: 300 },
    );
  });

  it('retrieval contribution is bounded by its weight', () => {
    const policy = resolvePolicy();
    fc.assert(
      fc.property(arbContext, (context) => {
        const value = retrievalContribution(context, policy);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(policy.retrieval_weight);
      }),
      { numRuns: 300 },
    );
  });

  it('ranking does not depend on input order', () => {
    const arbRecords = fc.uniqueArray(arbRecord, { selector: (r) => r.user_id, maxLength: 20 });
    fc.assert(
      fc.property(
        arbRecords.chain((records) =>
          fc.tuple(fc.constant(records), fc.shuffledSubarray(records, { minLength: records.length })),
        ),
        arbPolicy,
        ([records, shuffled], policy) => {
          const ids = (rs: readonly UserRecord[]) => rankUsers(rs, { policy }).map((r) => r.record.user_id);
          expect(ids(shuffled)).toEqual(ids(records));
        },
      ),
      { numRuns: 200 },
    );
  });

  it('ranking is sorted by score and drops visited users under exclude', () => {
    fc.assert(
      fc.property(fc.uniqueArray(arbRecord, { selector: (r) => r.user_id, maxLength: 20 }), (records) => {
        const ranked = rankUsers(records, { policy: resolvePolicy({ visited: 'exclude' }) });
        expect(ranked.some((r) => r.record.visited === true)).toBe(false);
        for (let i = 1; i < ranked.length; i++) {
          expect(ranked[i - 1].value.score).toBeGreaterThanOrEqual(ranked[i].value.score);
        }
      }),
      { numRuns: 200 },
    );
  });
});
