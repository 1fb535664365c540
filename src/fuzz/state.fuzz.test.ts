/**
 * Property-based tests for state merging: the final state depends only on
 * the topology, never on how long each node happens to take.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { WorkflowEngine } from '../workflow/engine.js';
import { mergeInOrder } from '../workflow/state.js';
import type { WriterUpdate } from '../workflow/state.js';
import { createTopology } from '../workflow/topology.js';
import type { NodeBinding } from '../workflow/topology.js';
import { RunStatus } from '../workflow/types.js';
import type { AgentNode } from '../workflow/types.js';
import { MemoryStorage } from '../storage/memory.js';
import type { GatewayResponse, TextInvoker } from '../gateway/types.js';
import type { Retriever } from '../retrieval/types.js';

// ---------------------------------------------------------------------------
// Arbitrary generators
// ---------------------------------------------------------------------------

const arbKey = fc.constantFrom('a', 'b', 'c', 'd', 'e');

const arbUpdates: fc.Arbitrary<WriterUpdate[]> = fc.array(
  fc.record({
    node: fc.stringMatching(/^n[0-9]{1,2}$/),
    update: fc.dictionary(arbKey, fc.integer(), { maxKeys: 4 }),
  }),
  { maxLength: 8 },
);

/** Node i may read the private key of any earlier node. */
const arbGraph: fc.Arbitrary<number[][]> = fc
  .array(fc.array(fc.nat({ max: 5 }), { maxLength: 3 }), { minLength: 2, maxLength: 6 })
  .map((raw) => raw.map((reads, i) => [...new Set(reads.filter((j) => j < i))]));

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const gateway: TextInvoker = {
  async invoke(): Promise<GatewayResponse> {
    return { text: 'ok', model: 'fake', provider: 'fake', attempts: 1, latency_ms: 0 };
  },
};

const index: Retriever = {
  async search() { return []; },
  async answer(question) { return { question, answer: null, passages: [] }; },
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Every node writes `shared` and its own key, derived from what it read. */
function buildBindings(readsOf: readonly number[][], delays: readonly number[]): NodeBinding[] {
  return readsOf.map((reads, i) => {
    const keys = reads.map((j) => `k${j}`);
    const node: AgentNode = {
      name: `n${i}`,
      kind: 'analysis',
      reads: { required: keys, optional: [] },
      writes: ['shared', `k${i}`],
      async produceUpdate(state) {
        await sleep(delays[i] ?? 0);
        const seen = keys.map((k) => String(state[k])).join(',');
        return { shared: `n${i}`, [`k${i}`]: `n${i}(${seen})` };
      },
    };
    return { node, required: true };
  });
}

async function runWithDelays(readsOf: readonly number[][], delays: readonly number[]) {
  const engine = new WorkflowEngine({
    topology: createTopology({ name: 'fuzz', bindings: buildBindings(readsOf, delays) }),
    storage: new MemoryStorage(),
    gateway,
    index,
    max_concurrency: 8,
  });
  return engine.run({ params: {} });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('State merge fuzz tests', () => {
  it('the last writer of each key wins', () => {
    fc.assert(
      fc.property(fc.dictionary(arbKey, fc.integer(), { maxKeys: 3 }), arbUpdates, (initial, updates) => {
        const { state, provenance } = mergeInOrder(initial, updates);
        for (const key of ['a', 'b', 'c', 'd', 'e']) {
          const writers = updates.filter((u) => Object.prototype.hasOwnProperty.call(u.update, key));
          const last = writers[writers.length - 1];
          if (last) {
            expect(state[key]).toBe(last.update[key]);
            expect(provenance[key]).toBe(last.node);
          } else {
            expect(state[key]).toBe(initial[key]);
            expect(provenance[key]).toBeUndefined();
          }
        }
      }),
      { numRuns: 300 },
    );
  });

  it('never mutates the initial state', () => {
    fc.assert(
      fc.property(fc.dictionary(arbKey, fc.integer(), { maxKeys: 3 }), arbUpdates, (initial, updates) => {
        const before = { ...initial };
        mergeInOrder(initial, updates);
        expect(initial).toEqual(before);
      }),
      { numRuns: 100 },
    );
  });

  it('node timing does not change the final state', async () => {
    await fc.assert(
      fc.asyncProperty(
        arbGraph,
        fc.array(fc.nat({ max: 4 }), { minLength: 6, maxLength: 6 }),
        fc.array(fc.nat({ max: 4 }), { minLength: 6, maxLength: 6 }),
        async (readsOf, first, second) => {
          const a = await runWithDelays(readsOf, first);
          const b = await runWithDelays(readsOf, second);
          expect(a.status).toBe(RunStatus.COMPLETED);
          expect(b.status).toBe(RunStatus.COMPLETED);
          expect(b.state).toEqual(a.state);
          expect(b.provenance).toEqual(a.provenance);
          // registration order is a valid topological order here, so the last node wins
          expect(a.state.shared).toBe(`n${readsOf.length - 1}`);
        },
      ),
      { numRuns: 25 },
    );
  });
});
