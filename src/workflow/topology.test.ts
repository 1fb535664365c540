import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  LintSeverity,
  Topology,
  createTopology,
  deriveDependencies,
  topologicalOrder,
  validateTopology,
} from './topology.js';
import type { LintRule, NodeBinding, TopologyDefinition } from './topology.js';
import { ValidationError } from '../errors.js';
import type { AgentNode } from './types.js';

function node(name: string, reads: string[], writes: string[], optional: string[] = []): AgentNode {
  return {
    name,
    kind: 'analysis',
    reads: { required: reads, optional },
    writes,
    async produceUpdate() { return {}; },
  };
}

const bind = (n: AgentNode, extra: Partial<NodeBinding> = {}): NodeBinding => ({ node: n, required: true, ...extra });

describe('deriveDependencies', () => {
  it('links readers to writers and honours after', () => {
    const deps = deriveDependencies([
      bind(node('load', [], ['users'])),
      bind(node('enrich', ['users'], ['users', 'insights'])),
      bind(node('plan', ['users'], ['plan'], ['insights'])),
      bind(node('audit', [], ['audit']), { after: ['plan'] }),
    ]);
    expect(deps.get('load')).toEqual([]);
    expect(deps.get('enrich')).toEqual(['load']);
    expect(deps.get('plan')).toEqual(['load', 'enrich']);
    expect(deps.get('audit')).toEqual(['plan']);
  });
});

describe('topologicalOrder', () => {
  it('breaks ties by registration order', () => {
    const deps = new Map([['c', ['a']], ['b', []], ['a', []]]);
    expect(topologicalOrder(['c', 'b', 'a'], deps)).toEqual({ order: ['b', 'a', 'c'], cyclic: [] });
  });

  it('reports nodes left in a cycle', () => {
    const deps = new Map([['a', ['b']], ['b', ['a']], ['c', []]]);
    expect(topologicalOrder(['a', 'b', 'c'], deps)).toEqual({ order: ['c'], cyclic: ['a', 'b'] });
  });
});

describe('validateTopology', () => {
  const def = (bindings: NodeBinding[], extra: Partial<TopologyDefinition> = {}): TopologyDefinition => ({
    name: 't',
    bindings,
    ...extra,
  });

  it('flags duplicate names', () => {
    const results = validateTopology(def([bind(node('a', [], ['x'])), bind(node('a', [], ['y']))]));
    expect(results).toContainEqual({
      rule: 'node_names',
      severity: LintSeverity.ERROR,
      message: "Node 'a' is registered more than once.",
      node: 'a',
    });
  });

  it('flags unknown after targets', () => {
    const results = validateTopology(def([bind(node('a', [], ['x']), { after: ['ghost'] })]));
    expect(results.map((r) => r.message)).toContain("Node 'a' runs after unknown node 'ghost'.");
  });

  it('flags cycles', () => {
    const results = validateTopology(def([
      bind(node('a', ['y'], ['x'])),
      bind(node('b', ['x'], ['y'])),
    ]));
    expect(results.find((r) => r.rule === 'acyclic')?.message).toBe('Dependency cycle among: a, b');
  });

  it('warns about required inputs nobody provides', () => {
    const results = validateTopology(def(
      [bind(node('a', ['goal', 'budget'], ['x']))],
      { params: z.object({ goal: z.string() }) },
    ));
    expect(results).toEqual([{
      rule: 'required_inputs',
      severity: LintSeverity.WARNING,
      message: "Node 'a' requires 'budget', which no node writes and the params schema does not declare.",
      node: 'a',
    }]);
  });

  it('checks conditions, timeouts and retries', () => {
    const results = validateTopology(def([
      bind(node('a', [], ['x']), { condition: 'mode==fast', timeout: 'later', max_retries: -1 }),
    ]));
    expect(results.map((r) => r.message)).toEqual([
      `Node 'a' condition: "mode==fast" uses "==", write "="`,
      `Node 'a' timeout: Invalid duration "later"`,
      "Node 'a' max_retries must be a non-negative integer, got -1.",
    ]);
  });

  it('rejects writes to the reserved flags key and empty writes', () => {
    const results = validateTopology(def([bind(node('a', [], [])), bind(node('b', [], ['flags']))]));
    expect(results.map((r) => r.message)).toEqual([
      "Node 'a' declares no state keys it writes.",
      "Node 'b' must not write the reserved key 'flags'.",
    ]);
  });

  it('runs extra rules', () => {
    const noAudit: LintRule = {
      name: 'no_audit',
      apply: (d) => d.bindings
        .filter((b) => b.node.name === 'audit')
        .map(() => ({ rule: 'no_audit', severity: LintSeverity.ERROR, message: 'audit is not allowed' })),
    };
    expect(() => createTopology(def([bind(node('audit', [], ['x']))]), [noAudit])).toThrow(ValidationError);
  });
});

describe('Topology', () => {
  it('exposes order, dependencies, ancestors and timeouts', () => {
    const topology = Topology.create({
      name: 'chain',
      bindings: [
        bind(node('c', ['b_out'], ['c_out'])),
        bind(node('b', ['a_out'], ['b_out']), { timeout: '2s' }),
        bind(node('a', [], ['a_out'])),
        bind(node('side', [], ['side_out'])),
      ],
    });
    expect(topology.order).toEqual(['a', 'b', 'c', 'side']);
    expect(topology.dependenciesOf('c')).toEqual(['b']);
    expect([...topology.ancestorsOf('c')].sort()).toEqual(['a', 'b']);
    expect(topology.timeoutOf('b')).toBe(2000);
    expect(topology.timeoutOf('a')).toBeUndefined();
    expect(topology.diagnostics).toEqual([]);
  });

  it('throws ValidationError listing every error', () => {
    try {
      createTopology({ name: 'bad', bindings: [] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err instanceof ValidationError && err.issues).toEqual([
        { path: 'node_names', message: 'Topology has no nodes.' },
      ]);
    }
  });

  it('rejects lookups of unknown nodes', () => {
    const topology = createTopology({ name: 't', bindings: [bind(node('a', [], ['x']))] });
    expect(() => topology.binding('b')).toThrow("Topology 't' has no node 'b'");
  });
});
