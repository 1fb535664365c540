/**
 * Topology definition and validation. Dependencies are derived from node
 * declarations: Y depends on X when Y reads a key X writes, or when Y names
 * X in `after`. Validation runs a set of lint rules and produces
 * error/warning diagnostics before anything executes.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { checkCondition } from './conditions.js';
import { toMilliseconds } from './duration.js';
import type { AgentNode } from './types.js';

export type ParamsSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

export interface NodeBinding {
  node: AgentNode;
  required: boolean;
  /** Disables the node when false for the request. */
  condition?: string;
  /** Extra ordering edges, by node name. */
  after?: readonly string[];
  /** Per-attempt timeout: milliseconds or a duration string. */
  timeout?: number | string;
  max_retries?: number;
}

export interface TopologyDefinition {
  name: string;
  bindings: readonly NodeBinding[];
  /** Validates and defaults request params, which become the initial state. */
  params?: ParamsSchema;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export enum LintSeverity {
  ERROR = 'error',
  WARNING = 'warning',
}

export interface LintResult {
  rule: string;
  severity: LintSeverity;
  message: string;
  node?: string;
}

export interface LintRule {
  name: string;
  apply(def: TopologyDefinition): LintResult[];
}

// ---------------------------------------------------------------------------
// Graph helpers
// ---------------------------------------------------------------------------

function nameOf(binding: NodeBinding): string {
  return binding.node.name;
}

/** Upstream node names per node, in registration order. */
export function deriveDependencies(bindings: readonly NodeBinding[]): Map<string, string[]> {
  const deps = new Map<string, string[]>();

  for (const y of bindings) {
    const reads = new Set([...y.node.reads.required, ...y.node.reads.optional]);
    const after = new Set(y.after ?? []);
    const upstream: string[] = [];
    for (const x of bindings) {
      if (x === y) continue;
      const feeds = x.node.writes.some((key) => reads.has(key));
      if (feeds || after.has(nameOf(x))) upstream.push(nameOf(x));
    }
    deps.set(nameOf(y), upstream);
  }
  return deps;
}

/**
 * Kahn's algorithm. Among ready nodes the one registered first goes next.
 * Nodes left over belong to a cycle.
 */
export function topologicalOrder(
  names: readonly string[],
  deps: ReadonlyMap<string, readonly string[]>,
): { order: string[]; cyclic: string[] } {
  const position = new Map(names.map((n, i) => [n, i]));
  const indegree = new Map<string, number>();
  const downstream = new Map<string, string[]>();
  for (const n of names) {
    indegree.set(n, 0);
    downstream.set(n, []);
  }
  for (const n of names) {
    for (const d of deps.get(n) ?? []) {
      if (!position.has(d)) continue;
      indegree.set(n, (indegree.get(n) ?? 0) + 1);
      downstream.get(d)?.push(n);
    }
  }

  const ready = names.filter((n) => indegree.get(n) === 0);
  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const m of downstream.get(next) ?? []) {
      const remaining = (indegree.get(m) ?? 0) - 1;
      indegree.set(m, remaining);
      if (remaining === 0) ready.push(m);
    }
  }

  const placed = new Set(order);
  return { order, cyclic: names.filter((n) => !placed.has(n)) };
}

function paramKeys(schema: ParamsSchema | undefined): Set<string> | undefined {
  if (schema instanceof z.ZodObject) {
    return new Set(Object.keys(schema.shape));
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Built-in lint rules
// ---------------------------------------------------------------------------

const nodeNamesRule: LintRule = {
  name: 'node_names',
  apply(def) {
    const results: LintResult[] = [];
    const seen = new Set<string>();
    for (const b of def.bindings) {
      const name = nameOf(b);
      if (!name.trim()) {
        results.push({ rule: 'node_names', severity: LintSeverity.ERROR, message: 'Node name must not be empty.' });
      } else if (seen.has(name)) {
        results.push({
          rule: 'node_names',
          severity: LintSeverity.ERROR,
          message: `Node '${name}' is registered more than once.`,
          node: name,
        });
      }
      seen.add(name);
    }
    if (def.bindings.length === 0) {
      results.push({ rule: 'node_names', severity: LintSeverity.ERROR, message: 'Topology has no nodes.' });
    }
    return results;
  },
};

const afterTargetsRule: LintRule = {
  name: 'after_targets',
  apply(def) {
    const results: LintResult[] = [];
    const names = new Set(def.bindings.map(nameOf));
    for (const b of def.bindings) {
      for (const target of b.after ?? []) {
        if (target === nameOf(b)) {
          results.push({
            rule: 'after_targets',
            severity: LintSeverity.ERROR,
            message: `Node '${target}' cannot run after itself.`,
            node: target,
          });
        } else if (!names.has(target)) {
          results.push({
            rule: 'after_targets',
            severity: LintSeverity.ERROR,
            message: `Node '${nameOf(b)}' runs after unknown node '${target}'.`,
            node: nameOf(b),
          });
        }
      }
    }
    return results;
  },
};

const acyclicRule: LintRule = {
  name: 'acyclic',
  apply(def) {
    const names = def.bindings.map(nameOf);
    const { cyclic } = topologicalOrder(names, deriveDependencies(def.bindings));
    if (cyclic.length === 0) return [];
    return [{
      rule: 'acyclic',
      severity: LintSeverity.ERROR,
      message: `Dependency cycle among: ${cyclic.join(', ')}`,
    }];
  },
};

const declaredWritesRule: LintRule = {
  name: 'declared_writes',
  apply(def) {
    const results: LintResult[] = [];
    for (const b of def.bindings) {
      if (b.node.writes.length === 0) {
        results.push({
          rule: 'declared_writes',
          severity: LintSeverity.ERROR,
          message: `Node '${nameOf(b)}' declares no state keys it writes.`,
          node: nameOf(b),
        });
      }
      if (b.node.writes.includes('flags')) {
        results.push({
          rule: 'declared_writes',
          severity: LintSeverity.ERROR,
          message: `Node '${nameOf(b)}' must not write the reserved key 'flags'.`,
          node: nameOf(b),
        });
      }
    }
    return results;
  },
};

const requiredInputsRule: LintRule = {
  name: 'required_inputs',
  apply(def) {
    const results: LintResult[] = [];
    const fromParams = paramKeys(def.params);
    for (const b of def.bindings) {
      for (const key of b.node.reads.required) {
        if (key === 'flags') continue;
        const produced = def.bindings.some((x) => x !== b && x.node.writes.includes(key));
        if (produced) continue;
        if (fromParams?.has(key)) continue;
        results.push({
          rule: 'required_inputs',
          severity: LintSeverity.WARNING,
          message: fromParams
            ? `Node '${nameOf(b)}' requires '${key}', which no node writes and the params schema does not declare.`
            : `Node '${nameOf(b)}' requires '${key}', which no node writes; it must come from params.`,
          node: nameOf(b),
        });
      }
    }
    return results;
  },
};

const bindingOptionsRule: LintRule = {
  name: 'binding_options',
  apply(def) {
    const results: LintResult[] = [];
    for (const b of def.bindings) {
      const node = nameOf(b);
      if (b.condition !== undefined) {
        for (const problem of checkCondition(b.condition)) {
          results.push({
            rule: 'binding_options',
            severity: LintSeverity.ERROR,
            message: `Node '${node}' condition: ${problem}`,
            node,
          });
        }
      }
      if (b.timeout !== undefined) {
        try {
          toMilliseconds(b.timeout);
        } catch (e) {
          results.push({
            rule: 'binding_options',
            severity: LintSeverity.ERROR,
            message: `Node '${node}' timeout: ${e instanceof Error ? e.message : String(e)}`,
            node,
          });
        }
      }
      if (b.max_retries !== undefined && (!Number.isInteger(b.max_retries) || b.max_retries < 0)) {
        results.push({
          rule: 'binding_options',
          severity: LintSeverity.ERROR,
          message: `Node '${node}' max_retries must be a non-negative integer, got ${b.max_retries}.`,
          node,
        });
      }
    }
    return results;
  },
};

const BUILT_IN_RULES: LintRule[] = [
  nodeNamesRule,
  afterTargetsRule,
  acyclicRule,
  declaredWritesRule,
  requiredInputsRule,
  bindingOptionsRule,
];

export function validateTopology(def: TopologyDefinition, extraRules?: LintRule[]): LintResult[] {
  const rules = [...BUILT_IN_RULES];
  if (extraRules) {
    rules.push(...extraRules);
  }

  const diagnostics: LintResult[] = [];
  for (const rule of rules) {
    diagnostics.push(...rule.apply(def));
  }
  return diagnostics;
}

export function validateOrRaise(def: TopologyDefinition, extraRules?: LintRule[]): LintResult[] {
  const diagnostics = validateTopology(def, extraRules);
  const errors = diagnostics.filter(d => d.severity === LintSeverity.ERROR);

  if (errors.length > 0) {
    const messages = errors.map(e => `[${e.rule}] ${e.message}`).join('\n');
    throw new ValidationError(
      `Topology '${def.name}' failed validation with ${errors.length} error(s):\n${messages}`,
      errors.map(e => ({ path: e.node ? `bindings.${e.node}` : e.rule, message: e.message })),
    );
  }

  return diagnostics;
}

// ---------------------------------------------------------------------------
// Topology
// ---------------------------------------------------------------------------

/** A validated topology with its fixed execution order. */
export class Topology {
  readonly name: string;
  readonly order: readonly string[];
  readonly params?: ParamsSchema;
  /** Warnings found during validation. */
  readonly diagnostics: readonly LintResult[];
  private readonly bindings: ReadonlyMap<string, NodeBinding>;
  private readonly deps: ReadonlyMap<string, readonly string[]>;
  private readonly ancestors: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly timeouts: ReadonlyMap<string, number>;

  private constructor(def: TopologyDefinition, diagnostics: LintResult[]) {
    this.name = def.name;
    this.params = def.params;
    this.diagnostics = diagnostics;
    this.bindings = new Map(def.bindings.map((b) => [nameOf(b), b]));

    const deps = deriveDependencies(def.bindings);
    this.deps = deps;
    this.order = topologicalOrder(def.bindings.map(nameOf), deps).order;

    const ancestors = new Map<string, Set<string>>();
    for (const name of this.order) {
      const set = new Set<string>();
      for (const d of deps.get(name) ?? []) {
        set.add(d);
        for (const a of ancestors.get(d) ?? []) set.add(a);
      }
      ancestors.set(name, set);
    }
    this.ancestors = ancestors;

    const timeouts = new Map<string, number>();
    for (const b of def.bindings) {
      if (b.timeout !== undefined) timeouts.set(nameOf(b), toMilliseconds(b.timeout));
    }
    this.timeouts = timeouts;
  }

  /** Validate a definition and build it. Throws ValidationError on any error diagnostic. */
  static create(def: TopologyDefinition, extraRules?: LintRule[]): Topology {
    const diagnostics = validateOrRaise(def, extraRules);
    return new Topology(def, diagnostics);
  }

  binding(name: string): NodeBinding {
    const b = this.bindings.get(name);
    if (!b) throw new ValidationError(`Topology '${this.name}' has no node '${name}'`);
    return b;
  }

  dependenciesOf(name: string): readonly string[] {
    return this.deps.get(name) ?? [];
  }

  ancestorsOf(name: string): ReadonlySet<string> {
    return this.ancestors.get(name) ?? new Set();
  }

  timeoutOf(name: string): number | undefined {
    return this.timeouts.get(name);
  }
}

export function createTopology(def: TopologyDefinition, extraRules?: LintRule[]): Topology {
  return Topology.create(def, extraRules);
}
