/**
 * Immutable run state. A node's input is the initial state plus the updates
 * of its completed ancestors; the final state is the initial state plus
 * every successful update. Both are merged in topological order, so the
 * later writer of a key always wins regardless of completion timing.
 */

import type { StateUpdate, WorkflowState } from './types.js';

export interface WriterUpdate {
  node: string;
  update: StateUpdate;
}

export interface MergedState {
  state: WorkflowState;
  provenance: Readonly<Record<string, string>>;
}

export function freezeState(values: StateUpdate): WorkflowState {
  return Object.freeze({ ...values });
}

/** Apply updates in the order given. Callers pass them in topological order. */
export function mergeInOrder(initial: WorkflowState, updates: readonly WriterUpdate[]): MergedState {
  const values: StateUpdate = { ...initial };
  const provenance: Record<string, string> = {};
  for (const { node, update } of updates) {
    for (const [key, value] of Object.entries(update)) {
      values[key] = value;
      provenance[key] = node;
    }
  }
  return { state: freezeState(values), provenance: Object.freeze(provenance) };
}

/**
 * Resolve a key, descending into nested objects for dotted paths
 * ("user_criteria.limit"). A literal key containing dots wins over descent.
 */
export function lookup(source: Readonly<Record<string, unknown>>, key: string): unknown {
  if (Object.prototype.hasOwnProperty.call(source, key)) {
    return source[key];
  }

  const parts = key.split('.');
  if (parts.length < 2) return undefined;

  let current: unknown = source;
  for (const part of parts) {
    if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/** True when the key is present with a value other than undefined. */
export function hasValue(state: WorkflowState, key: string): boolean {
  return lookup(state, key) !== undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
