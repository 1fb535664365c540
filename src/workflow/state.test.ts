import { describe, it, expect } from 'vitest';
import { freezeState, hasValue, lookup, mergeInOrder } from './state.js';

describe('mergeInOrder', () => {
  it('applies updates in order and tracks the last writer', () => {
    const initial = freezeState({ goal: 'g' });
    const { state, provenance } = mergeInOrder(initial, [
      { node: 'x', update: { a: 1 } },
      { node: 'y', update: { a: 2, b: 3 } },
    ]);
    expect(state).toEqual({ goal: 'g', a: 2, b: 3 });
    expect(provenance).toEqual({ a: 'y', b: 'y' });
    expect(Object.isFrozen(state)).toBe(true);
    expect(initial).toEqual({ goal: 'g' });
  });
});

describe('lookup', () => {
  const state = { 'a.b': 'literal', a: { b: 'nested', c: { d: 4 } }, list: [1, 2] };

  it('prefers a literal dotted key', () => {
    expect(lookup(state, 'a.b')).toBe('literal');
  });

  it('descends into nested objects', () => {
    expect(lookup(state, 'a.c.d')).toBe(4);
  });

  it('does not descend into arrays or missing paths', () => {
    expect(lookup(state, 'list.0')).toBeUndefined();
    expect(lookup(state, 'a.x.y')).toBeUndefined();
  });
});

describe('hasValue', () => {
  it('treats undefined as absent and null as present', () => {
    const state = freezeState({ none: undefined, empty: null });
    expect(hasValue(state, 'none')).toBe(false);
    expect(hasValue(state, 'empty')).toBe(true);
  });
});
