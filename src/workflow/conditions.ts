/**
 * Binding conditions, evaluated against request flags and params.
 * Grammar: Condition ::= Clause ( '&&' Clause )*
 *          Clause    ::= Key '=' Literal | Key '!=' Literal | Key
 *          Key       ::= 'flags.' Path | 'params.' Path | bare_key
 * A bare key is truthy unless empty, "0" or "false". Bare keys look in
 * flags first, then params.
 */

import type { Flags, WorkflowState } from './types.js';
import { lookup } from './state.js';

export interface ConditionScope {
  flags: Flags;
  params: WorkflowState;
}

export function resolveKey(key: string, scope: ConditionScope): string {
  const trimmed = key.trim();

  if (trimmed.startsWith('flags.')) {
    return stringify(lookup(scope.flags, trimmed.substring('flags.'.length)));
  }
  if (trimmed.startsWith('params.')) {
    return stringify(lookup(scope.params, trimmed.substring('params.'.length)));
  }

  const flag = lookup(scope.flags, trimmed);
  if (flag !== undefined) return stringify(flag);
  return stringify(lookup(scope.params, trimmed));
}

function evaluateClause(clause: string, scope: ConditionScope): boolean {
  const neqIndex = clause.indexOf('!=');
  if (neqIndex !== -1) {
    const key = clause.substring(0, neqIndex);
    const value = clause.substring(neqIndex + 2).trim();
    return resolveKey(key, scope) !== unquote(value);
  }

  const eqIndex = clause.indexOf('=');
  if (eqIndex !== -1) {
    const key = clause.substring(0, eqIndex);
    const value = clause.substring(eqIndex + 1).trim();
    return resolveKey(key, scope) === unquote(value);
  }

  const resolved = resolveKey(clause, scope);
  return resolved !== '' && resolved !== '0' && resolved !== 'false';
}

export function evaluateCondition(condition: string | undefined, scope: ConditionScope): boolean {
  if (!condition || !condition.trim()) return true;

  for (const clause of condition.split('&&')) {
    const trimmed = clause.trim();
    if (!trimmed) continue;
    if (!evaluateClause(trimmed, scope)) return false;
  }
  return true;
}

/** Syntax problems in a condition; empty when it is well formed. */
export function checkCondition(condition: string): string[] {
  const problems: string[] = [];
  const clauses = condition.split('&&').map((c) => c.trim());
  clauses.forEach((clause, i) => {
    if (!clause) {
      problems.push(`clause ${i + 1} is empty`);
      return;
    }
    const op = clause.includes('!=') ? '!=' : clause.includes('=') ? '=' : undefined;
    if (!op) {
      if (/\s/.test(clause)) problems.push(`"${clause}" is not a key`);
      return;
    }
    const [key, ...rest] = clause.split(op);
    const value = rest.join(op).trim();
    if (!key.trim()) problems.push(`"${clause}" has no key`);
    if (value.startsWith('=')) problems.push(`"${clause}" uses "==", write "="`);
  });
  return problems;
}

function stringify(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.substring(1, value.length - 1);
  }
  return value;
}
