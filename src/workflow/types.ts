/**
 * Core types for the workflow engine: node contract, per-node results, run
 * status and events.
 */

import type { TextInvoker } from '../gateway/types.js';
import type { Retriever } from '../retrieval/types.js';
import type { ScoringPolicy } from '../scoring/types.js';
import type { StorageHandle } from '../storage/types.js';
import type { TaskPool } from '../concurrency/task-pool.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** Aggregated run state. Never mutated; every merge yields a new frozen object. */
export type WorkflowState = Readonly<Record<string, unknown>>;

export type StateUpdate = Record<string, unknown>;

export type FlagValue = boolean | string | number;
export type Flags = Readonly<Record<string, FlagValue>>;

// ---------------------------------------------------------------------------
// Node Status
// ---------------------------------------------------------------------------

export enum NodeStatus {
  OK = 'ok',
  FAILED = 'failed',
  SKIPPED = 'skipped',
  TIMED_OUT = 'timed_out',
}

export interface AgentResult {
  node_name: string;
  status: NodeStatus;
  partial_state: StateUpdate;
  /** Error message, or the skip reason. */
  error?: string;
  /** Error class name. */
  error_kind?: string;
  attempts: number;
  started_at?: Date;
  ended_at?: Date;
}

export function makeAgentResult(
  partial: Partial<AgentResult> & { node_name: string; status: NodeStatus },
): AgentResult {
  return Object.freeze({
    partial_state: {},
    attempts: 0,
    ...partial,
  });
}

// ---------------------------------------------------------------------------
// Run Status
// ---------------------------------------------------------------------------

export enum RunStatus {
  /** Submitted; waiting for its storage handle. */
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  PARTIAL = 'partial',
  FAILED = 'failed',
}

export interface RunOutcome {
  run_id: string;
  topology: string;
  status: RunStatus;
  state: WorkflowState;
  /** Which node last wrote each state key. */
  provenance: Readonly<Record<string, string>>;
  trace: readonly AgentResult[];
  /** Enabled nodes that did not finish ok. */
  failed_nodes: readonly string[];
  started_at: Date;
  ended_at: Date;
  error?: Error;
}

// ---------------------------------------------------------------------------
// Agent Nodes
// ---------------------------------------------------------------------------

export type AgentKind = 'analysis' | 'insight' | 'strategy' | 'generation' | 'coordination';

export interface NodeReads {
  required: readonly string[];
  optional: readonly string[];
}

export interface NodeContext {
  run_id: string;
  node_name: string;
  /** Fires on run deadline, cancellation, fatal failure or node timeout. */
  signal: AbortSignal;
  gateway: TextInvoker;
  index: Retriever;
  storage: StorageHandle;
  /** Bounded pool for work inside the node; separate from node scheduling. */
  batch: TaskPool;
  scoring: ScoringPolicy;
  flags: Flags;
  emit(message: string, data?: Record<string, unknown>): void;
}

/**
 * A unit of work in a topology. Nodes declare what they read and write up
 * front; the engine derives dependencies from those declarations and rejects
 * updates that touch undeclared keys.
 */
export interface AgentNode {
  readonly name: string;
  readonly kind: AgentKind;
  readonly reads: NodeReads;
  readonly writes: readonly string[];
  produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate>;
}

// ---------------------------------------------------------------------------
// Workflow Events
// ---------------------------------------------------------------------------

export enum WorkflowEventKind {
  RUN_STARTED = 'run_started',
  RUN_FINISHED = 'run_finished',
  NODE_STARTED = 'node_started',
  NODE_COMPLETED = 'node_completed',
  NODE_FAILED = 'node_failed',
  NODE_SKIPPED = 'node_skipped',
  NODE_TIMED_OUT = 'node_timed_out',
  NODE_RETRYING = 'node_retrying',
  NODE_MESSAGE = 'node_message',
}

export interface WorkflowEvent {
  kind: WorkflowEventKind;
  run_id: string;
  timestamp: Date;
  data: Record<string, unknown>;
}
