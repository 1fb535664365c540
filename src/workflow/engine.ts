/**
 * Workflow engine: validates a request, builds the initial state, runs the
 * topology's nodes through a bounded pool once their dependencies resolve,
 * and merges their updates into the final state.
 * Lifecycle: VALIDATE -> INITIALIZE -> EXECUTE -> FINALIZE
 */

import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  AbortError,
  ConfigurationError,
  NodeTimeoutError,
  OrchestratorError,
  PartialWorkflowFailure,
  RunNotFoundError,
  ValidationError,
  WorkflowFailedError,
  toError,
} from '../errors.js';
import { GatewayExhaustedError } from '../gateway/types.js';
import type { RetryPolicy, TextInvoker } from '../gateway/types.js';
import { DEFAULT_RETRY_POLICY, computeDelay } from '../gateway/utils/retry.js';
import type { Retriever } from '../retrieval/types.js';
import { resolvePolicy } from '../scoring/scorer.js';
import type { ScoringPolicy } from '../scoring/types.js';
import type { StorageHandle, StorageProvider } from '../storage/types.js';
import { TaskPool } from '../concurrency/task-pool.js';
import { raceAbort, sleep, throwIfAborted } from '../concurrency/abort.js';
import { evaluateCondition } from './conditions.js';
import { toMilliseconds } from './duration.js';
import { WorkflowEventEmitter } from './events.js';
import type { EventListener } from './events.js';
import * as events from './events.js';
import { freezeState, hasValue, isRecord, mergeInOrder } from './state.js';
import type { WriterUpdate } from './state.js';
import type { NodeBinding, Topology } from './topology.js';
import { NodeStatus, RunStatus, makeAgentResult } from './types.js';
import type {
  AgentResult,
  Flags,
  NodeContext,
  RunOutcome,
  StateUpdate,
  WorkflowEvent,
  WorkflowState,
} from './types.js';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export interface WorkflowRequest {
  params: Record<string, unknown>;
  flags?: Record<string, boolean | string | number>;
  /** Milliseconds, or a duration string such as "90s". */
  deadline?: number | string;
  /** Overrides the engine's default topology for this run. */
  topology?: Topology;
}

const requestSchema = z.object({
  params: z.record(z.unknown()),
  flags: z.record(z.union([z.boolean(), z.string(), z.number()])).default({}),
  deadline: z.union([z.number(), z.string()]).optional(),
});

function issuesOf(error: z.ZodError, prefix: string) {
  return error.issues.map((i) => ({
    path: [prefix, ...i.path].filter((p) => p !== '').join('.'),
    message: i.message,
  }));
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface WorkflowEngineOptions {
  topology: Topology;
  storage: StorageProvider;
  gateway: TextInvoker;
  index: Retriever;
  scoring?: Partial<ScoringPolicy>;
  /** Nodes running at once across all runs. */
  max_concurrency?: number;
  /** Batch tasks running at once inside nodes, across all runs. */
  batch_concurrency?: number;
  /** Backoff for node retries. */
  node_retry?: Partial<RetryPolicy>;
  /** Finished runs kept for lookup; the oldest are dropped beyond this. Default 1000. */
  max_retained_runs?: number;
  on_event?: EventListener;
  clock?: () => Date;
  generateId?: () => string;
}

type AbortCause =
  | { kind: 'deadline' }
  | { kind: 'fatal'; node: string }
  | { kind: 'cancelled' };

interface RunRecord {
  run_id: string;
  topology: Topology;
  status: RunStatus;
  initial: WorkflowState;
  flags: Flags;
  deadline_ms?: number;
  trace: Map<string, AgentResult>;
  disabled: Set<string>;
  controller: AbortController;
  abort?: AbortCause;
  started_at: Date;
  error?: Error;
  outcome?: RunOutcome;
}

interface NodeProgress {
  attempts: number;
  started_at?: Date;
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/**
 * failed: some enabled required node is not ok. partial: every required node
 * is ok and some enabled optional node is not. Disabled nodes never count.
 */
export function computeRunStatus(
  topology: Topology,
  trace: ReadonlyMap<string, AgentResult>,
  disabled: ReadonlySet<string>,
): { status: RunStatus; failed_nodes: string[] } {
  const failed_nodes: string[] = [];
  let requiredFailed = false;
  for (const name of topology.order) {
    if (disabled.has(name)) continue;
    if (trace.get(name)?.status === NodeStatus.OK) continue;
    failed_nodes.push(name);
    if (topology.binding(name).required) requiredFailed = true;
  }
  const status = requiredFailed
    ? RunStatus.FAILED
    : failed_nodes.length > 0 ? RunStatus.PARTIAL : RunStatus.COMPLETED;
  return { status, failed_nodes };
}

function isNodeRetryable(err: unknown): boolean {
  if (err instanceof AbortError) return false;
  if (err instanceof NodeTimeoutError) return false;
  if (err instanceof ValidationError) return false;
  if (err instanceof GatewayExhaustedError) return false;
  return true;
}

// ---------------------------------------------------------------------------
// Workflow Engine
// ---------------------------------------------------------------------------

function isActive(status: RunStatus): boolean {
  return status === RunStatus.PENDING || status === RunStatus.RUNNING;
}

export class WorkflowEngine {
  private readonly topology: Topology;
  private readonly storage: StorageProvider;
  private readonly gateway: TextInvoker;
  private readonly index: Retriever;
  private readonly scoring: ScoringPolicy;
  private readonly pool: TaskPool;
  private readonly batch: TaskPool;
  private readonly retryPolicy: RetryPolicy;
  private readonly emitter: WorkflowEventEmitter;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly maxRetained: number;
  private readonly runs = new Map<string, { record: RunRecord; done: Promise<RunOutcome> }>();

  constructor(options: WorkflowEngineOptions) {
    this.topology = options.topology;
    this.storage = options.storage;
    this.gateway = options.gateway;
    this.index = options.index;
    this.scoring = resolvePolicy(options.scoring);
    this.pool = new TaskPool(options.max_concurrency ?? 4);
    this.batch = new TaskPool(options.batch_concurrency ?? 8);
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.node_retry };
    this.emitter = new WorkflowEventEmitter();
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? (() => nanoid());
    this.maxRetained = options.max_retained_runs ?? 1000;
    if (!Number.isInteger(this.maxRetained) || this.maxRetained < 1) {
      throw new ConfigurationError(`max_retained_runs must be a positive integer, got ${this.maxRetained}`);
    }

    if (options.on_event) {
      this.emitter.on(options.on_event);
    }
  }

  on(listener: EventListener): void {
    this.emitter.on(listener);
  }

  off(listener: EventListener): void {
    this.emitter.off(listener);
  }

  // -----------------------------------------------------------------------
  // Submission surface
  // -----------------------------------------------------------------------

  /**
   * Validate the request and start the run. Throws ValidationError before
   * anything executes; otherwise returns the run id immediately.
   */
  submit(request: WorkflowRequest): string {
    const topology = request.topology ?? this.topology;

    const parsed = requestSchema.safeParse({
      params: request.params,
      flags: request.flags,
      deadline: request.deadline,
    });
    if (!parsed.success) {
      throw new ValidationError('Invalid workflow request', issuesOf(parsed.error, ''));
    }

    let params: Record<string, unknown> = parsed.data.params;
    if (topology.params) {
      const checked = topology.params.safeParse(parsed.data.params);
      if (!checked.success) {
        throw new ValidationError(
          `Invalid params for topology '${topology.name}'`,
          issuesOf(checked.error, 'params'),
        );
      }
      params = checked.data;
    }

    const flags = Object.freeze({ ...parsed.data.flags });
    const deadline_ms = parsed.data.deadline !== undefined
      ? toMilliseconds(parsed.data.deadline)
      : undefined;

    const run_id = this.generateId();
    if (this.runs.has(run_id)) {
      throw new OrchestratorError(`Run id ${run_id} is already in use`);
    }

    const record: RunRecord = {
      run_id,
      topology,
      status: RunStatus.PENDING,
      initial: freezeState({ ...params, flags }),
      flags,
      deadline_ms,
      trace: new Map(),
      disabled: new Set(),
      controller: new AbortController(),
      started_at: this.clock(),
    };
    this.runs.set(run_id, { record, done: this.execute(record) });
    return run_id;
  }

  getStatus(run_id: string): RunStatus {
    return this.lookup(run_id).record.status;
  }

  /** Recorded node results so far, in topological order. */
  getTrace(run_id: string): AgentResult[] {
    return traceOf(this.lookup(run_id).record);
  }

  /**
   * Completed runs yield their state and partial runs a PartialWorkflowFailure.
   * Failed runs throw WorkflowFailedError. Runs still executing yield undefined.
   */
  getResult(run_id: string): WorkflowState | PartialWorkflowFailure | undefined {
    const { record } = this.lookup(run_id);
    const outcome = record.outcome;
    if (!outcome) return undefined;
    switch (outcome.status) {
      case RunStatus.COMPLETED:
        return outcome.state;
      case RunStatus.PARTIAL:
        return new PartialWorkflowFailure(outcome);
      case RunStatus.FAILED:
        throw new WorkflowFailedError(outcome);
      default:
        return undefined;
    }
  }

  wait(run_id: string): Promise<RunOutcome> {
    return this.lookup(run_id).done;
  }

  async run(request: WorkflowRequest): Promise<RunOutcome> {
    return this.wait(this.submit(request));
  }

  /** Abort a pending or running run. Returns false when it has already finished. */
  cancel(run_id: string): boolean {
    const { record } = this.lookup(run_id);
    if (!isActive(record.status)) return false;
    return this.abortRun(record, { kind: 'cancelled' });
  }

  /**
   * Drop a finished run's record. Returns false while the run is still
   * pending or running.
   */
  forget(run_id: string): boolean {
    const { record } = this.lookup(run_id);
    if (isActive(record.status)) return false;
    return this.runs.delete(run_id);
  }

  private lookup(run_id: string): { record: RunRecord; done: Promise<RunOutcome> } {
    const entry = this.runs.get(run_id);
    if (!entry) throw new RunNotFoundError(run_id);
    return entry;
  }

  // -----------------------------------------------------------------------
  // Execution
  // -----------------------------------------------------------------------

  private async execute(run: RunRecord): Promise<RunOutcome> {
    this.emit(events.runStarted(run.run_id, run.topology.name, run.topology.order));

    const timer = run.deadline_ms !== undefined
      ? setTimeout(() => this.abortRun(run, { kind: 'deadline' }), run.deadline_ms)
      : undefined;

    let handle: StorageHandle | undefined;
    try {
      handle = await this.storage.acquire(run.run_id);
      run.status = RunStatus.RUNNING;
      await this.executeNodes(run, handle);
    } catch (err) {
      run.error = toError(err);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
      if (handle) {
        try {
          await handle.release();
        } catch (err) {
          run.error ??= toError(err);
        }
      }
    }

    return this.finish(run);
  }

  private async executeNodes(run: RunRecord, handle: StorageHandle): Promise<void> {
    const settled = new Map<string, Promise<void>>();
    for (const name of run.topology.order) {
      const upstream: Promise<void>[] = [];
      for (const dep of run.topology.dependenciesOf(name)) {
        const p = settled.get(dep);
        if (p) upstream.push(p);
      }
      const binding = run.topology.binding(name);
      settled.set(name, Promise.all(upstream).then(() => this.resolveNode(run, binding, handle)));
    }
    await Promise.all(settled.values());
  }

  /** Runs one node to a recorded result. Never rejects. */
  private async resolveNode(run: RunRecord, binding: NodeBinding, handle: StorageHandle): Promise<void> {
    const name = binding.node.name;
    const progress: NodeProgress = { attempts: 0 };

    if (run.controller.signal.aborted) {
      this.recordInterrupted(run, name, progress);
      return;
    }

    if (!evaluateCondition(binding.condition, { flags: run.flags, params: run.initial })) {
      run.disabled.add(name);
      this.recordSkipped(run, name, 'disabled by condition');
      return;
    }

    const input = this.inputFor(run, name);
    const missing = binding.node.reads.required.filter((key) => !hasValue(input, key));
    if (missing.length > 0) {
      this.recordSkipped(run, name, `missing input: ${missing.join(', ')}`);
      return;
    }

    try {
      const update = await raceAbort(
        this.pool.run(() => this.attemptNode(run, binding, input, handle, progress)),
        run.controller.signal,
      );
      const ended_at = this.clock();
      const recorded = this.record(run, makeAgentResult({
        node_name: name,
        status: NodeStatus.OK,
        partial_state: Object.freeze(update),
        attempts: progress.attempts,
        started_at: progress.started_at,
        ended_at,
      }));
      if (recorded) {
        const duration = ended_at.getTime() - (progress.started_at ?? ended_at).getTime();
        this.emit(events.nodeCompleted(run.run_id, name, duration, Object.keys(update)));
      }
    } catch (err) {
      if (run.controller.signal.aborted) {
        this.recordInterrupted(run, name, progress);
        return;
      }
      const error = toError(err);
      if (error instanceof NodeTimeoutError) {
        this.recordTimedOut(run, name, progress, error);
        return;
      }
      const recorded = this.record(run, makeAgentResult({
        node_name: name,
        status: NodeStatus.FAILED,
        error: error.message,
        error_kind: error.name,
        attempts: progress.attempts,
        started_at: progress.started_at,
        ended_at: this.clock(),
      }));
      if (recorded) {
        this.emit(events.nodeFailed(run.run_id, name, error.message));
        if (binding.required && error instanceof GatewayExhaustedError) {
          this.abortRun(run, { kind: 'fatal', node: name });
        }
      }
    }
  }

  /** Attempts with retries. Runs inside a scheduling slot. */
  private async attemptNode(
    run: RunRecord,
    binding: NodeBinding,
    input: WorkflowState,
    handle: StorageHandle,
    progress: NodeProgress,
  ): Promise<StateUpdate> {
    const name = binding.node.name;
    const maxRetries = binding.max_retries ?? 0;

    for (let attempt = 0; ; attempt++) {
      throwIfAborted(run.controller.signal, `Node ${name}`);
      progress.attempts = attempt + 1;
      progress.started_at ??= this.clock();
      this.emit(events.nodeStarted(run.run_id, name, attempt + 1));

      try {
        return await this.invokeOnce(run, binding, input, handle);
      } catch (err) {
        if (attempt >= maxRetries || !isNodeRetryable(err) || run.controller.signal.aborted) {
          throw err;
        }
        const delay = computeDelay(attempt, this.retryPolicy);
        this.emit(events.nodeRetrying(run.run_id, name, attempt + 1, delay, toError(err).message));
        await sleep(delay * 1000, run.controller.signal);
      }
    }
  }

  private async invokeOnce(
    run: RunRecord,
    binding: NodeBinding,
    input: WorkflowState,
    handle: StorageHandle,
  ): Promise<StateUpdate> {
    const node = binding.node;
    const timeoutMs = run.topology.timeoutOf(node.name);
    const nodeController = new AbortController();
    const signal = AbortSignal.any([run.controller.signal, nodeController.signal]);
    const timer = timeoutMs !== undefined
      ? setTimeout(() => nodeController.abort(), timeoutMs)
      : undefined;

    const ctx: NodeContext = {
      run_id: run.run_id,
      node_name: node.name,
      signal,
      gateway: this.gateway,
      index: this.index,
      storage: handle,
      batch: this.batch,
      scoring: this.scoring,
      flags: run.flags,
      emit: (message, data) => this.emit(events.nodeMessage(run.run_id, node.name, message, data)),
    };

    try {
      const update = await raceAbort(node.produceUpdate(input, ctx), signal);
      return checkUpdate(node.name, node.writes, update);
    } catch (err) {
      if (nodeController.signal.aborted && !run.controller.signal.aborted) {
        throw new NodeTimeoutError(node.name, 'node_timeout', timeoutMs);
      }
      throw err;
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }

  /** Initial state plus updates of completed ancestors, in topological order. */
  private inputFor(run: RunRecord, name: string): WorkflowState {
    const ancestors = run.topology.ancestorsOf(name);
    return mergeInOrder(run.initial, this.okUpdates(run, (n) => ancestors.has(n))).state;
  }

  private okUpdates(run: RunRecord, include: (name: string) => boolean): WriterUpdate[] {
    const updates: WriterUpdate[] = [];
    for (const name of run.topology.order) {
      if (!include(name)) continue;
      const result = run.trace.get(name);
      if (result?.status === NodeStatus.OK) updates.push({ node: name, update: result.partial_state });
    }
    return updates;
  }

  // -----------------------------------------------------------------------
  // Recording
  // -----------------------------------------------------------------------

  /** First record for a node wins; later ones (late results) are dropped. */
  private record(run: RunRecord, result: AgentResult): boolean {
    if (run.trace.has(result.node_name)) return false;
    run.trace.set(result.node_name, result);
    return true;
  }

  private recordSkipped(run: RunRecord, name: string, reason: string, progress?: NodeProgress): void {
    const recorded = this.record(run, makeAgentResult({
      node_name: name,
      status: NodeStatus.SKIPPED,
      error: reason,
      attempts: progress?.attempts ?? 0,
      started_at: progress?.started_at,
      ended_at: progress?.started_at ? this.clock() : undefined,
    }));
    if (recorded) this.emit(events.nodeSkipped(run.run_id, name, reason));
  }

  private recordTimedOut(run: RunRecord, name: string, progress: NodeProgress, error: NodeTimeoutError): void {
    const recorded = this.record(run, makeAgentResult({
      node_name: name,
      status: NodeStatus.TIMED_OUT,
      error: error.message,
      error_kind: error.name,
      attempts: progress.attempts,
      started_at: progress.started_at,
      ended_at: this.clock(),
    }));
    if (recorded) this.emit(events.nodeTimedOut(run.run_id, name, error.message));
  }

  /** Record a node that the run-level abort caught before it finished. */
  private recordInterrupted(run: RunRecord, name: string, progress: NodeProgress): void {
    switch (run.abort?.kind) {
      case 'deadline':
        this.recordTimedOut(run, name, progress, new NodeTimeoutError(name, 'deadline'));
        return;
      case 'cancelled':
        this.recordSkipped(run, name, 'run cancelled', progress);
        return;
      default:
        this.recordSkipped(run, name, 'run aborted', progress);
    }
  }

  private abortRun(run: RunRecord, cause: AbortCause): boolean {
    if (run.abort || !isActive(run.status)) return false;
    run.abort = cause;
    run.controller.abort(cause.kind === 'deadline'
      ? new AbortError(`Run ${run.run_id} passed its deadline`)
      : new AbortError(`Run ${run.run_id} was ${cause.kind === 'cancelled' ? 'cancelled' : 'aborted'}`));
    return true;
  }

  private finish(run: RunRecord): RunOutcome {
    for (const name of run.topology.order) {
      if (!run.trace.has(name)) this.recordInterrupted(run, name, { attempts: 0 });
    }

    const { state, provenance } = mergeInOrder(run.initial, this.okUpdates(run, () => true));
    const computed = computeRunStatus(run.topology, run.trace, run.disabled);
    const status = run.error || run.abort?.kind === 'cancelled' ? RunStatus.FAILED : computed.status;
    const ended_at = this.clock();

    const outcome: RunOutcome = Object.freeze({
      run_id: run.run_id,
      topology: run.topology.name,
      status,
      state,
      provenance,
      trace: Object.freeze(traceOf(run)),
      failed_nodes: Object.freeze(computed.failed_nodes),
      started_at: run.started_at,
      ended_at,
      error: run.error,
    });
    run.outcome = outcome;
    run.status = status;
    this.evictFinished();

    this.emit(events.runFinished(run.run_id, status, ended_at.getTime() - run.started_at.getTime()));
    return outcome;
  }

  /** Oldest finished runs go first; Map iteration follows submission order. */
  private evictFinished(): void {
    let finished = 0;
    for (const { record } of this.runs.values()) {
      if (!isActive(record.status)) finished++;
    }
    for (const [run_id, { record }] of this.runs) {
      if (finished <= this.maxRetained) break;
      if (isActive(record.status)) continue;
      this.runs.delete(run_id);
      finished--;
    }
  }

  private emit(event: WorkflowEvent): void {
    this.emitter.emit(event);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function traceOf(run: RunRecord): AgentResult[] {
  const trace: AgentResult[] = [];
  for (const name of run.topology.order) {
    const result = run.trace.get(name);
    if (result) trace.push(result);
  }
  return trace;
}

function checkUpdate(node: string, writes: readonly string[], update: unknown): StateUpdate {
  if (!isRecord(update)) {
    throw new ValidationError(`Node '${node}' returned a non-object update`);
  }
  const undeclared = Object.keys(update).filter((key) => !writes.includes(key));
  if (undeclared.length > 0) {
    throw new ValidationError(
      `Node '${node}' wrote undeclared key(s): ${undeclared.join(', ')}`,
      undeclared.map((key) => ({ path: key, message: 'not in the node writes declaration' })),
    );
  }
  return { ...update };
}
