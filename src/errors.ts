// ============================================================================
// Orchestrator Error Taxonomy
// ============================================================================
//
// Provider-level errors (transient/permanent/exhausted) live in
// gateway/types.ts next to the HTTP status mapping. Everything the workflow,
// retrieval and storage layers raise is declared here.

import type { AgentResult, RunOutcome, WorkflowState } from "./workflow/types.js";

export class OrchestratorError extends Error {
  cause?: Error;
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "OrchestratorError";
    this.cause = cause;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed request, topology or node update. Raised before execution. */
export class ValidationError extends OrchestratorError {
  readonly issues: ValidationIssue[];
  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class RetrievalStaleError extends OrchestratorError {
  readonly keys: string[];
  constructor(keys: string[]) {
    super(`Stale embeddings for ${keys.length} document(s): ${keys.slice(0, 5).join(", ")}`);
    this.name = "RetrievalStaleError";
    this.keys = keys;
  }
}

export class NodeTimeoutError extends OrchestratorError {
  readonly node_name: string;
  constructor(node_name: string, reason: "deadline" | "node_timeout", timeoutMs?: number) {
    super(
      reason === "deadline"
        ? `Node "${node_name}" did not finish before the run deadline`
        : `Node "${node_name}" exceeded its timeout of ${timeoutMs ?? 0}ms`,
    );
    this.name = "NodeTimeoutError";
    this.node_name = node_name;
  }
}

export class RunNotFoundError extends OrchestratorError {
  readonly run_id: string;
  constructor(run_id: string) {
    super(`Unknown workflow run: ${run_id}`);
    this.name = "RunNotFoundError";
    this.run_id = run_id;
  }
}

export class StorageDecodeError extends OrchestratorError {
  readonly source_type: string;
  constructor(source_type: string, message: string) {
    super(`Could not decode ${source_type} record: ${message}`);
    this.name = "StorageDecodeError";
    this.source_type = source_type;
  }
}

export class ConfigurationError extends OrchestratorError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Cooperative cancellation reached a checkpoint. Never retried. */
export class AbortError extends OrchestratorError {
  constructor(message = "Operation was aborted") {
    super(message);
    this.name = "AbortError";
  }
}

/**
 * A run whose required nodes all succeeded while some optional node did not.
 * Returned, not thrown, by WorkflowEngine.getResult.
 */
export class PartialWorkflowFailure extends OrchestratorError {
  readonly run_id: string;
  readonly state: WorkflowState;
  readonly trace: readonly AgentResult[];
  readonly failed_nodes: readonly string[];
  constructor(outcome: RunOutcome) {
    super(`Run ${outcome.run_id} finished partially; not ok: ${outcome.failed_nodes.join(", ")}`);
    this.name = "PartialWorkflowFailure";
    this.run_id = outcome.run_id;
    this.state = outcome.state;
    this.trace = outcome.trace;
    this.failed_nodes = outcome.failed_nodes;
  }
}

export class WorkflowFailedError extends OrchestratorError {
  readonly run_id: string;
  readonly state: WorkflowState;
  readonly trace: readonly AgentResult[];
  readonly failed_nodes: readonly string[];
  constructor(outcome: RunOutcome) {
    const detail = outcome.failed_nodes.length > 0
      ? `not ok: ${outcome.failed_nodes.join(", ")}`
      : outcome.error?.message ?? "unknown cause";
    super(`Run ${outcome.run_id} failed (${detail})`, outcome.error);
    this.name = "WorkflowFailedError";
    this.run_id = outcome.run_id;
    this.state = outcome.state;
    this.trace = outcome.trace;
    this.failed_nodes = outcome.failed_nodes;
  }
}

/** Normalizes a thrown value into an Error instance. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : JSON.stringify(value));
}
