/**
 * Workflow events: a typed emitter plus factory functions for each kind.
 */

import type { WorkflowEvent } from './types.js';
import { WorkflowEventKind } from './types.js';

export type EventListener = (event: WorkflowEvent) => void;

export class WorkflowEventEmitter {
  private listeners: EventListener[] = [];

  on(listener: EventListener): void {
    this.listeners.push(listener);
  }

  off(listener: EventListener): void {
    this.listeners = this.listeners.filter(l => l !== listener);
  }

  emit(event: WorkflowEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        console.error('Event listener error:', e);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Event Factory Functions
// ---------------------------------------------------------------------------

function makeEvent(kind: WorkflowEventKind, run_id: string, data: Record<string, unknown>): WorkflowEvent {
  return { kind, run_id, timestamp: new Date(), data };
}

export function runStarted(run_id: string, topology: string, nodes: readonly string[]): WorkflowEvent {
  return makeEvent(WorkflowEventKind.RUN_STARTED, run_id, { topology, nodes: [...nodes] });
}

export function runFinished(run_id: string, status: string, duration: number): WorkflowEvent {
  return makeEvent(WorkflowEventKind.RUN_FINISHED, run_id, { status, duration });
}

export function nodeStarted(run_id: string, node: string, attempt: number): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_STARTED, run_id, { node, attempt });
}

export function nodeCompleted(run_id: string, node: string, duration: number, keys: readonly string[]): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_COMPLETED, run_id, { node, duration, keys: [...keys] });
}

export function nodeFailed(run_id: string, node: string, error: string): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_FAILED, run_id, { node, error });
}

export function nodeSkipped(run_id: string, node: string, reason: string): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_SKIPPED, run_id, { node, reason });
}

export function nodeTimedOut(run_id: string, node: string, reason: string): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_TIMED_OUT, run_id, { node, reason });
}

export function nodeRetrying(run_id: string, node: string, attempt: number, delay: number, error: string): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_RETRYING, run_id, { node, attempt, delay, error });
}

export function nodeMessage(run_id: string, node: string, message: string, data: Record<string, unknown> = {}): WorkflowEvent {
  return makeEvent(WorkflowEventKind.NODE_MESSAGE, run_id, { ...data, node, message });
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/** A listener that writes one line per event. */
export function createEventLogger(logger: (message: string) => void = console.log): EventListener {
  return (event) => {
    const { node, ...rest } = event.data;
    const subject = typeof node === 'string' ? ` node=${node}` : '';
    const details = Object.entries(rest)
      .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
      .join(' ');
    logger(`[workflow] ${event.kind} run=${event.run_id}${subject}${details ? ` ${details}` : ''}`);
  };
}
