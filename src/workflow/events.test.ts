import { describe, it, expect, vi } from 'vitest';
import {
  WorkflowEventEmitter,
  createEventLogger,
  nodeCompleted,
  nodeMessage,
  nodeRetrying,
  runStarted,
} from './events.js';
import { WorkflowEventKind } from './types.js';

describe('WorkflowEventEmitter', () => {
  it('emits to every listener until removed', () => {
    const emitter = new WorkflowEventEmitter();
    const first = vi.fn();
    const second = vi.fn();
    emitter.on(first);
    emitter.on(second);

    const event = runStarted('r1', 'outreach', ['a']);
    emitter.emit(event);
    emitter.off(first);
    emitter.emit(event);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(2);
  });

  it('reports listener errors and keeps going', () => {
    const emitter = new WorkflowEventEmitter();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const after = vi.fn();
    emitter.on(() => { throw new Error('listener broke'); });
    emitter.on(after);

    emitter.emit(runStarted('r1', 't', []));

    expect(after).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    errorSpy.mockRestore();
  });
});

describe('event factories', () => {
  it('builds typed events', () => {
    const event = nodeRetrying('r1', 'writer', 1, 0.5, 'rate limited');
    expect(event.kind).toBe(WorkflowEventKind.NODE_RETRYING);
    expect(event.run_id).toBe('r1');
    expect(event.data).toEqual({ node: 'writer', attempt: 1, delay: 0.5, error: 'rate limited' });
  });
});

describe('createEventLogger', () => {
  it('writes one line per event', () => {
    const lines: string[] = [];
    const log = createEventLogger((line) => lines.push(line));
    log(nodeCompleted('r1', 'plan', 12, ['content_strategy']));
    log(nodeMessage('r1', 'plan', 'segments built'));
    log(runStarted('r2', 'outreach', ['a', 'b']));
    expect(lines).toEqual([
      '[workflow] node_completed run=r1 node=plan duration=12 keys=["content_strategy"]',
      '[workflow] node_message run=r1 node=plan message=segments built',
      '[workflow] run_started run=r2 topology=outreach nodes=["a","b"]',
    ]);
  });
});
