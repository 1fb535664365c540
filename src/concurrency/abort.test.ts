import { describe, it, expect, vi, afterEach } from 'vitest';
import { sleep, raceAbort, throwIfAborted, isAbortError } from './abort.js';
import { AbortError } from '../errors.js';

describe('abort helpers', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sleep resolves after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const p = sleep(1000).then(() => {
      done = true;
    });
    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await p;
    expect(done).toBe(true);
  });

  it('sleep rejects when the signal fires', async () => {
    const controller = new AbortController();
    const p = sleep(60_000, controller.signal);
    controller.abort();
    await expect(p).rejects.toBeInstanceOf(AbortError);
  });

  it('sleep rejects immediately on an already aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(AbortError);
  });

  it('raceAbort passes through the result without a signal', async () => {
    await expect(raceAbort(Promise.resolve(3), undefined)).resolves.toBe(3);
  });

  it('raceAbort rejects once the signal fires', async () => {
    const controller = new AbortController();
    const never = new Promise<number>(() => {});
    const p = raceAbort(never, controller.signal);
    controller.abort();
    await expect(p).rejects.toBeInstanceOf(AbortError);
  });

  it('throwIfAborted names the operation', () => {
    expect(() => throwIfAborted(AbortSignal.abort(), 'Search')).toThrow('Search was aborted');
    expect(() => throwIfAborted(undefined)).not.toThrow();
  });

  it('isAbortError recognizes DOM-style abort errors', () => {
    const domLike = new Error('x');
    domLike.name = 'AbortError';
    expect(isAbortError(domLike)).toBe(true);
    expect(isAbortError(new AbortError())).toBe(true);
    expect(isAbortError(new Error('other'))).toBe(false);
  });
});
