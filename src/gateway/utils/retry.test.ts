import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { retry, retryDelay, computeDelay, isRetryable, DEFAULT_RETRY_POLICY } from "./retry.js";
import {
  RateLimitError,
  AuthenticationError,
  ServerError,
} from "../types.js";
import { AbortError } from "../../errors.js";

describe("retry()", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    await expect(retry(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries transient errors", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new ServerError({ message: "fail", provider: "openai" }))
      .mockResolvedValue("ok");

    const promise = retry(fn, { max_retries: 2, jitter: false, base_delay: 0.001 });
    await vi.runAllTimersAsync();
    await expect(promise).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent errors", async () => {
    const fn = vi.fn()
      .mockRejectedValue(new AuthenticationError({ message: "invalid key", provider: "openai" }));

    await expect(retry(fn, { max_retries: 3 })).rejects.toThrow(AuthenticationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops after max_retries", async () => {
    vi.useRealTimers();
    const fn = vi.fn()
      .mockRejectedValue(new ServerError({ message: "fail", provider: "openai" }));

    await expect(
      retry(fn, { max_retries: 2, jitter: false, base_delay: 0.001 }),
    ).rejects.toThrow(ServerError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("gives up when retry_after exceeds max_delay", async () => {
    const fn = vi.fn()
      .mockRejectedValue(new RateLimitError({ message: "slow down", provider: "openai", retry_after: 120 }));

    await expect(retry(fn, { max_retries: 3, max_delay: 60 })).rejects.toThrow(RateLimitError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("calls on_retry with attempt number and delay", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(new RateLimitError({ message: "429", provider: "openai", retry_after: 2 }))
      .mockResolvedValue("done");

    const promise = retry(fn, { on_retry: onRetry });
    await vi.runAllTimersAsync();
    await expect(promise).resolves.toBe("done");
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(2);
  });

  it("never retries an abort", async () => {
    const fn = vi.fn().mockRejectedValue(new AbortError());
    await expect(retry(fn, { max_retries: 3 })).rejects.toBeInstanceOf(AbortError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("aborts a pending backoff sleep", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockRejectedValue(new ServerError({ message: "fail", provider: "openai" }));
    const promise = retry(fn, { max_retries: 3, jitter: false, base_delay: 10 }, controller.signal);
    const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);
    await vi.advanceTimersByTimeAsync(1);
    controller.abort();
    await assertion;
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("backoff helpers", () => {
  it("computeDelay grows exponentially and caps at max_delay", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, jitter: false, base_delay: 1, max_delay: 5 };
    expect(computeDelay(0, policy)).toBe(1);
    expect(computeDelay(1, policy)).toBe(2);
    expect(computeDelay(2, policy)).toBe(4);
    expect(computeDelay(3, policy)).toBe(5);
  });

  it("computeDelay with jitter stays within +/- 50%", () => {
    const policy = { ...DEFAULT_RETRY_POLICY, jitter: true, base_delay: 2 };
    for (let i = 0; i < 20; i++) {
      const d = computeDelay(0, policy);
      expect(d).toBeGreaterThanOrEqual(1);
      expect(d).toBeLessThan(3);
    }
  });

  it("retryDelay prefers retry_after", () => {
    const err = new RateLimitError({ message: "429", provider: "p", retry_after: 3 });
    expect(retryDelay(err, 0, { ...DEFAULT_RETRY_POLICY, jitter: false })).toBe(3);
  });

  it("isRetryable treats unknown errors as retryable", () => {
    expect(isRetryable(new Error("weird"))).toBe(true);
    expect(isRetryable(new AuthenticationError({ message: "x", provider: "p" }))).toBe(false);
  });
});
