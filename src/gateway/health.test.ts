import { describe, it, expect } from "vitest";
import { HealthTracker } from "./health.js";

describe("HealthTracker", () => {
  it("starts healthy with no attempts", () => {
    const h = new HealthTracker("a");
    expect(h.score).toBe(1);
    expect(h.attempts).toBe(0);
  });

  it("computes successes over attempts", () => {
    const h = new HealthTracker("a");
    h.recordSuccess();
    h.recordFailure(new Error("x"));
    h.recordSuccess();
    h.recordFailure();
    expect(h.score).toBe(0.5);
    expect(h.snapshot()).toMatchObject({ provider: "a", attempts: 4, successes: 2, last_error: "Error: x" });
  });

  it("forgets outcomes that fall out of the window", () => {
    const h = new HealthTracker("a", 3);
    h.recordFailure();
    h.recordFailure();
    h.recordFailure();
    expect(h.score).toBe(0);
    h.recordSuccess();
    h.recordSuccess();
    h.recordSuccess();
    expect(h.score).toBe(1);
    expect(h.attempts).toBe(3);
  });

  it("rejects an invalid window", () => {
    expect(() => new HealthTracker("a", 0)).toThrow(RangeError);
  });

  it("reset clears history", () => {
    const h = new HealthTracker("a");
    h.recordFailure(new Error("x"));
    h.reset();
    expect(h.snapshot()).toMatchObject({ score: 1, attempts: 0, last_error: undefined });
  });
});
