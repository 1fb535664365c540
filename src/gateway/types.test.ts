import { describe, it, expect } from "vitest";
import {
  AccessDeniedError,
  AuthenticationError,
  ContentFilterError,
  ContextLengthError,
  GatewayExhaustedError,
  InvalidRequestError,
  NotFoundError,
  PermanentProviderError,
  QuotaExceededError,
  RateLimitError,
  RequestTimeoutError,
  ServerError,
  TransientProviderError,
  errorFromStatusCode,
  estimateTokens,
  toProviderError,
} from "./types.js";

describe("errorFromStatusCode()", () => {
  const cases: Array<[number, string, Function, boolean]> = [
    [400, "bad request", InvalidRequestError, false],
    [400, "context length exceeded", ContextLengthError, false],
    [401, "unauthorized", AuthenticationError, false],
    [402, "payment required", QuotaExceededError, false],
    [403, "forbidden", AccessDeniedError, false],
    [404, "missing", NotFoundError, false],
    [408, "timeout", RequestTimeoutError, true],
    [413, "payload too large", ContextLengthError, false],
    [422, "unprocessable", InvalidRequestError, false],
    [429, "rate limited", RateLimitError, true],
    [429, "insufficient quota", QuotaExceededError, false],
    [500, "oops", ServerError, true],
    [503, "unavailable", ServerError, true],
  ];

  for (const [status, message, cls, retryable] of cases) {
    it(`${status} "${message}" → ${cls.name}`, () => {
      const err = errorFromStatusCode(status, message, "p");
      expect(err).toBeInstanceOf(cls);
      expect(err.retryable).toBe(retryable);
      expect(err.status_code).toBe(status);
    });
  }

  it("classifies unknown statuses by message", () => {
    expect(errorFromStatusCode(418, "model does not exist", "p")).toBeInstanceOf(NotFoundError);
    expect(errorFromStatusCode(418, "blocked by safety system", "p")).toBeInstanceOf(ContentFilterError);
    expect(errorFromStatusCode(418, "teapot", "p")).toBeInstanceOf(TransientProviderError);
  });

  it("places every class under the transient or permanent branch", () => {
    expect(new RateLimitError({ message: "", provider: "p" })).toBeInstanceOf(TransientProviderError);
    expect(new ContentFilterError({ message: "", provider: "p" })).toBeInstanceOf(PermanentProviderError);
  });
});

describe("GatewayExhaustedError", () => {
  it("lists every provider failure", () => {
    const err = new GatewayExhaustedError([
      { provider: "a", error: new ServerError({ message: "down", provider: "a" }), attempts: 3 },
      { provider: "b", error: new AuthenticationError({ message: "denied", provider: "b" }), attempts: 1 },
    ]);
    expect(err.message).toBe("All providers failed (a: ServerError: down; b: AuthenticationError: denied)");
    expect(err.cause).toBeInstanceOf(AuthenticationError);
  });

  it("describes the empty case", () => {
    expect(new GatewayExhaustedError([]).message).toBe("All providers failed (no eligible providers)");
  });
});

describe("helpers", () => {
  it("toProviderError keeps provider errors and wraps others", () => {
    const original = new ServerError({ message: "x", provider: "a" });
    expect(toProviderError(original, "b")).toBe(original);
    const wrapped = toProviderError("boom", "b");
    expect(wrapped).toBeInstanceOf(TransientProviderError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.provider).toBe("b");
  });

  it("estimateTokens rounds up a quarter of the length", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcde")).toBe(2);
  });
});
