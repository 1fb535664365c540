// ============================================================================
// LLM Gateway Types
// ============================================================================

// --- Provider Capabilities ---------------------------------------------------

export type CostTier = "low" | "standard" | "premium";

export const COST_TIER_RANK: Record<CostTier, number> = {
  low: 0,
  standard: 1,
  premium: 2,
};

export interface ProviderCapabilities {
  max_context_tokens: number;
  cost_tier: CostTier;
}

// --- Requests & Responses ----------------------------------------------------

export interface CompletionRequest {
  prompt: string;
  system?: string;
  model?: string;
  max_tokens?: number;
  temperature?: number;
  response_format?: "text" | "json";
}

export interface TokenUsage {
  input_tokens: number;
  output_tokens: number;
}

export interface CompletionResponse {
  text: string;
  model: string;
  usage?: TokenUsage;
  finish_reason?: string;
}

export interface InvokeConstraints extends Omit<CompletionRequest, "prompt"> {
  /** Providers above this tier are not eligible for the call. */
  max_cost_tier?: CostTier;
  /** Moves the named provider to the front for this call only. */
  preferred_provider?: string;
  signal?: AbortSignal;
}

export interface GatewayResponse extends CompletionResponse {
  provider: string;
  /** Total attempts across all providers, including the successful one. */
  attempts: number;
  latency_ms: number;
}

// --- Provider Interfaces -----------------------------------------------------

export interface LlmProvider {
  readonly name: string;
  readonly capabilities: ProviderCapabilities;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/** The narrow surface agent nodes and the retrieval index depend on. */
export interface TextInvoker {
  invoke(prompt: string, constraints?: InvokeConstraints): Promise<GatewayResponse>;
}

// --- Middleware ---------------------------------------------------------------

export interface ProviderCall {
  provider: string;
  request: CompletionRequest;
  /** 1-based attempt number on this provider. */
  attempt: number;
}

export type MiddlewareNext = (call: ProviderCall) => Promise<CompletionResponse>;

export type Middleware = (
  call: ProviderCall,
  next: MiddlewareNext,
) => Promise<CompletionResponse>;

// --- Retry Policy ------------------------------------------------------------

export interface RetryPolicy {
  max_retries: number;
  /** Seconds. */
  base_delay: number;
  /** Seconds. */
  max_delay: number;
  backoff_multiplier: number;
  jitter: boolean;
  on_retry?: (error: Error, attempt: number, delay: number) => void;
}

// --- Gateway Events ----------------------------------------------------------

export type GatewayEvent =
  | { kind: "attempt_failed"; provider: string; attempt: number; error: ProviderError }
  | { kind: "failover"; from: string; to: string | undefined; reason: string }
  | { kind: "reranked"; order: string[] };

// --- Error Hierarchy ---------------------------------------------------------

export class GatewayError extends Error {
  cause?: Error;
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = "GatewayError";
    this.cause = cause;
  }
}

export interface ProviderErrorInit {
  message: string;
  provider: string;
  status_code?: number;
  error_code?: string;
  retryable: boolean;
  retry_after?: number;
  raw?: Record<string, unknown>;
  cause?: Error;
}

export type ProviderErrorDetails = Omit<ProviderErrorInit, "retryable">;

export class ProviderError extends GatewayError {
  provider: string;
  status_code?: number;
  error_code?: string;
  retryable: boolean;
  retry_after?: number;
  raw?: Record<string, unknown>;

  constructor(init: ProviderErrorInit) {
    super(init.message, init.cause);
    this.name = "ProviderError";
    this.provider = init.provider;
    this.status_code = init.status_code;
    this.error_code = init.error_code;
    this.retryable = init.retryable;
    this.retry_after = init.retry_after;
    this.raw = init.raw;
  }
}

/** Retryable on the same provider. */
export class TransientProviderError extends ProviderError {
  constructor(init: ProviderErrorDetails) {
    super({ ...init, retryable: true });
    this.name = "TransientProviderError";
  }
}

/** Not retryable on this provider; the gateway fails over immediately. */
export class PermanentProviderError extends ProviderError {
  constructor(init: ProviderErrorDetails) {
    super({ ...init, retryable: false });
    this.name = "PermanentProviderError";
  }
}

export class RateLimitError extends TransientProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "RateLimitError";
  }
}

export class ServerError extends TransientProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "ServerError";
  }
}

export class RequestTimeoutError extends TransientProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "RequestTimeoutError";
  }
}

export class NetworkError extends TransientProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "NetworkError";
  }
}

export class AuthenticationError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "AuthenticationError";
  }
}

export class AccessDeniedError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "AccessDeniedError";
  }
}

export class NotFoundError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "NotFoundError";
  }
}

export class InvalidRequestError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "InvalidRequestError";
  }
}

export class ContextLengthError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "ContextLengthError";
  }
}

export class ContentFilterError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "ContentFilterError";
  }
}

export class QuotaExceededError extends PermanentProviderError {
  constructor(init: ProviderErrorDetails) {
    super(init);
    this.name = "QuotaExceededError";
  }
}

export interface ProviderFailure {
  provider: string;
  error: ProviderError;
  attempts: number;
}

/** Every eligible provider failed. Lists each provider's last failure. */
export class GatewayExhaustedError extends GatewayError {
  readonly failures: ProviderFailure[];

  constructor(failures: ProviderFailure[], reason?: string) {
    const detail = failures.length > 0
      ? failures.map((f) => `${f.provider}: ${f.error.name}: ${f.error.message}`).join("; ")
      : reason ?? "no eligible providers";
    super(`All providers failed (${detail})`, failures.at(-1)?.error);
    this.name = "GatewayExhaustedError";
    this.failures = failures;
  }
}

// --- Helpers -----------------------------------------------------------------

export function errorFromStatusCode(
  statusCode: number,
  message: string,
  provider: string,
  errorCode?: string,
  raw?: Record<string, unknown>,
  retryAfter?: number,
): ProviderError {
  const base = { message, provider, status_code: statusCode, error_code: errorCode, raw, retry_after: retryAfter };

  const lowerMsg = message.toLowerCase();
  const mentionsContext = lowerMsg.includes("context length") || lowerMsg.includes("too many tokens");

  switch (statusCode) {
    case 400:
    case 422:
      if (mentionsContext) return new ContextLengthError(base);
      return new InvalidRequestError(base);
    case 401:
      return new AuthenticationError(base);
    case 402:
      return new QuotaExceededError(base);
    case 403:
      return new AccessDeniedError(base);
    case 404:
      return new NotFoundError(base);
    case 408:
      return new RequestTimeoutError(base);
    case 413:
      return new ContextLengthError(base);
    case 429:
      if (lowerMsg.includes("quota") || lowerMsg.includes("insufficient")) {
        return new QuotaExceededError(base);
      }
      return new RateLimitError(base);
    case 500:
    case 502:
    case 503:
    case 504:
      return new ServerError(base);
    default: {
      if (lowerMsg.includes("not found") || lowerMsg.includes("does not exist")) {
        return new NotFoundError(base);
      }
      if (lowerMsg.includes("unauthorized") || lowerMsg.includes("invalid key")) {
        return new AuthenticationError(base);
      }
      if (mentionsContext) return new ContextLengthError(base);
      if (lowerMsg.includes("content filter") || lowerMsg.includes("safety")) {
        return new ContentFilterError(base);
      }
      // Unknown statuses are treated as transient
      return new TransientProviderError(base);
    }
  }
}

/** Coerces anything a provider threw into the provider error hierarchy. */
export function toProviderError(err: unknown, provider: string): ProviderError {
  if (err instanceof ProviderError) return err;
  const cause = err instanceof Error ? err : undefined;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientProviderError({ message, provider, cause });
}

/** Rough prompt size in tokens, used for context eligibility. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
