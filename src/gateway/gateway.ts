// ============================================================================
// LLM Gateway: ranked providers, retry, failover and health re-ranking
// ============================================================================

import {
  COST_TIER_RANK,
  GatewayExhaustedError,
  estimateTokens,
  toProviderError,
} from "./types.js";
import type {
  CompletionResponse,
  GatewayEvent,
  GatewayResponse,
  InvokeConstraints,
  LlmProvider,
  Middleware,
  ProviderCall,
  ProviderError,
  ProviderFailure,
  RetryPolicy,
  TextInvoker,
} from "./types.js";
import { HealthTracker } from "./health.js";
import type { HealthSnapshot } from "./health.js";
import { buildMiddlewareChain } from "./middleware.js";
import { DEFAULT_RETRY_POLICY, retryDelay } from "./utils/retry.js";
import { isAbortError, raceAbort, sleep, throwIfAborted } from "../concurrency/abort.js";
import { ConfigurationError } from "../errors.js";

export interface GatewayOptions {
  /** Providers in initial priority order. */
  providers: LlmProvider[];
  retry?: Partial<RetryPolicy>;
  /** Attempts kept per provider for the rolling health score. */
  health_window?: number;
  middleware?: Middleware[];
  /** Re-sort providers by health after every attempt. Defaults to true. */
  rerank?: boolean;
  on_event?: (event: GatewayEvent) => void;
}

interface ProviderEntry {
  provider: LlmProvider;
  health: HealthTracker;
  priority: number;
}

export class LlmGateway implements TextInvoker {
  private _order: ProviderEntry[];
  private _policy: RetryPolicy;
  private _middleware: Middleware[];
  private _rerank: boolean;
  private _onEvent?: (event: GatewayEvent) => void;

  constructor(options: GatewayOptions) {
    const names = new Set<string>();
    for (const p of options.providers) {
      if (names.has(p.name)) {
        throw new ConfigurationError(`Duplicate provider name: ${p.name}`);
      }
      names.add(p.name);
    }
    this._order = options.providers.map((provider, priority) => ({
      provider,
      health: new HealthTracker(provider.name, options.health_window),
      priority,
    }));
    this._policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this._middleware = [...(options.middleware ?? [])];
    this._rerank = options.rerank ?? true;
    this._onEvent = options.on_event;
  }

  /** Provider names in current priority order. */
  get providers(): string[] {
    return this._order.map((e) => e.provider.name);
  }

  health(): HealthSnapshot[] {
    return this._order.map((e) => e.health.snapshot());
  }

  healthOf(name: string): HealthSnapshot | undefined {
    return this._order.find((e) => e.provider.name === name)?.health.snapshot();
  }

  use(middleware: Middleware): this {
    this._middleware.push(middleware);
    return this;
  }

  async invoke(prompt: string, constraints: InvokeConstraints = {}): Promise<GatewayResponse> {
    const { signal, max_cost_tier, preferred_provider, ...requestFields } = constraints;
    const request = { ...requestFields, prompt };
    const start = Date.now();
    throwIfAborted(signal, "LLM invocation");

    const candidates = this.eligible(prompt, constraints);
    if (candidates.length === 0) {
      throw new GatewayExhaustedError([], "no provider satisfies the call constraints");
    }

    const failures: ProviderFailure[] = [];
    let totalAttempts = 0;

    for (let i = 0; i < candidates.length; i++) {
      const entry = candidates[i];
      const name = entry.provider.name;
      const chain = buildMiddlewareChain(
        this._middleware,
        (call: ProviderCall) => entry.provider.complete(call.request, signal),
      );

      let lastError: ProviderError | undefined;
      let attempts = 0;

      for (let attempt = 0; attempt <= this._policy.max_retries; attempt++) {
        throwIfAborted(signal, "LLM invocation");
        attempts++;
        totalAttempts++;

        let response: CompletionResponse;
        try {
          response = await raceAbort(chain({ provider: name, request, attempt: attempts }), signal);
        } catch (err: unknown) {
          if (isAbortError(err)) throw err;
          const error = toProviderError(err, name);
          lastError = error;
          entry.health.recordFailure(error);
          this.reorder();
          this.emit({ kind: "attempt_failed", provider: name, attempt: attempts, error });

          if (!error.retryable || attempt >= this._policy.max_retries) break;
          const delay = retryDelay(error, attempt, this._policy);
          if (delay === undefined) break;
          this._policy.on_retry?.(error, attempts, delay);
          await sleep(delay * 1000, signal);
          continue;
        }

        entry.health.recordSuccess();
        this.reorder();
        return {
          ...response,
          provider: name,
          attempts: totalAttempts,
          latency_ms: Date.now() - start,
        };
      }

      if (lastError) {
        failures.push({ provider: name, error: lastError, attempts });
        this.emit({
          kind: "failover",
          from: name,
          to: candidates[i + 1]?.provider.name,
          reason: `${lastError.name}: ${lastError.message}`,
        });
      }
    }

    throw new GatewayExhaustedError(failures);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Snapshot of the current order, filtered by the call constraints. */
  private eligible(prompt: string, constraints: InvokeConstraints): ProviderEntry[] {
    const needed = estimateTokens((constraints.system ?? "") + prompt) + (constraints.max_tokens ?? 0);
    const maxTier = constraints.max_cost_tier;
    const entries = this._order.filter((e) => {
      const caps = e.provider.capabilities;
      if (caps.max_context_tokens < needed) return false;
      if (maxTier && COST_TIER_RANK[caps.cost_tier] > COST_TIER_RANK[maxTier]) return false;
      return true;
    });

    const preferred = constraints.preferred_provider;
    if (preferred) {
      const idx = entries.findIndex((e) => e.provider.name === preferred);
      if (idx > 0) {
        const [entry] = entries.splice(idx, 1);
        entries.unshift(entry);
      }
    }
    return entries;
  }

  /** Stable sort by health, ties broken by configured priority. */
  private reorder(): void {
    if (!this._rerank) return;
    const before = this.providers;
    this._order = [...this._order].sort((a, b) => {
      const diff = b.health.score - a.health.score;
      return diff !== 0 ? diff : a.priority - b.priority;
    });
    const after = this.providers;
    if (before.some((name, i) => name !== after[i])) {
      this.emit({ kind: "reranked", order: after });
    }
  }

  private emit(event: GatewayEvent): void {
    if (!this._onEvent) return;
    try {
      this._onEvent(event);
    } catch (err) {
      console.error("Gateway event listener error:", err);
    }
  }
}
