// ============================================================================
// Middleware: Onion/Chain-of-Responsibility Pattern
// ============================================================================

import type {
  CompletionResponse,
  Middleware,
  ProviderCall,
} from "./types.js";

/**
 * Builds a middleware chain around one provider attempt.
 * Middleware runs in registration order for the request phase and
 * reverse order for the response phase.
 */
export function buildMiddlewareChain(
  middlewares: readonly Middleware[],
  finalHandler: (call: ProviderCall) => Promise<CompletionResponse>,
): (call: ProviderCall) => Promise<CompletionResponse> {
  let chain = finalHandler;

  // Build from right to left so the first middleware is outermost
  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    const next = chain;
    chain = (call: ProviderCall) => mw(call, next);
  }

  return chain;
}

/** Logs each provider attempt and its outcome. */
export function createLoggingMiddleware(
  logger: (msg: string) => void = console.log,
): Middleware {
  return async (call, next) => {
    const start = Date.now();
    logger(`[LLM] Request: provider=${call.provider} attempt=${call.attempt} model=${call.request.model ?? "default"}`);
    try {
      const response = await next(call);
      const tokens = response.usage
        ? response.usage.input_tokens + response.usage.output_tokens
        : "n/a";
      logger(`[LLM] Response: provider=${call.provider} tokens=${tokens} latency=${Date.now() - start}ms`);
      return response;
    } catch (err: unknown) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      logger(`[LLM] Failed: provider=${call.provider} attempt=${call.attempt} ${reason}`);
      throw err;
    }
  };
}

/** Applies default request fields without overriding ones the caller set. */
export function createDefaultsMiddleware(
  defaults: Partial<ProviderCall["request"]>,
): Middleware {
  return (call, next) => next({ ...call, request: { ...defaults, ...call.request } });
}
