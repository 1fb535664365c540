export * from "./types.js";
export { LlmGateway } from "./gateway.js";
export type { GatewayOptions } from "./gateway.js";
export { HealthTracker } from "./health.js";
export type { HealthSnapshot } from "./health.js";
export { buildMiddlewareChain, createDefaultsMiddleware, createLoggingMiddleware } from "./middleware.js";
export { DEFAULT_RETRY_POLICY, computeDelay, isRetryable, retry, retryDelay } from "./utils/retry.js";
export { httpRequest, parseRetryAfter, raiseForStatus } from "./utils/http.js";
export { AnthropicProvider } from "./providers/anthropic.js";
export type { AnthropicProviderOptions } from "./providers/anthropic.js";
export { OpenAICompatibleEmbedder, OpenAICompatibleProvider } from "./providers/openai-compatible.js";
export type { OpenAICompatibleOptions, OpenAIEmbedderOptions } from "./providers/openai-compatible.js";
export { DEFAULT_PROVIDER_ORDER, PROVIDER_PRESETS, isProviderKind } from "./providers/catalog.js";
export type { ProviderKind, ProviderPreset } from "./providers/catalog.js";
