// ============================================================================
// Provider Catalog
// ============================================================================

import type { ProviderCapabilities } from "../types.js";

export type ProviderKind = "anthropic" | "openrouter" | "qwen" | "deepseek" | "openai";

export interface ProviderPreset {
  kind: ProviderKind;
  base_url: string;
  default_model: string;
  capabilities: ProviderCapabilities;
}

/** Default failover order when every provider is configured. */
export const DEFAULT_PROVIDER_ORDER: ProviderKind[] = [
  "anthropic",
  "openrouter",
  "qwen",
  "deepseek",
  "openai",
];

export const PROVIDER_PRESETS: Record<ProviderKind, ProviderPreset> = {
  anthropic: {
    kind: "anthropic",
    base_url: "https://api.anthropic.com/v1",
    default_model: "claude-sonnet-4-5",
    capabilities: { max_context_tokens: 200_000, cost_tier: "premium" },
  },
  openrouter: {
    kind: "openrouter",
    base_url: "https://openrouter.ai/api/v1",
    default_model: "anthropic/claude-sonnet-4.5",
    capabilities: { max_context_tokens: 200_000, cost_tier: "standard" },
  },
  qwen: {
    kind: "qwen",
    base_url: "https://dashscope.aliyuncs.com/compatible-mode/v1",
    default_model: "qwen-plus",
    capabilities: { max_context_tokens: 131_072, cost_tier: "low" },
  },
  deepseek: {
    kind: "deepseek",
    base_url: "https://api.deepseek.com/v1",
    default_model: "deepseek-chat",
    capabilities: { max_context_tokens: 64_000, cost_tier: "low" },
  },
  openai: {
    kind: "openai",
    base_url: "https://api.openai.com/v1",
    default_model: "gpt-4o-mini",
    capabilities: { max_context_tokens: 128_000, cost_tier: "standard" },
  },
};

export function isProviderKind(value: string): value is ProviderKind {
  return DEFAULT_PROVIDER_ORDER.some((kind) => kind === value);
}
