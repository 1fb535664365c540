/**
 * Orchestrator configuration from environment variables.
 *
 * LLM providers are enabled by the presence of their API key and tried in
 * the order anthropic, openrouter, qwen, deepseek, openai unless
 * PROVIDER_ORDER says otherwise.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_PROVIDER_ORDER, PROVIDER_PRESETS, isProviderKind } from '../gateway/providers/catalog.js';
import type { ProviderKind } from '../gateway/providers/catalog.js';
import type { VisitedPolicy } from '../scoring/types.js';
import { toMilliseconds } from '../workflow/duration.js';

export type Env = Readonly<Record<string, string | undefined>>;

export interface ProviderConfig {
  kind: ProviderKind;
  api_key: string;
  base_url: string;
  model: string;
}

export type EmbeddingConfig =
  | { kind: 'openai'; api_key: string; base_url: string; model: string; dimensions: number }
  | { kind: 'hashing'; dimensions: number };

export interface OrchestratorConfig {
  providers: ProviderConfig[];
  embedding: EmbeddingConfig;
  /** SQLite file, or ':memory:'. */
  database_path: string;
  max_concurrency: number;
  batch_concurrency: number;
  llm_max_retries: number;
  /** Seconds. */
  llm_base_delay: number;
  /** Per HTTP request, milliseconds. */
  llm_timeout_ms: number;
  /** Applied to requests that set no deadline. */
  default_deadline?: string;
  visited_policy: VisitedPolicy;
  log_events: boolean;
}

const KEY_VARS: Record<ProviderKind, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
  qwen: 'QWEN_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  openai: 'OPENAI_API_KEY',
};

const optionalText = z.string().trim().min(1).optional().catch(undefined);
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const intVar = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const boolVar = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false', '1', '0', 'yes', 'no']).default(fallback ? 'true' : 'false'),
  ).transform((v) => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  PROVIDER_ORDER: z.preprocess(blankToUndefined, z.string().optional()),
  EMBEDDING_PROVIDER: z.preprocess(blankToUndefined, z.enum(['openai', 'hashing']).optional()),
  EMBEDDING_MODEL: z.preprocess(blankToUndefined, z.string().default('text-embedding-3-small')),
  EMBEDDING_DIMENSIONS: z.preprocess(blankToUndefined, z.coerce.number().int().min(8).optional()),
  DATABASE_PATH: z.preprocess(blankToUndefined, z.string().default('outreach.db')),
  MAX_CONCURRENCY: intVar(4, 1),
  BATCH_CONCURRENCY: intVar(8, 1),
  LLM_MAX_RETRIES: intVar(2, 0),
  LLM_BASE_DELAY: z.preprocess(blankToUndefined, z.coerce.number().min(0).default(1)),
  LLM_TIMEOUT_MS: intVar(120_000, 1),
  RUN_DEADLINE: z.preprocess(blankToUndefined, z.string().optional()),
  VISITED_POLICY: z.preprocess(blankToUndefined, z.enum(['exclude', 'zero', 'penalize', 'ignore']).default('exclude')),
  LOG_EVENTS: boolVar(true),
});

function parseOrder(raw: string | undefined): ProviderKind[] {
  if (raw === undefined) return [...DEFAULT_PROVIDER_ORDER];
  const order: ProviderKind[] = [];
  for (const part of raw.split(',').map((p) => p.trim().toLowerCase()).filter(Boolean)) {
    if (!isProviderKind(part)) {
      throw new ConfigurationError(`PROVIDER_ORDER names unknown provider "${part}"`);
    }
    if (!order.includes(part)) order.push(part);
  }
  return order;
}

function providerConfigs(env: Env, order: readonly ProviderKind[]): ProviderConfig[] {
  const providers: ProviderConfig[] = [];
  for (const kind of order) {
    const api_key = optionalText.parse(env[KEY_VARS[kind]]);
    if (!api_key) continue;
    const prefix = kind.toUpperCase();
    providers.push({
      kind,
      api_key,
      base_url: optionalText.parse(env[`${prefix}_BASE_URL`]) ?? PROVIDER_PRESETS[kind].base_url,
      model: optionalText.parse(env[`${prefix}_MODEL`]) ?? PROVIDER_PRESETS[kind].default_model,
    });
  }
  return providers;
}

/** Validate an environment. Throws ConfigurationError naming every bad variable. */
export function loadConfig(env: Env): OrchestratorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }
  const vars = parsed.data;

  if (vars.RUN_DEADLINE !== undefined) {
    try {
      toMilliseconds(vars.RUN_DEADLINE);
    } catch (e) {
      throw new ConfigurationError(`RUN_DEADLINE: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  const providers = providerConfigs(env, parseOrder(vars.PROVIDER_ORDER));

  const openaiKey = optionalText.parse(env.OPENAI_API_KEY);
  const embeddingKind = vars.EMBEDDING_PROVIDER ?? (openaiKey ? 'openai' : 'hashing');
  let embedding: EmbeddingConfig;
  if (embeddingKind === 'openai') {
    if (!openaiKey) {
      throw new ConfigurationError('EMBEDDING_PROVIDER=openai needs OPENAI_API_KEY');
    }
    embedding = {
      kind: 'openai',
      api_key: openaiKey,
      base_url: optionalText.parse(env.OPENAI_BASE_URL) ?? PROVIDER_PRESETS.openai.base_url,
      model: vars.EMBEDDING_MODEL,
      dimensions: vars.EMBEDDING_DIMENSIONS ?? 1536,
    };
  } else {
    embedding = { kind: 'hashing', dimensions: vars.EMBEDDING_DIMENSIONS ?? 256 };
  }

  return {
    providers,
    embedding,
    database_path: vars.DATABASE_PATH,
    max_concurrency: vars.MAX_CONCURRENCY,
    batch_concurrency: vars.BATCH_CONCURRENCY,
    llm_max_retries: vars.LLM_MAX_RETRIES,
    llm_base_delay: vars.LLM_BASE_DELAY,
    llm_timeout_ms: vars.LLM_TIMEOUT_MS,
    ...(vars.RUN_DEADLINE !== undefined ? { default_deadline: vars.RUN_DEADLINE } : {}),
    visited_policy: vars.VISITED_POLICY,
    log_events: vars.LOG_EVENTS,
  };
}

/** Loads `.env` (without overriding variables already set) and reads process.env. */
export function loadConfigFromEnv(path?: string): OrchestratorConfig {
  loadDotenv(path ? { path } : {});
  return loadConfig(process.env);
}
