/**
 * Wires the orchestrator from configuration: gateway over the configured
 * providers, embedder, SQLite storage, retrieval index and the workflow
 * engine running the outreach topology.
 */

import { nanoid } from 'nanoid';
import { createOutreachTopology } from '../agents/outreach.js';
import { ConfigurationError } from '../errors.js';
import { LlmGateway } from '../gateway/gateway.js';
import { createLoggingMiddleware } from '../gateway/middleware.js';
import { AnthropicProvider } from '../gateway/providers/anthropic.js';
import { PROVIDER_PRESETS } from '../gateway/providers/catalog.js';
import { OpenAICompatibleEmbedder, OpenAICompatibleProvider } from '../gateway/providers/openai-compatible.js';
import type { EmbeddingProvider, GatewayEvent, LlmProvider } from '../gateway/types.js';
import { HashingEmbedder } from '../retrieval/hashing-embedder.js';
import { RetrievalIndex } from '../retrieval/retrieval-index.js';
import { syncIndexFromStorage } from '../retrieval/sync.js';
import type { SyncOptions } from '../retrieval/sync.js';
import type { UpsertSummary } from '../retrieval/types.js';
import type { SourceType } from '../storage/records.js';
import { SqliteStorage } from '../storage/sqlite.js';
import { WorkflowEngine } from '../workflow/engine.js';
import type { WorkflowRequest } from '../workflow/engine.js';
import { createEventLogger } from '../workflow/events.js';
import type { Topology } from '../workflow/topology.js';
import type { RunOutcome } from '../workflow/types.js';
import type { EmbeddingConfig, OrchestratorConfig, ProviderConfig } from './config.js';

export interface OrchestratorOverrides {
  /** Replaces the providers built from configuration. */
  providers?: LlmProvider[];
  embedder?: EmbeddingProvider;
  topology?: Topology;
  logger?: (line: string) => void;
}

export function createProvider(config: ProviderConfig, timeout: number): LlmProvider {
  const capabilities = PROVIDER_PRESETS[config.kind].capabilities;
  if (config.kind === 'anthropic') {
    return new AnthropicProvider({
      api_key: config.api_key,
      base_url: config.base_url,
      model: config.model,
      capabilities,
      timeout,
    });
  }
  return new OpenAICompatibleProvider({
    name: config.kind,
    api_key: config.api_key,
    base_url: config.base_url,
    model: config.model,
    capabilities,
    timeout,
  });
}

export function createEmbedder(config: EmbeddingConfig, timeout: number): EmbeddingProvider {
  if (config.kind === 'hashing') return new HashingEmbedder(config.dimensions);
  return new OpenAICompatibleEmbedder({
    api_key: config.api_key,
    base_url: config.base_url,
    model: config.model,
    dimensions: config.dimensions,
    timeout,
  });
}

function describeGatewayEvent(event: GatewayEvent): string {
  switch (event.kind) {
    case 'attempt_failed':
      return `[gateway] attempt_failed provider=${event.provider} attempt=${event.attempt} error=${event.error.name}`;
    case 'failover':
      return `[gateway] failover from=${event.from} to=${event.to ?? 'none'} reason=${event.reason}`;
    case 'reranked':
      return `[gateway] reranked order=${event.order.join(',')}`;
  }
}

export class Orchestrator {
  readonly config: OrchestratorConfig;
  readonly gateway: LlmGateway;
  readonly storage: SqliteStorage;
  readonly index: RetrievalIndex;
  readonly engine: WorkflowEngine;

  constructor(config: OrchestratorConfig, overrides: OrchestratorOverrides = {}) {
    const providers = overrides.providers
      ?? config.providers.map((p) => createProvider(p, config.llm_timeout_ms));
    if (providers.length === 0) {
      throw new ConfigurationError(
        'No LLM provider configured; set one of ANTHROPIC_API_KEY, OPENROUTER_API_KEY, QWEN_API_KEY, DEEPSEEK_API_KEY, OPENAI_API_KEY',
      );
    }

    const logger = overrides.logger ?? console.log;
    this.config = config;
    this.gateway = new LlmGateway({
      providers,
      retry: { max_retries: config.llm_max_retries, base_delay: config.llm_base_delay },
      middleware: config.log_events ? [createLoggingMiddleware(logger)] : [],
      ...(config.log_events ? { on_event: (e: GatewayEvent) => logger(describeGatewayEvent(e)) } : {}),
    });

    this.storage = new SqliteStorage({ path: config.database_path });
    this.index = new RetrievalIndex({
      embedder: overrides.embedder ?? createEmbedder(config.embedding, config.llm_timeout_ms),
      gateway: this.gateway,
      store: this.storage.documentStore(),
      embed_retry: { max_retries: config.llm_max_retries, base_delay: config.llm_base_delay },
    });

    this.engine = new WorkflowEngine({
      topology: overrides.topology ?? createOutreachTopology(),
      storage: this.storage,
      gateway: this.gateway,
      index: this.index,
      scoring: { visited: config.visited_policy },
      max_concurrency: config.max_concurrency,
      batch_concurrency: config.batch_concurrency,
      ...(config.log_events ? { on_event: createEventLogger(logger) } : {}),
    });
  }

  /** Loads persisted embeddings. Returns how many documents were restored. */
  open(): Promise<number> {
    return this.index.open();
  }

  /** Brings the index up to date with the source records in storage. */
  async syncIndex(options: SyncOptions = {}): Promise<Record<SourceType, UpsertSummary>> {
    const handle = await this.storage.acquire(`sync-${nanoid(10)}`);
    try {
      return await syncIndexFromStorage(this.index, handle, options);
    } finally {
      await handle.release();
    }
  }

  /** Runs a workflow, applying the configured default deadline when the request sets none. */
  run(request: WorkflowRequest): Promise<RunOutcome> {
    const deadline = request.deadline ?? this.config.default_deadline;
    return this.engine.run(deadline !== undefined ? { ...request, deadline } : request);
  }

  close(): void {
    this.storage.close();
  }
}

export function createOrchestrator(config: OrchestratorConfig, overrides: OrchestratorOverrides = {}): Orchestrator {
  return new Orchestrator(config, overrides);
}
