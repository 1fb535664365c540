export { loadConfig, loadConfigFromEnv } from './config.js';
export type { EmbeddingConfig, Env, OrchestratorConfig, ProviderConfig } from './config.js';
export { Orchestrator, createEmbedder, createOrchestrator, createProvider } from './runtime.js';
export type { OrchestratorOverrides } from './runtime.js';
