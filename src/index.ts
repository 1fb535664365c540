/**
 * Agent orchestration core for social-engagement outreach.
 *
 * Layers:
 * 1. LLM Gateway - provider failover, retries and health-ranked routing
 * 2. Retrieval Index - embedded source records with similarity search
 * 3. Workflow Engine - runs agent-node topologies over an immutable state
 *
 * The outreach agents, the user value scorer and the storage layer sit on
 * top; `config` wires them together from the environment.
 */

export * from './errors.js';
export * as concurrency from './concurrency/index.js';
export * as gateway from './gateway/index.js';
export * as retrieval from './retrieval/index.js';
export * as scoring from './scoring/index.js';
export * as storage from './storage/index.js';
export * as workflow from './workflow/index.js';
export * as agents from './agents/index.js';
export * as config from './config/index.js';
