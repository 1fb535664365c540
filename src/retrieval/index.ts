export * from './types.js';
export { RetrievalIndex, DEFAULT_THRESHOLD, DEFAULT_TOP_K, compareResults } from './retrieval-index.js';
export type { RetrievalIndexOptions } from './retrieval-index.js';
export { HashingEmbedder, tokenize } from './hashing-embedder.js';
export { MemoryDocumentStore } from './memory-store.js';
export { contentHash, cosineSimilarity, documentKey } from './similarity.js';
export { buildGroundedPrompt, fitToBudget, GROUNDED_SYSTEM_PROMPT } from './context.js';
export { syncIndexFromStorage } from './sync.js';
export type { SyncOptions } from './sync.js';
