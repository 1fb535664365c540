/**
 * Semantic retrieval index over heterogeneous source records.
 *
 * Documents are keyed by (source_type, source_id) and re-embedded only when
 * their content hash changes. Writes to one key are serialized; searches
 * read whatever document object is current and never take a lock.
 */

import type { EmbeddingProvider, RetryPolicy, TextInvoker } from '../gateway/types.js';
import { retry } from '../gateway/utils/retry.js';
import { TaskPool } from '../concurrency/task-pool.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { throwIfAborted } from '../concurrency/abort.js';
import { ConfigurationError, RetrievalStaleError, ValidationError } from '../errors.js';
import { contentHash, cosineSimilarity, documentKey } from './similarity.js';
import { buildGroundedPrompt, fitToBudget, GROUNDED_SYSTEM_PROMPT } from './context.js';
import type {
  AnswerOptions,
  DocumentRef,
  DocumentStore,
  GroundedAnswer,
  IndexedDocument,
  IndexStats,
  RetrievalResult,
  Retriever,
  SearchFilter,
  SearchOptions,
  UpsertItem,
  UpsertOptions,
  UpsertOutcome,
  UpsertSummary,
} from './types.js';

export interface RetrievalIndexOptions {
  embedder: EmbeddingProvider;
  /** Needed only for answer(). */
  gateway?: TextInvoker;
  store?: DocumentStore;
  /** Bounded pool for batch embedding work. */
  pool?: TaskPool;
  embed_retry?: Partial<RetryPolicy>;
  clock?: () => Date;
}

export const DEFAULT_TOP_K = 5;
export const DEFAULT_THRESHOLD = 0.7;

export class RetrievalIndex implements Retriever {
  private _docs = new Map<string, IndexedDocument>();
  private _locks = new KeyedMutex();
  private _embedder: EmbeddingProvider;
  private _gateway?: TextInvoker;
  private _store?: DocumentStore;
  private _pool: TaskPool;
  private _retry: Partial<RetryPolicy>;
  private _clock: () => Date;
  private _documentEmbeddings = 0;
  private _queryEmbeddings = 0;

  constructor(options: RetrievalIndexOptions) {
    this._embedder = options.embedder;
    this._gateway = options.gateway;
    this._store = options.store;
    this._pool = options.pool ?? new TaskPool(4);
    this._retry = options.embed_retry ?? { max_retries: 2 };
    this._clock = options.clock ?? (() => new Date());
  }

  /** Loads persisted documents. Returns how many were loaded. */
  async open(): Promise<number> {
    if (!this._store) return 0;
    const docs = await this._store.load();
    for (const doc of docs) {
      this._docs.set(documentKey(doc), Object.freeze({ ...doc }));
    }
    return docs.length;
  }

  get size(): number {
    return this._docs.size;
  }

  get(source_type: string, source_id: string): IndexedDocument | undefined {
    return this._docs.get(documentKey({ source_type, source_id }));
  }

  stats(): IndexStats {
    let stale = 0;
    for (const doc of this._docs.values()) {
      if (isStale(doc)) stale++;
    }
    return {
      documents: this._docs.size,
      stale,
      document_embeddings: this._documentEmbeddings,
      query_embeddings: this._queryEmbeddings,
    };
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  async upsert(
    source_type: string,
    source_id: string,
    content: string,
    options: UpsertOptions = {},
  ): Promise<UpsertOutcome> {
    if (!source_type || !source_id) {
      throw new ValidationError('upsert requires a source_type and a source_id');
    }
    const ref = { source_type, source_id };
    const key = documentKey(ref);
    const hash = contentHash(content);

    return this._locks.runExclusive(key, async () => {
      const existing = this._docs.get(key);
      if (existing && existing.content_hash === hash && !isStale(existing)) {
        return 'unchanged';
      }

      const base = {
        ...ref,
        content,
        content_hash: hash,
        metadata: options.metadata ?? existing?.metadata ?? {},
        snapshot_at: options.snapshot_at ?? existing?.snapshot_at ?? this._clock(),
      };

      if (options.defer) {
        await this.commit({
          ...base,
          embedded_hash: existing?.embedded_hash ?? null,
          embedding: existing?.embedding ?? [],
          indexed_at: existing?.indexed_at ?? this._clock(),
        });
        return 'deferred';
      }

      const [embedding] = await this.embedDocuments([content], options.signal);
      await this.commit({ ...base, embedded_hash: hash, embedding, indexed_at: this._clock() });
      return existing ? 'updated' : 'created';
    });
  }

  async upsertMany(items: readonly UpsertItem[], signal?: AbortSignal): Promise<UpsertSummary> {
    const summary: UpsertSummary = { created: 0, updated: 0, unchanged: 0, deferred: 0 };
    const outcomes = await this._pool.map(items, (item) => this.upsert(
      item.source_type,
      item.source_id,
      item.content,
      { snapshot_at: item.snapshot_at, metadata: item.metadata, signal },
    ));
    for (const outcome of outcomes) summary[outcome]++;
    return summary;
  }

  async remove(source_type: string, source_id: string): Promise<boolean> {
    const ref = { source_type, source_id };
    const key = documentKey(ref);
    return this._locks.runExclusive(key, async () => {
      if (!this._docs.has(key)) return false;
      await this._store?.delete(ref);
      this._docs.delete(key);
      return true;
    });
  }

  /** Explicit full re-embedding. Never triggered implicitly. */
  async rebuild(options: { source_types?: readonly string[]; signal?: AbortSignal } = {}): Promise<number> {
    const refs = this.matching({ source_types: options.source_types }).map(toRef);
    const done = await this._pool.map(refs, (ref) => this.reembed(ref, true, options.signal));
    return done.filter(Boolean).length;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async search(query: string, options: SearchOptions = {}): Promise<RetrievalResult[]> {
    const topK = options.top_k ?? DEFAULT_TOP_K;
    const threshold = options.threshold ?? DEFAULT_THRESHOLD;
    validateSearch(topK, threshold);
    throwIfAborted(options.signal, 'Search');

    const [queryVector] = await this.embedQuery(query, options.signal);

    let scored: RetrievalResult[];
    try {
      scored = this.rank(queryVector, this.matching(options.filter), threshold, false);
    } catch (err: unknown) {
      if (!(err instanceof RetrievalStaleError)) throw err;
      await this.refresh(err.keys, options.signal);
      // Anything deferred again meanwhile is left out rather than looping.
      scored = this.rank(queryVector, this.matching(options.filter), threshold, true);
    }
    return scored.slice(0, topK);
  }

  async answer(question: string, options: AnswerOptions): Promise<GroundedAnswer> {
    if (!this._gateway) {
      throw new ConfigurationError('RetrievalIndex.answer() needs a gateway');
    }
    if (!Number.isInteger(options.context_budget) || options.context_budget < 1) {
      throw new ValidationError(`context_budget must be a positive integer, got ${options.context_budget}`);
    }

    const results = await this.search(question, {
      top_k: options.top_k ?? 3,
      threshold: options.threshold ?? 0.6,
      filter: options.filter,
      signal: options.signal,
    });
    const passages = fitToBudget(results, options.context_budget);
    if (passages.length === 0) {
      return { question, answer: null, passages };
    }

    const response = await this._gateway.invoke(buildGroundedPrompt(question, passages), {
      ...options.constraints,
      system: options.constraints?.system ?? GROUNDED_SYSTEM_PROMPT,
      signal: options.signal,
    });
    return { question, answer: response.text, provider: response.provider, passages };
  }

  /** Related documents for one user, grouped by source type. */
  async userInsights(
    user_id: string,
    options: { query?: string; top_k?: number; threshold?: number; signal?: AbortSignal } = {},
  ): Promise<Record<string, RetrievalResult[]>> {
    const results = await this.search(options.query ?? `engagement history and needs of user ${user_id}`, {
      top_k: options.top_k ?? 10,
      threshold: options.threshold ?? 0.5,
      filter: { metadata: { user_id } },
      signal: options.signal,
    });
    const grouped: Record<string, RetrievalResult[]> = {};
    for (const r of results) {
      (grouped[r.document_ref.source_type] ??= []).push(r);
    }
    return grouped;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private matching(filter: SearchFilter | undefined): IndexedDocument[] {
    const docs: IndexedDocument[] = [];
    for (const doc of this._docs.values()) {
      if (filter?.source_types && !filter.source_types.includes(doc.source_type)) continue;
      if (filter?.metadata && !metadataMatches(doc, filter)) continue;
      docs.push(doc);
    }
    return docs;
  }

  private rank(
    queryVector: readonly number[],
    docs: readonly IndexedDocument[],
    threshold: number,
    skipStale: boolean,
  ): RetrievalResult[] {
    const stale: string[] = [];
    const results: RetrievalResult[] = [];

    for (const doc of docs) {
      if (isStale(doc)) {
        if (!skipStale) stale.push(documentKey(doc));
        continue;
      }
      const similarity = cosineSimilarity(queryVector, doc.embedding);
      if (similarity < threshold) continue;
      results.push({
        document_ref: toRef(doc),
        similarity_score: similarity,
        snapshot_timestamp: doc.snapshot_at,
        content: doc.content,
        metadata: doc.metadata,
      });
    }

    if (stale.length > 0) throw new RetrievalStaleError(stale);

    return results.sort(compareResults);
  }

  /** Targeted re-embed of the given stale keys. */
  private async refresh(keys: readonly string[], signal?: AbortSignal): Promise<number> {
    const refs: DocumentRef[] = [];
    for (const key of keys) {
      const doc = this._docs.get(key);
      if (doc) refs.push(toRef(doc));
    }
    const done = await this._pool.map(refs, (ref) => this.reembed(ref, false, signal));
    return done.filter(Boolean).length;
  }

  private reembed(ref: DocumentRef, force: boolean, signal?: AbortSignal): Promise<boolean> {
    const key = documentKey(ref);
    return this._locks.runExclusive(key, async () => {
      const doc = this._docs.get(key);
      if (!doc || (!force && !isStale(doc))) return false;
      const [embedding] = await this.embedDocuments([doc.content], signal);
      await this.commit({ ...doc, embedded_hash: doc.content_hash, embedding, indexed_at: this._clock() });
      return true;
    });
  }

  private async commit(doc: IndexedDocument): Promise<void> {
    await this._store?.put(doc);
    this._docs.set(documentKey(doc), Object.freeze(doc));
  }

  private async embedDocuments(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors = await this.embed(texts, signal);
    this._documentEmbeddings += texts.length;
    return vectors;
  }

  private async embedQuery(text: string, signal?: AbortSignal): Promise<number[][]> {
    const vectors = await this.embed([text], signal);
    this._queryEmbeddings++;
    return vectors;
  }

  private async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors = await retry(() => this._embedder.embed(texts, signal), this._retry, signal);
    if (vectors.length !== texts.length) {
      throw new Error(`Embedder ${this._embedder.name} returned ${vectors.length} vectors for ${texts.length} texts`);
    }
    return vectors;
  }
}

function isStale(doc: IndexedDocument): boolean {
  return doc.embedded_hash !== doc.content_hash;
}

function toRef(doc: DocumentRef): DocumentRef {
  return { source_type: doc.source_type, source_id: doc.source_id };
}

function metadataMatches(doc: IndexedDocument, filter: SearchFilter): boolean {
  for (const [k, v] of Object.entries(filter.metadata ?? {})) {
    if (doc.metadata[k] !== v) return false;
  }
  return true;
}

function validateSearch(topK: number, threshold: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`top_k must be a positive integer, got ${topK}`);
  }
  if (!Number.isFinite(threshold) || threshold < -1 || threshold > 1) {
    throw new ValidationError(`threshold must be within [-1, 1], got ${threshold}`);
  }
}

/** Similarity descending, then newer snapshot, then key for a total order. */
export function compareResults(a: RetrievalResult, b: RetrievalResult): number {
  if (b.similarity_score !== a.similarity_score) return b.similarity_score - a.similarity_score;
  const dt = b.snapshot_timestamp.getTime() - a.snapshot_timestamp.getTime();
  if (dt !== 0) return dt;
  const ka = documentKey(a.document_ref);
  const kb = documentKey(b.document_ref);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
