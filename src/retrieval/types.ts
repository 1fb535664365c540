import type { InvokeConstraints } from '../gateway/types.js';

export type MetadataValue = string | number | boolean | null;
export type DocumentMetadata = Readonly<Record<string, MetadataValue>>;

export interface DocumentRef {
  source_type: string;
  source_id: string;
}

/**
 * One embedded source record. `embedded_hash` is the hash of the content the
 * stored embedding was computed from; when it differs from `content_hash`
 * the document is stale.
 */
export interface IndexedDocument extends DocumentRef {
  content: string;
  content_hash: string;
  embedded_hash: string | null;
  embedding: readonly number[];
  metadata: DocumentMetadata;
  /** Timestamp of the underlying source record. */
  snapshot_at: Date;
  indexed_at: Date;
}

export interface RetrievalResult {
  document_ref: DocumentRef;
  similarity_score: number;
  snapshot_timestamp: Date;
  content: string;
  metadata: DocumentMetadata;
}

export interface SearchFilter {
  source_types?: readonly string[];
  /** Exact-match constraints on document metadata. */
  metadata?: DocumentMetadata;
}

export interface SearchOptions {
  top_k?: number;
  threshold?: number;
  filter?: SearchFilter;
  signal?: AbortSignal;
}

export interface AnswerOptions extends SearchOptions {
  /** Maximum total characters of retrieved passages sent to the model. */
  context_budget: number;
  constraints?: Omit<InvokeConstraints, 'signal'>;
}

export interface ContextPassage {
  document_ref: DocumentRef;
  similarity_score: number;
  text: string;
  truncated: boolean;
}

export interface GroundedAnswer {
  question: string;
  /** null when nothing relevant was retrieved; the model is not called then. */
  answer: string | null;
  provider?: string;
  passages: ContextPassage[];
}

export interface UpsertOptions {
  snapshot_at?: Date;
  metadata?: DocumentMetadata;
  /** Store content and hash now, embed on the next query that touches it. */
  defer?: boolean;
  signal?: AbortSignal;
}

export type UpsertOutcome = 'created' | 'updated' | 'unchanged' | 'deferred';

export interface UpsertItem extends DocumentRef {
  content: string;
  snapshot_at?: Date;
  metadata?: DocumentMetadata;
}

export type UpsertSummary = Record<UpsertOutcome, number>;

export interface IndexStats {
  documents: number;
  stale: number;
  /** Texts embedded for documents (upserts, refreshes, rebuilds). */
  document_embeddings: number;
  query_embeddings: number;
}

/** The surface agent nodes depend on. */
export interface Retriever {
  search(query: string, options?: SearchOptions): Promise<RetrievalResult[]>;
  answer(question: string, options: AnswerOptions): Promise<GroundedAnswer>;
}

/** Persistence for embedded documents, so restarts need no re-embedding. */
export interface DocumentStore {
  load(): Promise<IndexedDocument[]>;
  put(doc: IndexedDocument): Promise<void>;
  delete(ref: DocumentRef): Promise<void>;
}
