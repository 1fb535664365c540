/**
 * SQLite storage collaborator (better-sqlite3). One database connection is
 * shared by every run; handles are cheap per-run views over it.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { OrchestratorError, StorageDecodeError } from '../errors.js';
import type { UserRecord, ValueScore } from '../scoring/types.js';
import type { DocumentRef, DocumentStore, IndexedDocument } from '../retrieval/types.js';
import { aggregateUserRecords, filterUsers } from './aggregate.js';
import { decodeSourceRecord, sourceId } from './records.js';
import type { SourceRecord, SourceType } from './records.js';
import { runMigrations } from './migrations.js';
import type {
  ContentDraft,
  SourceQuery,
  StorageHandle,
  StorageProvider,
  StoredDraft,
  StoredValueScore,
  UserQuery,
} from './types.js';

interface PayloadRow {
  payload: string;
}

interface ScoreRow {
  user_id: string;
  run_id: string;
  score: number;
  components: string;
  excluded: number;
}

interface DraftRow {
  run_id: string;
  payload: string;
}

interface DocumentRow {
  source_type: string;
  source_id: string;
  content: string;
  content_hash: string;
  embedded_hash: string | null;
  embedding: string;
  metadata: string;
  snapshot_at: string;
  indexed_at: string;
}

const componentsSchema = z.object({
  sentiment: z.number(),
  unmet_need: z.number(),
  interactions: z.number(),
  aips: z.number(),
  recency: z.number(),
  retrieval: z.number(),
  visited: z.number(),
});

const draftSchema = z.object({
  draft_id: z.string(),
  segment: z.string(),
  theme: z.string(),
  title: z.string(),
  body: z.string(),
  content_type: z.string(),
  call_to_action: z.string().optional(),
});

const embeddingSchema = z.array(z.number());
const metadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

function parseJson<T>(schema: z.ZodType<T>, text: string, what: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new StorageDecodeError(what, err instanceof Error ? err.message : String(err));
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new StorageDecodeError(what, parsed.error.message);
  return parsed.data;
}

export interface SqliteStorageOptions {
  /** File path, or ':memory:'. */
  path: string;
  clock?: () => Date;
}

export class SqliteStorage implements StorageProvider {
  readonly db: Database.Database;
  private _clock: () => Date;
  private _openHandles = new Set<string>();

  constructor(options: SqliteStorageOptions) {
    this.db = new Database(options.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    runMigrations(this.db);
    this._clock = options.clock ?? (() => new Date());
  }

  close(): void {
    this.db.close();
  }

  get openHandles(): string[] {
    return [...this._openHandles];
  }

  async acquire(run_id: string): Promise<StorageHandle> {
    this._openHandles.add(run_id);
    return new SqliteHandle(this, run_id);
  }

  /** Decodes and upserts raw source records. Returns the number written. */
  insertSourceRecords(raw: readonly unknown[]): number {
    const records = raw.map(decodeSourceRecord);
    const stmt = this.db.prepare<[string, string, string, string]>(`
      INSERT INTO source_records (source_type, source_id, payload, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (source_type, source_id) DO UPDATE SET
        payload = excluded.payload,
        created_at = excluded.created_at
    `);
    const insertAll = this.db.transaction((items: SourceRecord[]) => {
      for (const r of items) {
        stmt.run(r.source_type, sourceId(r), JSON.stringify(r), r.created_at.toISOString());
      }
    });
    insertAll(records);
    return records.length;
  }

  sourceRecords(type?: SourceType, query: SourceQuery = {}): SourceRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (type) {
      clauses.push('source_type = ?');
      params.push(type);
    }
    if (query.since) {
      clauses.push('created_at >= ?');
      params.push(query.since.toISOString());
    }
    let sql = 'SELECT payload FROM source_records';
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(' AND ')}`;
    sql += ' ORDER BY created_at ASC, source_id ASC';
    if (query.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }
    const rows = this.db.prepare<Array<string | number>, PayloadRow>(sql).all(...params);
    return rows.map((row) => decodeSourceRecord(JSON.parse(row.payload)));
  }

  upsertScores(run_id: string, scores: readonly ValueScore[]): void {
    const stmt = this.db.prepare<[string, string, number, string, number, string]>(`
      INSERT INTO value_scores (user_id, run_id, score, components, excluded, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT (user_id) DO UPDATE SET
        run_id = excluded.run_id,
        score = excluded.score,
        components = excluded.components,
        excluded = excluded.excluded,
        updated_at = excluded.updated_at
    `);
    const now = this._clock().toISOString();
    this.db.transaction(() => {
      for (const s of scores) {
        stmt.run(s.user_id, run_id, s.score, JSON.stringify(s.components), s.excluded ? 1 : 0, now);
      }
    })();
  }

  valueScores(): StoredValueScore[] {
    const rows = this.db
      .prepare<[], ScoreRow>('SELECT user_id, run_id, score, components, excluded FROM value_scores ORDER BY user_id')
      .all();
    return rows.map((row) => ({
      user_id: row.user_id,
      run_id: row.run_id,
      score: row.score,
      components: parseJson(componentsSchema, row.components, 'value_score'),
      ...(row.excluded ? { excluded: true } : {}),
    }));
  }

  upsertDrafts(run_id: string, drafts: readonly ContentDraft[]): void {
    const stmt = this.db.prepare<[string, string, string, string]>(`
      INSERT INTO content_drafts (draft_id, run_id, payload, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT (draft_id) DO UPDATE SET
        run_id = excluded.run_id,
        payload = excluded.payload,
        updated_at = excluded.updated_at
    `);
    const now = this._clock().toISOString();
    this.db.transaction(() => {
      for (const d of drafts) stmt.run(d.draft_id, run_id, JSON.stringify(d), now);
    })();
  }

  drafts(): StoredDraft[] {
    const rows = this.db
      .prepare<[], DraftRow>('SELECT run_id, payload FROM content_drafts ORDER BY draft_id')
      .all();
    return rows.map((row) => ({ ...parseJson(draftSchema, row.payload, 'content_draft'), run_id: row.run_id }));
  }

  /** Document store over the same connection, for RetrievalIndex persistence. */
  documentStore(): DocumentStore {
    return new SqliteDocumentStore(this.db);
  }

  /** @internal */
  closeHandle(run_id: string): void {
    this._openHandles.delete(run_id);
  }
}

class SqliteHandle implements StorageHandle {
  private _released = false;

  constructor(private readonly owner: SqliteStorage, readonly run_id: string) {}

  private ensureOpen(): void {
    if (this._released) {
      throw new OrchestratorError(`Storage handle for run ${this.run_id} was already released`);
    }
  }

  async listUserRecords(query?: UserQuery): Promise<UserRecord[]> {
    this.ensureOpen();
    const records = [
      ...this.owner.sourceRecords('comment'),
      ...this.owner.sourceRecords('analysis'),
    ];
    return filterUsers(aggregateUserRecords(records), query);
  }

  async listSourceRecords(type: SourceType, query?: SourceQuery): Promise<SourceRecord[]> {
    this.ensureOpen();
    return this.owner.sourceRecords(type, query);
  }

  async upsertValueScores(scores: readonly ValueScore[]): Promise<void> {
    this.ensureOpen();
    this.owner.upsertScores(this.run_id, scores);
  }

  async upsertContentDrafts(drafts: readonly ContentDraft[]): Promise<void> {
    this.ensureOpen();
    this.owner.upsertDrafts(this.run_id, drafts);
  }

  async release(): Promise<void> {
    if (this._released) return;
    this._released = true;
    this.owner.closeHandle(this.run_id);
  }
}

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly db: Database.Database) {}

  async load(): Promise<IndexedDocument[]> {
    const rows = this.db.prepare<[], DocumentRow>('SELECT * FROM indexed_documents').all();
    return rows.map((row) => ({
      source_type: row.source_type,
      source_id: row.source_id,
      content: row.content,
      content_hash: row.content_hash,
      embedded_hash: row.embedded_hash,
      embedding: parseJson(embeddingSchema, row.embedding, 'indexed_document'),
      metadata: parseJson(metadataSchema, row.metadata, 'indexed_document'),
      snapshot_at: new Date(row.snapshot_at),
      indexed_at: new Date(row.indexed_at),
    }));
  }

  async put(doc: IndexedDocument): Promise<void> {
    this.db.prepare<[string, string, string, string, string | null, string, string, string, string]>(`
      INSERT INTO indexed_documents
        (source_type, source_id, content, content_hash, embedded_hash, embedding, metadata, snapshot_at, indexed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (source_type, source_id) DO UPDATE SET
        content = excluded.content,
        content_hash = excluded.content_hash,
        embedded_hash = excluded.embedded_hash,
        embedding = excluded.embedding,
        metadata = excluded.metadata,
        snapshot_at = excluded.snapshot_at,
        indexed_at = excluded.indexed_at
    `).run(
      doc.source_type,
      doc.source_id,
      doc.content,
      doc.content_hash,
      doc.embedded_hash,
      JSON.stringify(doc.embedding),
      JSON.stringify(doc.metadata),
      doc.snapshot_at.toISOString(),
      doc.indexed_at.toISOString(),
    );
  }

  async delete(ref: DocumentRef): Promise<void> {
    this.db
      .prepare<[string, string]>('DELETE FROM indexed_documents WHERE source_type = ? AND source_id = ?')
      .run(ref.source_type, ref.source_id);
  }
}
