import type { UserRecord, ValueScore } from '../scoring/types.js';
import type { SourceRecord, SourceType } from './records.js';

export interface ContentDraft {
  /** Stable natural key: the same segment and theme always map to one draft. */
  draft_id: string;
  segment: string;
  theme: string;
  title: string;
  body: string;
  content_type: string;
  call_to_action?: string;
}

export interface UserQuery {
  user_ids?: readonly string[];
  /** Only users active at or after this time. */
  active_since?: Date;
}

export interface SourceQuery {
  since?: Date;
  limit?: number;
}

export interface StoredValueScore extends ValueScore {
  run_id: string;
}

export interface StoredDraft extends ContentDraft {
  run_id: string;
}

/**
 * Per-run access to persisted data. Acquired by the workflow engine at run
 * start and released on every exit path. All writes are upserts on natural
 * keys, so repeating them never duplicates rows.
 */
export interface StorageHandle {
  readonly run_id: string;
  listUserRecords(query?: UserQuery): Promise<UserRecord[]>;
  listSourceRecords(type: SourceType, query?: SourceQuery): Promise<SourceRecord[]>;
  upsertValueScores(scores: readonly ValueScore[]): Promise<void>;
  upsertContentDrafts(drafts: readonly ContentDraft[]): Promise<void>;
  release(): Promise<void>;
}

export interface StorageProvider {
  acquire(run_id: string): Promise<StorageHandle>;
}
