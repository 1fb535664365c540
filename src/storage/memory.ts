import { OrchestratorError } from '../errors.js';
import type { UserRecord, ValueScore } from '../scoring/types.js';
import { aggregateUserRecords, filterUsers } from './aggregate.js';
import { decodeSourceRecord, sourceId } from './records.js';
import type { SourceRecord, SourceType } from './records.js';
import type {
  ContentDraft,
  SourceQuery,
  StorageHandle,
  StorageProvider,
  StoredDraft,
  StoredValueScore,
  UserQuery,
} from './types.js';

/** In-process storage collaborator. Records are decoded on insert. */
export class MemoryStorage implements StorageProvider {
  private _records = new Map<string, SourceRecord>();
  private _scores = new Map<string, StoredValueScore>();
  private _drafts = new Map<string, StoredDraft>();
  private _openHandles = new Set<string>();
  private _acquired = 0;

  constructor(records: readonly unknown[] = []) {
    this.insertSourceRecords(records);
  }

  insertSourceRecords(raw: readonly unknown[]): number {
    for (const item of raw) {
      const record = decodeSourceRecord(item);
      this._records.set(`${record.source_type}:${sourceId(record)}`, record);
    }
    return raw.length;
  }

  async acquire(run_id: string): Promise<StorageHandle> {
    this._openHandles.add(run_id);
    this._acquired++;
    return new MemoryHandle(this, run_id);
  }

  /** Runs whose handles are still open. */
  get openHandles(): string[] {
    return [...this._openHandles];
  }

  get acquiredCount(): number {
    return this._acquired;
  }

  valueScores(): StoredValueScore[] {
    return [...this._scores.values()];
  }

  drafts(): StoredDraft[] {
    return [...this._drafts.values()];
  }

  /** @internal */
  sourceRecords(type?: SourceType): SourceRecord[] {
    const all = [...this._records.values()];
    return type ? all.filter((r) => r.source_type === type) : all;
  }

  /** @internal */
  putScores(run_id: string, scores: readonly ValueScore[]): void {
    for (const s of scores) this._scores.set(s.user_id, { ...s, run_id });
  }

  /** @internal */
  putDrafts(run_id: string, drafts: readonly ContentDraft[]): void {
    for (const d of drafts) this._drafts.set(d.draft_id, { ...d, run_id });
  }

  /** @internal */
  close(run_id: string): void {
    this._openHandles.delete(run_id);
  }
}

class MemoryHandle implements StorageHandle {
  private _released = false;

  constructor(private readonly owner: MemoryStorage, readonly run_id: string) {}

  private ensureOpen(): void {
    if (this._released) {
      throw new OrchestratorError(`Storage handle for run ${this.run_id} was already released`);
    }
  }

  async listUserRecords(query?: UserQuery): Promise<UserRecord[]> {
    this.ensureOpen();
    return filterUsers(aggregateUserRecords(this.owner.sourceRecords()), query);
  }

  async listSourceRecords(type: SourceType, query: SourceQuery = {}): Promise<SourceRecord[]> {
    this.ensureOpen();
    const since = query.since?.getTime();
    const records = this.owner
      .sourceRecords(type)
      .filter((r) => since === undefined || r.created_at.getTime() >= since)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime());
    return query.limit !== undefined ? records.slice(0, query.limit) : records;
  }

  async upsertValueScores(scores: readonly ValueScore[]): Promise<void> {
    this.ensureOpen();
    this.owner.putScores(this.run_id, scores);
  }

  async upsertContentDrafts(drafts: readonly ContentDraft[]): Promise<void> {
    this.ensureOpen();
    this.owner.putDrafts(this.run_id, drafts);
  }

  async release(): Promise<void> {
    if (this._released) return;
    this._released = true;
    this.owner.close(this.run_id);
  }
}
