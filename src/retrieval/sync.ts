import { SOURCE_TYPES, describeSource } from '../storage/records.js';
import type { SourceType } from '../storage/records.js';
import type { StorageHandle } from '../storage/types.js';
import type { RetrievalIndex } from './retrieval-index.js';
import type { DocumentMetadata, UpsertItem, UpsertSummary } from './types.js';

export interface SyncOptions {
  source_types?: readonly SourceType[];
  /** Only records created at or after this time. */
  since?: Date;
  signal?: AbortSignal;
}

/**
 * Pulls source records out of storage and upserts them into the index.
 * Unchanged records cost a hash comparison and no embedding call.
 */
export async function syncIndexFromStorage(
  index: RetrievalIndex,
  handle: StorageHandle,
  options: SyncOptions = {},
): Promise<Record<SourceType, UpsertSummary>> {
  const empty = (): UpsertSummary => ({ created: 0, updated: 0, unchanged: 0, deferred: 0 });
  const result: Record<SourceType, UpsertSummary> = { comment: empty(), note: empty(), analysis: empty() };

  for (const type of options.source_types ?? SOURCE_TYPES) {
    const records = await handle.listSourceRecords(type, { since: options.since });
    const items: UpsertItem[] = records.map((record) => {
      const d = describeSource(record);
      const metadata: Record<string, DocumentMetadata[string]> = { ...d.metadata };
      if (d.sentiment) metadata.sentiment = d.sentiment;
      if (d.aips_tier) metadata.aips_tier = d.aips_tier;
      return {
        source_type: d.source_type,
        source_id: d.source_id,
        content: d.content,
        snapshot_at: d.timestamp,
        metadata,
      };
    });
    result[type] = await index.upsertMany(items, options.signal);
  }
  return result;
}
