import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { RetrievalIndex } from './retrieval-index.js';
import { HashingEmbedder } from './hashing-embedder.js';
import { syncIndexFromStorage } from './sync.js';
import { MemoryStorage } from '../storage/memory.js';

const fixture: unknown[] = JSON.parse(
  readFileSync(new URL('../storage/__fixtures__/records.json', import.meta.url), 'utf8'),
);

describe('syncIndexFromStorage', () => {
  it('indexes every source type with record metadata', async () => {
    const storage = new MemoryStorage(fixture);
    const handle = await storage.acquire('sync');
    const index = new RetrievalIndex({ embedder: new HashingEmbedder(64) });

    const summary = await syncIndexFromStorage(index, handle);
    expect(summary.comment.created).toBe(4);
    expect(summary.note.created).toBe(2);
    expect(summary.analysis.created).toBe(3);
    expect(index.size).toBe(9);

    const analysis = index.get('analysis', 'a1');
    expect(analysis?.metadata).toEqual({
      user_id: 'u1', note_id: 'n1', comment_id: 'c1', sentiment: 'positive', aips_tier: 'purchase',
    });
    expect(analysis?.snapshot_at).toEqual(new Date('2024-03-03T11:00:00Z'));
  });

  it('skips unchanged records on a second pass', async () => {
    const storage = new MemoryStorage(fixture);
    const handle = await storage.acquire('sync');
    const index = new RetrievalIndex({ embedder: new HashingEmbedder(64) });
    await syncIndexFromStorage(index, handle, { source_types: ['comment'] });

    storage.insertSourceRecords([{
      source_type: 'comment', comment_id: 'c4', note_id: 'n2', user_id: 'u3',
      content: 'Love this recipe, will share', created_at: '2024-03-06T09:00:00Z',
    }]);
    const summary = await syncIndexFromStorage(index, handle, { source_types: ['comment'] });
    expect(summary.comment).toEqual({ created: 0, updated: 1, unchanged: 3, deferred: 0 });
    expect(index.stats().document_embeddings).toBe(5);
  });
});
