import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { aggregateUserRecords, filterUsers } from './aggregate.js';
import { decodeSourceRecord } from './records.js';

const fixture: unknown[] = JSON.parse(
  readFileSync(new URL('./__fixtures__/records.json', import.meta.url), 'utf8'),
);
const records = fixture.map(decodeSourceRecord);

describe('aggregateUserRecords', () => {
  const users = aggregateUserRecords(records);

  it('produces one record per user sorted by id', () => {
    expect(users.map((u) => u.user_id)).toEqual(['u1', 'u2', 'u3']);
  });

  it('folds comments and analyses for a user', () => {
    expect(users[0]).toEqual({
      user_id: 'u1',
      nickname: 'Mika',
      sentiment: 'positive',
      aips_tier: 'purchase',
      unmet_need: true,
      unmet_description: 'grinder availability',
      visited: false,
      interaction_count: 2,
      last_activity_at: new Date('2024-03-05T10:00:00Z'),
      notes_engaged: ['n1', 'n2'],
    });
  });

  it('leaves unknown signals undefined', () => {
    const u3 = users[2];
    expect(u3.unmet_need).toBeUndefined();
    expect(u3.visited).toBe(true);
    expect(u3.nickname).toBeUndefined();
  });

  it('prefers the newest analysis for classification', () => {
    const later = decodeSourceRecord({
      source_type: 'analysis',
      analysis_id: 'a9',
      comment_id: 'c2',
      note_id: 'n2',
      user_id: 'u1',
      sentiment: 'neutral',
      created_at: '2024-04-01T00:00:00Z',
    });
    const [u1] = aggregateUserRecords([...records, later]);
    expect(u1.sentiment).toBe('neutral');
    expect(u1.aips_tier).toBe('purchase');
    expect(u1.last_activity_at).toEqual(new Date('2024-04-01T00:00:00Z'));
  });
});

describe('filterUsers', () => {
  const users = aggregateUserRecords(records);

  it('filters by id', () => {
    expect(filterUsers(users, { user_ids: ['u2'] }).map((u) => u.user_id)).toEqual(['u2']);
  });

  it('filters by activity', () => {
    const active = filterUsers(users, { active_since: new Date('2024-03-05T00:00:00Z') });
    expect(active.map((u) => u.user_id)).toEqual(['u1', 'u3']);
  });
});
