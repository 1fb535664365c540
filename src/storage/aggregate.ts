import type { UserRecord } from '../scoring/types.js';
import type { AnalysisRecord, CommentRecord, SourceRecord } from './records.js';
import type { UserQuery } from './types.js';

interface Accumulator {
  comments: CommentRecord[];
  analyses: AnalysisRecord[];
}

function latestFirst<T extends { created_at: Date }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
}

function firstDefined<T, K extends keyof T>(items: readonly T[], key: K): T[K] | undefined {
  for (const item of items) {
    if (item[key] !== undefined) return item[key];
  }
  return undefined;
}

function anyFlag(values: ReadonlyArray<boolean | undefined>): boolean | undefined {
  if (values.includes(true)) return true;
  if (values.includes(false)) return false;
  return undefined;
}

/**
 * Folds comments and analyses into one UserRecord per user. Classification
 * signals come from the newest analysis that has them; counts from comments.
 */
export function aggregateUserRecords(records: readonly SourceRecord[]): UserRecord[] {
  const byUser = new Map<string, Accumulator>();
  const bucket = (userId: string): Accumulator => {
    let acc = byUser.get(userId);
    if (!acc) {
      acc = { comments: [], analyses: [] };
      byUser.set(userId, acc);
    }
    return acc;
  };

  for (const record of records) {
    if (record.source_type === 'comment') bucket(record.user_id).comments.push(record);
    else if (record.source_type === 'analysis') bucket(record.user_id).analyses.push(record);
  }

  const users: UserRecord[] = [];
  for (const [userId, acc] of byUser) {
    const comments = latestFirst(acc.comments);
    const analyses = latestFirst(acc.analyses);
    const times = [...comments, ...analyses].map((r) => r.created_at.getTime());

    users.push({
      user_id: userId,
      nickname: firstDefined(comments, 'nickname'),
      sentiment: firstDefined(analyses, 'sentiment'),
      aips_tier: firstDefined(analyses, 'aips_tier'),
      unmet_need: anyFlag(analyses.map((a) => a.unmet_need)),
      unmet_description: firstDefined(analyses, 'unmet_description'),
      visited: anyFlag(analyses.map((a) => a.visited)),
      interaction_count: comments.length,
      last_activity_at: times.length > 0 ? new Date(Math.max(...times)) : undefined,
      notes_engaged: [...new Set(comments.map((c) => c.note_id))].sort(),
    });
  }

  return users.sort((a, b) => (a.user_id < b.user_id ? -1 : a.user_id > b.user_id ? 1 : 0));
}

export function filterUsers(users: readonly UserRecord[], query: UserQuery = {}): UserRecord[] {
  const ids = query.user_ids ? new Set(query.user_ids) : undefined;
  const since = query.active_since?.getTime();
  return users.filter((u) => {
    if (ids && !ids.has(u.user_id)) return false;
    if (since !== undefined && (u.last_activity_at?.getTime() ?? Number.NEGATIVE_INFINITY) < since) return false;
    return true;
  });
}
