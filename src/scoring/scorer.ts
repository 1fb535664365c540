/**
 * User value scoring. Pure and deterministic: no clock, no I/O, identical
 * inputs give identical scores and breakdowns.
 */

import type {
  CandidateCriteria,
  RankedUser,
  RetrievedContext,
  ScoreComponent,
  ScoringPolicy,
  UserRecord,
  ValueScore,
} from './types.js';

export const MAX_SCORE = 10;

export const DEFAULT_SCORING_POLICY: Readonly<ScoringPolicy> = {
  visited: 'exclude',
  visited_penalty: 2,
  sentiment_weights: { positive: 3, neutral: 1, negative: 0 },
  unmet_need_bonus: 2.5,
  interaction_weight: 0.75,
  interaction_cap: 2.5,
  aips_weights: { awareness: 0.25, interest: 0.5, share: 0.75, purchase: 1 },
  recency_weight: 1,
  recency_half_life_days: 30,
  retrieval_weight: 1,
};

export const DEFAULT_CANDIDATE_CRITERIA: Readonly<CandidateCriteria> = {
  sentiments: ['positive'],
  require_unmet_need: true,
  min_interactions: 1,
  exclude_visited: false,
  limit: 100,
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function resolvePolicy(overrides: Partial<ScoringPolicy> = {}): ScoringPolicy {
  return { ...DEFAULT_SCORING_POLICY, ...overrides };
}

function interactionContribution(count: number | undefined, policy: ScoringPolicy): number {
  if (count === undefined || !Number.isFinite(count) || count <= 0) return 0;
  return Math.min(policy.interaction_cap, policy.interaction_weight * Math.log2(1 + count));
}

function recencyContribution(lastActivity: Date | undefined, policy: ScoringPolicy): number {
  if (!lastActivity || !policy.as_of) return 0;
  const ageDays = Math.max(0, (policy.as_of.getTime() - lastActivity.getTime()) / DAY_MS);
  if (!Number.isFinite(ageDays)) return 0;
  return policy.recency_weight * Math.pow(0.5, ageDays / policy.recency_half_life_days);
}

/** avg_similarity * 0.7 + min(matches / 5, 1) * 0.3, scaled by retrieval_weight. */
export function retrievalContribution(context: RetrievedContext | undefined, policy: ScoringPolicy): number {
  const sims = context?.similarities.filter((s) => Number.isFinite(s)) ?? [];
  if (sims.length === 0) return 0;
  const avg = sims.reduce((sum, s) => sum + s, 0) / sims.length;
  const coverage = Math.min(sims.length / 5, 1);
  return policy.retrieval_weight * Math.max(0, avg * 0.7 + coverage * 0.3);
}

function clamp(value: number): number {
  return Math.min(MAX_SCORE, Math.max(0, value));
}

export function score(
  record: UserRecord,
  context?: RetrievedContext,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY,
): ValueScore {
  const components: Record<ScoreComponent, number> = {
    sentiment: record.sentiment ? policy.sentiment_weights[record.sentiment] ?? 0 : 0,
    unmet_need: record.unmet_need === true ? policy.unmet_need_bonus : 0,
    interactions: interactionContribution(record.interaction_count, policy),
    aips: record.aips_tier ? policy.aips_weights[record.aips_tier] ?? 0 : 0,
    recency: recencyContribution(record.last_activity_at, policy),
    retrieval: retrievalContribution(context, policy),
    visited: 0,
  };

  const subtotal = Object.values(components).reduce((sum, v) => sum + v, 0);

  if (record.visited === true) {
    switch (policy.visited) {
      case 'exclude':
      case 'zero':
        components.visited = -subtotal;
        return {
          user_id: record.user_id,
          score: 0,
          components,
          ...(policy.visited === 'exclude' ? { excluded: true } : {}),
        };
      case 'penalize':
        components.visited = -policy.visited_penalty;
        break;
      case 'ignore':
        break;
    }
  }

  return {
    user_id: record.user_id,
    score: clamp(subtotal + components.visited),
    components,
  };
}

function activityTime(record: UserRecord): number {
  return record.last_activity_at?.getTime() ?? Number.NEGATIVE_INFINITY;
}

/** Score descending, then most recent activity, then user id. */
export function compareRanked(a: RankedUser, b: RankedUser): number {
  if (b.value.score !== a.value.score) return b.value.score - a.value.score;
  const ta = activityTime(a.record);
  const tb = activityTime(b.record);
  if (ta !== tb) return tb > ta ? 1 : -1;
  return a.record.user_id < b.record.user_id ? -1 : a.record.user_id > b.record.user_id ? 1 : 0;
}

export interface RankOptions {
  policy?: ScoringPolicy;
  contexts?: ReadonlyMap<string, RetrievedContext>;
  limit?: number;
}

export function rankUsers(records: readonly UserRecord[], options: RankOptions = {}): RankedUser[] {
  const policy = options.policy ?? DEFAULT_SCORING_POLICY;
  const pool = policy.visited === 'exclude'
    ? records.filter((r) => r.visited !== true)
    : records;
  const ranked = pool
    .map((record) => ({ record, value: score(record, options.contexts?.get(record.user_id), policy) }))
    .sort(compareRanked);
  return options.limit !== undefined ? ranked.slice(0, options.limit) : ranked;
}

/**
 * Candidate filter applied before scoring. Records with a missing
 * sentiment never match a sentiment list.
 */
export function selectCandidates(
  records: readonly UserRecord[],
  criteria: Partial<CandidateCriteria> = {},
): UserRecord[] {
  const c: CandidateCriteria = { ...DEFAULT_CANDIDATE_CRITERIA, ...criteria };
  const selected = records.filter((r) => {
    if (c.sentiments.length > 0 && (!r.sentiment || !c.sentiments.includes(r.sentiment))) return false;
    if (c.require_unmet_need && r.unmet_need !== true) return false;
    if ((r.interaction_count ?? 0) < c.min_interactions) return false;
    if (c.exclude_visited && r.visited === true) return false;
    return true;
  });
  return selected.slice(0, c.limit);
}
