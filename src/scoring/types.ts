export type Sentiment = 'positive' | 'neutral' | 'negative';

/** Awareness, Interest, Purchase intent, Share. */
export type AipsTier = 'awareness' | 'interest' | 'purchase' | 'share';

export const SENTIMENTS: readonly Sentiment[] = ['positive', 'neutral', 'negative'];
export const AIPS_TIERS: readonly AipsTier[] = ['awareness', 'interest', 'purchase', 'share'];

/** Aggregated signals for one user. Every signal may be missing. */
export interface UserRecord {
  user_id: string;
  nickname?: string;
  sentiment?: Sentiment;
  unmet_need?: boolean;
  unmet_description?: string;
  interaction_count?: number;
  aips_tier?: AipsTier;
  visited?: boolean;
  last_activity_at?: Date;
  notes_engaged?: readonly string[];
}

export type ScoreComponent =
  | 'sentiment'
  | 'unmet_need'
  | 'interactions'
  | 'aips'
  | 'recency'
  | 'retrieval'
  | 'visited';

export interface ValueScore {
  user_id: string;
  /** Clamped to [0, 10]. */
  score: number;
  components: Readonly<Record<ScoreComponent, number>>;
  /** Set when the visited policy removes the user from candidacy. */
  excluded?: boolean;
}

/** Similarities of passages retrieved for the user. */
export interface RetrievedContext {
  similarities: readonly number[];
}

/**
 * - exclude: visited users are dropped from the candidate set before ranking
 * - zero: visited users score 0
 * - penalize: subtract visited_penalty
 * - ignore: visited status has no effect
 */
export type VisitedPolicy = 'exclude' | 'zero' | 'penalize' | 'ignore';

export interface ScoringPolicy {
  visited: VisitedPolicy;
  visited_penalty: number;
  sentiment_weights: Readonly<Record<Sentiment, number>>;
  unmet_need_bonus: number;
  /** contribution = min(interaction_cap, interaction_weight * log2(1 + n)) */
  interaction_weight: number;
  interaction_cap: number;
  aips_weights: Readonly<Record<AipsTier, number>>;
  /** Recency counts only when as_of is given; score reads no clock. */
  as_of?: Date;
  recency_weight: number;
  recency_half_life_days: number;
  retrieval_weight: number;
}

export interface RankedUser {
  record: UserRecord;
  value: ValueScore;
}

export interface CandidateCriteria {
  sentiments: readonly Sentiment[];
  require_unmet_need: boolean;
  min_interactions: number;
  exclude_visited: boolean;
  limit: number;
}
