export * from './types.js';
export {
  score,
  rankUsers,
  selectCandidates,
  compareRanked,
  resolvePolicy,
  retrievalContribution,
  DEFAULT_SCORING_POLICY,
  DEFAULT_CANDIDATE_CRITERIA,
  MAX_SCORE,
} from './scorer.js';
export type { RankOptions } from './scorer.js';
