/**
 * Loads aggregated user records, filters them by the request's candidate
 * criteria, ranks the rest with the value scorer and persists the scores.
 * Deterministic: no LLM involvement.
 */

import { rankUsers, selectCandidates } from '../scoring/scorer.js';
import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { requireKey, userCriteriaSchema } from './types.js';

export class UserAnalysisNode implements AgentNode {
  readonly name = 'user_analysis';
  readonly kind: AgentKind = 'analysis';
  readonly reads = { required: ['user_criteria'], optional: [] };
  readonly writes = ['high_value_users'];

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const criteria = requireKey(state, 'user_criteria', userCriteriaSchema);
    const records = await ctx.storage.listUserRecords();

    // The limit applies to the ranked list, not to the unranked filter.
    const candidates = selectCandidates(records, { ...criteria, limit: records.length });
    const ranked = rankUsers(candidates, { policy: ctx.scoring, limit: criteria.limit });

    if (ranked.length > 0) {
      await ctx.storage.upsertValueScores(ranked.map((r) => r.value));
    }
    ctx.emit('ranked candidates', {
      loaded: records.length,
      candidates: candidates.length,
      ranked: ranked.length,
    });

    return { high_value_users: ranked };
  }
}
