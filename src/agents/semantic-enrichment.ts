/**
 * Retrieves each ranked user's own indexed content and re-scores them with
 * the retrieval component. Searches run through the node's batch pool.
 */

import { rankUsers } from '../scoring/scorer.js';
import type { RetrievedContext, UserRecord } from '../scoring/types.js';
import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { highValueUsersSchema, requireKey } from './types.js';
import type { UserInsight } from './types.js';

export interface SemanticEnrichmentOptions {
  top_k?: number;
  /** Minimum similarity; the index default applies when unset. */
  threshold?: number;
}

/** Query text built from what the user said they lack and where they are in the funnel. */
export function enrichmentQuery(record: UserRecord): string {
  return [record.unmet_description, record.aips_tier, record.sentiment]
    .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
    .join(' ');
}

export class SemanticEnrichmentNode implements AgentNode {
  readonly name = 'semantic_enrichment';
  readonly kind: AgentKind = 'insight';
  readonly reads = { required: ['high_value_users'], optional: [] };
  readonly writes = ['high_value_users', 'insights'];
  private readonly options: SemanticEnrichmentOptions;

  constructor(options: SemanticEnrichmentOptions = {}) {
    this.options = options;
  }

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const users = requireKey(state, 'high_value_users', highValueUsersSchema);

    const insights: UserInsight[] = await ctx.batch.map(users, async ({ record, value }) => {
      const query = enrichmentQuery(record);
      const results = query
        ? await ctx.index.search(query, {
          top_k: this.options.top_k ?? 3,
          ...(this.options.threshold !== undefined ? { threshold: this.options.threshold } : {}),
          filter: { metadata: { user_id: record.user_id } },
          signal: ctx.signal,
        })
        : [];
      return {
        user_id: record.user_id,
        query,
        passages: results.map((r) => ({
          document_ref: r.document_ref,
          similarity_score: r.similarity_score,
          content: r.content,
        })),
        score_before: value.score,
        score_after: value.score,
      };
    });

    const contexts = new Map<string, RetrievedContext>();
    for (const insight of insights) {
      if (insight.passages.length > 0) {
        contexts.set(insight.user_id, { similarities: insight.passages.map((p) => p.similarity_score) });
      }
    }

    const reranked = rankUsers(users.map((u) => u.record), { policy: ctx.scoring, contexts });
    const after = new Map(reranked.map((r) => [r.record.user_id, r.value.score]));
    for (const insight of insights) {
      insight.score_after = after.get(insight.user_id) ?? insight.score_before;
    }

    if (reranked.length > 0) {
      await ctx.storage.upsertValueScores(reranked.map((r) => r.value));
    }
    ctx.emit('enriched candidates', {
      users: users.length,
      with_context: contexts.size,
    });

    return { high_value_users: reranked, insights };
  }
}
