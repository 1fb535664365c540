import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { AgentPrompter } from './prompts.js';
import {
  contentDraftsSchema,
  contentStrategySchema,
  highValueUsersSchema,
  readKey,
  requireKey,
  userInsightsSchema,
} from './types.js';
import type { ContentStrategy, CoordinationSummary, UserInsight } from './types.js';

/** Segments averaging below this are flagged as not ready for direct outreach. */
export const LOW_SEGMENT_SCORE = 3;

export function optimizationNotes(
  strategy: ContentStrategy,
  draftSegments: ReadonlySet<string>,
  insights: readonly UserInsight[] | undefined,
): string[] {
  const notes: string[] = [];
  if (strategy.narrative === null) {
    notes.push('No candidates matched the criteria; consider relaxing user_criteria.');
  }
  for (const segment of strategy.segments) {
    if (!draftSegments.has(segment.name)) {
      notes.push(`Segment '${segment.name}' has no drafts.`);
    }
    if (segment.average_score < LOW_SEGMENT_SCORE) {
      notes.push(`Segment '${segment.name}' averages ${segment.average_score}; nurture before direct outreach.`);
    }
  }
  if (insights === undefined) {
    notes.push('Ranking did not use retrieved context; enable ai_enhancement to include it.');
  } else {
    const ungrounded = insights.filter((i) => i.passages.length === 0).length;
    if (ungrounded > 0) {
      notes.push(`${ungrounded} user(s) had no indexed content to ground their score.`);
    }
  }
  return notes;
}

/** Reviews the run's outputs and records a summary plus follow-up notes. */
export class StrategyCoordinationNode implements AgentNode {
  readonly name = 'strategy_coordination';
  readonly kind: AgentKind = 'coordination';
  readonly reads = {
    required: ['content_strategy', 'content_drafts'],
    optional: ['high_value_users', 'insights'],
  };
  readonly writes = ['summary', 'optimization_notes'];

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const strategy = requireKey(state, 'content_strategy', contentStrategySchema);
    const drafts = requireKey(state, 'content_drafts', contentDraftsSchema);
    const users = readKey(state, 'high_value_users', highValueUsersSchema) ?? [];
    const insights = readKey(state, 'insights', userInsightsSchema);

    const draftSegments = new Set(drafts.map((d) => d.segment));
    const notes = optimizationNotes(strategy, draftSegments, insights);

    const results = [
      `Users ranked: ${users.length}`,
      `Segments: ${strategy.segments.map((s) => `${s.name} (${s.size})`).join(', ') || 'none'}`,
      `Drafts: ${drafts.map((d) => d.title).join(' | ') || 'none'}`,
      `Strategy: ${strategy.narrative ?? 'none'}`,
      `Notes: ${notes.join(' ') || 'none'}`,
    ].join('\n');

    const response = await new AgentPrompter(ctx.gateway).coordinateStrategy(
      { results },
      { signal: ctx.signal },
    );

    const summary: CoordinationSummary = {
      users: users.length,
      segments: strategy.segments.length,
      drafts: drafts.length,
      segments_without_drafts: strategy.segments
        .filter((s) => !draftSegments.has(s.name))
        .map((s) => s.name),
      narrative: response.text.trim(),
      provider: response.provider,
    };
    return { summary, optimization_notes: notes };
  }
}
