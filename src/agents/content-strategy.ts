/**
 * Builds the content strategy. Segments come from the ranked users
 * deterministically (one per sentiment); the LLM only contributes the
 * narrative on top of them.
 */

import { AIPS_TIERS } from '../scoring/types.js';
import type { AipsTier, RankedUser } from '../scoring/types.js';
import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { AgentPrompter } from './prompts.js';
import {
  DEFAULT_BUSINESS_GOAL,
  highValueUsersSchema,
  readKey,
  readText,
  requireKey,
  taskAnalysisSchema,
  userInsightsSchema,
} from './types.js';
import type { AudienceSegment, ContentStrategy, UserInsight } from './types.js';

const SEGMENT_ORDER = ['positive', 'neutral', 'negative', 'unlabelled'];

const TIER_THEMES: Readonly<Record<AipsTier, string>> = {
  awareness: 'introductions',
  interest: 'product deep dives',
  purchase: 'offers and availability',
  share: 'community stories',
};

const UNMET_THEME = 'answers to unmet needs';
const FALLBACK_THEME = 'general engagement';
const MAX_UNMET_NEEDS = 5;
const MAX_EVIDENCE = 10;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function segmentUsers(users: readonly RankedUser[]): AudienceSegment[] {
  const groups = new Map<string, RankedUser[]>();
  for (const user of users) {
    const name = user.record.sentiment ?? 'unlabelled';
    const group = groups.get(name) ?? [];
    group.push(user);
    groups.set(name, group);
  }

  const segments: AudienceSegment[] = [];
  for (const name of SEGMENT_ORDER) {
    const members = groups.get(name);
    if (!members) continue;

    const aips_mix: Partial<Record<AipsTier, number>> = {};
    for (const { record } of members) {
      if (record.aips_tier) aips_mix[record.aips_tier] = (aips_mix[record.aips_tier] ?? 0) + 1;
    }

    const unmet_needs = [...new Set(
      members
        .map(({ record }) => record.unmet_description?.trim())
        .filter((d): d is string => d !== undefined && d.length > 0),
    )].slice(0, MAX_UNMET_NEEDS);

    const themes = AIPS_TIERS.filter((t) => aips_mix[t] !== undefined).map((t) => TIER_THEMES[t]);
    if (unmet_needs.length > 0) themes.unshift(UNMET_THEME);
    if (themes.length === 0) themes.push(FALLBACK_THEME);

    segments.push({
      name,
      size: members.length,
      user_ids: members.map(({ record }) => record.user_id),
      average_score: round2(members.reduce((sum, m) => sum + m.value.score, 0) / members.length),
      aips_mix,
      themes,
      unmet_needs,
    });
  }
  return segments;
}

function describeSegments(segments: readonly AudienceSegment[]): string {
  return segments
    .map((s) => `- ${s.name}: ${s.size} user(s), average score ${s.average_score}, themes: ${s.themes.join(', ')}` +
      (s.unmet_needs.length > 0 ? `; unmet needs: ${s.unmet_needs.join('; ')}` : ''))
    .join('\n');
}

function describeEvidence(insights: readonly UserInsight[] | undefined): string {
  const passages = (insights ?? [])
    .flatMap((i) => i.passages.map((p) => ({ user_id: i.user_id, ...p })))
    .sort((a, b) => b.similarity_score - a.similarity_score)
    .slice(0, MAX_EVIDENCE);
  if (passages.length === 0) return 'none';
  return passages.map((p) => `- (${p.user_id}) ${p.content}`).join('\n');
}

export class ContentStrategyNode implements AgentNode {
  readonly name = 'content_strategy';
  readonly kind: AgentKind = 'strategy';
  readonly reads = {
    required: ['high_value_users'],
    optional: ['insights', 'business_goal', 'task_analysis'],
  };
  readonly writes = ['content_strategy'];

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const users = requireKey(state, 'high_value_users', highValueUsersSchema);
    const insights = readKey(state, 'insights', userInsightsSchema);
    const taskAnalysis = readKey(state, 'task_analysis', taskAnalysisSchema);
    const businessGoal = readText(state, 'business_goal') ?? DEFAULT_BUSINESS_GOAL;

    const segments = segmentUsers(users);
    const strategy: ContentStrategy = { business_goal: businessGoal, segments, narrative: null };

    if (segments.length > 0) {
      const response = await new AgentPrompter(ctx.gateway).createContentStrategy(
        {
          business_goal: businessGoal,
          task_notes: taskAnalysis?.interpretation ?? 'none',
          segments: describeSegments(segments),
          evidence: describeEvidence(insights),
        },
        { signal: ctx.signal },
      );
      strategy.narrative = response.text.trim();
      strategy.provider = response.provider;
    } else {
      ctx.emit('no candidates; strategy has no segments');
    }

    return { content_strategy: strategy };
  }
}
