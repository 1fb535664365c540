/**
 * State shapes written by the outreach nodes, and the request params schema
 * that seeds the initial state. Nodes read upstream keys through these
 * schemas, so a malformed value fails the reading node with a
 * ValidationError instead of surfacing later as a type confusion.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { DEFAULT_CANDIDATE_CRITERIA } from '../scoring/scorer.js';
import { lookup } from '../workflow/state.js';
import type { WorkflowState } from '../workflow/types.js';

const sentimentSchema = z.enum(['positive', 'neutral', 'negative']);
const aipsTierSchema = z.enum(['awareness', 'interest', 'purchase', 'share']);

// ---------------------------------------------------------------------------
// Request params
// ---------------------------------------------------------------------------

export const userCriteriaSchema = z.object({
  sentiments: z.array(sentimentSchema).default([...DEFAULT_CANDIDATE_CRITERIA.sentiments]),
  require_unmet_need: z.boolean().default(DEFAULT_CANDIDATE_CRITERIA.require_unmet_need),
  min_interactions: z.number().int().min(0).default(DEFAULT_CANDIDATE_CRITERIA.min_interactions),
  exclude_visited: z.boolean().default(DEFAULT_CANDIDATE_CRITERIA.exclude_visited),
  limit: z.number().int().positive().default(DEFAULT_CANDIDATE_CRITERIA.limit),
});

export type UserCriteria = z.infer<typeof userCriteriaSchema>;

export const outreachParamsSchema = z.object({
  user_criteria: userCriteriaSchema.default({}),
  task: z.string().min(1).optional(),
  business_goal: z.string().min(1).optional(),
  target_profile: z.string().min(1).optional(),
});

export type OutreachParams = z.infer<typeof outreachParamsSchema>;

export const DEFAULT_BUSINESS_GOAL = 'Grow user acquisition and conversion on the platform';
export const DEFAULT_TASK = 'Identify high-value users and prepare targeted outreach content';

// ---------------------------------------------------------------------------
// State values
// ---------------------------------------------------------------------------

const userRecordSchema = z.object({
  user_id: z.string(),
  nickname: z.string().optional(),
  sentiment: sentimentSchema.optional(),
  unmet_need: z.boolean().optional(),
  unmet_description: z.string().optional(),
  interaction_count: z.number().optional(),
  aips_tier: aipsTierSchema.optional(),
  visited: z.boolean().optional(),
  last_activity_at: z.date().optional(),
  notes_engaged: z.array(z.string()).optional(),
});

const valueScoreSchema = z.object({
  user_id: z.string(),
  score: z.number(),
  components: z.object({
    sentiment: z.number(),
    unmet_need: z.number(),
    interactions: z.number(),
    aips: z.number(),
    recency: z.number(),
    retrieval: z.number(),
    visited: z.number(),
  }),
  excluded: z.boolean().optional(),
});

export const highValueUsersSchema = z.array(z.object({
  record: userRecordSchema,
  value: valueScoreSchema,
}));

export const taskAnalysisSchema = z.object({
  task: z.string(),
  interpretation: z.string(),
  provider: z.string(),
});

export type TaskAnalysis = z.infer<typeof taskAnalysisSchema>;

export const userInsightsSchema = z.array(z.object({
  user_id: z.string(),
  query: z.string(),
  passages: z.array(z.object({
    document_ref: z.object({ source_type: z.string(), source_id: z.string() }),
    similarity_score: z.number(),
    content: z.string(),
  })),
  score_before: z.number(),
  score_after: z.number(),
}));

export type UserInsight = z.infer<typeof userInsightsSchema>[number];

const audienceSegmentSchema = z.object({
  /** Sentiment label, or 'unlabelled'. */
  name: z.string(),
  size: z.number(),
  user_ids: z.array(z.string()),
  average_score: z.number(),
  aips_mix: z.record(aipsTierSchema, z.number()),
  themes: z.array(z.string()),
  unmet_needs: z.array(z.string()),
});

export type AudienceSegment = z.infer<typeof audienceSegmentSchema>;

export const contentStrategySchema = z.object({
  business_goal: z.string(),
  segments: z.array(audienceSegmentSchema),
  /** Null when there was nobody to plan for. */
  narrative: z.string().nullable(),
  provider: z.string().optional(),
});

export type ContentStrategy = z.infer<typeof contentStrategySchema>;

export const contentDraftsSchema = z.array(z.object({
  draft_id: z.string(),
  segment: z.string(),
  theme: z.string(),
  title: z.string(),
  body: z.string(),
  content_type: z.string(),
  call_to_action: z.string().optional(),
}));

export interface CoordinationSummary {
  users: number;
  segments: number;
  drafts: number;
  segments_without_drafts: string[];
  narrative: string;
  provider: string;
}

/**
 * Read a state key through its schema. Missing keys give undefined; present
 * but malformed values throw.
 */
export function readKey<T>(
  state: WorkflowState,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T | undefined {
  const value = lookup(state, key);
  if (value === undefined) return undefined;
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      `State key '${key}' has an unexpected shape`,
      parsed.error.issues.map((i) => ({ path: [key, ...i.path].join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

/** As readKey, for keys the node declared as required. */
export function requireKey<T>(
  state: WorkflowState,
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  const value = readKey(state, key, schema);
  if (value === undefined) throw new ValidationError(`State key '${key}' is missing`);
  return value;
}

export function readText(state: WorkflowState, key: string): string | undefined {
  return readKey(state, key, z.string());
}
