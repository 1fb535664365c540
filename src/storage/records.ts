/**
 * Typed, versioned source records. Raw rows are decoded exactly once, here,
 * at the storage boundary.
 */

import { z } from 'zod';
import { StorageDecodeError } from '../errors.js';
import type { AipsTier, Sentiment } from '../scoring/types.js';
import type { DocumentMetadata } from '../retrieval/types.js';

export const SOURCE_TYPES = ['comment', 'note', 'analysis'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

const SENTIMENT_LABELS: Record<string, Sentiment> = {
  positive: 'positive',
  neutral: 'neutral',
  negative: 'negative',
  正向: 'positive',
  中性: 'neutral',
  负向: 'negative',
};

const YES = new Set(['true', 'yes', 'y', '1', '是']);
const NO = new Set(['false', 'no', 'n', '0', '否']);

function normalizeSentiment(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const label = value.trim().toLowerCase();
  if (label === '' || label === 'unknown' || label === '未知') return undefined;
  return SENTIMENT_LABELS[label] ?? label;
}

function normalizeFlag(value: unknown): unknown {
  if (typeof value === 'number') return value !== 0;
  if (typeof value !== 'string') return value;
  const label = value.trim().toLowerCase();
  if (YES.has(label)) return true;
  if (NO.has(label)) return false;
  if (label === '' || label === 'unknown' || label === '未知') return undefined;
  return value;
}

function normalizeTier(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const label = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (label === '' || label === 'unknown') return undefined;
  return label === 'purchase_intent' ? 'purchase' : label;
}

const sentimentField = z.preprocess(
  normalizeSentiment,
  z.enum(['positive', 'neutral', 'negative']).optional(),
);
const flagField = z.preprocess(normalizeFlag, z.boolean().optional());
const tierField = z.preprocess(
  normalizeTier,
  z.enum(['awareness', 'interest', 'purchase', 'share']).optional(),
);
const id = z.union([z.string().min(1), z.number().transform(String)]);
const count = z.number().int().nonnegative().default(0);

export const commentRecordSchema = z.object({
  source_type: z.literal('comment'),
  schema_version: z.literal(1).default(1),
  comment_id: id,
  note_id: id,
  user_id: id,
  nickname: z.string().optional(),
  content: z.string(),
  like_count: count,
  created_at: z.coerce.date(),
});

export const noteRecordSchema = z.object({
  source_type: z.literal('note'),
  schema_version: z.literal(1).default(1),
  note_id: id,
  title: z.string().default(''),
  description: z.string().default(''),
  author_id: z.string().optional(),
  liked_count: count,
  comment_count: count,
  created_at: z.coerce.date(),
});

export const analysisRecordSchema = z.object({
  source_type: z.literal('analysis'),
  schema_version: z.literal(1).default(1),
  analysis_id: id,
  comment_id: id,
  note_id: id,
  user_id: id,
  sentiment: sentimentField,
  aips_tier: tierField,
  unmet_need: flagField,
  unmet_description: z.string().optional(),
  visited: flagField,
  summary: z.string().optional(),
  created_at: z.coerce.date(),
});

export const sourceRecordSchema = z.discriminatedUnion('source_type', [
  commentRecordSchema,
  noteRecordSchema,
  analysisRecordSchema,
]);

export type CommentRecord = z.infer<typeof commentRecordSchema>;
export type NoteRecord = z.infer<typeof noteRecordSchema>;
export type AnalysisRecord = z.infer<typeof analysisRecordSchema>;
export type SourceRecord = z.infer<typeof sourceRecordSchema>;
export type SourceRecordInput = z.input<typeof sourceRecordSchema>;

export function decodeSourceRecord(raw: unknown): SourceRecord {
  const parsed = sourceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const type = typeof raw === 'object' && raw !== null && 'source_type' in raw
      ? String(raw.source_type)
      : 'unknown';
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new StorageDecodeError(type, detail);
  }
  return parsed.data;
}

/** What every source record exposes to the core, whatever its type. */
export interface SourceDescriptor {
  source_type: SourceType;
  source_id: string;
  /** Text that gets embedded. */
  content: string;
  timestamp: Date;
  interaction_count: number;
  sentiment?: Sentiment;
  aips_tier?: AipsTier;
  metadata: DocumentMetadata;
}

export function sourceId(record: SourceRecord): string {
  switch (record.source_type) {
    case 'comment': return record.comment_id;
    case 'note': return record.note_id;
    case 'analysis': return record.analysis_id;
  }
}

export function describeSource(record: SourceRecord): SourceDescriptor {
  switch (record.source_type) {
    case 'comment':
      return {
        source_type: 'comment',
        source_id: record.comment_id,
        content: `Comment by ${record.nickname ?? record.user_id}: ${record.content}`,
        timestamp: record.created_at,
        interaction_count: record.like_count,
        metadata: { user_id: record.user_id, note_id: record.note_id },
      };
    case 'note':
      return {
        source_type: 'note',
        source_id: record.note_id,
        content: [record.title, record.description].filter(Boolean).join('\n'),
        timestamp: record.created_at,
        interaction_count: record.liked_count + record.comment_count,
        metadata: { note_id: record.note_id, author_id: record.author_id ?? null },
      };
    case 'analysis': {
      const lines = [
        `Sentiment: ${record.sentiment ?? 'unknown'}`,
        `Purchase stage: ${record.aips_tier ?? 'unknown'}`,
        `Unmet need: ${record.unmet_need === undefined ? 'unknown' : record.unmet_need ? 'yes' : 'no'}`,
      ];
      if (record.unmet_description) lines.push(`Need: ${record.unmet_description}`);
      if (record.summary) lines.push(`Summary: ${record.summary}`);
      return {
        source_type: 'analysis',
        source_id: record.analysis_id,
        content: lines.join('\n'),
        timestamp: record.created_at,
        interaction_count: 0,
        sentiment: record.sentiment,
        aips_tier: record.aips_tier,
        metadata: { user_id: record.user_id, note_id: record.note_id, comment_id: record.comment_id },
      };
    }
  }
}
