/**
 * Generates outreach drafts per segment. The model is asked for JSON; a
 * reply that does not validate becomes a single plain-text draft so a
 * segment never ends up empty because of formatting.
 */

import { z } from 'zod';
import type { ContentDraft } from '../storage/types.js';
import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { AgentPrompter } from './prompts.js';
import { contentStrategySchema, readText, requireKey } from './types.js';
import type { AudienceSegment } from './types.js';

const generatedDraftsSchema = z.object({
  drafts: z.array(z.object({
    theme: z.string().min(1),
    title: z.string().min(1),
    body: z.string().min(1),
    content_type: z.string().min(1).default('post'),
    call_to_action: z.string().min(1).optional(),
  })).min(1),
});

type GeneratedDrafts = z.infer<typeof generatedDraftsSchema>;

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

export function slugify(text: string): string {
  const slug = text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '-').replace(/^-+|-+$/g, '');
  return slug || 'general';
}

/** Same segment and theme always yield the same id, so re-runs overwrite. */
export function draftId(segment: string, theme: string): string {
  return `${segment}:${slugify(theme)}`;
}

/** Parse a model reply into drafts. Undefined when it is not valid draft JSON. */
export function parseGeneratedDrafts(text: string): GeneratedDrafts | undefined {
  const trimmed = text.trim();
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed;
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = generatedDraftsSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export function fallbackDraft(segment: AudienceSegment, text: string): ContentDraft {
  const theme = segment.themes[0] ?? 'general engagement';
  return {
    draft_id: draftId(segment.name, theme),
    segment: segment.name,
    theme,
    title: `${segment.name} audience: ${theme}`,
    body: text.trim(),
    content_type: 'post',
  };
}

export class ContentGenerationNode implements AgentNode {
  readonly name = 'content_generation';
  readonly kind: AgentKind = 'generation';
  readonly reads = { required: ['content_strategy'], optional: ['target_profile'] };
  readonly writes = ['content_drafts'];

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const strategy = requireKey(state, 'content_strategy', contentStrategySchema);
    const targetProfile = readText(state, 'target_profile') ?? 'not specified';
    const prompter = new AgentPrompter(ctx.gateway);

    const perSegment = await ctx.batch.map(strategy.segments, async (segment) => {
      const response = await prompter.generateContent(
        {
          segment: `${segment.name} (${segment.size} user(s))`,
          themes: segment.themes.join(', '),
          unmet_needs: segment.unmet_needs.join('; ') || 'none recorded',
          target_profile: targetProfile,
          narrative: strategy.narrative ?? 'none',
        },
        { signal: ctx.signal },
      );

      const generated = parseGeneratedDrafts(response.text);
      if (!generated) {
        ctx.emit('reply was not draft JSON; kept as text', { segment: segment.name });
        return [fallbackDraft(segment, response.text)];
      }

      const drafts = new Map<string, ContentDraft>();
      for (const d of generated.drafts) {
        const id = draftId(segment.name, d.theme);
        if (drafts.has(id)) continue;
        drafts.set(id, {
          draft_id: id,
          segment: segment.name,
          theme: d.theme,
          title: d.title,
          body: d.body,
          content_type: d.content_type,
          ...(d.call_to_action ? { call_to_action: d.call_to_action } : {}),
        });
      }
      return [...drafts.values()];
    });

    const drafts = perSegment.flat();
    if (drafts.length > 0) {
      await ctx.storage.upsertContentDrafts(drafts);
    }
    return { content_drafts: drafts };
  }
}
