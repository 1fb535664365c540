export * from './types.js';
export { AgentPrompter, PROMPTS, formatPrompt } from './prompts.js';
export type { PromptName, PromptTemplate } from './prompts.js';
export { TaskAnalysisNode } from './task-analysis.js';
export { UserAnalysisNode } from './user-analysis.js';
export { SemanticEnrichmentNode, enrichmentQuery } from './semantic-enrichment.js';
export type { SemanticEnrichmentOptions } from './semantic-enrichment.js';
export { ContentStrategyNode, segmentUsers } from './content-strategy.js';
export {
  ContentGenerationNode,
  draftId,
  fallbackDraft,
  parseGeneratedDrafts,
  slugify,
} from './content-generation.js';
export { StrategyCoordinationNode, optimizationNotes, LOW_SEGMENT_SCORE } from './strategy-coordination.js';
export {
  AI_ENHANCEMENT_CONDITION,
  createOutreachTopology,
  outreachBindings,
} from './outreach.js';
export type { OutreachTopologyOptions } from './outreach.js';
