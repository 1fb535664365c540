/**
 * The outreach topology: six nodes, two of them gated on the
 * `ai_enhancement` flag. Execution order falls out of the nodes' read and
 * write declarations.
 */

import { createTopology } from '../workflow/topology.js';
import type { NodeBinding, Topology } from '../workflow/topology.js';
import { ContentGenerationNode } from './content-generation.js';
import { ContentStrategyNode } from './content-strategy.js';
import { SemanticEnrichmentNode } from './semantic-enrichment.js';
import type { SemanticEnrichmentOptions } from './semantic-enrichment.js';
import { StrategyCoordinationNode } from './strategy-coordination.js';
import { TaskAnalysisNode } from './task-analysis.js';
import { outreachParamsSchema } from './types.js';
import { UserAnalysisNode } from './user-analysis.js';

export const AI_ENHANCEMENT_CONDITION = 'ai_enhancement=true';

export interface OutreachTopologyOptions {
  enrichment?: SemanticEnrichmentOptions;
  /** Per-attempt timeout for nodes that call the LLM gateway. */
  llm_node_timeout?: number | string;
  /** Node-level retries for the LLM-backed nodes. */
  llm_node_retries?: number;
}

export function outreachBindings(options: OutreachTopologyOptions = {}): NodeBinding[] {
  const llm = {
    ...(options.llm_node_timeout !== undefined ? { timeout: options.llm_node_timeout } : {}),
    ...(options.llm_node_retries !== undefined ? { max_retries: options.llm_node_retries } : {}),
  };
  return [
    { node: new TaskAnalysisNode(), required: false, condition: AI_ENHANCEMENT_CONDITION, ...llm },
    { node: new UserAnalysisNode(), required: true },
    {
      node: new SemanticEnrichmentNode(options.enrichment),
      required: false,
      condition: AI_ENHANCEMENT_CONDITION,
    },
    { node: new ContentStrategyNode(), required: true, ...llm },
    { node: new ContentGenerationNode(), required: true, ...llm },
    { node: new StrategyCoordinationNode(), required: false, ...llm },
  ];
}

export function createOutreachTopology(options: OutreachTopologyOptions = {}): Topology {
  return createTopology({
    name: 'outreach',
    bindings: outreachBindings(options),
    params: outreachParamsSchema,
  });
}
