import type { AgentKind, AgentNode, NodeContext, StateUpdate, WorkflowState } from '../workflow/types.js';
import { AgentPrompter } from './prompts.js';
import { DEFAULT_TASK, readKey, readText, userCriteriaSchema } from './types.js';
import type { TaskAnalysis } from './types.js';

/** Asks the LLM to restate the request as concrete goals for later nodes. */
export class TaskAnalysisNode implements AgentNode {
  readonly name = 'task_analysis';
  readonly kind: AgentKind = 'analysis';
  readonly reads = { required: [], optional: ['task', 'user_criteria'] };
  readonly writes = ['task_analysis'];

  async produceUpdate(state: WorkflowState, ctx: NodeContext): Promise<StateUpdate> {
    const task = readText(state, 'task') ?? DEFAULT_TASK;
    const criteria = readKey(state, 'user_criteria', userCriteriaSchema);

    const response = await new AgentPrompter(ctx.gateway).analyzeUsers(
      { task, criteria: criteria ? JSON.stringify(criteria) : 'defaults' },
      { signal: ctx.signal },
    );

    const analysis: TaskAnalysis = {
      task,
      interpretation: response.text.trim(),
      provider: response.provider,
    };
    return { task_analysis: analysis };
  }
}
