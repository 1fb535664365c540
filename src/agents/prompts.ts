/**
 * Prompt templates for the outreach nodes and a thin invoker wrapper.
 * Templates use {name} placeholders; every placeholder must be supplied.
 */

import { ValidationError } from '../errors.js';
import type { GatewayResponse, InvokeConstraints, TextInvoker } from '../gateway/types.js';

export type PromptName =
  | 'task_analysis'
  | 'content_strategy'
  | 'content_generation'
  | 'strategy_coordination';

export interface PromptTemplate {
  system: string;
  user: string;
  response_format?: 'text' | 'json';
}

export const PROMPTS: Readonly<Record<PromptName, PromptTemplate>> = {
  task_analysis: {
    system:
      'You plan work for a team of analysis agents on a user-generated content platform. ' +
      'Restate the task as concrete goals, the signals to prioritise and the expected outputs.',
    user: 'Task: {task}\n\nCandidate criteria: {criteria}',
  },
  content_strategy: {
    system:
      'You are a content strategist. Given audience segments of high-value users, ' +
      'propose positioning, tone and channel choices for each segment.',
    user:
      'Business goal: {business_goal}\n\nTask notes: {task_notes}\n\n' +
      'Segments:\n{segments}\n\nRetrieved evidence:\n{evidence}',
  },
  content_generation: {
    system:
      'You write outreach posts for one audience segment. Reply with JSON only: ' +
      '{"drafts":[{"theme":string,"title":string,"body":string,"content_type":string,"call_to_action":string}]}',
    user:
      'Segment: {segment}\nThemes: {themes}\nUnmet needs: {unmet_needs}\n' +
      'Target profile: {target_profile}\n\nStrategy:\n{narrative}',
    response_format: 'json',
  },
  strategy_coordination: {
    system:
      'You review the output of an outreach pipeline and recommend what to run first, ' +
      'what to measure and what to change next time.',
    user: 'Pipeline results:\n{results}',
  },
};

const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function formatPrompt(template: string, vars: Readonly<Record<string, string>>): string {
  const missing = new Set<string>();
  const text = template.replace(PLACEHOLDER, (_, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      missing.add(name);
      return '';
    }
    return value;
  });
  if (missing.size > 0) {
    throw new ValidationError(`Prompt is missing variable(s): ${[...missing].join(', ')}`);
  }
  return text;
}

/** Invokes the gateway with a named template. */
export class AgentPrompter {
  private readonly gateway: TextInvoker;
  private readonly templates: Readonly<Record<PromptName, PromptTemplate>>;

  constructor(gateway: TextInvoker, overrides: Partial<Record<PromptName, PromptTemplate>> = {}) {
    this.gateway = gateway;
    this.templates = { ...PROMPTS, ...overrides };
  }

  render(name: PromptName, vars: Readonly<Record<string, string>>): { system: string; prompt: string } {
    const template = this.templates[name];
    return {
      system: formatPrompt(template.system, vars),
      prompt: formatPrompt(template.user, vars),
    };
  }

  ask(
    name: PromptName,
    vars: Readonly<Record<string, string>>,
    constraints: InvokeConstraints = {},
  ): Promise<GatewayResponse> {
    const { system, prompt } = this.render(name, vars);
    const format = this.templates[name].response_format;
    return this.gateway.invoke(prompt, {
      ...constraints,
      system,
      ...(format ? { response_format: format } : {}),
    });
  }

  // -------------------------------------------------------------------------
  // Role helpers
  // -------------------------------------------------------------------------

  /** Interprets the outreach task and the candidate criteria. */
  analyzeUsers(vars: { task: string; criteria: string }, constraints?: InvokeConstraints): Promise<GatewayResponse> {
    return this.ask('task_analysis', vars, constraints);
  }

  createContentStrategy(
    vars: { business_goal: string; task_notes: string; segments: string; evidence: string },
    constraints?: InvokeConstraints,
  ): Promise<GatewayResponse> {
    return this.ask('content_strategy', vars, constraints);
  }

  /** Asks for JSON drafts for one segment. */
  generateContent(
    vars: { segment: string; themes: string; unmet_needs: string; target_profile: string; narrative: string },
    constraints?: InvokeConstraints,
  ): Promise<GatewayResponse> {
    return this.ask('content_generation', vars, constraints);
  }

  coordinateStrategy(vars: { results: string }, constraints?: InvokeConstraints): Promise<GatewayResponse> {
    return this.ask('strategy_coordination', vars, constraints);
  }
}
