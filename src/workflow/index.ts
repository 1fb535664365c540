export * from './types.js';
export { WorkflowEngine, computeRunStatus } from './engine.js';
export type { WorkflowEngineOptions, WorkflowRequest } from './engine.js';
export {
  LintSeverity,
  Topology,
  createTopology,
  deriveDependencies,
  topologicalOrder,
  validateOrRaise,
  validateTopology,
} from './topology.js';
export type { LintResult, LintRule, NodeBinding, ParamsSchema, TopologyDefinition } from './topology.js';
export { evaluateCondition, checkCondition, resolveKey } from './conditions.js';
export type { ConditionScope } from './conditions.js';
export { parseDuration, toMilliseconds } from './duration.js';
export { freezeState, hasValue, lookup, mergeInOrder } from './state.js';
export type { MergedState, WriterUpdate } from './state.js';
export { WorkflowEventEmitter, createEventLogger } from './events.js';
export type { EventListener } from './events.js';
