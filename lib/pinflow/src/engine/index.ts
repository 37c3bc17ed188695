export { ControlFlowEngine } from './control-flow-engine';
export { DataFlowEngine } from './data-flow-engine';
export { GraphEngine, resolveEngineOptions } from './graph-engine';
export type { IGraphEngine, ResolvedEngineOptions } from './graph-engine';
export { GraphExecutor } from './graph-executor';
export { HookManager } from './hook-manager';
export { NodeRegistry } from './registry';
export type { INodeRegistry, NodeFactory } from './registry';
export { computeEvaluationOrder, collectDataDependencies } from './evaluation-order';
