export { Connection } from './connection';
export { Node } from './node';
export type { NodeExecutionContext, NodePinOptions } from './node';
export { NodeGraph, isControlFlowEntry, isDataFlowSink } from './node-graph';
export type { GraphOptions } from './node-graph';
export { NodeGroup, EMPTY_RECT } from './node-group';
export { Pin, DEFAULT_CONNECTION_POLICY } from './pin';
export type { ConnectionPolicy, PinOptions } from './pin';
export { TypeRules, ANY_TYPE, DEFAULT_TYPE_RULES } from './type-rules';
