// ============================================
// Graph model
// ============================================
export {
  Connection,
  Node,
  NodeGraph,
  NodeGroup,
  Pin,
  TypeRules,
  ANY_TYPE,
  DEFAULT_CONNECTION_POLICY,
  DEFAULT_TYPE_RULES,
  EMPTY_RECT,
  isControlFlowEntry,
  isDataFlowSink,
} from './model';
export type {
  ConnectionPolicy,
  GraphOptions,
  NodeExecutionContext,
  NodePinOptions,
  PinOptions,
} from './model';

// ============================================
// Groups
// ============================================
export * from './groups';

// ============================================
// Engines
// ============================================
export {
  ControlFlowEngine,
  DataFlowEngine,
  GraphExecutor,
  HookManager,
  NodeRegistry,
  computeEvaluationOrder,
} from './engine';
export type { IGraphEngine, INodeRegistry, NodeFactory } from './engine';

// ============================================
// Build API
// ============================================
export {
  createRunner,
  GraphRunner,
  withEngineOptions,
  withGraphOptions,
  withLogger,
  withPersistence,
  withRegistry,
} from './runner';
export type { ProviderRegistry, RunnerDefinition, RunnerOperator } from './runner';

// ============================================
// Serialization
// ============================================
export * from './serialization';

// ============================================
// Providers
// ============================================
export type { IPersistenceProvider } from './providers';
export { MemoryStateProvider } from './providers';

// ============================================
// Types
// ============================================
export * from './types';

// ============================================
// Errors & logging
// ============================================
export {
  GraphEngineError,
  GraphPreconditionError,
  NodeExecutionError,
  CyclicDependencyError,
  StepLimitExceededError,
  isGraphEngineError,
  isNodeExecutionError,
  isCyclicDependencyError,
  getErrorMessage,
} from './utils/errors';
export type { GraphEngineErrorCode } from './utils/errors';
export {
  LoggerAdapter,
  ConsoleLoggerAdapter,
  LoggerFactory,
  LoggerManager,
} from './utils/logging';
export { generateId } from './utils/id';
