/**
 * Error codes carried by every engine error
 */
export type GraphEngineErrorCode =
  | 'GRAPH_PRECONDITION'
  | 'NODE_EXECUTION'
  | 'CYCLIC_DEPENDENCY'
  | 'STEP_LIMIT_EXCEEDED';

/**
 * Base class for errors raised by the engines and the runner
 */
export class GraphEngineError extends Error {
  public readonly code: GraphEngineErrorCode;

  /**
   * Identifier of the graph being executed, when known
   */
  public readonly graphId?: string;

  constructor(message: string, code: GraphEngineErrorCode, graphId?: string) {
    super(message);
    this.name = 'GraphEngineError';
    this.code = code;
    this.graphId = graphId;

    // For ES5 compatibility
    Object.setPrototypeOf(this, GraphEngineError.prototype);
  }

  public override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): {
    readonly name: string;
    readonly code: GraphEngineErrorCode;
    readonly message: string;
    readonly graphId?: string;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      graphId: this.graphId,
    };
  }
}

/**
 * A run cannot start: wrong category, missing or ineligible main node,
 * or the graph is already being executed
 */
export class GraphPreconditionError extends GraphEngineError {
  constructor(message: string, graphId?: string) {
    super(message, 'GRAPH_PRECONDITION', graphId);
    this.name = 'GraphPreconditionError';
    Object.setPrototypeOf(this, GraphPreconditionError.prototype);
  }
}

/**
 * A node's evaluation step threw
 */
export class NodeExecutionError extends GraphEngineError {
  public readonly nodeId: string;

  /**
   * Node ids from the run's starting node to the failing node.
   * For data-flow runs this is the evaluation order up to the failing node.
   */
  public readonly path: readonly string[];

  public readonly originalError?: Error;

  constructor(
    message: string,
    nodeId: string,
    path: readonly string[],
    originalError?: Error,
    graphId?: string
  ) {
    super(message, 'NODE_EXECUTION', graphId);
    this.name = 'NodeExecutionError';
    this.nodeId = nodeId;
    this.path = path;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    Object.setPrototypeOf(this, NodeExecutionError.prototype);
  }

  public override toString(): string {
    return `[NodeExecutionError in ${this.nodeId}] ${this.message}`;
  }
}

/**
 * Data-flow evaluation found nodes whose inputs can never become ready
 */
export class CyclicDependencyError extends GraphEngineError {
  /**
   * Nodes left unevaluated when no node was ready
   */
  public readonly nodeIds: readonly string[];

  constructor(nodeIds: readonly string[], graphId?: string) {
    super(`Cyclic data dependency between nodes: ${nodeIds.join(', ')}`, 'CYCLIC_DEPENDENCY', graphId);
    this.name = 'CyclicDependencyError';
    this.nodeIds = nodeIds;
    Object.setPrototypeOf(this, CyclicDependencyError.prototype);
  }
}

/**
 * Control-flow run exceeded its step or per-node visit bound with failOnStepLimit set
 */
export class StepLimitExceededError extends GraphEngineError {
  public readonly steps: number;
  public readonly nodeId: string;

  constructor(message: string, nodeId: string, steps: number, graphId?: string) {
    super(message, 'STEP_LIMIT_EXCEEDED', graphId);
    this.name = 'StepLimitExceededError';
    this.nodeId = nodeId;
    this.steps = steps;
    Object.setPrototypeOf(this, StepLimitExceededError.prototype);
  }
}

export function isGraphEngineError(error: unknown): error is GraphEngineError {
  return error instanceof GraphEngineError;
}

export function isNodeExecutionError(error: unknown): error is NodeExecutionError {
  return error instanceof NodeExecutionError;
}

export function isCyclicDependencyError(error: unknown): error is CyclicDependencyError {
  return error instanceof CyclicDependencyError;
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
