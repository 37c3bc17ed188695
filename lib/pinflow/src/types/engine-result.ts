import type { NodeExecutionError } from '../utils/errors';
import { NodeGraphCategory } from './graph-category';
import type { PinValue } from './utils';

/**
 * How a run ended
 */
export enum RunStatus {
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  /**
   * Control flow only: at least one path aborted on a node fault
   */
  FAULTED = 'faulted',
  /**
   * Control flow only: maxSteps or maxVisitsPerNode was hit
   */
  STEP_LIMIT_REACHED = 'stepLimitReached',
}

interface RunResultBase {
  readonly graphId: string;
  readonly status: RunStatus;

  /**
   * Ids of evaluated nodes in evaluation order; repeated on revisits
   */
  readonly executedNodeIds: readonly string[];
  readonly durationMs: number;
}

export interface ControlFlowResult extends RunResultBase {
  readonly category: NodeGraphCategory.CONTROL_FLOW;
  readonly steps: number;

  /**
   * Faults of aborted paths, in the order they occurred
   */
  readonly errors: readonly NodeExecutionError[];
}

/**
 * Sink values keyed by pin name
 */
export type PinValues = Readonly<Record<string, PinValue>>;

export interface DataFlowResult extends RunResultBase {
  readonly category: NodeGraphCategory.DATA_FLOW;

  /**
   * Topological order computed before evaluation
   */
  readonly evaluationOrder: readonly string[];

  /**
   * Values of every evaluated sink, keyed by node id
   */
  readonly sinkOutputs: ReadonlyMap<string, PinValues>;
}

export type GraphRunResult = ControlFlowResult | DataFlowResult;

export function isControlFlowResult(result: GraphRunResult): result is ControlFlowResult {
  return result.category === NodeGraphCategory.CONTROL_FLOW;
}

export function isDataFlowResult(result: GraphRunResult): result is DataFlowResult {
  return result.category === NodeGraphCategory.DATA_FLOW;
}
