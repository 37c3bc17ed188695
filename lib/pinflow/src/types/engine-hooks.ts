import type { GraphEngineError, NodeExecutionError } from '../utils/errors';
import type { NodeGraphCategory } from './graph-category';
import type { GraphRunResult } from './engine-result';

/**
 * Types of all engine events
 */
export enum EngineEventType {
  // Run lifecycle
  RUN_STARTED = 'runStarted',
  RUN_COMPLETED = 'runCompleted',
  RUN_CANCELLED = 'runCancelled',
  RUN_FAILED = 'runFailed',

  // Node events
  NODE_EXECUTING = 'nodeExecuting',
  NODE_EXECUTED = 'nodeExecuted',
  NODE_FAILED = 'nodeFailed',
  NODE_SKIPPED = 'nodeSkipped',

  // Limits
  STEP_LIMIT_REACHED = 'stepLimitReached',
}

/**
 * Handler type for each event
 */
export interface EngineEventHandlers {
  [EngineEventType.RUN_STARTED]: (graphId: string, category: NodeGraphCategory) => void;
  [EngineEventType.RUN_COMPLETED]: (graphId: string, result: GraphRunResult) => void;
  [EngineEventType.RUN_CANCELLED]: (graphId: string, result: GraphRunResult) => void;
  [EngineEventType.RUN_FAILED]: (graphId: string, error: GraphEngineError) => void;
  [EngineEventType.NODE_EXECUTING]: (nodeId: string, path: readonly string[]) => void;
  [EngineEventType.NODE_EXECUTED]: (nodeId: string, durationMs: number) => void;
  [EngineEventType.NODE_FAILED]: (nodeId: string, error: NodeExecutionError) => void;
  /**
   * Disabled node reached by a run
   */
  [EngineEventType.NODE_SKIPPED]: (nodeId: string) => void;
  [EngineEventType.STEP_LIMIT_REACHED]: (data: {
    graphId: string;
    nodeId: string;
    steps: number;
  }) => void;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Event sink the engines report through
 */
export interface IEngineEvents {
  emit<K extends keyof EngineEventHandlers>(
    eventType: K,
    ...args: Parameters<EngineEventHandlers[K]>
  ): void;
}

/**
 * Interface for hook management
 */
export interface IHookManager extends IEngineEvents {
  /**
   * Subscribe to event with cancellation capability
   * @returns Function to unsubscribe
   */
  on<K extends keyof EngineEventHandlers>(
    eventType: K,
    handler: EngineEventHandlers[K]
  ): UnsubscribeFn;

  /**
   * Cancel all subscriptions to specified event
   */
  clearEvent(eventType: keyof EngineEventHandlers): void;

  /**
   * Cancel all subscriptions to all events
   */
  clearAllEvents(): void;
}
