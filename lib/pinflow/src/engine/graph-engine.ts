import type { Node, NodeExecutionContext } from '../model/node';
import type { NodeGraph } from '../model/node-graph';
import { EngineEventHandlers, EngineEventType, IEngineEvents } from '../types/engine-hooks';
import { DEFAULT_ENGINE_OPTIONS, IEngineOptions } from '../types/engine-options';
import { GraphRunResult, RunStatus } from '../types/engine-result';
import { NodeGraphCategory } from '../types/graph-category';
import type { ILogger } from '../types/logger';
import { GraphPreconditionError, NodeExecutionError, getErrorMessage, isError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';

export interface ResolvedEngineOptions {
  readonly logger: ILogger;
  readonly maxSteps: number;
  readonly maxVisitsPerNode: number;
  readonly failOnStepLimit: boolean;
  readonly silentErrors: boolean;
}

export function resolveEngineOptions(options: IEngineOptions = {}): ResolvedEngineOptions {
  return {
    logger: options.logger ?? LoggerManager.getInstance().getLogger(),
    maxSteps: options.maxSteps ?? DEFAULT_ENGINE_OPTIONS.maxSteps,
    maxVisitsPerNode: options.maxVisitsPerNode ?? DEFAULT_ENGINE_OPTIONS.maxVisitsPerNode,
    failOnStepLimit: options.failOnStepLimit ?? DEFAULT_ENGINE_OPTIONS.failOnStepLimit,
    silentErrors: options.silentErrors ?? DEFAULT_ENGINE_OPTIONS.silentErrors,
  };
}

/**
 * Interprets a graph of one category into an ordered sequence of node evaluations
 */
export interface IGraphEngine<R extends GraphRunResult = GraphRunResult> {
  readonly category: NodeGraphCategory;
  executeAsync(graph: NodeGraph, signal?: AbortSignal): Promise<R>;
}

/**
 * Shared plumbing of the two engines: options, events, preconditions and
 * fault wrapping. Engines hold no per-run state between calls.
 */
export abstract class GraphEngine<R extends GraphRunResult> implements IGraphEngine<R> {
  abstract readonly category: NodeGraphCategory;

  protected readonly options: ResolvedEngineOptions;

  constructor(
    options: IEngineOptions = {},
    private readonly events?: IEngineEvents
  ) {
    this.options = resolveEngineOptions(options);
  }

  protected get logger(): ILogger {
    return this.options.logger;
  }

  protected get logCategory(): string {
    return this.category === NodeGraphCategory.CONTROL_FLOW ? 'control-flow' : 'data-flow';
  }

  abstract executeAsync(graph: NodeGraph, signal?: AbortSignal): Promise<R>;

  protected emit<K extends keyof EngineEventHandlers>(
    eventType: K,
    ...args: Parameters<EngineEventHandlers[K]>
  ): void {
    this.events?.emit(eventType, ...args);
  }

  /**
   * @throws GraphPreconditionError if the graph belongs to another engine
   */
  protected assertCategory(graph: NodeGraph): void {
    if (graph.category !== this.category) {
      throw new GraphPreconditionError(
        `Graph ${graph.id} is a ${graph.category} graph, expected ${this.category}`,
        graph.id
      );
    }
  }

  /**
   * Resolves the main node and checks it is eligible for this category
   * @throws GraphPreconditionError if the id does not resolve or the node is not a candidate
   */
  protected resolveMainNode(graph: NodeGraph, mainNodeId: string): Node {
    const node = graph.findNode(mainNodeId);
    if (!node) {
      throw new GraphPreconditionError(`Main node ${mainNodeId} is not in graph ${graph.id}`, graph.id);
    }
    if (!graph.isMainNodeCandidate(node)) {
      throw new GraphPreconditionError(
        `Node ${node.id} is not eligible as ${this.category} main node`,
        graph.id
      );
    }
    return node;
  }

  protected createContext(graph: NodeGraph, signal?: AbortSignal): NodeExecutionContext {
    return { graphId: graph.id, category: graph.category, logger: this.logger, signal };
  }

  /**
   * Runs one node step, reporting it through the events
   * @returns false if the node is disabled and was skipped
   * @throws NodeExecutionError wrapping whatever the step threw
   */
  protected async runNode(
    graph: NodeGraph,
    node: Node,
    path: readonly string[],
    context: NodeExecutionContext
  ): Promise<boolean> {
    if (!node.isEnabled) {
      this.logger.debug(`Node ${node.id} is disabled, skipped`);
      this.emit(EngineEventType.NODE_SKIPPED, node.id);
      return false;
    }

    this.emit(EngineEventType.NODE_EXECUTING, node.id, path);
    const startedAt = Date.now();
    try {
      await node.execute(context);
    } catch (error) {
      const failure = new NodeExecutionError(
        `Node ${node.id} (${node.type}) failed: ${getErrorMessage(error)}`,
        node.id,
        path,
        isError(error) ? error : undefined,
        graph.id
      );
      if (!this.options.silentErrors) {
        this.logger.error(failure.message, failure);
      }
      this.emit(EngineEventType.NODE_FAILED, node.id, failure);
      throw failure;
    }

    this.emit(EngineEventType.NODE_EXECUTED, node.id, Date.now() - startedAt);
    return true;
  }

  /**
   * Reports the end of a run that was not aborted by a thrown error
   */
  protected finishRun(result: R): R {
    const cancelled = result.status === RunStatus.CANCELLED;
    this.emit(
      cancelled ? EngineEventType.RUN_CANCELLED : EngineEventType.RUN_COMPLETED,
      result.graphId,
      result
    );
    this.logger.logEvent(this.logCategory, 'run-finished', {
      graphId: result.graphId,
      status: result.status,
      executedNodes: result.executedNodeIds.length,
      durationMs: result.durationMs,
    });
    return result;
  }
}
