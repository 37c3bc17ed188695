import { GraphExecutor } from '../engine/graph-executor';
import { HookManager } from '../engine/hook-manager';
import type { INodeRegistry } from '../engine/registry';
import type { NodeGraph } from '../model/node-graph';
import type { IPersistenceProvider } from '../providers/interfaces/persistence';
import { deserializeGraph, serializeGraph } from '../serialization/serializer';
import { EngineEventHandlers, EngineEventType, UnsubscribeFn } from '../types/engine-hooks';
import { GraphRunResult, RunStatus } from '../types/engine-result';
import type { RunnerStats } from '../types/engine-stats';
import type { ILogger } from '../types/logger';
import { GraphPreconditionError, isGraphEngineError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';
import type { RunnerDefinition, RunnerOperator } from './operator-types';

/**
 * Creates a runner from operators
 *
 * @example
 * ```typescript
 * const runner = createRunner(
 *   withEngineOptions({ maxSteps: 1000 }),
 *   withRegistry(registry),
 *   withPersistence(new MemoryStateProvider())
 * );
 *
 * const result = await runner.execute(graph);
 * if (result.category === NodeGraphCategory.DATA_FLOW) {
 *   console.log(result.sinkOutputs);
 * }
 * ```
 */
export function createRunner(...operators: readonly RunnerOperator[]): GraphRunner {
  let definition: RunnerDefinition = {
    engineOptions: {},
    graphOptions: {},
    providers: {},
  };

  for (const operator of operators) {
    definition = operator(definition);
  }

  return new GraphRunner(definition);
}

/**
 * Executes graphs with the engine matching their category, reporting
 * through hooks and keeping counters across runs
 */
export class GraphRunner {
  private readonly hookManager = new HookManager();
  private readonly executor: GraphExecutor;
  private readonly activeRuns = new Set<string>();
  private readonly logger: ILogger;
  private runs = 0;
  private completedRuns = 0;
  private cancelledRuns = 0;
  private failedRuns = 0;
  private nodeEvaluations = 0;
  private errorCount = 0;

  constructor(private readonly definition: RunnerDefinition) {
    this.logger = definition.engineOptions.logger ?? LoggerManager.getInstance().getLogger();
    this.executor = new GraphExecutor(definition.engineOptions, this.hookManager);

    this.hookManager.on(EngineEventType.NODE_EXECUTED, () => {
      this.nodeEvaluations++;
    });
    this.hookManager.on(EngineEventType.NODE_FAILED, () => {
      this.nodeEvaluations++;
      this.errorCount++;
    });
  }

  /**
   * Runs a graph once.
   * A cancelled signal yields partial results with status `cancelled`.
   *
   * @throws GraphPreconditionError if the graph is already running in this runner,
   * or the engine rejects it before the first node runs
   * @throws NodeExecutionError if a data-flow node faults
   * @throws CyclicDependencyError on a data-flow cycle
   * @throws StepLimitExceededError on a control-flow limit with failOnStepLimit
   */
  async execute(graph: NodeGraph, options: { signal?: AbortSignal } = {}): Promise<GraphRunResult> {
    this.runs++;

    if (this.activeRuns.has(graph.id)) {
      const error = new GraphPreconditionError(`Graph ${graph.id} is already running`, graph.id);
      this.failedRuns++;
      this.hookManager.emit(EngineEventType.RUN_FAILED, graph.id, error);
      throw error;
    }

    this.activeRuns.add(graph.id);
    try {
      const result = await this.executor.executeAsync(graph, options.signal);
      if (result.status === RunStatus.CANCELLED) {
        this.cancelledRuns++;
      } else {
        this.completedRuns++;
      }
      return result;
    } catch (error) {
      this.failedRuns++;
      if (isGraphEngineError(error)) {
        this.hookManager.emit(EngineEventType.RUN_FAILED, graph.id, error);
      }
      throw error;
    } finally {
      this.activeRuns.delete(graph.id);
    }
  }

  /**
   * Subscribes to engine events
   * @returns Function to unsubscribe
   */
  on<K extends keyof EngineEventHandlers>(eventType: K, handler: EngineEventHandlers[K]): UnsubscribeFn {
    return this.hookManager.on(eventType, handler);
  }

  isRunning(graphId: string): boolean {
    return this.activeRuns.has(graphId);
  }

  getStats(): RunnerStats {
    return {
      runs: this.runs,
      completedRuns: this.completedRuns,
      cancelledRuns: this.cancelledRuns,
      failedRuns: this.failedRuns,
      nodeEvaluations: this.nodeEvaluations,
      errorCount: this.errorCount,
      activeRuns: [...this.activeRuns],
    };
  }

  /**
   * Saves the graph using the registered persistence provider
   * @throws Error if persistence provider not registered
   */
  async saveGraph(graph: NodeGraph, key: string, options?: { ttl?: number }): Promise<void> {
    await this.requirePersistence().saveState(key, serializeGraph(graph, false), options);
    this.logger.logEvent('runner', 'graph-saved', { key, graphId: graph.id });
  }

  /**
   * Loads a graph saved under key and rebuilds it through the registry
   * @returns the graph, or null if nothing is stored under key
   * @throws Error if a provider is missing or the stored file is malformed
   */
  async loadGraph(key: string): Promise<NodeGraph | null> {
    const persistence = this.requirePersistence();
    const registry = this.requireRegistry();

    const json = await persistence.loadState(key);
    if (json === null) {
      return null;
    }

    const { graph, errors, warnings } = deserializeGraph(json, registry, this.definition.graphOptions);
    for (const warning of warnings) {
      this.logger.warn(`Loading '${key}': ${warning}`);
    }
    if (!graph) {
      throw new Error(`Graph '${key}' could not be loaded: ${errors.join('; ')}`);
    }

    this.logger.logEvent('runner', 'graph-loaded', { key, graphId: graph.id, warnings: warnings.length });
    return graph;
  }

  /**
   * @throws Error if persistence provider not registered
   */
  async deleteGraph(key: string): Promise<void> {
    await this.requirePersistence().deleteState(key);
  }

  private requirePersistence(): IPersistenceProvider {
    const persistence = this.definition.providers.persistence;
    if (!persistence) {
      throw new Error(
        'Persistence provider not registered. Use withPersistence() operator to register a provider.'
      );
    }
    return persistence;
  }

  private requireRegistry(): INodeRegistry {
    const registry = this.definition.registry;
    if (!registry) {
      throw new Error('Node registry not registered. Use withRegistry() operator to register one.');
    }
    return registry;
  }
}
