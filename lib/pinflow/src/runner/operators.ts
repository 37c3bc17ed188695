import type { INodeRegistry } from '../engine/registry';
import type { IPersistenceProvider } from '../providers/interfaces/persistence';
import type { RestoreOptions } from '../serialization/snapshot';
import type { IEngineOptions } from '../types/engine-options';
import type { ILogger } from '../types/logger';
import type { RunnerOperator } from './operator-types';

/**
 * Sets engine options for every run
 *
 * @example
 * ```typescript
 * const runner = createRunner(
 *   withEngineOptions({ maxSteps: 500, failOnStepLimit: true })
 * );
 * ```
 */
export function withEngineOptions(options: Omit<IEngineOptions, 'logger'>): RunnerOperator {
  return definition => ({
    ...definition,
    engineOptions: {
      ...definition.engineOptions,
      ...options,
    },
  });
}

/**
 * Logger used by the engines and the runner.
 * Loaded graphs log through it as well.
 */
export function withLogger(logger: ILogger): RunnerOperator {
  return definition => ({
    ...definition,
    engineOptions: {
      ...definition.engineOptions,
      logger,
    },
    graphOptions: {
      ...definition.graphOptions,
      logger,
    },
  });
}

/**
 * Registers the node types loadGraph() rebuilds nodes from
 */
export function withRegistry(registry: INodeRegistry): RunnerOperator {
  return definition => ({
    ...definition,
    registry,
  });
}

/**
 * Options for graphs created by loadGraph(), such as type rules
 */
export function withGraphOptions(options: RestoreOptions): RunnerOperator {
  return definition => ({
    ...definition,
    graphOptions: {
      ...definition.graphOptions,
      ...options,
    },
  });
}

/**
 * Registers a persistence provider for saveGraph() and loadGraph()
 *
 * @example
 * ```typescript
 * const runner = createRunner(
 *   withRegistry(registry),
 *   withPersistence(new MemoryStateProvider())
 * );
 * await runner.saveGraph(graph, 'pipeline-1');
 * ```
 * @category Providers
 */
export function withPersistence(provider: IPersistenceProvider): RunnerOperator {
  return definition => ({
    ...definition,
    providers: {
      ...definition.providers,
      persistence: provider,
    },
  });
}
