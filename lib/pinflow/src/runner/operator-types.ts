import type { INodeRegistry } from '../engine/registry';
import type { IPersistenceProvider } from '../providers/interfaces/persistence';
import type { IEngineOptions } from '../types/engine-options';
import type { RestoreOptions } from '../serialization/snapshot';

/**
 * Provider registry for IoC pattern
 * @category Providers
 */
export interface ProviderRegistry {
  readonly persistence?: IPersistenceProvider;
}

/**
 * Immutable configuration a GraphRunner is built from
 */
export interface RunnerDefinition {
  readonly engineOptions: Readonly<IEngineOptions>;

  /**
   * Node types used to rebuild loaded graphs
   */
  readonly registry?: INodeRegistry;

  /**
   * Options applied to graphs the runner loads
   */
  readonly graphOptions: RestoreOptions;
  readonly providers: ProviderRegistry;
}

/**
 * Runner operator function.
 * Transforms a runner definition, adding providers or modifying configuration
 */
export interface RunnerOperator {
  (definition: RunnerDefinition): RunnerDefinition;
}
