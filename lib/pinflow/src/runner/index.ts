export { createRunner, GraphRunner } from './runner';
export {
  withEngineOptions,
  withGraphOptions,
  withLogger,
  withPersistence,
  withRegistry,
} from './operators';
export type { ProviderRegistry, RunnerDefinition, RunnerOperator } from './operator-types';
