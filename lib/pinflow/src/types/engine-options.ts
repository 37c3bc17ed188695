import type { ILogger } from './logger';

/**
 * Options shared by both execution engines
 */
export interface IEngineOptions {
  /**
   * Main logger. Defaults to LoggerManager's logger.
   */
  logger?: ILogger;

  /**
   * Maximum node evaluations in one control-flow run
   */
  maxSteps?: number;

  /**
   * Maximum evaluations of a single node in one control-flow run
   */
  maxVisitsPerNode?: number;

  /**
   * Throw StepLimitExceededError instead of stopping with stepLimitReached
   */
  failOnStepLimit?: boolean;

  /**
   * Suppress error logging for node faults
   */
  silentErrors?: boolean;
}

export const DEFAULT_ENGINE_OPTIONS = {
  maxSteps: 10_000,
  maxVisitsPerNode: 1_000,
  failOnStepLimit: false,
  silentErrors: false,
} as const satisfies Required<Omit<IEngineOptions, 'logger'>>;
