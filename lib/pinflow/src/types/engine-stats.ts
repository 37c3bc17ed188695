/**
 * Counters collected by a runner since creation
 */
export interface RunnerStats {
  /**
   * Runs started, including those that failed a precondition
   */
  runs: number;
  completedRuns: number;
  cancelledRuns: number;
  failedRuns: number;

  /**
   * Node evaluations across all runs
   */
  nodeEvaluations: number;

  /**
   * Node faults across all runs
   */
  errorCount: number;

  /**
   * Graph ids with a run in flight
   */
  activeRuns: readonly string[];
}
