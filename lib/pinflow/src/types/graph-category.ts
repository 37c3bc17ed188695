/**
 * Execution discipline of a graph. Selects the engine that interprets it.
 */
export enum NodeGraphCategory {
  /**
   * Sequencing, branching and loops driven by flow pins
   */
  CONTROL_FLOW = 'ControlFlow',

  /**
   * Evaluation ordered by data dependencies between data pins
   */
  DATA_FLOW = 'DataFlow',
}

/**
 * Checks that a raw value names a known category
 */
export function isNodeGraphCategory(value: unknown): value is NodeGraphCategory {
  return value === NodeGraphCategory.CONTROL_FLOW || value === NodeGraphCategory.DATA_FLOW;
}
