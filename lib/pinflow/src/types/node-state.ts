/**
 * Execution state of a node, updated by the node around each evaluation step
 */
export enum NodeState {
  NORMAL = 'normal',
  EXECUTING = 'executing',
  SUCCESS = 'success',
  ERROR = 'error',
}
