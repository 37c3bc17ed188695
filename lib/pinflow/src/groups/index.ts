export {
  NodeGroupManager,
  DEFAULT_NODE_SIZE,
  GROUP_PADDING,
  NODE_PADDING,
} from './node-group-manager';
export type { MoveGroupOptions, NodeGroupManagerOptions } from './node-group-manager';
export * from './geometry';
