import type { Connection } from '../model/connection';
import type { Node } from '../model/node';
import type { NodeGroup } from '../model/node-group';

/**
 * Structural edit published by NodeGraph.changes$
 */
export type GraphChange =
  | { readonly type: 'nodeAdded'; readonly node: Node }
  | { readonly type: 'nodeRemoved'; readonly node: Node }
  | { readonly type: 'connectionAdded'; readonly connection: Connection }
  | { readonly type: 'connectionRemoved'; readonly connection: Connection }
  | { readonly type: 'groupAdded'; readonly group: NodeGroup }
  | { readonly type: 'groupRemoved'; readonly group: NodeGroup }
  | {
      readonly type: 'groupMoved';
      readonly group: NodeGroup;
      readonly parent: NodeGroup | undefined;
    }
  | {
      readonly type: 'nodeGroupChanged';
      readonly node: Node;
      readonly group: NodeGroup | undefined;
    }
  | { readonly type: 'mainNodeChanged'; readonly mainNodeId: string | undefined };

export type GraphChangeType = GraphChange['type'];
