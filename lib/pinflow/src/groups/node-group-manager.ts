import type { Point, Rect, Size } from '../types/geometry';
import type { ILogger } from '../types/logger';
import { LoggerManager } from '../utils/logging/logger-manager';
import type { Node } from '../model/node';
import { NodeGroup } from '../model/node-group';
import type { NodeGraph } from '../model/node-graph';
import {
  boundingRect,
  clampPosition,
  containsRect,
  expandToInclude,
  inflate,
  intersects,
  rectAt,
  translate,
} from './geometry';

export const DEFAULT_NODE_SIZE: Size = { width: 120, height: 60 };

/**
 * Padding used when a single node grows a group
 */
export const NODE_PADDING = 8;

/**
 * Padding used when a group is fitted around its members
 */
export const GROUP_PADDING = 16;

export interface NodeGroupManagerOptions {
  /**
   * Node size used for bounds computation; falls back to defaultNodeSize
   */
  readonly measureNode?: (node: Node) => Size;
  readonly defaultNodeSize?: Size;
  readonly logger?: ILogger;
}

export interface MoveGroupOptions {
  /**
   * Shift member node positions too. Default false.
   */
  readonly cascadeNodes?: boolean;
  /**
   * Shift child groups too. Default true.
   */
  readonly cascadeChildren?: boolean;
}

/**
 * Spatial bookkeeping for the group forest of a graph.
 *
 * Membership edits go through the graph so its change stream sees them;
 * bounds are plain rectangle arithmetic over node positions and measured sizes.
 */
export class NodeGroupManager {
  private readonly measure: (node: Node) => Size;
  private readonly logger: ILogger;

  constructor(
    private readonly graph: NodeGraph,
    options: NodeGroupManagerOptions = {}
  ) {
    const fallback = options.defaultNodeSize ?? DEFAULT_NODE_SIZE;
    this.measure = options.measureNode ?? (() => fallback);
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
  }

  get groups(): readonly NodeGroup[] {
    return this.graph.groups;
  }

  /**
   * Creates a group under parent, or as a root group of the graph.
   * A parent unknown to the graph is registered as a root first.
   */
  createGroup(name: string, bounds: Rect, parent?: NodeGroup): NodeGroup {
    const group = new NodeGroup(name, bounds);
    this.graph.reparentGroup(group, parent ?? null);
    this.logger.debug(`Group created: ${group.id} (${name})`);
    return group;
  }

  /**
   * Creates a group wrapping the given nodes with padding
   */
  createGroupFromNodes(
    name: string,
    nodes: Iterable<Node>,
    padding = GROUP_PADDING,
    parent?: NodeGroup
  ): NodeGroup {
    const members = [...new Set(nodes)];
    const group = this.createGroup(name, this.calculateBoundsForNodes(members, padding), parent);
    for (const node of members) {
      this.addNodeToGroup(node, group, false);
    }
    this.updateGroupBoundsToFit(group, padding);
    return group;
  }

  /**
   * Deletes a group with all nested groups. Member nodes are detached, not removed.
   */
  deleteGroup(group: NodeGroup): void {
    for (const child of [...group.children]) {
      this.deleteGroup(child);
    }
    for (const node of [...group.nodes]) {
      this.removeNodeFromGroup(node, group);
    }

    if (!this.graph.removeGroup(group)) {
      group.parent?.removeChild(group);
    }
    this.logger.debug(`Group deleted: ${group.id}`);
  }

  addNodeToGroup(node: Node, group: NodeGroup, adjustBounds = true): boolean {
    this.graph.moveNodeToGroup(node, group);
    if (adjustBounds) {
      this.expandBoundsToIncludeNode(group, node, NODE_PADDING);
    }
    return true;
  }

  /**
   * @returns false if the node is not a direct member of the group
   */
  removeNodeFromGroup(node: Node, group: NodeGroup): boolean {
    if (node.group !== group) {
      return false;
    }
    this.graph.moveNodeToGroup(node, null);
    return true;
  }

  moveGroup(group: NodeGroup, dx: number, dy: number, options: MoveGroupOptions = {}): void {
    const { cascadeNodes = false, cascadeChildren = true } = options;

    group.bounds = translate(group.bounds, dx, dy);
    if (cascadeNodes) {
      for (const node of group.nodes) {
        node.position = { x: node.position.x + dx, y: node.position.y + dy };
      }
    }
    if (cascadeChildren) {
      for (const child of group.children) {
        this.moveGroup(child, dx, dy, { cascadeNodes, cascadeChildren: true });
      }
    }
  }

  /**
   * Refits bounds around the group's nodes and those of nested groups.
   * A group with no nodes keeps its bounds.
   */
  updateGroupBoundsToFit(group: NodeGroup, padding = GROUP_PADDING): void {
    const nodes = group.getAllNodesRecursive();
    if (nodes.length === 0) {
      return;
    }
    group.bounds = this.calculateBoundsForNodes(nodes, padding);
  }

  /**
   * True if the node's rectangle lies inside the group bounds grown by tolerance
   */
  validateNodeInsideBounds(group: NodeGroup, node: Node, tolerance = 0): boolean {
    const area = inflate(group.bounds, tolerance);
    const nodeRect = this.getNodeRect(node);
    return intersects(area, nodeRect) && containsRect(area, nodeRect);
  }

  /**
   * Grows the group bounds to cover the node plus padding; never shrinks
   */
  expandBoundsToIncludeNode(group: NodeGroup, node: Node, padding = NODE_PADDING): void {
    group.bounds = expandToInclude(group.bounds, this.getNodeRect(node), padding);
  }

  calculateBoundsForNodes(nodes: Iterable<Node>, padding = GROUP_PADDING): Rect {
    return boundingRect(
      [...nodes].map(node => this.getNodeRect(node)),
      padding
    );
  }

  /**
   * Resolves where a node may be placed inside a group.
   * With dynamicExpand the group grows to fit the desired position, which is
   * returned unchanged; otherwise the position is clamped into the bounds.
   */
  constrainOrExpandNodePosition(
    node: Node,
    group: NodeGroup,
    desired: Point,
    dynamicExpand = true,
    padding = NODE_PADDING
  ): Point {
    const size = this.measure(node);
    const desiredRect = rectAt(desired, size);
    if (containsRect(group.bounds, desiredRect)) {
      return desired;
    }

    if (dynamicExpand) {
      group.bounds = expandToInclude(group.bounds, desiredRect, padding);
      return desired;
    }
    return clampPosition(desired, size, group.bounds);
  }

  private getNodeRect(node: Node): Rect {
    return rectAt(node.position, this.measure(node));
  }
}
