import type { Rect } from '../types/geometry';
import { generateId } from '../utils/id';
import type { Node } from './node';

export const EMPTY_RECT: Rect = { x: 0, y: 0, width: 0, height: 0 };

/**
 * @internal
 * Holder of a group's root registration, told when the group stops being a root
 */
export interface RootGroupOwner {
  releaseRootGroup(group: NodeGroup): void;
}

/**
 * Hierarchical, non-owning cluster of nodes and child groups.
 * Groups form a forest: a group has at most one parent and can never
 * become a descendant of itself.
 */
export class NodeGroup {
  public id: string;
  public name: string;
  public bounds: Rect;

  private parentRef: NodeGroup | undefined;
  private readonly childList: NodeGroup[] = [];
  private readonly members = new Set<Node>();
  private rootOwner: RootGroupOwner | undefined;

  constructor(name = '', bounds: Rect = EMPTY_RECT, id: string = generateId()) {
    this.id = id;
    this.name = name;
    this.bounds = bounds;
  }

  get parent(): NodeGroup | undefined {
    return this.parentRef;
  }

  get children(): readonly NodeGroup[] {
    return this.childList;
  }

  get nodes(): ReadonlySet<Node> {
    return this.members;
  }

  /**
   * Moves the node into this group, taking it out of any other group
   */
  addNode(node: Node): void {
    node.setGroup(this);
  }

  removeNode(node: Node): boolean {
    if (node.group !== this) {
      return false;
    }
    node.setGroup(undefined);
    return true;
  }

  /**
   * Adds a child group, detaching it from its previous parent or from the
   * graph that holds it as a root.
   * @returns false if the group is this group or one of its ancestors
   */
  addChild(group: NodeGroup): boolean {
    if (group === this || this.isDescendantOf(group)) {
      return false;
    }
    if (group.parentRef === this) {
      return true;
    }

    group.parentRef?.removeChild(group);
    this.childList.push(group);
    group.parentRef = this;

    const owner = group.rootOwner;
    group.rootOwner = undefined;
    owner?.releaseRootGroup(group);
    return true;
  }

  removeChild(group: NodeGroup): boolean {
    const index = this.childList.indexOf(group);
    if (index < 0) {
      return false;
    }
    this.childList.splice(index, 1);
    group.parentRef = undefined;
    return true;
  }

  /**
   * True if ancestor is a (transitive) parent of this group
   */
  isDescendantOf(ancestor: NodeGroup): boolean {
    for (let current = this.parentRef; current; current = current.parentRef) {
      if (current === ancestor) {
        return true;
      }
    }
    return false;
  }

  /**
   * All nested groups in pre-order, excluding this group
   */
  getDescendants(): NodeGroup[] {
    return this.childList.flatMap(child => [child, ...child.getDescendants()]);
  }

  /**
   * Member nodes of this group and of every nested group
   */
  getAllNodesRecursive(): Node[] {
    return [...this.members, ...this.childList.flatMap(child => child.getAllNodesRecursive())];
  }

  containsNodeRecursive(node: Node): boolean {
    return this.members.has(node) || this.childList.some(child => child.containsNodeRecursive(node));
  }

  /**
   * @internal
   * Records the graph holding this group as a root, releasing any previous holder
   */
  attachRoot(owner: RootGroupOwner): void {
    const previous = this.rootOwner;
    this.rootOwner = owner;
    if (previous && previous !== owner) {
      previous.releaseRootGroup(this);
    }
  }

  /**
   * @internal
   */
  detachRoot(owner: RootGroupOwner): void {
    if (this.rootOwner === owner) {
      this.rootOwner = undefined;
    }
  }

  /**
   * @internal
   * Membership bookkeeping driven by Node.setGroup()
   */
  trackMember(node: Node, present: boolean): void {
    if (present) {
      this.members.add(node);
    } else {
      this.members.delete(node);
    }
  }
}
