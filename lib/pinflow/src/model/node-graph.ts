import { Observable, Subject } from 'rxjs';
import { NodeGraphCategory } from '../types/graph-category';
import type { GraphChange } from '../types/graph-change';
import type { ILogger } from '../types/logger';
import { PinDirection } from '../types/pin-direction';
import { generateId } from '../utils/id';
import { LoggerManager } from '../utils/logging/logger-manager';
import { Connection } from './connection';
import type { Node } from './node';
import type { NodeGroup, RootGroupOwner } from './node-group';
import type { ConnectionPolicy, Pin } from './pin';
import { DEFAULT_TYPE_RULES, TypeRules } from './type-rules';

/**
 * Per-graph configuration
 */
export interface GraphOptions {
  readonly id?: string;
  readonly name?: string;
  readonly category?: NodeGraphCategory;

  /**
   * Connecting to an already connected input replaces the old connection
   * instead of failing. Default true.
   */
  readonly replaceInputConnectionOnNew?: boolean;

  /**
   * Data type compatibility rules. Defaults to exact match plus `any`.
   */
  readonly typeRules?: TypeRules;

  /**
   * Logger for structural diagnostics. Defaults to LoggerManager's logger.
   */
  readonly logger?: ILogger;
}

/**
 * ControlFlow entry candidate: no flow inputs, at least one flow output
 */
export function isControlFlowEntry(node: Node): boolean {
  return !node.inputPins.some(pin => pin.isFlowPin) && node.outputPins.some(pin => pin.isFlowPin);
}

/**
 * DataFlow sink candidate: at least one data input, no data outputs
 */
export function isDataFlowSink(node: Node): boolean {
  return node.inputPins.some(pin => !pin.isFlowPin) && !node.outputPins.some(pin => !pin.isFlowPin);
}

/**
 * Aggregate root of the model. Sole owner of nodes, connections and groups.
 *
 * Structural failures (incompatible pins, unknown members) are reported by
 * return values and never thrown.
 */
export class NodeGraph implements RootGroupOwner {
  public readonly id: string;
  public name: string;
  public category: NodeGraphCategory;

  private mainId: string | undefined;
  private readonly nodeSet = new Set<Node>();
  private readonly connectionSet = new Set<Connection>();
  private readonly rootGroups: NodeGroup[] = [];
  private readonly changesSubject = new Subject<GraphChange>();
  private readonly options: GraphOptions;

  /**
   * Structural edits, emitted after they are applied
   */
  public readonly changes$: Observable<GraphChange> = this.changesSubject.asObservable();

  constructor(options: GraphOptions = {}) {
    this.options = options;
    this.id = options.id ?? generateId();
    this.name = options.name ?? '';
    this.category = options.category ?? NodeGraphCategory.CONTROL_FLOW;
  }

  get nodes(): readonly Node[] {
    return [...this.nodeSet];
  }

  /**
   * Connections in registration order
   */
  get connections(): readonly Connection[] {
    return [...this.connectionSet];
  }

  get groups(): readonly NodeGroup[] {
    return this.rootGroups;
  }

  get typeRules(): TypeRules {
    return this.options.typeRules ?? DEFAULT_TYPE_RULES;
  }

  get connectionPolicy(): ConnectionPolicy {
    return {
      replaceInputConnection: this.options.replaceInputConnectionOnNew ?? true,
      typeRules: this.typeRules,
    };
  }

  private get logger(): ILogger {
    return this.options.logger ?? LoggerManager.getInstance().getLogger();
  }

  // ---------------------------------------------------------------------------
  // Main node
  // ---------------------------------------------------------------------------

  get mainNodeId(): string | undefined {
    return this.mainId;
  }

  get mainNode(): Node | undefined {
    return this.mainId === undefined ? undefined : this.findNode(this.mainId);
  }

  /**
   * Designates the main node (entry for ControlFlow, sink for DataFlow).
   * Candidacy is checked by the engines at run time, not here.
   * @returns false if the node is not a member of this graph
   */
  setMainNode(node: Node | string | undefined): boolean {
    if (node === undefined) {
      this.updateMainId(undefined);
      return true;
    }

    const member = typeof node === 'string' ? this.findNode(node) : node;
    if (!member || !this.nodeSet.has(member)) {
      this.logger.debug(`Main node rejected: ${typeof node === 'string' ? node : node.id} is not in graph ${this.id}`);
      return false;
    }

    this.updateMainId(member.id);
    return true;
  }

  /**
   * Nodes eligible as main node for the current category.
   * Recomputed on every call since it depends on current pins.
   */
  getCandidateMainNodes(): Node[] {
    const predicate = this.category === NodeGraphCategory.CONTROL_FLOW ? isControlFlowEntry : isDataFlowSink;
    return this.nodes.filter(predicate);
  }

  isMainNodeCandidate(node: Node): boolean {
    return this.category === NodeGraphCategory.CONTROL_FLOW ? isControlFlowEntry(node) : isDataFlowSink(node);
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  hasNode(node: Node): boolean {
    return this.nodeSet.has(node);
  }

  findNode(id: string): Node | undefined {
    for (const node of this.nodeSet) {
      if (node.id === id) {
        return node;
      }
    }
    return undefined;
  }

  /**
   * Adds a node. No-op if already present.
   */
  addNode(node: Node): void {
    if (this.nodeSet.has(node)) {
      return;
    }
    this.nodeSet.add(node);
    this.emit({ type: 'nodeAdded', node });
  }

  /**
   * Removes a node together with its connections and group membership
   * @returns false if the node was not in the graph
   */
  removeNode(node: Node): boolean {
    if (!this.nodeSet.has(node)) {
      return false;
    }

    const related = this.connections.filter(
      connection => connection.sourcePin?.parentNode === node || connection.targetPin?.parentNode === node
    );
    for (const connection of related) {
      this.removeConnection(connection);
    }

    if (node.group) {
      node.group.removeNode(node);
      this.emit({ type: 'nodeGroupChanged', node, group: undefined });
    }

    this.nodeSet.delete(node);
    if (this.mainId === node.id) {
      this.updateMainId(undefined);
    }

    this.emit({ type: 'nodeRemoved', node });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Connections
  // ---------------------------------------------------------------------------

  /**
   * Connects an output pin to an input pin.
   * Owning nodes not yet in the graph are added on success.
   * @returns the new connection, or undefined if the pins are incompatible
   */
  connect(source: Pin, target: Pin): Connection | undefined {
    const sourceNode = source.parentNode;
    const targetNode = target.parentNode;
    if (!sourceNode || !targetNode) {
      this.logger.debug(`Connect rejected: pin without parent node (${source.id} -> ${target.id})`);
      return undefined;
    }

    if (source.direction !== PinDirection.OUTPUT || target.direction !== PinDirection.INPUT) {
      this.logger.debug(`Connect rejected: ${source} -> ${target} is not output -> input`);
      return undefined;
    }

    const policy = this.connectionPolicy;
    if (!source.canConnectTo(target, policy)) {
      this.logger.debug(`Connect rejected: ${source} is not compatible with ${target}`);
      return undefined;
    }

    this.addNode(sourceNode);
    this.addNode(targetNode);

    // canConnectTo only lets a connected input through when replacement is allowed
    for (const existing of [...target.connections]) {
      if (!this.removeConnection(existing)) {
        // Held by another graph
        existing.disconnect();
      }
    }

    const connection = Connection.create(source, target);
    this.connectionSet.add(connection);
    this.emit({ type: 'connectionAdded', connection });
    return connection;
  }

  /**
   * Registers an existing connection as is, resolved or not.
   * Used when loading; prefer connect() for edits.
   */
  addConnection(connection: Connection): void {
    if (this.connectionSet.has(connection)) {
      return;
    }
    this.connectionSet.add(connection);
    this.emit({ type: 'connectionAdded', connection });
  }

  /**
   * Disconnects both ends and removes the connection
   * @returns false if the connection was not in the graph
   */
  removeConnection(connection: Connection): boolean {
    if (!this.connectionSet.has(connection)) {
      return false;
    }
    connection.disconnect();
    this.connectionSet.delete(connection);
    this.emit({ type: 'connectionRemoved', connection });
    return true;
  }

  /**
   * Connections leaving an output pin, in registration order
   */
  getOutgoingConnections(pin: Pin): Connection[] {
    return this.connections.filter(connection => connection.sourcePin === pin);
  }

  getIncomingConnection(pin: Pin): Connection | undefined {
    return this.connections.find(connection => connection.targetPin === pin);
  }

  // ---------------------------------------------------------------------------
  // Groups
  // ---------------------------------------------------------------------------

  /**
   * Registers a root group. No-op if the group is already anywhere in the forest.
   */
  addGroup(group: NodeGroup): void {
    if (this.containsGroup(group)) {
      return;
    }
    group.parent?.removeChild(group);
    this.rootGroups.push(group);
    group.attachRoot(this);
    this.emit({ type: 'groupAdded', group });
  }

  /**
   * Takes a group out of the forest, from the root list or from its parent.
   * Member nodes and children keep their relations.
   * @returns false if the group is not in this graph
   */
  removeGroup(group: NodeGroup): boolean {
    const index = this.rootGroups.indexOf(group);
    if (index >= 0) {
      this.rootGroups.splice(index, 1);
      group.detachRoot(this);
    } else if (group.parent && this.containsGroup(group)) {
      group.parent.removeChild(group);
    } else {
      return false;
    }
    this.emit({ type: 'groupRemoved', group });
    return true;
  }

  /**
   * Moves a group under parent, or to the root list with null.
   * A parent unknown to the graph is first registered as a root group.
   * @returns false if parent is the group itself or one of its descendants
   */
  reparentGroup(group: NodeGroup, parent: NodeGroup | null): boolean {
    if (parent && (parent === group || parent.isDescendantOf(group))) {
      this.logger.debug(`Group move rejected: ${parent.id} is ${group.id} or nested in it`);
      return false;
    }

    const known = this.containsGroup(group);
    const wasRoot = this.rootGroups.includes(group);

    if (parent) {
      if (!this.containsGroup(parent)) {
        this.addGroup(parent);
      }
      if (group.parent === parent) {
        return true;
      }
      // A root group is released through releaseRootGroup(), which reports the move
      parent.addChild(group);
      if (!wasRoot) {
        this.emit(known ? { type: 'groupMoved', group, parent } : { type: 'groupAdded', group });
      }
      return true;
    }

    if (wasRoot) {
      return true;
    }
    if (!known) {
      this.addGroup(group);
      return true;
    }
    group.parent?.removeChild(group);
    this.rootGroups.push(group);
    group.attachRoot(this);
    this.emit({ type: 'groupMoved', group, parent: undefined });
    return true;
  }

  /**
   * @internal
   * Called by a root group that gained a parent or was claimed by another graph
   */
  releaseRootGroup(group: NodeGroup): void {
    const index = this.rootGroups.indexOf(group);
    if (index < 0) {
      return;
    }
    this.rootGroups.splice(index, 1);
    this.emit(
      this.containsGroup(group)
        ? { type: 'groupMoved', group, parent: group.parent }
        : { type: 'groupRemoved', group }
    );
  }

  /**
   * Moves a node into a group, or out of any group with null.
   * A group unknown to the graph is first registered as a root group.
   */
  moveNodeToGroup(node: Node, group: NodeGroup | null): void {
    if (group && !this.containsGroup(group)) {
      this.addGroup(group);
    }
    if (node.group === (group ?? undefined)) {
      return;
    }
    node.setGroup(group ?? undefined);
    this.emit({ type: 'nodeGroupChanged', node, group: group ?? undefined });
  }

  /**
   * Root groups and all nested groups, pre-order
   */
  getAllGroupsRecursive(): NodeGroup[] {
    return this.rootGroups.flatMap(group => [group, ...group.getDescendants()]);
  }

  containsGroup(group: NodeGroup): boolean {
    return this.getAllGroupsRecursive().includes(group);
  }

  // ---------------------------------------------------------------------------
  // Consistency
  // ---------------------------------------------------------------------------

  findPin(id: string): Pin | undefined {
    return this.buildPinIndex().get(id);
  }

  /**
   * Rebuilds runtime references from stored ids after loading:
   * pin → node, node → group (by groupId), connection → pins (by pin ids).
   * Unknown ids leave the reference unset.
   */
  onDeserialized(): void {
    for (const node of this.nodeSet) {
      node.onDeserialized();
    }

    const groupIndex = new Map(this.getAllGroupsRecursive().map(group => [group.id, group]));
    for (const node of this.nodeSet) {
      const groupId = node.groupId;
      const group = groupId === undefined ? undefined : groupIndex.get(groupId);
      if (groupId !== undefined && !group) {
        this.logger.debug(`Relink: group ${groupId} of node ${node.id} not found`);
      }
      node.setGroup(group);
    }

    const pinIndex = this.buildPinIndex();
    for (const connection of this.connectionSet) {
      connection.resolve(pinIndex);
      if (!connection.isResolved) {
        this.logger.debug(`Relink: connection ${connection.id} left unresolved`);
      }
    }

    if (this.mainId !== undefined && !this.findNode(this.mainId)) {
      this.logger.debug(`Relink: main node ${this.mainId} not found`);
    }
  }

  /**
   * @internal
   * Restores the stored main node id without membership checks
   */
  restoreMainNodeId(id: string | undefined): void {
    this.mainId = id;
  }

  /**
   * True if every connection is resolved and compatible
   */
  validate(): boolean {
    return this.connections.every(connection => connection.isValid(this.typeRules));
  }

  private buildPinIndex(): Map<string, Pin> {
    const index = new Map<string, Pin>();
    for (const node of this.nodeSet) {
      for (const pin of [...node.inputPins, ...node.outputPins]) {
        index.set(pin.id, pin);
      }
    }
    return index;
  }

  private updateMainId(id: string | undefined): void {
    if (this.mainId === id) {
      return;
    }
    this.mainId = id;
    this.emit({ type: 'mainNodeChanged', mainNodeId: id });
  }

  private emit(change: GraphChange): void {
    this.changesSubject.next(change);
  }
}
