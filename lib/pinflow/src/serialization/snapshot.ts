import { Connection } from '../model/connection';
import type { Node } from '../model/node';
import { GraphOptions, NodeGraph } from '../model/node-graph';
import { NodeGroup } from '../model/node-group';
import type { Pin } from '../model/pin';
import type { INodeRegistry } from '../engine/registry';
import type { Point, Rect } from '../types/geometry';
import type { NodeGraphCategory } from '../types/graph-category';
import type { PinDirection } from '../types/pin-direction';
import type { Serializable } from '../types/utils';
import { getErrorMessage } from '../utils/errors';

export interface PinSnapshot {
  readonly id: string;
  readonly name: string;
  readonly direction: PinDirection;
  readonly dataType: string;
  readonly isFlowPin: boolean;
  /**
   * Current value of a data pin; left out for flow pins and non-JSON values
   */
  readonly value?: Serializable;
}

export interface NodeSnapshot {
  readonly id: string;
  readonly type: string;
  readonly name: string;
  readonly position: Point;
  readonly isEnabled: boolean;
  readonly groupId?: string;
  readonly inputs: readonly PinSnapshot[];
  readonly outputs: readonly PinSnapshot[];
}

export interface ConnectionSnapshot {
  readonly id: string;
  readonly sourcePinId: string;
  readonly targetPinId: string;
}

export interface GroupSnapshot {
  readonly id: string;
  readonly name: string;
  readonly bounds: Rect;
  readonly parentId?: string;
  readonly nodeIds: readonly string[];
}

/**
 * Identifier-keyed persisted form of a graph. References between parts
 * are ids only; NodeGraph.onDeserialized() turns them back into links.
 */
export interface GraphSnapshot {
  readonly id: string;
  readonly name: string;
  readonly category: NodeGraphCategory;
  readonly mainNodeId?: string;
  readonly nodes: readonly NodeSnapshot[];
  readonly connections: readonly ConnectionSnapshot[];
  /**
   * Every group of the forest, pre-order
   */
  readonly groups: readonly GroupSnapshot[];
}

export function isSerializable(value: unknown): value is Serializable {
  if (value === null || value === undefined) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isSerializable);
      }
      if (Object.getPrototypeOf(value) !== Object.prototype) {
        return false;
      }
      return Object.values(value).every(isSerializable);
    default:
      return false;
  }
}

function snapshotPin(pin: Pin): PinSnapshot {
  const base = {
    id: pin.id,
    name: pin.name,
    direction: pin.direction,
    dataType: pin.dataType,
    isFlowPin: pin.isFlowPin,
  };
  const value = pin.value;
  if (pin.isFlowPin || value === undefined || !isSerializable(value)) {
    return base;
  }
  return { ...base, value };
}

function snapshotNode(node: Node): NodeSnapshot {
  return {
    id: node.id,
    type: node.type,
    name: node.name,
    position: { x: node.position.x, y: node.position.y },
    isEnabled: node.isEnabled,
    ...(node.groupId !== undefined ? { groupId: node.groupId } : {}),
    inputs: node.inputPins.map(snapshotPin),
    outputs: node.outputPins.map(snapshotPin),
  };
}

function snapshotGroup(group: NodeGroup): GroupSnapshot {
  return {
    id: group.id,
    name: group.name,
    bounds: { ...group.bounds },
    ...(group.parent ? { parentId: group.parent.id } : {}),
    nodeIds: [...group.nodes].map(node => node.id),
  };
}

/**
 * Captures the graph as plain data
 */
export function snapshotGraph(graph: NodeGraph): GraphSnapshot {
  return {
    id: graph.id,
    name: graph.name,
    category: graph.category,
    ...(graph.mainNodeId !== undefined ? { mainNodeId: graph.mainNodeId } : {}),
    nodes: graph.nodes.map(snapshotNode),
    connections: graph.connections.map(connection => ({
      id: connection.id,
      sourcePinId: connection.sourcePinId,
      targetPinId: connection.targetPinId,
    })),
    groups: graph.getAllGroupsRecursive().map(snapshotGroup),
  };
}

export interface RestoreResult {
  readonly graph: NodeGraph;
  /**
   * Parts that could not be restored as stored (unknown types, pins, dangling ids)
   */
  readonly warnings: readonly string[];
}

/**
 * Graph options applied to the restored graph; identity comes from the snapshot
 */
export type RestoreOptions = Omit<GraphOptions, 'id' | 'name' | 'category'>;

function restorePins(node: Node, pins: readonly Pin[], stored: readonly PinSnapshot[], warnings: string[]): void {
  for (const snapshot of stored) {
    const pin = pins.find(candidate => candidate.name === snapshot.name && candidate.isFlowPin === snapshot.isFlowPin);
    if (!pin) {
      warnings.push(`Node ${node.id} (${node.type}) has no ${snapshot.direction} pin '${snapshot.name}'`);
      continue;
    }
    pin.id = snapshot.id;
    pin.dataType = snapshot.dataType;
    if (!pin.isFlowPin && snapshot.value !== undefined) {
      pin.value = snapshot.value;
    }
  }
}

function restoreGroups(graph: NodeGraph, stored: readonly GroupSnapshot[], warnings: string[]): void {
  const groups = new Map(stored.map(snapshot => [snapshot.id, new NodeGroup(snapshot.name, snapshot.bounds, snapshot.id)]));
  const roots: NodeGroup[] = [];

  for (const snapshot of stored) {
    const group = groups.get(snapshot.id);
    if (!group) {
      continue;
    }
    const parent = snapshot.parentId === undefined ? undefined : groups.get(snapshot.parentId);
    if (snapshot.parentId !== undefined && !parent) {
      warnings.push(`Group ${snapshot.id}: parent group ${snapshot.parentId} not found`);
    }
    if (parent && !parent.addChild(group)) {
      warnings.push(`Group ${snapshot.id}: parent ${parent.id} would create a cycle`);
      roots.push(group);
    } else if (!parent) {
      roots.push(group);
    }
  }

  for (const root of roots) {
    graph.addGroup(root);
  }
}

/**
 * Rebuilds a graph from a snapshot.
 *
 * Nodes are constructed through the registry and receive the stored ids and
 * values on pins matched by name. Connections are registered from pin ids and
 * resolved by onDeserialized(); ids that match nothing stay unresolved.
 */
export function restoreGraph(
  snapshot: GraphSnapshot,
  registry: INodeRegistry,
  options: RestoreOptions = {}
): RestoreResult {
  const warnings: string[] = [];
  const graph = new NodeGraph({
    ...options,
    id: snapshot.id,
    name: snapshot.name,
    category: snapshot.category,
  });

  restoreGroups(graph, snapshot.groups, warnings);

  for (const stored of snapshot.nodes) {
    let node: Node;
    try {
      node = registry.create(stored.type);
    } catch (error) {
      warnings.push(`Node ${stored.id} skipped: ${getErrorMessage(error)}`);
      continue;
    }

    node.id = stored.id;
    node.name = stored.name;
    node.position = { x: stored.position.x, y: stored.position.y };
    node.isEnabled = stored.isEnabled;
    node.groupId = stored.groupId;
    restorePins(node, node.inputPins, stored.inputs, warnings);
    restorePins(node, node.outputPins, stored.outputs, warnings);
    graph.addNode(node);
  }

  for (const stored of snapshot.connections) {
    graph.addConnection(Connection.fromIds(stored.sourcePinId, stored.targetPinId, stored.id));
  }

  graph.restoreMainNodeId(snapshot.mainNodeId);
  graph.onDeserialized();

  for (const connection of graph.connections) {
    if (!connection.isResolved) {
      warnings.push(`Connection ${connection.id} is unresolved`);
    }
  }
  if (snapshot.mainNodeId !== undefined && !graph.mainNode) {
    warnings.push(`Main node ${snapshot.mainNodeId} not found`);
  }

  return { graph, warnings };
}
