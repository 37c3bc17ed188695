/**
 * JSON codec for graph snapshots.
 *
 * Malformed input is reported through `errors` and never thrown; a graph is
 * only returned when the file is structurally sound.
 */

import type { INodeRegistry } from '../engine/registry';
import type { NodeGraph } from '../model/node-graph';
import type { Point, Rect } from '../types/geometry';
import { isNodeGraphCategory } from '../types/graph-category';
import { isPinDirection } from '../types/pin-direction';
import { getErrorMessage } from '../utils/errors';
import {
  ConnectionSnapshot,
  GraphSnapshot,
  GroupSnapshot,
  NodeSnapshot,
  PinSnapshot,
  RestoreOptions,
  isSerializable,
  restoreGraph,
  snapshotGraph,
} from './snapshot';

export const GRAPH_FILE_FORMAT = 'pinflow-graph';
export const GRAPH_FILE_VERSION = 1;

export interface SerializedGraphFile {
  readonly format: typeof GRAPH_FILE_FORMAT;
  readonly formatVersion: typeof GRAPH_FILE_VERSION;
  readonly graph: GraphSnapshot;
}

export interface DeserializationResult {
  graph: NodeGraph | null;
  errors: string[];
  warnings: string[];
}

/**
 * Serializes a graph to a JSON string
 * @param pretty - Whether to pretty-print the JSON (default: true)
 */
export function serializeGraph(graph: NodeGraph, pretty: boolean = true): string {
  const wrapper: SerializedGraphFile = {
    format: GRAPH_FILE_FORMAT,
    formatVersion: GRAPH_FILE_VERSION,
    graph: snapshotGraph(graph),
  };
  return JSON.stringify(wrapper, null, pretty ? 2 : 0);
}

/**
 * Deserializes a JSON string and rebuilds the graph through the registry
 */
export function deserializeGraph(
  json: string,
  registry: INodeRegistry,
  options: RestoreOptions = {}
): DeserializationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    errors.push(`JSON parse error: ${getErrorMessage(error)}`);
    return { graph: null, errors, warnings };
  }

  const snapshot = parseGraphFile(data, errors);
  if (!snapshot || errors.length > 0) {
    return { graph: null, errors, warnings };
  }

  const restored = restoreGraph(snapshot, registry, options);
  warnings.push(...restored.warnings);
  return { graph: restored.graph, errors, warnings };
}

/**
 * Checks the file envelope and the snapshot structure
 */
export function parseGraphFile(data: unknown, errors: string[]): GraphSnapshot | null {
  if (!isRecord(data)) {
    errors.push('Invalid file: expected a JSON object');
    return null;
  }
  if (data.format !== GRAPH_FILE_FORMAT) {
    errors.push(`Invalid file format: expected "${GRAPH_FILE_FORMAT}"`);
    return null;
  }
  if (data.formatVersion !== GRAPH_FILE_VERSION) {
    errors.push(`Unsupported format version: ${String(data.formatVersion)} (expected ${GRAPH_FILE_VERSION})`);
    return null;
  }
  if (!isRecord(data.graph)) {
    errors.push('Missing graph data in file');
    return null;
  }
  return parseGraphSnapshot(data.graph, errors);
}

export function parseGraphSnapshot(raw: Record<string, unknown>, errors: string[]): GraphSnapshot | null {
  const id = raw.id;
  const category = raw.category;
  if (typeof id !== 'string' || id.length === 0) {
    errors.push('Graph must have a non-empty string id');
    return null;
  }
  if (!isNodeGraphCategory(category)) {
    errors.push(`Graph ${id}: unknown category ${String(category)}`);
    return null;
  }
  if (raw.mainNodeId !== undefined && typeof raw.mainNodeId !== 'string') {
    errors.push(`Graph ${id}: mainNodeId must be a string`);
  }

  const nodes = parseList(raw.nodes, 'nodes', errors, parseNode);
  const connections = parseList(raw.connections, 'connections', errors, parseConnection);
  const groups = parseList(raw.groups, 'groups', errors, parseGroup);

  checkUnique('node', nodes.map(node => node.id), errors);
  checkUnique('pin', nodes.flatMap(node => [...node.inputs, ...node.outputs].map(pin => pin.id)), errors);
  checkUnique('connection', connections.map(connection => connection.id), errors);
  checkUnique('group', groups.map(group => group.id), errors);

  return {
    id,
    name: typeof raw.name === 'string' ? raw.name : '',
    category,
    ...(typeof raw.mainNodeId === 'string' ? { mainNodeId: raw.mainNodeId } : {}),
    nodes,
    connections,
    groups,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPoint(value: unknown): value is Point {
  return isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number';
}

function isRect(value: unknown): value is Rect {
  return isPoint(value) && isRecord(value) && typeof value.width === 'number' && typeof value.height === 'number';
}

function parseList<T>(
  value: unknown,
  field: string,
  errors: string[],
  parseItem: (item: unknown, index: number, errors: string[]) => T | null
): T[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    errors.push(`Graph field "${field}" must be an array`);
    return [];
  }
  const items: T[] = [];
  value.forEach((item: unknown, index) => {
    const parsed = parseItem(item, index, errors);
    if (parsed) {
      items.push(parsed);
    }
  });
  return items;
}

function checkUnique(kind: string, ids: readonly string[], errors: string[]): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      errors.push(`Duplicate ${kind} id: ${id}`);
    }
    seen.add(id);
  }
}

function parsePin(item: unknown, index: number, errors: string[]): PinSnapshot | null {
  if (
    !isRecord(item) ||
    typeof item.id !== 'string' ||
    typeof item.name !== 'string' ||
    !isPinDirection(item.direction) ||
    typeof item.isFlowPin !== 'boolean'
  ) {
    errors.push(`Pin #${index}: expected id, name, direction and isFlowPin`);
    return null;
  }
  const base = {
    id: item.id,
    name: item.name,
    direction: item.direction,
    dataType: typeof item.dataType === 'string' ? item.dataType : 'any',
    isFlowPin: item.isFlowPin,
  };
  const value = item.value;
  return value !== undefined && isSerializable(value) ? { ...base, value } : base;
}

function parseNode(item: unknown, index: number, errors: string[]): NodeSnapshot | null {
  if (!isRecord(item) || typeof item.id !== 'string' || typeof item.type !== 'string') {
    errors.push(`Node #${index}: expected string id and type`);
    return null;
  }
  if (item.groupId !== undefined && typeof item.groupId !== 'string') {
    errors.push(`Node ${item.id}: groupId must be a string`);
  }
  const before = errors.length;
  const inputs = parseList(item.inputs, `nodes[${index}].inputs`, errors, parsePin);
  const outputs = parseList(item.outputs, `nodes[${index}].outputs`, errors, parsePin);
  if (errors.length > before) {
    errors.push(`Node ${item.id}: invalid pins`);
  }

  return {
    id: item.id,
    type: item.type,
    name: typeof item.name === 'string' ? item.name : '',
    position: isPoint(item.position) ? { x: item.position.x, y: item.position.y } : { x: 0, y: 0 },
    isEnabled: typeof item.isEnabled === 'boolean' ? item.isEnabled : true,
    ...(typeof item.groupId === 'string' ? { groupId: item.groupId } : {}),
    inputs,
    outputs,
  };
}

function parseConnection(item: unknown, index: number, errors: string[]): ConnectionSnapshot | null {
  if (
    !isRecord(item) ||
    typeof item.id !== 'string' ||
    typeof item.sourcePinId !== 'string' ||
    typeof item.targetPinId !== 'string'
  ) {
    errors.push(`Connection #${index}: expected string id, sourcePinId and targetPinId`);
    return null;
  }
  return { id: item.id, sourcePinId: item.sourcePinId, targetPinId: item.targetPinId };
}

function parseGroup(item: unknown, index: number, errors: string[]): GroupSnapshot | null {
  if (!isRecord(item) || typeof item.id !== 'string') {
    errors.push(`Group #${index}: expected string id`);
    return null;
  }
  if (!isRect(item.bounds)) {
    errors.push(`Group ${item.id}: bounds must have numeric x, y, width and height`);
    return null;
  }
  const nodeIds = Array.isArray(item.nodeIds)
    ? item.nodeIds.filter((nodeId: unknown): nodeId is string => typeof nodeId === 'string')
    : [];
  return {
    id: item.id,
    name: typeof item.name === 'string' ? item.name : '',
    bounds: {
      x: item.bounds.x,
      y: item.bounds.y,
      width: item.bounds.width,
      height: item.bounds.height,
    },
    ...(typeof item.parentId === 'string' ? { parentId: item.parentId } : {}),
    nodeIds,
  };
}
