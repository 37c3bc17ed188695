export {
  GRAPH_FILE_FORMAT,
  GRAPH_FILE_VERSION,
  deserializeGraph,
  parseGraphFile,
  parseGraphSnapshot,
  serializeGraph,
} from './serializer';
export type { DeserializationResult, SerializedGraphFile } from './serializer';
export { isSerializable, restoreGraph, snapshotGraph } from './snapshot';
export type {
  ConnectionSnapshot,
  GraphSnapshot,
  GroupSnapshot,
  NodeSnapshot,
  PinSnapshot,
  RestoreOptions,
  RestoreResult,
} from './snapshot';
