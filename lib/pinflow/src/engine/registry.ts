import type { Node } from '../model/node';

/**
 * Creates a fresh node of one type
 */
export type NodeFactory<T extends Node = Node> = () => T;

/**
 * Registry API for node types
 */
export interface INodeRegistry {
  register(type: string, factory: NodeFactory): void;
  create(type: string): Node;
  has(type: string): boolean;
  getNodeTypes(): IterableIterator<string>;
  readonly size: number;
}

/**
 * Host-supplied map from node type name to factory.
 * Used to rebuild nodes when restoring snapshots.
 */
export class NodeRegistry implements INodeRegistry {
  private readonly factories = new Map<string, NodeFactory>();

  /**
   * @throws Error if the type is already registered
   */
  register(type: string, factory: NodeFactory): void {
    if (this.factories.has(type)) {
      throw new Error(`Node type '${type}' is already registered`);
    }
    this.factories.set(type, factory);
  }

  /**
   * Constructs a node of the given type
   * @throws Error if the type is unknown or the factory produced another type
   */
  create(type: string): Node {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new Error(`Unknown node type: ${type}`);
    }
    const node = factory();
    if (node.type !== type) {
      throw new Error(`Factory for '${type}' produced a node of type '${node.type}'`);
    }
    return node;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  getNodeTypes(): IterableIterator<string> {
    return this.factories.keys();
  }

  public get size(): number {
    return this.factories.size;
  }

  clear(): void {
    this.factories.clear();
  }
}
