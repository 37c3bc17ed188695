import type { Subscription } from 'rxjs';
import { PinDirection } from '../types/pin-direction';
import { generateId } from '../utils/id';
import type { Pin } from './pin';
import { DEFAULT_TYPE_RULES, TypeRules } from './type-rules';

/**
 * Directed edge from an output pin to an input pin.
 *
 * Stores both endpoint ids (persisted) and endpoint references (runtime only).
 * A resolved data connection pushes the source value into the target when it
 * is attached and every time the source value changes.
 */
export class Connection {
  public readonly id: string;
  public sourcePinId: string;
  public targetPinId: string;

  private source: Pin | undefined;
  private target: Pin | undefined;
  private subscription: Subscription | undefined;

  private constructor(id: string, sourcePinId: string, targetPinId: string) {
    this.id = id;
    this.sourcePinId = sourcePinId;
    this.targetPinId = targetPinId;
  }

  /**
   * Creates a connection between two pins and propagates the current source value.
   * Does not check compatibility; NodeGraph.connect does.
   */
  static create(source: Pin, target: Pin, id: string = generateId()): Connection {
    const connection = new Connection(id, source.id, target.id);
    connection.link(source, target);
    return connection;
  }

  /**
   * Creates an unresolved connection from stored pin ids.
   * Endpoints are attached later by resolve().
   */
  static fromIds(sourcePinId: string, targetPinId: string, id: string = generateId()): Connection {
    return new Connection(id, sourcePinId, targetPinId);
  }

  get sourcePin(): Pin | undefined {
    return this.source;
  }

  get targetPin(): Pin | undefined {
    return this.target;
  }

  get isResolved(): boolean {
    return this.source !== undefined && this.target !== undefined;
  }

  get isFlowConnection(): boolean {
    return this.source?.isFlowPin ?? this.target?.isFlowPin ?? false;
  }

  /**
   * Attaches endpoints found in the pin index by the stored ids.
   * An id with no match leaves that endpoint as it is.
   */
  resolve(pinIndex: ReadonlyMap<string, Pin>): void {
    this.link(pinIndex.get(this.sourcePinId) ?? this.source, pinIndex.get(this.targetPinId) ?? this.target);
  }

  /**
   * Pushes the source value into the target. Flow connections carry nothing.
   * @returns true if a value was transferred
   */
  transfer(): boolean {
    if (!this.source || !this.target || this.isFlowConnection) {
      return false;
    }
    this.target.value = this.source.value;
    return true;
  }

  /**
   * Checks direction, flow kind, data type and that both endpoints are resolved
   * and owned by different nodes
   */
  isValid(typeRules: TypeRules = DEFAULT_TYPE_RULES): boolean {
    const source = this.source;
    const target = this.target;
    if (!source || !target) {
      return false;
    }
    if (source.direction !== PinDirection.OUTPUT || target.direction !== PinDirection.INPUT) {
      return false;
    }
    if (!source.parentNode || !target.parentNode || source.parentNode === target.parentNode) {
      return false;
    }
    if (source.isFlowPin !== target.isFlowPin) {
      return false;
    }
    return source.isFlowPin || typeRules.isCompatible(source.dataType, target.dataType);
  }

  /**
   * Detaches both endpoints and resets the target to its default value
   */
  disconnect(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;

    const target = this.target;
    this.source?.removeConnection(this);
    target?.removeConnection(this);
    this.source = undefined;
    this.target = undefined;

    if (target && !target.isFlowPin) {
      target.reset();
    }
  }

  private link(source: Pin | undefined, target: Pin | undefined): void {
    if (source !== this.source) {
      this.source?.removeConnection(this);
      this.source = source;
      if (source) {
        this.sourcePinId = source.id;
        source.addConnection(this);
      }
    }

    if (target !== this.target) {
      this.target?.removeConnection(this);
      this.target = target;
      if (target) {
        this.targetPinId = target.id;
        target.addConnection(this);
      }
    }

    this.subscription?.unsubscribe();
    this.subscription = undefined;

    if (source && target && !this.isFlowConnection) {
      this.subscription = source.valueChanged$.subscribe(() => {
        this.transfer();
      });
      this.transfer();
    }
  }
}
