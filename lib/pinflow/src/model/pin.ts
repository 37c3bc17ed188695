import { Observable, Subject } from 'rxjs';
import { PinDirection } from '../types/pin-direction';
import type { PinValue } from '../types/utils';
import { generateId } from '../utils/id';
import type { Connection } from './connection';
import type { Node } from './node';
import { ANY_TYPE, DEFAULT_TYPE_RULES, TypeRules } from './type-rules';

/**
 * Options for creating a pin
 */
export interface PinOptions {
  readonly id?: string;
  readonly dataType?: string;
  readonly isFlowPin?: boolean;
  readonly defaultValue?: PinValue;
}

/**
 * Rules applied when checking whether two pins may be connected
 */
export interface ConnectionPolicy {
  /**
   * Allow connecting to an input that already has a connection
   * (the caller replaces the old one)
   */
  readonly replaceInputConnection: boolean;
  readonly typeRules: TypeRules;
}

export const DEFAULT_CONNECTION_POLICY: ConnectionPolicy = {
  replaceInputConnection: true,
  typeRules: DEFAULT_TYPE_RULES,
};

/**
 * Typed, directional connection point owned by exactly one node.
 *
 * Flow pins sequence control-flow execution and carry no payload.
 * Data pins carry a value and publish every change on `valueChanged$`.
 */
export class Pin {
  public id: string;
  public readonly name: string;
  public readonly direction: PinDirection;
  public dataType: string;
  public readonly isFlowPin: boolean;
  public defaultValue: PinValue;

  private parent: Node | undefined;
  private currentValue: PinValue;
  private readonly valueSubject = new Subject<PinValue>();
  private readonly connectionList: Connection[] = [];

  /**
   * Emits the new value whenever it changes (compared with Object.is)
   */
  public readonly valueChanged$: Observable<PinValue> = this.valueSubject.asObservable();

  constructor(name: string, direction: PinDirection, options: PinOptions = {}) {
    this.id = options.id ?? generateId();
    this.name = name;
    this.direction = direction;
    this.isFlowPin = options.isFlowPin ?? false;
    this.dataType = options.dataType ?? ANY_TYPE;
    this.defaultValue = options.defaultValue;
    this.currentValue = options.defaultValue;
  }

  get parentNode(): Node | undefined {
    return this.parent;
  }

  /**
   * @internal
   * Sets the owning node. Called by Node when the pin is added and on relink.
   */
  attachTo(node: Node | undefined): void {
    this.parent = node;
  }

  get value(): PinValue {
    return this.currentValue;
  }

  set value(value: PinValue) {
    if (Object.is(this.currentValue, value)) {
      return;
    }
    this.currentValue = value;
    this.valueSubject.next(value);
  }

  /**
   * Connections attached to this pin, in attach order.
   * An input pin has at most one.
   */
  get connections(): readonly Connection[] {
    return this.connectionList;
  }

  get isConnected(): boolean {
    return this.connectionList.length > 0;
  }

  /**
   * @internal
   */
  addConnection(connection: Connection): void {
    if (!this.connectionList.includes(connection)) {
      this.connectionList.push(connection);
    }
  }

  /**
   * @internal
   */
  removeConnection(connection: Connection): void {
    const index = this.connectionList.indexOf(connection);
    if (index >= 0) {
      this.connectionList.splice(index, 1);
    }
  }

  /**
   * Restores the default value
   */
  reset(): void {
    this.value = this.defaultValue;
  }

  /**
   * Checks whether this pin may be connected to another pin, in either role.
   * Does not require a particular argument order; see NodeGraph.connect for that.
   */
  canConnectTo(other: Pin, policy: ConnectionPolicy = DEFAULT_CONNECTION_POLICY): boolean {
    if (other === this) {
      return false;
    }

    // Both pins must be owned, and by different nodes
    if (!this.parent || !other.parent || this.parent === other.parent) {
      return false;
    }

    if (this.direction === other.direction) {
      return false;
    }

    const output = this.direction === PinDirection.OUTPUT ? this : other;
    const input = output === this ? other : this;

    if (input.isConnected && !policy.replaceInputConnection) {
      return false;
    }

    if (this.isFlowPin !== other.isFlowPin) {
      return false;
    }

    return this.isFlowPin || policy.typeRules.isCompatible(output.dataType, input.dataType);
  }

  public toString(): string {
    return `${this.direction} pin ${this.name} (${this.isFlowPin ? 'flow' : this.dataType})`;
  }
}
