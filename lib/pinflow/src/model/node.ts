import type { NodeGraphCategory } from '../types/graph-category';
import type { Point } from '../types/geometry';
import type { ILogger } from '../types/logger';
import { NodeState } from '../types/node-state';
import { PinDirection } from '../types/pin-direction';
import { generateId } from '../utils/id';
import type { NodeGroup } from './node-group';
import { Pin, PinOptions } from './pin';

/**
 * Context handed to a node's evaluation step
 */
export interface NodeExecutionContext {
  readonly graphId: string;
  readonly category: NodeGraphCategory;
  readonly logger: ILogger;
  /**
   * Cancellation signal of the current run
   */
  readonly signal?: AbortSignal;
}

/**
 * Pin options accepted by the pin helpers; direction and flow kind are implied
 */
export type NodePinOptions = Omit<PinOptions, 'isFlowPin'>;

/**
 * Executable unit of a graph. Owns a fixed, ordered set of input and output pins
 * and one evaluation step.
 *
 * @example
 * ```typescript
 * class PlusOneNode extends Node {
 *   readonly type = 'math.plusOne';
 *   readonly x = this.addInputPin('x', { dataType: 'number', defaultValue: 0 });
 *   readonly y = this.addOutputPin('y', { dataType: 'number' });
 *
 *   protected override onExecute(): void {
 *     this.y.value = Number(this.x.value) + 1;
 *   }
 * }
 * ```
 */
export abstract class Node {
  public id: string = generateId();
  public name: string;

  /**
   * Registry key of the node type, persisted in snapshots
   */
  abstract readonly type: string;

  public position: Point = { x: 0, y: 0 };

  /**
   * Disabled nodes are skipped by the engines
   */
  public isEnabled = true;

  private currentState: NodeState = NodeState.NORMAL;
  private readonly inputs: Pin[] = [];
  private readonly outputs: Pin[] = [];
  private groupRef: NodeGroup | undefined;
  private storedGroupId: string | undefined;

  constructor(name = '') {
    this.name = name;
  }

  get inputPins(): readonly Pin[] {
    return this.inputs;
  }

  get outputPins(): readonly Pin[] {
    return this.outputs;
  }

  get state(): NodeState {
    return this.currentState;
  }

  get group(): NodeGroup | undefined {
    return this.groupRef;
  }

  /**
   * Id of the owning group. Survives serialization; the group reference
   * is rebuilt from it by NodeGraph.onDeserialized().
   */
  get groupId(): string | undefined {
    return this.storedGroupId;
  }

  set groupId(id: string | undefined) {
    this.storedGroupId = id;
  }

  /**
   * Moves the node into a group (or out of any group), keeping both sides in sync
   */
  setGroup(group: NodeGroup | undefined): void {
    const previous = this.groupRef;
    this.groupRef = group;
    this.storedGroupId = group?.id;

    if (previous === group) {
      return;
    }
    previous?.trackMember(this, false);
    group?.trackMember(this, true);
  }

  /**
   * Runs the evaluation step.
   * @returns false if the node is disabled and did not run
   */
  async execute(context: NodeExecutionContext): Promise<boolean> {
    if (!this.isEnabled) {
      return false;
    }

    this.currentState = NodeState.EXECUTING;
    try {
      await this.onExecute(context);
      this.currentState = NodeState.SUCCESS;
      return true;
    } catch (error) {
      this.currentState = NodeState.ERROR;
      throw error;
    }
  }

  /**
   * Flow outputs to follow after the last step, in declaration order.
   * Override to branch; the default fires every flow output.
   */
  getFiredFlowOutputs(): readonly Pin[] {
    return this.outputs.filter(pin => pin.isFlowPin);
  }

  findInputPin(name: string): Pin | undefined {
    return this.inputs.find(pin => pin.name === name);
  }

  findOutputPin(name: string): Pin | undefined {
    return this.outputs.find(pin => pin.name === name);
  }

  /**
   * Rebuilds pin back-references after loading
   */
  onDeserialized(): void {
    for (const pin of this.inputs) pin.attachTo(this);
    for (const pin of this.outputs) pin.attachTo(this);
  }

  /**
   * Evaluation step. Reads input pin values and writes output pin values.
   */
  protected onExecute(_context: NodeExecutionContext): void | Promise<void> {
    // Nodes without behavior (pure entry points, pass-through sequencing) keep the default
  }

  protected addInputPin(name: string, options: NodePinOptions = {}): Pin {
    return this.addPin(new Pin(name, PinDirection.INPUT, options), this.inputs);
  }

  protected addOutputPin(name: string, options: NodePinOptions = {}): Pin {
    return this.addPin(new Pin(name, PinDirection.OUTPUT, options), this.outputs);
  }

  protected addFlowInput(name = 'In'): Pin {
    return this.addPin(new Pin(name, PinDirection.INPUT, { isFlowPin: true }), this.inputs);
  }

  protected addFlowOutput(name = 'Out'): Pin {
    return this.addPin(new Pin(name, PinDirection.OUTPUT, { isFlowPin: true }), this.outputs);
  }

  private addPin(pin: Pin, list: Pin[]): Pin {
    pin.attachTo(this);
    list.push(pin);
    return pin;
  }
}
