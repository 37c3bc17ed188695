/**
 * Direction of a pin relative to its node
 */
export enum PinDirection {
  INPUT = 'input',
  OUTPUT = 'output',
}

export function isPinDirection(value: unknown): value is PinDirection {
  return value === PinDirection.INPUT || value === PinDirection.OUTPUT;
}
