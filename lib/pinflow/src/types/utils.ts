/**
 * Utility types shared across the library
 */

/**
 * Value carried by a data pin
 */
export type PinValue = unknown;

/**
 * JSON-compatible value, used for structured log metadata and snapshots
 */
export type Serializable =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly Serializable[]
  | { readonly [key: string]: Serializable };
