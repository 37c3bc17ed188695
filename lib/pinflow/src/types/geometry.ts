/**
 * Point in canvas coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Width/height pair
 */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/**
 * Axis-aligned rectangle, origin at the top-left corner
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}
