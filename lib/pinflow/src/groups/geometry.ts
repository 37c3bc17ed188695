import type { Point, Rect, Size } from '../types/geometry';

export function rectAt(position: Point, size: Size): Rect {
  return { x: position.x, y: position.y, width: size.width, height: size.height };
}

/**
 * True if inner lies entirely inside outer (edges included)
 */
export function containsRect(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.width <= outer.x + outer.width &&
    inner.y + inner.height <= outer.y + outer.height
  );
}

export function intersects(a: Rect, b: Rect): boolean {
  return a.x <= b.x + b.width && b.x <= a.x + a.width && a.y <= b.y + b.height && b.y <= a.y + a.height;
}

/**
 * Grows a rectangle by amount on every side
 */
export function inflate(rect: Rect, amount: number): Rect {
  return {
    x: rect.x - amount,
    y: rect.y - amount,
    width: rect.width + 2 * amount,
    height: rect.height + 2 * amount,
  };
}

export function translate(rect: Rect, dx: number, dy: number): Rect {
  return { ...rect, x: rect.x + dx, y: rect.y + dy };
}

/**
 * Smallest rectangle covering `rect` and `other` grown by padding.
 * The result never shrinks `rect`.
 */
export function expandToInclude(rect: Rect, other: Rect, padding = 0): Rect {
  const minX = Math.min(rect.x, other.x - padding);
  const minY = Math.min(rect.y, other.y - padding);
  const maxX = Math.max(rect.x + rect.width, other.x + other.width + padding);
  const maxY = Math.max(rect.y + rect.height, other.y + other.height + padding);
  return { x: minX, y: minY, width: Math.max(0, maxX - minX), height: Math.max(0, maxY - minY) };
}

/**
 * Bounding box of rects grown by padding; an empty rect at the origin for no input
 */
export function boundingRect(rects: readonly Rect[], padding = 0): Rect {
  if (rects.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const r of rects) {
    minX = Math.min(minX, r.x);
    minY = Math.min(minY, r.y);
    maxX = Math.max(maxX, r.x + r.width);
    maxY = Math.max(maxY, r.y + r.height);
  }

  if (![minX, minY, maxX, maxY].every(Number.isFinite)) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  minX -= padding;
  minY -= padding;
  maxX += padding;
  maxY += padding;
  return { x: minX, y: minY, width: Math.max(0, maxX - minX), height: Math.max(0, maxY - minY) };
}

/**
 * Top-left position keeping a rect of the given size inside bounds.
 * The bounds' top-left edge wins when the size does not fit.
 */
export function clampPosition(position: Point, size: Size, bounds: Rect): Point {
  return {
    x: Math.max(bounds.x, Math.min(position.x, bounds.x + bounds.width - size.width)),
    y: Math.max(bounds.y, Math.min(position.y, bounds.y + bounds.height - size.height)),
  };
}
