// geometry.ts
// Points and axis-aligned rectangles shared by rendering and collision.

/** 2D coordinate in field units. */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle with its top-left corner at (x, y). */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export function addPoints(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function scalePoint(p: Point, k: number): Point {
  return { x: p.x * k, y: p.y * k };
}

/**
 * Positive-area intersection test. Rectangles that only share an edge or a
 * corner do not overlap, and a rectangle with no area overlaps nothing.
 * @param a - First rectangle.
 * @param b - Second rectangle.
 * @returns True when the intersection has non-zero area.
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  if (!(a.w > 0 && a.h > 0 && b.w > 0 && b.h > 0)) return false;
  return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}

/**
 * Containment test; touching the outer border still counts as inside.
 * @param inner - Rectangle to test.
 * @param outer - Bounding rectangle.
 * @returns True when inner lies fully within outer.
 */
export function rectInside(inner: Rect, outer: Rect): boolean {
  return (
    inner.x >= outer.x &&
    inner.y >= outer.y &&
    inner.x + inner.w <= outer.x + outer.w &&
    inner.y + inner.h <= outer.y + outer.h
  );
}
