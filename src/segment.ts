// segment.ts
// Capabilities every body segment provides to the snake chain.

import type { Direction } from './direction.ts';
import type { Point, Rect } from './geometry.ts';

/** Segment whose length can change from either end. */
export interface Growable {
  /**
   * Extend the leading end.
   * @param distance - Distance to add.
   * @returns Distance that could not be applied.
   */
  grow(distance: number): number;
  /**
   * Retract the trailing end toward the leading end.
   * @param distance - Distance to remove.
   * @returns Remainder the segment could not absorb.
   */
  shrink(distance: number): number;
  getEnd(): Point;
  getDir(): Direction;
}

/** Segment that exposes the rectangle it is drawn and collided as. */
export interface Renderable {
  getBBox(): Rect;
}

/** Full segment capability set used by the snake. */
export type Segment = Growable & Renderable;

/** Read-only view of a segment, as handed out by the snake's accessors. */
export interface SegmentView extends Renderable {
  readonly begin: Readonly<Point>;
  readonly end: Readonly<Point>;
  readonly dir: Direction;
  readonly width: number;
  size(): number;
}
