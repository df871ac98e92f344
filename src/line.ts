// line.ts
// Straight axis-aligned run of the snake body between two turns.

import { directionVector, type Direction } from './direction.ts';
import { addPoints, scalePoint, type Point, type Rect } from './geometry.ts';
import type { Segment } from './segment.ts';
import { clamp } from './utils.ts';

/** Initial length of a fresh segment, so its direction is never ambiguous. */
export const SEGMENT_EPSILON = 0.01;

/**
 * One straight segment. `end` is the head-ward point, `begin` the tail-ward
 * one; the two only differ along the axis of `dir`.
 */
export class Line implements Segment {
  /** Trailing (tail-ward) point. */
  begin: Point;
  /** Leading (head-ward) point. */
  end: Point;
  /** Direction the segment was laid down in. */
  readonly dir: Direction;
  /** Body thickness across the segment's axis. */
  readonly width: number;

  /**
   * Create a near-zero segment starting at a pivot point.
   * @param pos - Pivot point; copied, never aliased.
   * @param dir - Direction of travel along the segment.
   * @param width - Body thickness used for the bounding box.
   */
  constructor(pos: Point, dir: Direction, width: number) {
    this.begin = { x: pos.x, y: pos.y };
    this.end = addPoints(pos, scalePoint(directionVector(dir), SEGMENT_EPSILON));
    this.dir = dir;
    this.width = width;
  }

  /** Extent along the segment's own axis. */
  size(): number {
    switch (this.dir) {
      case 'UP':
      case 'DOWN':
        return Math.abs(this.end.y - this.begin.y);
      case 'LEFT':
      case 'RIGHT':
        return Math.abs(this.end.x - this.begin.x);
    }
  }

  /** Head growth is unconstrained, so the whole distance is always used. */
  grow(distance: number): number {
    this.end = addPoints(this.end, scalePoint(directionVector(this.dir), distance));
    return 0;
  }

  shrink(distance: number): number {
    const size = this.size();
    const left = clamp(distance - size, 0, distance);
    if (distance >= size) {
      this.begin = { x: this.end.x, y: this.end.y };
    } else {
      this.begin = addPoints(this.begin, scalePoint(directionVector(this.dir), distance));
    }
    return left;
  }

  getEnd(): Point {
    return { x: this.end.x, y: this.end.y };
  }

  getDir(): Direction {
    return this.dir;
  }

  /**
   * Rectangle covering the segment, thickened to `width` across its axis.
   * Rendering and collision both use it.
   */
  getBBox(): Rect {
    const half = this.width / 2;
    const size = this.size();
    switch (this.dir) {
      case 'UP':
        return { x: this.end.x - half, y: this.end.y, w: this.width, h: size };
      case 'DOWN':
        return { x: this.end.x - half, y: this.begin.y, w: this.width, h: size };
      case 'LEFT':
        return { x: this.end.x, y: this.end.y - half, w: size, h: this.width };
      case 'RIGHT':
        return { x: this.begin.x, y: this.end.y - half, w: size, h: this.width };
    }
  }
}
