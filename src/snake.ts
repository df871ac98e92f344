// snake.ts
// The snake body as an ordered chain of axis-aligned segments.  The chain
// extends at the head and retracts at the tail so that total length is
// conserved while moving, and answers the collision queries the game needs.

import { isColinear, type Direction } from './direction.ts';
import { rectInside, rectsOverlap, type Point, type Rect } from './geometry.ts';
import { Line } from './line.ts';
import type { Renderable, SegmentView } from './segment.ts';

/** Optional parameters for spawning a snake. */
export interface SnakeOptions {
  /** Initial direction of travel. Defaults to RIGHT. */
  dir?: Direction;
  /** Body thickness. Defaults to 16. */
  width?: number;
}

/** Default body thickness when no option is given. */
export const DEFAULT_SNAKE_WIDTH = 16;

/**
 * True when any renderable's bounding box overlaps the box.
 * @param items - Segments to test.
 * @param box - Rectangle to test against.
 * @returns Whether at least one overlap exists.
 */
function anyOverlap(items: readonly Renderable[], box: Rect): boolean {
  for (const item of items) {
    if (rectsOverlap(item.getBBox(), box)) return true;
  }
  return false;
}

/**
 * Direction of travel from a to b when they differ along exactly one axis.
 * @returns Direction or null for diagonal or coincident points.
 */
function directionBetween(a: Point, b: Point): Direction | null {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  if (dx !== 0 && dy === 0) return dx > 0 ? 'RIGHT' : 'LEFT';
  if (dy !== 0 && dx === 0) return dy > 0 ? 'DOWN' : 'UP';
  return null;
}

/**
 * Segment chain from tail (index 0) to head (last index).
 *
 * Invariants kept by every operation:
 * - each segment's `end` equals the next segment's `begin`;
 * - neighbouring segments are never colinear;
 * - the head segment's direction is the direction of travel;
 * - total length only changes through {@link Snake.growAndMove}.
 */
export class Snake {
  /** Body thickness shared by every segment. */
  readonly width: number;
  /** Segments from tail to head. Never empty. */
  private chain: Line[];
  /** Cached reference to the last element of `chain`. */
  private headSeg: Line;
  /** Direction set by the constructor or the last accepted turn. */
  private heading: Direction;

  /**
   * Spawn a snake as a single degenerate segment.
   * @param x - Start X position.
   * @param y - Start Y position.
   * @param options - Optional direction and width.
   */
  constructor(x: number, y: number, options: SnakeOptions = {}) {
    this.width = options.width ?? DEFAULT_SNAKE_WIDTH;
    this.headSeg = new Line({ x, y }, options.dir ?? 'RIGHT', this.width);
    this.chain = [this.headSeg];
    this.heading = this.headSeg.dir;
  }

  /**
   * Build a snake that follows a polyline of turn points, tail first.
   * @param points - At least two vertices; consecutive pairs must differ
   * along exactly one axis and consecutive runs must be real turns.
   * @param width - Body thickness.
   * @returns Snake whose segments span the given vertices.
   * @throws RangeError when the path cannot form a valid chain.
   */
  static fromPath(points: readonly Point[], width = DEFAULT_SNAKE_WIDTH): Snake {
    const lines: Line[] = [];
    for (let i = 1; i < points.length; i++) {
      const a = points[i - 1];
      const b = points[i];
      if (!a || !b) continue;
      const dir = directionBetween(a, b);
      if (!dir) {
        throw new RangeError(`path step ${i} is not a non-empty axis-aligned run`);
      }
      const prev = lines[lines.length - 1];
      if (prev && isColinear(prev.dir, dir)) {
        throw new RangeError(`path step ${i} does not turn`);
      }
      const line = new Line(a, dir, width);
      line.end = { x: b.x, y: b.y };
      lines.push(line);
    }
    const head = lines[lines.length - 1];
    if (!head) throw new RangeError('path needs at least two points');
    const snake = new Snake(head.begin.x, head.begin.y, { dir: head.dir, width });
    snake.chain = lines;
    snake.headSeg = head;
    snake.heading = head.dir;
    return snake;
  }

  /** Current direction of travel. */
  get dir(): Direction {
    return this.heading;
  }

  /** Segments from tail to head. */
  get segments(): readonly SegmentView[] {
    return this.chain;
  }

  get head(): SegmentView {
    return this.headSeg;
  }

  get tail(): SegmentView {
    return this.chain[0] ?? this.headSeg;
  }

  get segmentCount(): number {
    return this.chain.length;
  }

  /** Head-ward end of the body. */
  headPoint(): Point {
    return this.headSeg.getEnd();
  }

  /** Total body length; the sum of segment sizes. */
  length(): number {
    let total = 0;
    for (const line of this.chain) total += line.size();
    return total;
  }

  /**
   * Change direction. A colinear direction (same axis) is ignored; anything
   * else starts a new head segment at the current head point.
   * @param dir - Requested direction.
   * @returns True when a new segment was appended.
   */
  turn(dir: Direction): boolean {
    if (isColinear(dir, this.headSeg.dir)) return false;
    const next = new Line(this.headSeg.end, dir, this.width);
    this.chain.push(next);
    this.headSeg = next;
    this.heading = dir;
    return true;
  }

  /**
   * Advance by a distance while conserving total length: the head grows by
   * the full distance and the same amount is consumed from the tail,
   * dropping every tail segment that the remainder runs past.
   * @param distance - Distance to travel; non-positive values do nothing.
   */
  move(distance: number): void {
    if (!(distance > 0)) return;
    this.headSeg.grow(distance);
    let remaining = distance;
    for (;;) {
      const tail = this.chain[0];
      if (!tail) return;
      const left = tail.shrink(remaining);
      if (left <= 0 || tail === this.headSeg) return;
      this.chain.shift();
      remaining = left;
    }
  }

  /**
   * Extend the head without retracting the tail.
   * @param distance - Length to add; non-positive values do nothing.
   */
  growAndMove(distance: number): void {
    if (!(distance > 0)) return;
    this.headSeg.grow(distance);
  }

  /** True when any segment overlaps the box. */
  collidesWithBox(box: Rect): boolean {
    return anyOverlap(this.chain, box);
  }

  /**
   * Head against the rest of the body. The head's own segment and the one
   * right behind it always touch at the pivot and are skipped.
   */
  selfCollides(): boolean {
    return anyOverlap(this.chain.slice(0, -2), this.headSeg.getBBox());
  }

  /**
   * True when the head's box pokes out of the field.
   * @param bounds - Field rectangle.
   */
  wallCollides(bounds: Rect): boolean {
    return !rectInside(this.headSeg.getBBox(), bounds);
  }

  /** Bounding boxes from tail to head, for the renderer. */
  getBBoxes(): Rect[] {
    return this.chain.map((line) => line.getBBox());
  }

  /**
   * List every structural invariant the chain currently violates: axis
   * alignment, continuity, colinear neighbours and the head segment's
   * direction against the direction of travel.
   * @returns Human readable violations; empty when the chain is valid.
   */
  checkInvariants(): string[] {
    const problems: string[] = [];
    for (let i = 0; i < this.chain.length; i++) {
      const line = this.chain[i];
      if (!line) continue;
      const offAxis =
        line.dir === 'LEFT' || line.dir === 'RIGHT'
          ? line.begin.y !== line.end.y
          : line.begin.x !== line.end.x;
      if (offAxis) problems.push(`segment ${i} leaves its axis`);
      const next = this.chain[i + 1];
      if (!next) continue;
      if (line.end.x !== next.begin.x || line.end.y !== next.begin.y) {
        problems.push(`segments ${i} and ${i + 1} are not continuous`);
      }
      if (isColinear(line.dir, next.dir)) {
        problems.push(`segments ${i} and ${i + 1} are colinear`);
      }
    }
    const last = this.chain[this.chain.length - 1];
    if (last !== this.headSeg) {
      problems.push('head reference is stale');
    }
    if (last && last.dir !== this.heading) {
      problems.push(`head segment runs ${last.dir} but the snake heads ${this.heading}`);
    }
    return problems;
  }
}
