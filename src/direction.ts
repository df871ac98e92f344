// direction.ts
// The four cardinal directions the snake can travel in.

import type { Point } from './geometry.ts';

/** Cardinal travel direction. Screen coordinates: UP decreases y. */
export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

/** Axis a direction runs along. */
export type Axis = 'x' | 'y';

/** Every direction, in a stable order. */
export const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

const VECTORS: Record<Direction, Point> = {
  UP: { x: 0, y: -1 },
  DOWN: { x: 0, y: 1 },
  LEFT: { x: -1, y: 0 },
  RIGHT: { x: 1, y: 0 }
};

const OPPOSITES: Record<Direction, Direction> = {
  UP: 'DOWN',
  DOWN: 'UP',
  LEFT: 'RIGHT',
  RIGHT: 'LEFT'
};

/**
 * Unit vector for a direction.
 * @param dir - Direction to map.
 * @returns Fresh point holding the unit vector.
 */
export function directionVector(dir: Direction): Point {
  const v = VECTORS[dir];
  return { x: v.x, y: v.y };
}

/**
 * Axis the direction moves along.
 * @param dir - Direction to classify.
 * @returns 'x' for LEFT/RIGHT, 'y' for UP/DOWN.
 */
export function directionAxis(dir: Direction): Axis {
  return dir === 'LEFT' || dir === 'RIGHT' ? 'x' : 'y';
}

/**
 * True when both directions share an axis, including identical directions.
 * @param a - First direction.
 * @param b - Second direction.
 * @returns Whether the two are colinear.
 */
export function isColinear(a: Direction, b: Direction): boolean {
  return directionAxis(a) === directionAxis(b);
}

/**
 * Reverse of a direction.
 * @param dir - Direction to flip.
 * @returns The opposite direction.
 */
export function opposite(dir: Direction): Direction {
  return OPPOSITES[dir];
}

/**
 * Type guard for untrusted direction values.
 * @param value - Value to check.
 * @returns True when value is one of the four directions.
 */
export function isDirection(value: unknown): value is Direction {
  return value === 'UP' || value === 'DOWN' || value === 'LEFT' || value === 'RIGHT';
}
