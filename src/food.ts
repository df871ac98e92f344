// food.ts
// The single food item and its placement on the field.

import type { Point, Rect } from './geometry.ts';
import { randRange, type RandomSource } from './rng.ts';
import type { Snake } from './snake.ts';

/**
 * Food at a point, with a square box of side `size` centred on it.
 */
export class Food {
  /** Centre of the food. */
  readonly point: Point;
  /** Box used for drawing and for overlap with the snake. */
  readonly bbox: Rect;

  constructor(point: Point, size: number) {
    this.point = { x: point.x, y: point.y };
    const half = size / 2;
    this.bbox = { x: point.x - half, y: point.y - half, w: size, h: size };
  }

  /**
   * Food at a uniform random point whose box lies inside the field.
   * @param field - Field rectangle.
   * @param size - Side of the food box.
   * @param rng - Random source.
   */
  static random(field: Rect, size: number, rng: RandomSource = Math.random): Food {
    const half = size / 2;
    const x = randRange(rng, field.x + half, field.x + field.w - half);
    const y = randRange(rng, field.y + half, field.y + field.h - half);
    return new Food({ x, y }, size);
  }
}

/**
 * Rejection-sample food positions until one does not touch the snake.
 * The snake must leave some free area in the field.
 * @param snake - Body the food must avoid.
 * @param field - Field rectangle.
 * @param size - Side of the food box.
 * @param rng - Random source.
 * @returns Food that does not overlap the snake.
 */
export function placeFood(snake: Snake, field: Rect, size: number, rng: RandomSource = Math.random): Food {
  let food = Food.random(field, size, rng);
  while (snake.collidesWithBox(food.bbox)) {
    food = Food.random(field, size, rng);
  }
  return food;
}
