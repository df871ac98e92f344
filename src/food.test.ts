import { describe, it, expect } from 'vitest';
import { Food, placeFood } from './food.ts';
import { rectInside } from './geometry.ts';
import { createRng, type RandomSource } from './rng.ts';
import { Snake } from './snake.ts';

const FIELD = { x: 0, y: 0, w: 800, h: 600 };

/**
 * Random source replaying a fixed list of values.
 * @param values - Values to return in order; the last one repeats.
 * @returns Random source.
 */
function sequence(values: number[]): RandomSource {
  let i = 0;
  return () => {
    const value = values[Math.min(i, values.length - 1)] ?? 0;
    i += 1;
    return value;
  };
}

describe('food.ts', () => {
  it('centres a square box on its point', () => {
    const food = new Food({ x: 50, y: 60 }, 10);
    expect(food.point).toEqual({ x: 50, y: 60 });
    expect(food.bbox).toEqual({ x: 45, y: 55, w: 10, h: 10 });
  });

  it('samples positions that keep the box inside the field', () => {
    expect(Food.random(FIELD, 16, () => 0).point).toEqual({ x: 8, y: 8 });
    expect(Food.random(FIELD, 16, () => 0.5).point).toEqual({ x: 400, y: 300 });
    const rng = createRng(3);
    for (let i = 0; i < 100; i++) {
      expect(rectInside(Food.random(FIELD, 16, rng).bbox, FIELD)).toBe(true);
    }
  });

  it('resamples while the food would land on the snake', () => {
    const snake = new Snake(400, 300);
    const food = placeFood(snake, FIELD, 16, sequence([0.5, 0.5, 0, 0]));
    expect(food.point).toEqual({ x: 8, y: 8 });
    expect(snake.collidesWithBox(food.bbox)).toBe(false);
  });

  it('never overlaps a long body', () => {
    const snake = Snake.fromPath([
      { x: 20, y: 20 },
      { x: 780, y: 20 },
      { x: 780, y: 300 },
      { x: 20, y: 300 },
      { x: 20, y: 580 },
      { x: 700, y: 580 }
    ]);
    const rng = createRng(9);
    for (let i = 0; i < 50; i++) {
      const food = placeFood(snake, FIELD, 16, rng);
      expect(snake.collidesWithBox(food.bbox)).toBe(false);
    }
  });
});
