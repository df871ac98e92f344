import { describe, it, expect } from 'vitest';
import {
  DIRECTIONS,
  directionAxis,
  directionVector,
  isColinear,
  isDirection,
  opposite
} from './direction.ts';

describe('direction.ts', () => {
  it('maps directions to screen-space unit vectors', () => {
    expect(directionVector('UP')).toEqual({ x: 0, y: -1 });
    expect(directionVector('DOWN')).toEqual({ x: 0, y: 1 });
    expect(directionVector('LEFT')).toEqual({ x: -1, y: 0 });
    expect(directionVector('RIGHT')).toEqual({ x: 1, y: 0 });
  });

  it('returns a fresh vector each call', () => {
    const v = directionVector('UP');
    v.y = 42;
    expect(directionVector('UP').y).toBe(-1);
  });

  it('treats directions on the same axis as colinear', () => {
    expect(isColinear('UP', 'DOWN')).toBe(true);
    expect(isColinear('LEFT', 'RIGHT')).toBe(true);
    for (const dir of DIRECTIONS) {
      expect(isColinear(dir, dir)).toBe(true);
    }
    expect(isColinear('UP', 'LEFT')).toBe(false);
    expect(isColinear('RIGHT', 'DOWN')).toBe(false);
  });

  it('reports axis and opposite', () => {
    expect(directionAxis('LEFT')).toBe('x');
    expect(directionAxis('DOWN')).toBe('y');
    expect(opposite('UP')).toBe('DOWN');
    expect(opposite('LEFT')).toBe('RIGHT');
  });

  it('guards untrusted values', () => {
    expect(isDirection('RIGHT')).toBe(true);
    expect(isDirection('right')).toBe(false);
    expect(isDirection(1)).toBe(false);
    expect(isDirection(null)).toBe(false);
  });
});
