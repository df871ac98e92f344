import { describe, it, expect } from 'vitest';
import { approxEqual, clamp, maxf, minf } from './utils.ts';

describe('utils.ts', () => {
  it('clamp should constrain values', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-5, 0, 10)).toBe(0);
    expect(clamp(15, 0, 10)).toBe(10);
  });

  it('clamp keeps a shrink remainder within [0, distance]', () => {
    expect(clamp(30 - 50, 0, 30)).toBe(0);
    expect(clamp(30 - 10, 0, 30)).toBe(20);
  });

  it('minf and maxf pick the right operand', () => {
    expect(maxf(2, 3)).toBe(3);
    expect(maxf(3, 2)).toBe(3);
    expect(minf(2, 3)).toBe(2);
    expect(minf(3, 2)).toBe(2);
  });

  it('approxEqual uses an absolute tolerance', () => {
    expect(approxEqual(1, 1.00005)).toBe(true);
    expect(approxEqual(1, 1.001)).toBe(false);
    expect(approxEqual(1, 1.001, 0.01)).toBe(true);
  });
});
