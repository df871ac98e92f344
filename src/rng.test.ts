import { describe, it, expect } from 'vitest';
import { createRng, randRange } from './rng.ts';

describe('rng.ts', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 10; i++) expect(a()).toBe(b());
  });

  it('stays within [0, 1)', () => {
    const rng = createRng(0);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('treats zero and non-finite seeds like seed 1', () => {
    expect(createRng(0)()).toBe(createRng(1)());
    expect(createRng(Number.NaN)()).toBe(createRng(1)());
  });

  it('scales draws into a range', () => {
    expect(randRange(() => 0, 5, 15)).toBe(5);
    expect(randRange(() => 0.5, 5, 15)).toBe(10);
  });
});
