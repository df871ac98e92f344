import { describe, it, expect } from 'vitest';
import { CFG_DEFAULT, resolveGameConfig } from './config.ts';

describe('config.ts', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveGameConfig()).toEqual(CFG_DEFAULT);
  });

  it('applies valid overrides, including numeric strings', () => {
    const cfg = resolveGameConfig({ speed: 300, fieldWidth: '1024' });
    expect(cfg.speed).toBe(300);
    expect(cfg.fieldWidth).toBe(1024);
  });

  it('falls back on invalid values and warns', () => {
    const warnings: string[] = [];
    const cfg = resolveGameConfig({ snakeWidth: 'wide', foodSize: Number.NaN }, (msg) => warnings.push(msg));
    expect(cfg.snakeWidth).toBe(CFG_DEFAULT.snakeWidth);
    expect(cfg.foodSize).toBe(CFG_DEFAULT.foodSize);
    expect(warnings).toEqual(['snakeWidth is invalid; using 16.', 'foodSize is invalid; using 16.']);
  });

  it('clamps out-of-range values', () => {
    const warnings: string[] = [];
    const cfg = resolveGameConfig({ fieldHeight: 50 }, (msg) => warnings.push(msg));
    expect(cfg.fieldHeight).toBe(100);
    expect(warnings).toEqual(['fieldHeight was clamped to 100.']);
  });

  it('keeps turns at least one body width apart', () => {
    const warnings: string[] = [];
    const cfg = resolveGameConfig({ secsPerInputUpdate: 0.01 }, (msg) => warnings.push(msg));
    expect(cfg.secsPerInputUpdate).toBe(16 / 200);
    expect(warnings).toEqual([`secsPerInputUpdate raised to ${16 / 200} to keep turns one body width apart.`]);
  });
});
