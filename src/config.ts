// config.ts
// Default game constants and validation of user supplied overrides.

/** Tunable constants consumed by the core. */
export interface GameConfig {
  /** Field width in field units. */
  fieldWidth: number;
  /** Field height in field units. */
  fieldHeight: number;
  /** Body thickness. */
  snakeWidth: number;
  /** Travel speed in units per second. */
  speed: number;
  /** Side of the square food box. */
  foodSize: number;
  /** Length added to the body per food eaten. */
  growPerFood: number;
  /** Minimum seconds between two applied turns. */
  secsPerInputUpdate: number;
}

export const CFG_DEFAULT: Readonly<GameConfig> = {
  fieldWidth: 800,
  fieldHeight: 600,
  snakeWidth: 16,
  speed: 200,
  foodSize: 16,
  growPerFood: 16,
  secsPerInputUpdate: 0.1
};

type Warn = (msg: string) => void;

/**
 * Accept a finite number within [min, max], otherwise fall back.
 * @param name - Key used in warnings.
 * @param value - Raw value.
 * @param fallback - Value used when raw is missing or invalid.
 * @param min - Inclusive lower bound.
 * @param max - Inclusive upper bound.
 * @param warn - Optional warning sink.
 * @returns Sanitised value.
 */
function coerceNumber(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  if (value === undefined || value === null) return fallback;
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string'
        ? Number.parseFloat(value)
        : Number.NaN;
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = Math.max(min, Math.min(max, parsed));
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

/**
 * Merge overrides onto the defaults and enforce cross-field constraints.
 *
 * The input interval is raised when a U-turn taken at the minimum spacing
 * would leave less than one body width between the two parallel runs.
 * @param input - Partial overrides, possibly from untrusted sources.
 * @param warn - Optional warning sink for every correction made.
 * @returns Complete game configuration.
 */
export function resolveGameConfig(input: Partial<Record<keyof GameConfig, unknown>> = {}, warn?: Warn): GameConfig {
  const fieldWidth = coerceNumber('fieldWidth', input.fieldWidth, CFG_DEFAULT.fieldWidth, 100, 10000, warn);
  const fieldHeight = coerceNumber('fieldHeight', input.fieldHeight, CFG_DEFAULT.fieldHeight, 100, 10000, warn);
  const limit = Math.min(fieldWidth, fieldHeight) / 4;
  const snakeWidth = coerceNumber('snakeWidth', input.snakeWidth, CFG_DEFAULT.snakeWidth, 1, limit, warn);
  const speed = coerceNumber('speed', input.speed, CFG_DEFAULT.speed, 1, 5000, warn);
  const foodSize = coerceNumber('foodSize', input.foodSize, CFG_DEFAULT.foodSize, 1, limit, warn);
  const growPerFood = coerceNumber('growPerFood', input.growPerFood, CFG_DEFAULT.growPerFood, 0, 1000, warn);
  let secsPerInputUpdate = coerceNumber(
    'secsPerInputUpdate',
    input.secsPerInputUpdate,
    CFG_DEFAULT.secsPerInputUpdate,
    0,
    5,
    warn
  );
  const minInterval = snakeWidth / speed;
  if (secsPerInputUpdate < minInterval) {
    warn?.(`secsPerInputUpdate raised to ${minInterval} to keep turns one body width apart.`);
    secsPerInputUpdate = minInterval;
  }
  return { fieldWidth, fieldHeight, snakeWidth, speed, foodSize, growPerFood, secsPerInputUpdate };
}
