// index.ts
// Public surface of the game core.

export { CFG_DEFAULT, resolveGameConfig, type GameConfig } from './config.ts';
export {
  DIRECTIONS,
  directionAxis,
  directionVector,
  isColinear,
  isDirection,
  opposite,
  type Axis,
  type Direction
} from './direction.ts';
export { Food, placeFood } from './food.ts';
export {
  Game,
  type FrameSnapshot,
  type GameEvents,
  type GameMode,
  type GameOptions,
  type ResetReason
} from './game.ts';
export { addPoints, rectInside, rectsOverlap, scalePoint, type Point, type Rect } from './geometry.ts';
export { Line, SEGMENT_EPSILON } from './line.ts';
export { createRng, randRange, type RandomSource } from './rng.ts';
export type { Growable, Renderable, Segment, SegmentView } from './segment.ts';
export { DEFAULT_SNAKE_WIDTH, Snake, type SnakeOptions } from './snake.ts';
export { approxEqual, clamp, maxf, minf } from './utils.ts';
