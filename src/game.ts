// game.ts
// Session state for one game: owns the snake, the food, pending input and
// score, and advances them once per frame.

import { resolveGameConfig, type GameConfig } from './config.ts';
import { isColinear, type Direction } from './direction.ts';
import { Food, placeFood } from './food.ts';
import type { Rect } from './geometry.ts';
import type { RandomSource } from './rng.ts';
import { Snake } from './snake.ts';

/** Pre-game waits for the first input; game runs the simulation. */
export type GameMode = 'pregame' | 'game';

/** Why a session was reset. */
export type ResetReason = 'self' | 'wall' | 'manual';

/** Hooks fired as the session changes state. */
export interface GameEvents {
  /** Pre-game switched to game. */
  onStart?: () => void;
  /** Food eaten; receives the new score and body length. */
  onEat?: (score: number, length: number) => void;
  /** Session reset; receives the score reached before the reset. */
  onReset?: (reason: ResetReason, score: number) => void;
}

/** Optional parameters for a game session. */
export interface GameOptions {
  /** Overrides merged onto the default constants. */
  config?: Partial<GameConfig>;
  /** Random source for food placement. */
  rng?: RandomSource;
  events?: GameEvents;
}

/** Per-frame data handed to the renderer. */
export interface FrameSnapshot {
  tick: number;
  mode: GameMode;
  score: number;
  length: number;
  /** Segment boxes from tail to head. */
  segments: Rect[];
  food: Rect;
}

export class Game {
  /** Resolved constants for this session. */
  readonly config: GameConfig;
  /** Field rectangle walls are checked against. */
  readonly field: Rect;
  snake: Snake;
  food: Food;
  /** Pending directions in arrival order (oldest first). */
  inputs: Direction[] = [];
  /** Seconds accumulated since the last applied turn. */
  inputTimer = 0;
  score = 0;
  mode: GameMode = 'pregame';
  /** Frames processed since construction. */
  tick = 0;
  private rng: RandomSource;
  private events: GameEvents;

  /**
   * Create a session in pre-game mode with the snake at the field centre.
   * @param options - Config overrides, random source and event hooks.
   */
  constructor(options: GameOptions = {}) {
    this.config = resolveGameConfig(options.config ?? {});
    this.field = { x: 0, y: 0, w: this.config.fieldWidth, h: this.config.fieldHeight };
    this.rng = options.rng ?? Math.random;
    this.events = options.events ?? {};
    this.snake = this.spawnSnake();
    this.food = placeFood(this.snake, this.field, this.config.foodSize, this.rng);
  }

  private spawnSnake(): Snake {
    return new Snake(this.config.fieldWidth / 2, this.config.fieldHeight / 2, {
      width: this.config.snakeWidth
    });
  }

  /**
   * Queue a direction. The first input in pre-game also starts the game.
   * @param dir - Direction received from the player.
   */
  pushInput(dir: Direction): void {
    if (this.mode === 'pregame') this.start();
    this.inputs.push(dir);
  }

  /** Leave pre-game. Does nothing while already playing. */
  start(): void {
    if (this.mode === 'game') return;
    this.mode = 'game';
    this.inputTimer = 0;
    this.events.onStart?.();
  }

  /**
   * Apply at most one turn per `secsPerInputUpdate`.
   *
   * The queue is scanned from newest to oldest; the first entry that is not
   * colinear with the current direction is applied and everything newer is
   * discarded, while older entries stay queued for later ticks. When no
   * entry turns, the whole queue is dropped.
   * @param dt - Seconds since the previous frame.
   */
  updateInput(dt: number): void {
    this.inputTimer += dt;
    if (this.inputTimer < this.config.secsPerInputUpdate) return;

    for (let idx = 0; idx < this.inputs.length; idx++) {
      const dir = this.inputs[this.inputs.length - 1 - idx];
      if (dir === undefined || isColinear(dir, this.snake.dir)) continue;
      this.inputs.length = this.inputs.length - idx - 1;
      this.snake.turn(dir);
      this.inputTimer = 0;
      return;
    }
    this.inputs.length = 0;
  }

  /**
   * React to the snake's current position: eat, die, or move.
   * @param dt - Seconds since the previous frame.
   */
  updateSnake(dt: number): void {
    if (this.snake.collidesWithBox(this.food.bbox)) {
      this.snake.growAndMove(this.config.growPerFood);
      this.score += 1;
      this.food = placeFood(this.snake, this.field, this.config.foodSize, this.rng);
      this.events.onEat?.(this.score, this.snake.length());
    } else if (this.snake.selfCollides()) {
      this.reset('self');
    } else if (this.snake.wallCollides(this.field)) {
      this.reset('wall');
    } else {
      this.snake.move(dt * this.config.speed);
    }
  }

  /**
   * Advance one frame. Nothing moves in pre-game.
   * @param dt - Seconds since the previous frame.
   */
  update(dt: number): void {
    this.tick += 1;
    if (this.mode !== 'game') return;
    this.updateInput(dt);
    this.updateSnake(dt);
  }

  /**
   * Replace the snake and food, clear input and score, return to pre-game.
   * @param reason - What caused the reset.
   */
  reset(reason: ResetReason = 'manual'): void {
    const finalScore = this.score;
    this.snake = this.spawnSnake();
    this.food = placeFood(this.snake, this.field, this.config.foodSize, this.rng);
    this.inputs.length = 0;
    this.inputTimer = 0;
    this.score = 0;
    this.mode = 'pregame';
    this.events.onReset?.(reason, finalScore);
  }

  /** Data the renderer needs for the current frame. */
  snapshot(): FrameSnapshot {
    return {
      tick: this.tick,
      mode: this.mode,
      score: this.score,
      length: this.snake.length(),
      segments: this.snake.getBBoxes(),
      food: { ...this.food.bbox }
    };
  }
}
