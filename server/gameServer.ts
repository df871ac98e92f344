import { performance } from 'node:perf_hooks';
import { Game } from '../src/game.ts';
import type { RandomSource } from '../src/rng.ts';
import type { ServerConfig } from './config.ts';
import type { Logger } from './logger.ts';
import { toFrameMsg, type InputMsg } from './protocol.ts';
import type { FrameSink } from './wsHub.ts';

/** Longest frame step fed to the game, in seconds. */
export const MAX_FRAME_DT = 0.1;

/** Server-side game loop and frame broadcasting. */
export class GameServer {
  /** Session driven by the loop. */
  private game: Game;
  /** Where frame messages go. */
  private sink: FrameSink;
  private logger: Logger;
  /** Loop rate in hertz. */
  private tickRateHz: number;
  /** Whether the main loop is running. */
  private running = false;
  /** Active timer id for scheduled ticks. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next tick in ms. */
  private nextTickAt = 0;
  /** Timestamp for the previous tick in ms. */
  private lastTickAt = 0;

  /**
   * Create a game server for a frame sink.
   * @param config - Normalized server configuration.
   * @param sink - Receiver of frame messages.
   * @param logger - Logger for session events.
   * @param rng - Random source for food placement.
   */
  constructor(config: ServerConfig, sink: FrameSink, logger: Logger, rng: RandomSource = Math.random) {
    this.sink = sink;
    this.logger = logger;
    this.tickRateHz = config.tickRateHz;
    this.game = new Game({
      config: config.game,
      rng,
      events: {
        onStart: () => this.logger.info('game', 'started'),
        onEat: (score, length) =>
          this.logger.debug('game', `food eaten; score ${score}, length ${length.toFixed(2)}`),
        onReset: (reason, score) =>
          this.logger.info('game', `reset after ${reason} collision with score ${score}`)
      }
    });
  }

  /** Start the server tick loop. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.nextTickAt = performance.now();
    this.lastTickAt = this.nextTickAt;
    this.loop();
  }

  /** Stop the server tick loop. */
  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  getGame(): Game {
    return this.game;
  }

  /**
   * Queue a direction from a connection.
   * @param connId - Connection id.
   * @param msg - Input message payload.
   */
  handleInput(connId: number, msg: InputMsg): void {
    this.logger.debug('input', `conn ${connId} -> ${msg.direction}`);
    this.game.pushInput(msg.direction);
  }

  /**
   * Advance the game by one frame and broadcast the result.
   * @param dt - Seconds since the previous frame, clamped to MAX_FRAME_DT.
   */
  step(dt: number): void {
    const safeDt = Math.min(Math.max(dt, 0), MAX_FRAME_DT);
    this.game.update(safeDt);
    this.sink.broadcast(toFrameMsg(this.game.snapshot()));
  }

  /** Main timer loop for scheduling ticks. */
  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    if (now >= this.nextTickAt) {
      this.step((now - this.lastTickAt) / 1000);
      this.lastTickAt = now;
      this.nextTickAt += 1000 / this.tickRateHz;
    }
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }
}
