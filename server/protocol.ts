import { isDirection, type Direction } from '../src/direction.ts';
import type { FrameSnapshot } from '../src/game.ts';

export const PROTOCOL_VERSION = 1;

export interface HelloMsg {
  type: 'hello';
  version: number;
}

export interface InputMsg {
  type: 'input';
  direction: Direction;
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export type ClientMessage = HelloMsg | InputMsg | PingMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  tickRate: number;
  field: { w: number; h: number };
  snakeWidth: number;
}

export interface FrameMsg extends FrameSnapshot {
  type: 'frame';
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | FrameMsg | ErrorMsg;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'hello' && msg['version'] === PROTOCOL_VERSION;
}

export function isInput(msg: unknown): msg is InputMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'input' && isDirection(msg['direction']);
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  return msg['t'] === undefined || isFiniteNumber(msg['t']);
}

/**
 * Validate an already JSON-decoded client payload.
 * @param msg - Decoded payload.
 * @returns Typed message, or null when it matches no known shape.
 */
export function parseClientMessage(msg: unknown): ClientMessage | null {
  if (isHello(msg)) return { type: 'hello', version: msg.version };
  if (isInput(msg)) return { type: 'input', direction: msg.direction };
  if (isPing(msg)) return msg.t === undefined ? { type: 'ping' } : { type: 'ping', t: msg.t };
  return null;
}

/** Wrap a game snapshot as a frame message. */
export function toFrameMsg(snapshot: FrameSnapshot): FrameMsg {
  return { type: 'frame', ...snapshot };
}
