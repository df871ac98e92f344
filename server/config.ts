import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import { resolveGameConfig, type GameConfig } from '../src/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  tickRateHz: number;
  logLevel: LogLevel;
  seed?: number;
  game: GameConfig;
}

/** Raw, unvalidated config as read from TOML, env or flags. */
export interface RawServerConfig {
  host?: unknown;
  port?: unknown;
  tickRateHz?: unknown;
  logLevel?: unknown;
  seed?: unknown;
  game?: Partial<Record<keyof GameConfig, unknown>>;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5174,
  tickRateHz: 60,
  logLevel: 'info',
  game: resolveGameConfig()
};

/** Config file read when neither --config nor SNAKE_CONFIG is set. */
export const DEFAULT_CONFIG_PATH = 'server/config.toml';

type Env = Record<string, string | undefined>;
type Warn = (msg: string) => void;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = Math.max(min, Math.min(max, Math.floor(parsed)));
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

/**
 * Validate raw config values, falling back to defaults with a warning.
 * @param input - Raw values from any source.
 * @param warn - Optional warning sink.
 * @returns Complete server configuration.
 */
export function normalizeConfig(input: RawServerConfig, warn?: Warn): ServerConfig {
  // 0 asks the OS for an ephemeral port.
  const port = coerceInt('port', input.port, DEFAULT_CONFIG.port, 0, 65535, warn);
  const rawHost = input.host;
  const host = typeof rawHost === 'string' && rawHost.trim() ? rawHost.trim() : DEFAULT_CONFIG.host;
  if (rawHost !== undefined && host !== rawHost) {
    warn?.(`host is invalid; using ${host}.`);
  }
  const tickRateHz = coerceInt('tickRateHz', input.tickRateHz, DEFAULT_CONFIG.tickRateHz, 1, 240, warn);

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number' ? input.seed : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const game = resolveGameConfig(input.game ?? {}, (msg) => warn?.(`game.${msg}`));

  const output: ServerConfig = { host, port, tickRateHz, logLevel, game };
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Read a TOML config file. Missing or empty files yield an empty object.
 * @param filePath - Absolute path to read.
 * @param warn - Optional warning sink for parse failures.
 * @returns Raw config values found in the file.
 */
export function loadTomlConfig(filePath: string, warn?: Warn): RawServerConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw.trim()) return {};
  let parsed: unknown;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to parse ${filePath}: ${message}`);
    return {};
  }
  if (!isRecord(parsed)) return {};
  const out: RawServerConfig = {
    host: parsed['host'],
    port: parsed['port'],
    tickRateHz: parsed['tickRateHz'],
    logLevel: parsed['logLevel'],
    seed: parsed['seed']
  };
  const game = parsed['game'];
  if (isRecord(game)) out.game = game;
  return out;
}

/**
 * Resolve config from file, environment and CLI flags (later wins).
 * @param argv - CLI arguments after the script name.
 * @param env - Process environment.
 * @param warn - Warning sink; defaults to console.warn.
 * @returns Complete server configuration.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: Warn = (msg) => console.warn(`[config] ${msg}`)
): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SNAKE_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const input = loadTomlConfig(path.resolve(process.cwd(), configPath), warn);
  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const tickRate = parseIntValue(getArgValue(argv, '--tick')) ?? parseIntValue(env['TICK_RATE']);
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed = parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['GAME_SEED']);
  if (seed !== undefined) input.seed = seed;
  return normalizeConfig(input, warn);
}
