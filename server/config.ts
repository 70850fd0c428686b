import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  maxInputsPerTick: number;
  maxInputsPerSecond: number;
  statusIntervalMs: number;
  seed?: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5180,
  logLevel: 'info',
  maxInputsPerTick: 4,
  maxInputsPerSecond: 120,
  statusIntervalMs: 1000
};

/** Config file read when neither --config nor TILTSNAKE_CONFIG is given. */
export const DEFAULT_CONFIG_PATH = 'server/config.toml';

type Env = Record<string, string | undefined>;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const CONFIG_KEYS: Array<keyof ServerConfig> = [
  'host',
  'port',
  'logLevel',
  'maxInputsPerTick',
  'maxInputsPerSecond',
  'statusIntervalMs',
  'seed'
];

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
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

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: (msg: string) => void
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
  const whole = Math.floor(parsed);
  const clamped = clampInt(whole, min, max);
  if (clamped !== whole) {
    warn?.(`${name} was clamped to ${clamped}.`);
  } else if (whole !== parsed) {
    warn?.(`${name} was rounded down to ${whole}.`);
  }
  return clamped;
}

/** Loosely typed config input, as read from TOML, env or argv. */
export type RawConfig = { [K in keyof ServerConfig]?: unknown };

export function normalizeConfig(input: RawConfig, warn?: (msg: string) => void): ServerConfig {
  const port = coerceInt('port', input.port, DEFAULT_CONFIG.port, 0, 65535, warn);
  const rawHost = input.host;
  const host = typeof rawHost === 'string' && rawHost.trim() ? rawHost.trim() : DEFAULT_CONFIG.host;
  if (rawHost !== undefined && (typeof rawHost !== 'string' || !rawHost.trim())) {
    warn?.(`host is invalid; using ${host}.`);
  }
  const maxInputsPerTick = coerceInt(
    'maxInputsPerTick',
    input.maxInputsPerTick,
    DEFAULT_CONFIG.maxInputsPerTick,
    1,
    64,
    warn
  );
  const maxInputsPerSecond = coerceInt(
    'maxInputsPerSecond',
    input.maxInputsPerSecond,
    DEFAULT_CONFIG.maxInputsPerSecond,
    1,
    10000,
    warn
  );
  const statusIntervalMs = coerceInt(
    'statusIntervalMs',
    input.statusIntervalMs,
    DEFAULT_CONFIG.statusIntervalMs,
    100,
    60000,
    warn
  );

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number'
        ? input.seed
        : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: ServerConfig = {
    host,
    port,
    logLevel,
    maxInputsPerTick,
    maxInputsPerSecond,
    statusIntervalMs
  };
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Parse TOML config text. Unknown keys are dropped.
 * @param text - TOML source.
 * @returns Raw config values.
 * @throws When the text is not valid TOML.
 */
export function parseTomlConfig(text: string): RawConfig {
  if (!text.trim()) return {};
  const table = parseToml(text);
  const output: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    if (key in table) output[key] = table[key];
  }
  return output;
}

/**
 * Load a TOML config file.
 * @param filePath - File to read.
 * @param warn - Receives a message when the file is unreadable or malformed.
 * @returns Raw config values, empty when the file is missing or invalid.
 */
export function loadConfigFile(filePath: string, warn?: (msg: string) => void): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  try {
    return parseTomlConfig(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to read ${filePath}: ${message}`);
    return {};
  }
}

export function parseConfig(
  argv: string[],
  env: Env,
  warn: (msg: string) => void = (msg) => console.warn(`[config] ${msg}`)
): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['TILTSNAKE_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const input: RawConfig = loadConfigFile(path.resolve(process.cwd(), configPath), warn);

  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed = parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['GAME_SEED']);
  if (seed !== undefined) input.seed = seed;
  const perTick =
    parseIntValue(getArgValue(argv, '--inputs-per-tick')) ?? parseIntValue(env['INPUTS_PER_TICK']);
  if (perTick !== undefined) input.maxInputsPerTick = perTick;
  const perSecond =
    parseIntValue(getArgValue(argv, '--inputs-per-second')) ?? parseIntValue(env['INPUTS_PER_SECOND']);
  if (perSecond !== undefined) input.maxInputsPerSecond = perSecond;
  const statusInterval =
    parseIntValue(getArgValue(argv, '--status-interval')) ?? parseIntValue(env['STATUS_INTERVAL_MS']);
  if (statusInterval !== undefined) input.statusIntervalMs = statusInterval;

  return normalizeConfig(input, warn);
}
