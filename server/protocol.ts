import { isDirection, type Direction } from '../src/direction.ts';
import type { Palette } from '../src/theme.ts';

export const PROTOCOL_VERSION = 1;
/** Largest tilt magnitude accepted from a controller. */
const MAX_TILT = 4096;

/** Displays only watch; controllers may also steer and restart. */
export type ClientType = 'display' | 'controller';

export interface HelloMsg {
  type: 'hello';
  clientType: ClientType;
  version: number;
}

export interface TiltMsg {
  type: 'tilt';
  vertical: number;
  horizontal: number;
}

export interface TurnMsg {
  type: 'turn';
  dir: Direction;
}

export interface RestartMsg {
  type: 'restart';
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export type ClientMessage = HelloMsg | TiltMsg | TurnMsg | RestartMsg | PingMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  tickPeriodMs: number;
  gridSize: number;
  frameVersion: number;
  palettes: { normal: Palette; gameOver: Palette };
}

export interface StatusMsg {
  type: 'status';
  tick: number;
  length: number;
  score: number;
  digits: number[];
  gameOver: boolean;
  fruitPending: boolean;
}

export interface ControlMsg {
  type: 'control';
  granted: boolean;
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | StatusMsg | ControlMsg | ErrorMsg;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isTiltValue(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && Math.abs(value) <= MAX_TILT;
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return (
    msg['type'] === 'hello' &&
    msg['version'] === PROTOCOL_VERSION &&
    (msg['clientType'] === 'display' || msg['clientType'] === 'controller')
  );
}

export function isTilt(msg: unknown): msg is TiltMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'tilt') return false;
  return isTiltValue(msg['vertical']) && isTiltValue(msg['horizontal']);
}

export function isTurn(msg: unknown): msg is TurnMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'turn' && isDirection(msg['dir']);
}

export function isRestart(msg: unknown): msg is RestartMsg {
  return isRecord(msg) && msg['type'] === 'restart';
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  if (typeof raw['type'] !== 'string') return null;
  switch (raw['type']) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'tilt':
      return isTilt(raw) ? raw : null;
    case 'turn':
      return isTurn(raw) ? raw : null;
    case 'restart':
      return isRestart(raw) ? raw : null;
    case 'ping':
      return isPing(raw) ? raw : null;
    default:
      return null;
  }
}
