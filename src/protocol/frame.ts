import { directionFromCode, type Direction } from '../direction.ts';
import type { Cell } from '../snake.ts';

export const FRAME_VERSION = 1;

export const FRAME_HEADER_OFFSETS = {
  version: 0,
  flags: 1,
  direction: 2,
  fruitX: 3,
  fruitY: 4,
  score: 5,
  length: 7,
  tick: 9
} as const;

export const FRAME_HEADER_BYTES = 13;

export const FRAME_FLAG_GAME_OVER = 0b01;
export const FRAME_FLAG_FRUIT_PENDING = 0b10;

export interface FrameData {
  tick: number;
  gameOver: boolean;
  direction: Direction;
  fruit: { x: number; y: number; pending: boolean };
  score: number;
  body: Cell[];
}

export function packCell(x: number, y: number): number {
  return ((x & 0x0f) << 4) | (y & 0x0f);
}

export function unpackCell(byte: number): Cell {
  return { x: (byte >> 4) & 0x0f, y: byte & 0x0f };
}

export function readFrame(bytes: Uint8Array): FrameData | null {
  if (bytes.byteLength < FRAME_HEADER_BYTES) return null;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (view.getUint8(FRAME_HEADER_OFFSETS.version) !== FRAME_VERSION) return null;
  const direction = directionFromCode(view.getUint8(FRAME_HEADER_OFFSETS.direction));
  if (!direction) return null;
  const length = view.getUint16(FRAME_HEADER_OFFSETS.length);
  if (bytes.byteLength !== FRAME_HEADER_BYTES + length) return null;

  const flags = view.getUint8(FRAME_HEADER_OFFSETS.flags);
  const body: Cell[] = [];
  for (let i = 0; i < length; i++) {
    body.push(unpackCell(view.getUint8(FRAME_HEADER_BYTES + i)));
  }
  return {
    tick: view.getUint32(FRAME_HEADER_OFFSETS.tick),
    gameOver: (flags & FRAME_FLAG_GAME_OVER) !== 0,
    direction,
    fruit: {
      x: view.getUint8(FRAME_HEADER_OFFSETS.fruitX),
      y: view.getUint8(FRAME_HEADER_OFFSETS.fruitY),
      pending: (flags & FRAME_FLAG_FRUIT_PENDING) !== 0
    },
    score: view.getUint16(FRAME_HEADER_OFFSETS.score),
    body
  };
}
