/** Packs committed game state into compact binary frames for displays. */

import { directionCode } from './direction.ts';
import type { GameSnapshot } from './game.ts';
import {
  FRAME_FLAG_FRUIT_PENDING,
  FRAME_FLAG_GAME_OVER,
  FRAME_HEADER_BYTES,
  FRAME_HEADER_OFFSETS,
  FRAME_VERSION,
  packCell
} from './protocol/frame.ts';

/** Serializer for packing a snapshot into a Uint8Array. */
export class GameSerializer {
  /**
   * Packs a snapshot into a binary frame.
   *
   * Buffer Layout Contract v1 (big-endian):
   * 1. Header (13 bytes):
   *    [version, flags, direction, fruitX, fruitY, score:u16, length:u16, tick:u32]
   *    flags: bit0 = game over, bit1 = fruit pending.
   * 2. Body block (`length` bytes):
   *    one byte per segment, head first, x in the high nibble and y in the low.
   *
   * @param snapshot - Committed state to serialize.
   * @returns Frame bytes.
   */
  static serialize(snapshot: GameSnapshot): Uint8Array {
    const bytes = new Uint8Array(FRAME_HEADER_BYTES + snapshot.body.length);
    const view = new DataView(bytes.buffer);

    let flags = 0;
    if (snapshot.gameOver) flags |= FRAME_FLAG_GAME_OVER;
    if (snapshot.fruit.pending) flags |= FRAME_FLAG_FRUIT_PENDING;

    view.setUint8(FRAME_HEADER_OFFSETS.version, FRAME_VERSION);
    view.setUint8(FRAME_HEADER_OFFSETS.flags, flags);
    view.setUint8(FRAME_HEADER_OFFSETS.direction, directionCode(snapshot.direction));
    view.setUint8(FRAME_HEADER_OFFSETS.fruitX, snapshot.fruit.x);
    view.setUint8(FRAME_HEADER_OFFSETS.fruitY, snapshot.fruit.y);
    view.setUint16(FRAME_HEADER_OFFSETS.score, snapshot.score);
    view.setUint16(FRAME_HEADER_OFFSETS.length, snapshot.body.length);
    // The tick counter wraps rather than overflowing the field.
    view.setUint32(FRAME_HEADER_OFFSETS.tick, snapshot.tick >>> 0);

    let ptr = FRAME_HEADER_BYTES;
    for (const cell of snapshot.body) {
      bytes[ptr++] = packCell(cell.x, cell.y);
    }
    return bytes;
  }
}
