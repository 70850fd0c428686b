// cells.ts
// Maps board positions to what a display should draw there. Reads committed
// state only and never mutates it.

import { GRID_SIZE } from './config.ts';
import type { Cell } from './snake.ts';

export type CellKind = 'background' | 'gridLine' | 'fruit' | 'snakeHead' | 'snakeBody' | 'gameOverBody';

/** The committed state a classifier needs. */
export interface BoardView {
  body: readonly Cell[];
  fruit: { x: number; y: number; pending: boolean };
  gameOver: boolean;
}

/**
 * Classify one board cell.
 * @param view - Committed board state.
 * @param x - Cell column.
 * @param y - Cell row.
 * @returns What occupies the cell.
 */
export function classifyCell(view: BoardView, x: number, y: number): CellKind {
  for (let i = 0; i < view.body.length; i++) {
    const seg = view.body[i];
    if (!seg || seg.x !== x || seg.y !== y) continue;
    if (view.gameOver) return 'gameOverBody';
    return i === 0 ? 'snakeHead' : 'snakeBody';
  }
  if (!view.fruit.pending && view.fruit.x === x && view.fruit.y === y) return 'fruit';
  return 'background';
}

/**
 * Classify a pixel of a drawn board. The board spans
 * `GRID_SIZE * cellPixels + 1` pixels per side; every multiple of
 * `cellPixels` on either axis is a grid line.
 * @param view - Committed board state.
 * @param px - Column relative to the board's top-left corner.
 * @param py - Row relative to the board's top-left corner.
 * @param cellPixels - Cell pitch in pixels, grid line included.
 * @returns What to draw at the pixel.
 */
export function classifyPixel(view: BoardView, px: number, py: number, cellPixels: number): CellKind {
  const pitch = Math.max(2, Math.floor(cellPixels));
  const extent = GRID_SIZE * pitch;
  if (px < 0 || py < 0 || px > extent || py > extent) return 'background';
  if (px % pitch === 0 || py % pitch === 0) return 'gridLine';
  return classifyCell(view, Math.floor(px / pitch), Math.floor(py / pitch));
}
