/** Text rendering of a committed board, for terminals and the HTTP API. */

import { GRID_SIZE } from './config.ts';
import { classifyCell, classifyPixel, type BoardView } from './cells.ts';
import { GLYPHS } from './theme.ts';

export interface RenderOptions {
  /**
   * Characters per cell side, grid line included. 1 draws one glyph per cell
   * with no grid; 2 or more draws grid lines between cells.
   */
  cellPixels?: number;
}

/**
 * Draw the board as lines of glyphs.
 * @param view - Committed board state.
 * @param options - Render options.
 * @returns Board rows joined with newlines.
 */
export function renderBoardText(view: BoardView, options: RenderOptions = {}): string {
  const cellPixels = Math.max(1, Math.floor(options.cellPixels ?? 1));
  const rows: string[] = [];

  if (cellPixels === 1) {
    for (let y = 0; y < GRID_SIZE; y++) {
      let row = '';
      for (let x = 0; x < GRID_SIZE; x++) row += GLYPHS[classifyCell(view, x, y)];
      rows.push(row);
    }
    return rows.join('\n');
  }

  const extent = GRID_SIZE * cellPixels;
  for (let py = 0; py <= extent; py++) {
    let row = '';
    for (let px = 0; px <= extent; px++) row += GLYPHS[classifyPixel(view, px, py, cellPixels)];
    rows.push(row);
  }
  return rows.join('\n');
}
