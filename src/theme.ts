// theme.ts
// Display palettes per cell kind. Displays switch to the overlay palette while
// the game is over; the board itself is drawn from the frozen state unchanged.

import type { CellKind } from './cells.ts';

export type Palette = Record<CellKind, string>;

export const THEME: { normal: Palette; gameOver: Palette } = {
  normal: {
    background: '#000000',
    gridLine: '#202020',
    fruit: '#ff3030',
    snakeHead: '#30ff30',
    snakeBody: '#20a020',
    gameOverBody: '#ff8000'
  },
  // Overlay: dimmed board, body in alarm colour.
  gameOver: {
    background: '#200000',
    gridLine: '#401010',
    fruit: '#802020',
    snakeHead: '#ff8000',
    snakeBody: '#ff8000',
    gameOverBody: '#ff8000'
  }
};

/** Single-character glyphs for text boards. */
export const GLYPHS: Record<CellKind, string> = {
  background: '.',
  gridLine: '+',
  fruit: '*',
  snakeHead: '@',
  snakeBody: 'o',
  gameOverBody: 'x'
};

