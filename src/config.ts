// config.ts
// Fixed board geometry and timing. None of these values are runtime settings:
// the game is defined on a 16×16 board stepped at a constant period.

/** Cells per board side. */
export const GRID_SIZE = 16;

/** Largest coordinate on either axis. */
export const GRID_MAX = GRID_SIZE - 1;

/** Total cell count, which is also the body capacity. */
export const GRID_CELLS = GRID_SIZE * GRID_SIZE;

/** Milliseconds between game steps. */
export const TICK_PERIOD_MS = 150;

/** Minimum tilt magnitude for an axis to take part in direction selection. */
export const TILT_DEADZONE = 16;

/** Body laid out on power-up and restart, head first. */
export const INITIAL_BODY: ReadonlyArray<readonly [number, number]> = [
  [8, 8],
  [7, 8],
  [6, 8],
  [5, 8]
];

/** Fruit cell placed on power-up (restart defers placement instead). */
export const INITIAL_FRUIT = { x: 12, y: 8 } as const;

/** Substitute PRNG state for a zero seed or a zero transition. */
export const LFSR_FALLBACK = 0xa5;

/** Largest value the 4-digit BCD score can hold. */
export const SCORE_MAX = 0x9999;
