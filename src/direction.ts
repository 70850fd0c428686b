// direction.ts
// Cardinal directions on the board, in cyclic order.

export type Direction = 'up' | 'right' | 'down' | 'left';

/** Cyclic order; a direction's opposite sits two steps away. */
export const DIRECTIONS: readonly Direction[] = ['up', 'right', 'down', 'left'];

/** Cell offsets per direction. `y` grows downwards. */
const DELTAS: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: -1 },
  right: { dx: 1, dy: 0 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 }
};

/**
 * Numeric code used on the wire (index in {@link DIRECTIONS}).
 * @param dir - Direction to encode.
 * @returns Code in [0, 3].
 */
export function directionCode(dir: Direction): number {
  return DIRECTIONS.indexOf(dir);
}

/**
 * Decode a wire code back into a direction.
 * @param code - Candidate code.
 * @returns Direction or null for anything outside [0, 3].
 */
export function directionFromCode(code: number): Direction | null {
  if (!Number.isInteger(code)) return null;
  return DIRECTIONS[code] ?? null;
}

export function opposite(dir: Direction): Direction {
  const idx = directionCode(dir);
  return DIRECTIONS[(idx + 2) % DIRECTIONS.length] ?? dir;
}

export function isOpposite(a: Direction, b: Direction): boolean {
  return opposite(a) === b;
}

export function stepDelta(dir: Direction): { dx: number; dy: number } {
  return DELTAS[dir];
}

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((dir) => dir === value);
}
