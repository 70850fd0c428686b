// snake.ts
// Snake body storage and the per-tick movement rule.
//
// The body lives in two fixed-capacity coordinate arrays with an explicit
// length, head at index 0. A step is computed first as a pure proposal from
// the committed body, then committed in one go, so collision checks never see
// a half-moved snake.

import { GRID_CELLS, GRID_MAX, INITIAL_BODY } from './config.ts';
import { stepDelta, type Direction } from './direction.ts';
import { invariant } from './invariant.ts';

/** Board coordinate. */
export interface Cell {
  x: number;
  y: number;
}

/** Fruit as seen by the movement rule. */
export interface FruitView {
  x: number;
  y: number;
  pending: boolean;
}

export type Collision = 'wall' | 'self';

/** Outcome of applying one direction to the committed body. */
export interface StepProposal {
  /** Next head cell; may lie off the board when `collision` is `wall`. */
  head: Cell;
  /** Whether the next head lands on a placed fruit. */
  willGrow: boolean;
  collision: Collision | null;
}

/** Ordered snake body with a fixed capacity of one slot per board cell. */
export class SnakeBody {
  /** Maximum number of segments. */
  readonly capacity: number;
  /** Segment x coordinates, head first. */
  private xs: Uint8Array;
  /** Segment y coordinates, head first. */
  private ys: Uint8Array;
  /** Occupied segment count. */
  private len = 0;

  constructor(capacity = GRID_CELLS) {
    this.capacity = capacity;
    this.xs = new Uint8Array(capacity);
    this.ys = new Uint8Array(capacity);
    this.reset();
  }

  get length(): number {
    return this.len;
  }

  get headX(): number {
    return this.xs[0] ?? 0;
  }

  get headY(): number {
    return this.ys[0] ?? 0;
  }

  /** Lay out the starting body. */
  reset(): void {
    this.load(INITIAL_BODY.map(([x, y]) => ({ x, y })));
  }

  /**
   * Replace the body with the given cells, head first.
   * @param cells - Segments to store; must be distinct and on the board.
   */
  load(cells: readonly Cell[]): void {
    invariant(
      cells.length >= 1 && cells.length <= this.capacity,
      `body length ${cells.length} outside [1, ${this.capacity}]`
    );
    cells.forEach((cell, i) => {
      invariant(isOnBoard(cell.x, cell.y), `segment ${i} is off the board`);
      this.xs[i] = cell.x;
      this.ys[i] = cell.y;
    });
    this.len = cells.length;
    this.assertDistinct();
  }

  cells(): Cell[] {
    const out: Cell[] = [];
    for (let i = 0; i < this.len; i++) {
      out.push({ x: this.xs[i] ?? 0, y: this.ys[i] ?? 0 });
    }
    return out;
  }

  /**
   * Find the segment index covering a cell.
   * @param x - Cell column.
   * @param y - Cell row.
   * @param limit - Number of leading segments to search (defaults to all).
   * @returns Segment index or -1.
   */
  indexOf(x: number, y: number, limit = this.len): number {
    const end = Math.min(limit, this.len);
    for (let i = 0; i < end; i++) {
      if (this.xs[i] === x && this.ys[i] === y) return i;
    }
    return -1;
  }

  occupies(x: number, y: number): boolean {
    return this.indexOf(x, y) !== -1;
  }

  /**
   * Shift every segment one slot towards the tail and write a new head.
   * @param head - New head cell.
   * @param grow - Keep the old tail by extending the length.
   * @returns True when the length grew; false when growth was not asked for
   * or the body is already at capacity.
   */
  advance(head: Cell, grow: boolean): boolean {
    // Slot `len` receives the old tail so that growth only needs a length bump.
    const last = Math.min(this.len, this.capacity - 1);
    this.xs.copyWithin(1, 0, last);
    this.ys.copyWithin(1, 0, last);
    this.xs[0] = head.x;
    this.ys[0] = head.y;
    const grew = grow && this.len < this.capacity;
    if (grew) this.len += 1;
    invariant(this.len <= this.capacity, `body length ${this.len} exceeds capacity`);
    this.assertDistinct();
    return grew;
  }

  private assertDistinct(): void {
    const seen = new Set<number>();
    for (let i = 0; i < this.len; i++) {
      const key = ((this.xs[i] ?? 0) << 8) | (this.ys[i] ?? 0);
      invariant(!seen.has(key), `segment ${i} overlaps an earlier segment`);
      seen.add(key);
    }
  }
}

export function isOnBoard(x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x <= GRID_MAX && y >= 0 && y <= GRID_MAX;
}

/**
 * Work out what one step in a direction would do, without mutating anything.
 * @param body - Committed body.
 * @param direction - Direction to move in.
 * @param fruit - Committed fruit.
 * @returns Next head, growth flag and collision cause.
 */
export function proposeStep(body: SnakeBody, direction: Direction, fruit: FruitView): StepProposal {
  const { dx, dy } = stepDelta(direction);
  const head = { x: body.headX + dx, y: body.headY + dy };
  if (!isOnBoard(head.x, head.y)) {
    return { head, willGrow: false, collision: 'wall' };
  }

  const willGrow = !fruit.pending && fruit.x === head.x && fruit.y === head.y;
  // Without growth the tail leaves its cell this same step, so it is not an obstacle.
  const checked = willGrow ? body.length : body.length - 1;
  const collision: Collision | null = body.indexOf(head.x, head.y, checked) !== -1 ? 'self' : null;
  return { head, willGrow, collision };
}

/**
 * Apply a collision-free proposal to the body.
 * @param body - Body to mutate.
 * @param proposal - Result of {@link proposeStep} for the same body.
 * @returns `grew` when the length went up and `consumed` when a fruit was
 * eaten (the latter also holds when growth was suppressed at capacity).
 */
export function commitStep(body: SnakeBody, proposal: StepProposal): { grew: boolean; consumed: boolean } {
  invariant(proposal.collision === null, `cannot commit a ${proposal.collision} collision`);
  const grew = body.advance(proposal.head, proposal.willGrow);
  return { grew, consumed: proposal.willGrow };
}
