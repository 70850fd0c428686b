// fruit.ts
// Fruit placement: one LFSR-driven attempt per tick while no fruit is placed.

import { INITIAL_FRUIT } from './config.ts';
import { lfsrCell, lfsrNext, seedLfsr } from './lfsr.ts';
import { invariant } from './invariant.ts';
import type { FruitView, SnakeBody } from './snake.ts';

export type PlacementOutcome = 'idle' | 'placed' | 'rejected';

/** Owns the fruit cell, its pending flag and the PRNG that feeds it. */
export class FruitPlacer {
  private fx: number = INITIAL_FRUIT.x;
  private fy: number = INITIAL_FRUIT.y;
  private isPending = false;
  private state: number;

  constructor(seed: number) {
    this.state = seedLfsr(seed);
  }

  get x(): number {
    return this.fx;
  }

  get y(): number {
    return this.fy;
  }

  get pending(): boolean {
    return this.isPending;
  }

  /** Current PRNG state. */
  get prng(): number {
    return this.state;
  }

  view(): FruitView {
    return { x: this.fx, y: this.fy, pending: this.isPending };
  }

  /** Power-up layout: fixed fruit cell, already placed. */
  powerUp(seed: number): void {
    this.state = seedLfsr(seed);
    this.fx = INITIAL_FRUIT.x;
    this.fy = INITIAL_FRUIT.y;
    this.isPending = false;
  }

  /** Restart layout: placement deferred to the following ticks. */
  restart(seed: number): void {
    this.state = seedLfsr(seed);
    this.isPending = true;
  }

  consume(): void {
    this.isPending = true;
  }

  /**
   * Try the PRNG's current cell once, then advance the PRNG.
   * @param body - Body to keep the fruit clear of.
   * @returns `idle` when a fruit is already placed, otherwise whether the
   * candidate was taken.
   */
  attempt(body: SnakeBody): PlacementOutcome {
    if (!this.isPending) return 'idle';
    const candidate = lfsrCell(this.state);
    const free = !body.occupies(candidate.x, candidate.y);
    if (free) {
      this.fx = candidate.x;
      this.fy = candidate.y;
      this.isPending = false;
    }
    this.state = lfsrNext(this.state);
    invariant(this.state !== 0, 'PRNG reached zero');
    return free ? 'placed' : 'rejected';
  }
}
