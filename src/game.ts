// game.ts
// Single owner of all game state. Everything that changes does so inside
// advance(); readers get frozen snapshots of what the last step committed.

import { GRID_CELLS } from './config.ts';
import { type Direction } from './direction.ts';
import { FruitPlacer, type PlacementOutcome } from './fruit.ts';
import { invariant } from './invariant.ts';
import { ambientEntropy, type EntropySource } from './rng.ts';
import { ScoreCounter, bcdDigits, isBcd } from './score.ts';
import { SnakeBody, commitStep, proposeStep, type Cell, type Collision } from './snake.ts';
import { DirectionArbiter, axisFromSigned } from './tilt.ts';

/** Inputs for one logical step. */
export interface AdvanceInput {
  /** Game-step pulse. */
  tick?: boolean;
  /** Restart pulse; takes priority over `tick` in the same step. */
  restart?: boolean;
  /** Direction request routed through the reversal lockout before the step. */
  requested?: Direction;
}

/** What one step did. */
export interface AdvanceResult {
  restarted: boolean;
  moved: boolean;
  grew: boolean;
  consumed: boolean;
  collision: Collision | null;
  fruit: PlacementOutcome;
}

/** Immutable view of committed state. */
export interface GameSnapshot {
  /** Steps taken since power-up or the last restart. */
  tick: number;
  body: readonly Readonly<Cell>[];
  length: number;
  /** Direction of the last committed move. */
  direction: Direction;
  /** Direction the next step will take. */
  requested: Direction;
  fruit: Readonly<{ x: number; y: number; pending: boolean }>;
  /** Packed BCD score. */
  score: number;
  digits: readonly [number, number, number, number];
  gameOver: boolean;
  prng: number;
}

export interface GameOptions {
  /** Entropy for the PRNG seed, sampled on power-up and every restart. */
  entropy?: EntropySource;
}

const IDLE_RESULT: AdvanceResult = {
  restarted: false,
  moved: false,
  grew: false,
  consumed: false,
  collision: null,
  fruit: 'idle'
};

export class Game {
  private readonly entropy: EntropySource;
  private readonly body = new SnakeBody(GRID_CELLS);
  private readonly arbiter = new DirectionArbiter();
  private readonly fruit: FruitPlacer;
  private readonly score = new ScoreCounter();
  private committed: Direction = 'right';
  private over = false;
  private tickCount = 0;
  private latest: GameSnapshot;

  constructor(options: GameOptions = {}) {
    this.entropy = options.entropy ?? ambientEntropy;
    this.fruit = new FruitPlacer(this.entropy());
    this.latest = this.buildSnapshot();
  }

  get gameOver(): boolean {
    return this.over;
  }

  /**
   * Feed one tilt sample to the direction arbiter. Not gated by the tick.
   * @param vertical - Signed vertical reading.
   * @param horizontal - Signed horizontal reading.
   * @returns True when the requested direction changed.
   */
  applyTilt(vertical: number, horizontal: number): boolean {
    const changed = this.arbiter.sample(axisFromSigned(vertical), axisFromSigned(horizontal), this.committed);
    if (changed) this.refreshSnapshot();
    return changed;
  }

  /**
   * Request a direction directly, subject to the reversal lockout.
   * @param dir - Requested direction.
   * @returns True when the requested direction changed.
   */
  requestDirection(dir: Direction): boolean {
    const changed = this.arbiter.offer(dir, this.committed);
    if (changed) this.refreshSnapshot();
    return changed;
  }

  /**
   * Run one logical step.
   * @param input - Pulses for this step.
   * @returns Summary of what changed.
   */
  advance(input: AdvanceInput): AdvanceResult {
    if (input.restart) {
      this.restart();
      return { ...IDLE_RESULT, restarted: true };
    }
    if (input.requested) this.arbiter.offer(input.requested, this.committed);
    if (!input.tick || this.over) {
      if (input.requested) this.refreshSnapshot();
      return { ...IDLE_RESULT };
    }
    return this.step();
  }

  /** Latest committed state. */
  snapshot(): GameSnapshot {
    return this.latest;
  }

  private step(): AdvanceResult {
    const direction = this.arbiter.direction;
    const placingFruit = this.fruit.pending;
    const proposal = proposeStep(this.body, direction, this.fruit.view());
    if (proposal.collision) {
      this.over = true;
      this.refreshSnapshot();
      return { ...IDLE_RESULT, collision: proposal.collision };
    }

    const lengthBefore = this.body.length;
    const { grew, consumed } = commitStep(this.body, proposal);
    invariant(this.body.length >= lengthBefore, 'body shrank during a step');
    this.committed = direction;
    this.tickCount += 1;
    if (consumed) {
      this.fruit.consume();
      this.score.increment();
    }
    // A fruit eaten this step is searched for from the next step on.
    const fruit = placingFruit ? this.fruit.attempt(this.body) : 'idle';
    this.refreshSnapshot();
    return { restarted: false, moved: true, grew, consumed, collision: null, fruit };
  }

  private restart(): void {
    this.body.reset();
    this.arbiter.reset();
    this.committed = 'right';
    this.fruit.restart(this.entropy());
    this.score.reset();
    this.over = false;
    this.tickCount = 0;
    this.refreshSnapshot();
  }

  private refreshSnapshot(): void {
    this.latest = this.buildSnapshot();
  }

  private buildSnapshot(): GameSnapshot {
    const fruit = this.fruit.view();
    if (!fruit.pending) {
      invariant(!this.body.occupies(fruit.x, fruit.y), 'placed fruit overlaps the body');
    }
    invariant(isBcd(this.score.value), 'score left packed BCD');
    const body = this.body.cells().map((cell) => Object.freeze(cell));
    return Object.freeze({
      tick: this.tickCount,
      body: Object.freeze(body),
      length: this.body.length,
      direction: this.committed,
      requested: this.arbiter.direction,
      fruit: Object.freeze(fruit),
      score: this.score.value,
      digits: Object.freeze(bcdDigits(this.score.value)),
      gameOver: this.over,
      prng: this.fruit.prng
    });
  }
}
