import { describe, it, expect } from 'vitest';
import { Game } from './game.ts';
import type { EntropySource } from './rng.ts';

/** Entropy source that replays the given samples, repeating the last one. */
function entropyOf(...samples: number[]): EntropySource {
  let i = 0;
  return () => {
    const value = samples[Math.min(i, samples.length - 1)] ?? 0;
    i += 1;
    return value;
  };
}

const INITIAL_BODY = [
  { x: 8, y: 8 },
  { x: 7, y: 8 },
  { x: 6, y: 8 },
  { x: 5, y: 8 }
];

/**
 * Drive a freshly powered-up game until its head sits at (0, 8) heading left.
 * The fixed power-up fruit at (12, 8) stays out of the path.
 */
function driveToLeftEdge(game: Game): void {
  game.advance({ tick: true, requested: 'up' });
  game.advance({ tick: true, requested: 'left' });
  game.advance({ tick: true });
  game.advance({ tick: true, requested: 'down' });
  for (let i = 0; i < 6; i++) game.advance({ tick: true, requested: 'left' });
}

describe('acceptance: game scenarios', () => {
  it('powers up with the documented layout', () => {
    const snap = new Game({ entropy: entropyOf(0x12) }).snapshot();
    expect(snap.body).toEqual(INITIAL_BODY);
    expect(snap.length).toBe(4);
    expect(snap.direction).toBe('right');
    expect(snap.requested).toBe('right');
    expect(snap.fruit).toEqual({ x: 12, y: 8, pending: false });
    expect(snap.score).toBe(0);
    expect(snap.digits).toEqual([0, 0, 0, 0]);
    expect(snap.gameOver).toBe(false);
    expect(snap.prng).toBe(0x12);
    expect(snap.tick).toBe(0);
  });

  it('moves one cell right on the first tick after a restart', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    game.advance({ restart: true });
    expect(game.snapshot().fruit.pending).toBe(true);

    const result = game.advance({ tick: true });
    const snap = game.snapshot();
    expect(result.moved).toBe(true);
    expect(snap.body).toEqual([
      { x: 9, y: 8 },
      { x: 8, y: 8 },
      { x: 7, y: 8 },
      { x: 6, y: 8 }
    ]);
    expect(snap.length).toBe(4);
    expect(snap.score).toBe(0);
  });

  it('grows and scores when the head reaches the fruit', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    for (let i = 0; i < 3; i++) game.advance({ tick: true });
    expect(game.snapshot().body[0]).toEqual({ x: 11, y: 8 });

    const result = game.advance({ tick: true });
    const snap = game.snapshot();
    expect(result).toEqual({
      restarted: false,
      moved: true,
      grew: true,
      consumed: true,
      collision: null,
      fruit: 'idle'
    });
    expect(snap.length).toBe(5);
    expect(snap.body).toEqual([
      { x: 12, y: 8 },
      { x: 11, y: 8 },
      { x: 10, y: 8 },
      { x: 9, y: 8 },
      { x: 8, y: 8 }
    ]);
    expect(snap.score).toBe(0x0001);
    expect(snap.fruit.pending).toBe(true);
  });

  it('places the next fruit from the PRNG on the following tick', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    for (let i = 0; i < 4; i++) game.advance({ tick: true });
    const result = game.advance({ tick: true });
    expect(result.fruit).toBe('placed');
    expect(game.snapshot().fruit).toEqual({ x: 1, y: 2, pending: false });
    expect(game.snapshot().prng).toBe(0x25);
  });

  it('ends the game on the left wall and freezes the board', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    driveToLeftEdge(game);
    const before = game.snapshot();
    expect(before.body[0]).toEqual({ x: 0, y: 8 });
    expect(before.gameOver).toBe(false);

    const result = game.advance({ tick: true });
    expect(result.collision).toBe('wall');
    expect(result.moved).toBe(false);
    const over = game.snapshot();
    expect(over.gameOver).toBe(true);
    expect(over.body).toEqual(before.body);

    for (let i = 0; i < 3; i++) {
      expect(game.advance({ tick: true }).moved).toBe(false);
    }
    expect(game.snapshot().body).toEqual(before.body);
    expect(game.snapshot().tick).toBe(before.tick);
    expect(game.snapshot().prng).toBe(before.prng);
  });

  it('restarts everything in one step while the game is over', () => {
    const game = new Game({ entropy: entropyOf(0x12, 0x33) });
    driveToLeftEdge(game);
    game.advance({ tick: true });
    expect(game.gameOver).toBe(true);

    const result = game.advance({ restart: true });
    const snap = game.snapshot();
    expect(result.restarted).toBe(true);
    expect(snap.body).toEqual(INITIAL_BODY);
    expect(snap.direction).toBe('right');
    expect(snap.requested).toBe('right');
    expect(snap.fruit.pending).toBe(true);
    expect(snap.score).toBe(0);
    expect(snap.gameOver).toBe(false);
    expect(snap.prng).toBe(0x33);
    expect(snap.tick).toBe(0);
  });

  it('falls back to the fixed seed when the restart sample is zero', () => {
    const game = new Game({ entropy: entropyOf(0x12, 0) });
    game.advance({ restart: true });
    expect(game.snapshot().prng).toBe(0xa5);
  });

  it('lets restart win over a tick in the same step', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    game.advance({ tick: true });
    game.advance({ tick: true, restart: true });
    expect(game.snapshot().body).toEqual(INITIAL_BODY);
    expect(game.snapshot().tick).toBe(0);
  });

  it('locks out reversals against the committed direction', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    expect(game.requestDirection('left')).toBe(false);
    expect(game.applyTilt(0, -100)).toBe(false);
    expect(game.snapshot().requested).toBe('right');

    expect(game.applyTilt(-100, 0)).toBe(true);
    expect(game.requestDirection('left')).toBe(false);
    expect(game.snapshot().requested).toBe('up');

    game.advance({ tick: true });
    expect(game.snapshot().direction).toBe('up');
    expect(game.requestDirection('left')).toBe(true);
    expect(game.requestDirection('down')).toBe(false);
  });

  it('hands out frozen snapshots that later steps do not touch', () => {
    const game = new Game({ entropy: entropyOf(0x12) });
    const before = game.snapshot();
    game.advance({ tick: true });
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.body)).toBe(true);
    expect(before.body[0]).toEqual({ x: 8, y: 8 });
    expect(game.snapshot().body[0]).toEqual({ x: 9, y: 8 });
  });

  it('keeps its invariants over a long seeded session', () => {
    let dirSeed = 0x2f;
    const nextDir = () => {
      dirSeed = (dirSeed * 1103515245 + 12345) >>> 0;
      return (['up', 'right', 'down', 'left'] as const)[(dirSeed >>> 16) % 4] ?? 'right';
    };
    let samples = 0;
    const game = new Game({ entropy: () => (samples++ * 37 + 11) & 0xff });
    let lastLength = game.snapshot().length;
    let restarts = 0;

    for (let step = 0; step < 3000; step++) {
      if (game.gameOver) {
        game.advance({ restart: true });
        restarts += 1;
        lastLength = game.snapshot().length;
        continue;
      }
      game.advance({ tick: true, requested: nextDir() });
      const snap = game.snapshot();

      expect(snap.length).toBeGreaterThanOrEqual(lastLength);
      lastLength = snap.length;

      const keys = new Set(snap.body.map((c) => c.x * 16 + c.y));
      expect(keys.size).toBe(snap.length);
      if (!snap.fruit.pending) {
        expect(keys.has(snap.fruit.x * 16 + snap.fruit.y)).toBe(false);
      }
      expect(snap.prng).not.toBe(0);
      const digits = snap.digits;
      expect(digits[0] * 1000 + digits[1] * 100 + digits[2] * 10 + digits[3]).toBe(snap.length - 4);
    }
    expect(restarts).toBeGreaterThan(0);
  });
});
