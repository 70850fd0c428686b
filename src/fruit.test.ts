import { describe, it, expect } from 'vitest';
import { FruitPlacer } from './fruit.ts';
import { lfsrNext } from './lfsr.ts';
import { SnakeBody } from './snake.ts';

describe('fruit.ts', () => {
  it('powers up with the fixed fruit already placed', () => {
    const fruit = new FruitPlacer(0);
    expect(fruit.view()).toEqual({ x: 12, y: 8, pending: false });
    expect(fruit.prng).toBe(0xa5);
  });

  it('does nothing while a fruit is placed', () => {
    const fruit = new FruitPlacer(0x40);
    expect(fruit.attempt(new SnakeBody())).toBe('idle');
    expect(fruit.prng).toBe(0x40);
  });

  it('places the candidate cell when it is free and advances the PRNG', () => {
    const fruit = new FruitPlacer(1);
    fruit.restart(0x12);
    expect(fruit.pending).toBe(true);
    expect(fruit.attempt(new SnakeBody())).toBe('placed');
    expect(fruit.view()).toEqual({ x: 1, y: 2, pending: false });
    expect(fruit.prng).toBe(0x25);
  });

  it('retries on the next attempt after landing on the body', () => {
    const fruit = new FruitPlacer(1);
    const body = new SnakeBody();
    fruit.restart(0x88);
    expect(fruit.attempt(body)).toBe('rejected');
    expect(fruit.pending).toBe(true);
    expect(fruit.prng).toBe(0x10);
    expect(fruit.attempt(body)).toBe('placed');
    expect(fruit.view()).toEqual({ x: 1, y: 0, pending: false });
  });

  it('returns to the power-up layout', () => {
    const fruit = new FruitPlacer(0x12);
    fruit.restart(0x12);
    fruit.attempt(new SnakeBody());
    fruit.powerUp(0);
    expect(fruit.view()).toEqual({ x: 12, y: 8, pending: false });
    expect(fruit.prng).toBe(0xa5);
  });

  it('marks the fruit pending when consumed', () => {
    const fruit = new FruitPlacer(1);
    fruit.consume();
    expect(fruit.pending).toBe(true);
  });

  it('never places a fruit on the body', () => {
    const body = new SnakeBody();
    body.load([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 3, y: 0 },
      { x: 3, y: 1 },
      { x: 2, y: 1 },
      { x: 1, y: 1 },
      { x: 0, y: 1 }
    ]);
    for (let seed = 1; seed <= 0xff; seed++) {
      const fruit = new FruitPlacer(seed);
      fruit.restart(seed);
      let expected = seed;
      let attempts = 0;
      while (fruit.pending && attempts < 255) {
        fruit.attempt(body);
        expected = lfsrNext(expected);
        attempts += 1;
        expect(fruit.prng).toBe(expected);
      }
      expect(fruit.pending).toBe(false);
      expect(body.occupies(fruit.x, fruit.y)).toBe(false);
    }
  });
});
