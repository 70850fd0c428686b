// lfsr.ts
// 8-bit Fibonacci LFSR (x^8 + x^4 + x^3 + x^2 + 1) driving fruit placement.
// The state is never zero: a zero seed or a zero transition is replaced by
// LFSR_FALLBACK.

import { LFSR_FALLBACK } from './config.ts';
import { invariant } from './invariant.ts';

/**
 * Turn an entropy sample into a usable PRNG state.
 * @param sample - Entropy sample; only the low 8 bits are kept.
 * @returns Non-zero 8-bit state.
 */
export function seedLfsr(sample: number): number {
  const byte = Number.isFinite(sample) ? Math.trunc(sample) & 0xff : 0;
  return byte === 0 ? LFSR_FALLBACK : byte;
}

/**
 * Advance the generator by one shift.
 * @param state - Current non-zero 8-bit state.
 * @returns Next non-zero 8-bit state.
 */
export function lfsrNext(state: number): number {
  invariant(state > 0 && state <= 0xff, `LFSR state out of range: ${state}`);
  const feedback = ((state >> 7) ^ (state >> 5) ^ (state >> 4) ^ (state >> 3)) & 1;
  const next = ((state << 1) | feedback) & 0xff;
  return next === 0 ? LFSR_FALLBACK : next;
}

/**
 * Split a state into a board coordinate: high nibble is x, low nibble is y.
 * @param state - 8-bit state.
 * @returns Candidate cell.
 */
export function lfsrCell(state: number): { x: number; y: number } {
  return { x: (state >> 4) & 0x0f, y: state & 0x0f };
}
