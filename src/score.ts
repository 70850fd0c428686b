// score.ts
// Four-digit packed BCD score. Each nibble holds one decimal digit, so the
// value can be shown digit by digit without any binary-to-decimal step.

import { SCORE_MAX } from './config.ts';
import { InvariantError, invariant } from './invariant.ts';

/** Digits in the score, most significant first when listed. */
export const SCORE_DIGITS = 4;

/**
 * Check that every nibble of a 16-bit value is a decimal digit.
 * @param value - Candidate packed value.
 * @returns True for 0x0000..0x9999 with no nibble above 9.
 */
export function isBcd(value: number): boolean {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) return false;
  for (let shift = 0; shift < SCORE_DIGITS * 4; shift += 4) {
    if (((value >> shift) & 0x0f) > 9) return false;
  }
  return true;
}

/**
 * Add one in decimal digit arithmetic, saturating at 9999.
 * @param value - Packed BCD value.
 * @returns Incremented packed BCD value.
 */
export function bcdIncrement(value: number): number {
  invariant(isBcd(value), `score is not packed BCD: 0x${value.toString(16)}`);
  if (value >= SCORE_MAX) return SCORE_MAX;

  let result = value;
  for (let shift = 0; shift < SCORE_DIGITS * 4; shift += 4) {
    const digit = (result >> shift) & 0x0f;
    if (digit < 9) {
      return result + (1 << shift);
    }
    // Digit rolls over to 0 and carries into the next nibble.
    result &= ~(0x0f << shift);
  }
  // Unreachable: only 0x9999 carries out of the top digit, and it returned above.
  throw new InvariantError('score carried past its top digit');
}

/**
 * Unpack a score into decimal digits.
 * @param value - Packed BCD value.
 * @returns Digits, most significant first.
 */
export function bcdDigits(value: number): [number, number, number, number] {
  return [(value >> 12) & 0x0f, (value >> 8) & 0x0f, (value >> 4) & 0x0f, value & 0x0f];
}

export function bcdToNumber(value: number): number {
  return bcdDigits(value).reduce((acc, digit) => acc * 10 + digit, 0);
}

/** Saturating BCD counter fed by fruit consumption. */
export class ScoreCounter {
  private packed = 0;

  get value(): number {
    return this.packed;
  }

  /**
   * Count one consumed fruit.
   * @returns True when the score moved; false once saturated.
   */
  increment(): boolean {
    const next = bcdIncrement(this.packed);
    const moved = next !== this.packed;
    this.packed = next;
    return moved;
  }

  digits(): [number, number, number, number] {
    return bcdDigits(this.packed);
  }

  reset(): void {
    this.packed = 0;
  }
}
