// tilt.ts
// Direction arbitration from a two-axis tilt sensor.
//
// The sensor reports each axis as a magnitude with a sign bit. Readings below
// the deadzone are ignored. When both axes clear it, the stronger one wins and
// an exact tie goes to the horizontal axis. The chosen direction is then held
// in a request register that the game reads at the next tick, unless it would
// reverse the snake onto itself.

import { TILT_DEADZONE } from './config.ts';
import { isOpposite, type Direction } from './direction.ts';

/** One tilt axis as reported by the sensor. */
export interface TiltAxis {
  /** Absolute reading. */
  magnitude: number;
  /** Sign bit: true for a negative reading. */
  negative: boolean;
}

/**
 * Build an axis reading from a signed integer.
 * @param value - Signed reading; non-finite values read as zero.
 * @returns Magnitude/sign pair.
 */
export function axisFromSigned(value: number): TiltAxis {
  if (!Number.isFinite(value)) return { magnitude: 0, negative: false };
  const whole = Math.trunc(value);
  return { magnitude: Math.abs(whole), negative: whole < 0 };
}

function isAxisValid(axis: TiltAxis): boolean {
  return axis.magnitude >= TILT_DEADZONE;
}

/**
 * Choose a candidate direction from one tilt sample.
 * @param vertical - Vertical axis; positive tilts towards `down`.
 * @param horizontal - Horizontal axis; positive tilts towards `right`.
 * @returns Candidate direction or null when neither axis clears the deadzone.
 */
export function pickTiltDirection(vertical: TiltAxis, horizontal: TiltAxis): Direction | null {
  const verticalValid = isAxisValid(vertical);
  const horizontalValid = isAxisValid(horizontal);
  if (!verticalValid && !horizontalValid) return null;

  let useHorizontal: boolean;
  if (verticalValid && horizontalValid) {
    useHorizontal = horizontal.magnitude >= vertical.magnitude;
  } else {
    useHorizontal = horizontalValid;
  }

  if (useHorizontal) return horizontal.negative ? 'left' : 'right';
  return vertical.negative ? 'up' : 'down';
}

/** Holds the direction the snake will take at the next tick. */
export class DirectionArbiter {
  /** Latched request, read by the game at tick boundaries. */
  private requested: Direction = 'right';

  /** Current request. */
  get direction(): Direction {
    return this.requested;
  }

  /**
   * Latch a candidate unless it reverses the committed direction.
   * @param candidate - Proposed direction, or null for no proposal.
   * @param committed - Direction the snake moved on its last step.
   * @returns True when the latched request changed.
   */
  offer(candidate: Direction | null, committed: Direction): boolean {
    if (candidate === null) return false;
    if (isOpposite(candidate, committed)) return false;
    const changed = candidate !== this.requested;
    this.requested = candidate;
    return changed;
  }

  /**
   * Run one sensor sample through selection and lockout.
   * @param vertical - Vertical axis reading.
   * @param horizontal - Horizontal axis reading.
   * @param committed - Direction the snake moved on its last step.
   * @returns True when the latched request changed.
   */
  sample(vertical: TiltAxis, horizontal: TiltAxis, committed: Direction): boolean {
    return this.offer(pickTiltDirection(vertical, horizontal), committed);
  }

  reset(): void {
    this.requested = 'right';
  }
}
