/** Entropy sources for seeding the fruit PRNG on power-up and restart. */

/** Produces one entropy sample in [0, 255] per call. */
export type EntropySource = () => number;

/** FNV-1a 32-bit offset basis. */
const FNV_OFFSET_BASIS = 0x811c9dc5;
/** FNV-1a 32-bit prime. */
const FNV_PRIME = 0x01000193;

/**
 * Normalize a number into an unsigned 32-bit integer.
 * @param value - Input value to normalize.
 * @returns Unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Hash one or more numeric inputs into a 32-bit seed.
 * @param values - Numeric inputs to mix into the hash.
 * @returns Unsigned 32-bit hash.
 */
export function hashSeed(...values: number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (const value of values) {
    hash ^= toUint32(value);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Create a reproducible entropy source from a seed (xorshift32 underneath).
 * Successive samples come from successive generator outputs, so every
 * restart in a seeded session sees a different, but repeatable, byte.
 * @param seed - Any finite number; mixed through {@link hashSeed}.
 * @returns Entropy source.
 */
export function createSeededEntropy(seed: number): EntropySource {
  let state = hashSeed(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 24) & 0xff;
  };
}

/** Entropy from the runtime's ambient generator. */
export const ambientEntropy: EntropySource = () => Math.floor(Math.random() * 256) & 0xff;
