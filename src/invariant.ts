/** Raised when internal game state breaks one of its own guarantees. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * Fail fast on a logic defect.
 * @param condition - Expected-true condition.
 * @param message - Description of the broken guarantee.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
