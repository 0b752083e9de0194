/**
 * Cryptographically secure random bytes.
 *
 * Used for run identifiers and random rename suffixes. Injected so tests can
 * force collisions deterministically.
 *
 * @example
 * const suffix = entropy.generateBytes(8);
 */
export interface RandomEntropyPort {
  /**
   * @returns exactly `count` random bytes
   */
  generateBytes(count: number): Uint8Array;
}
