import type { RandomEntropyPort } from '../../src/ports/random-entropy.port.js';

/**
 * Deterministic entropy.
 *
 * Scripted chunks are handed out first, in order (repeat one to force a
 * collision); after that bytes come from a running counter.
 */
export class FakeRandomEntropy implements RandomEntropyPort {
  private sequence = 0;
  private readonly scripted: Uint8Array[] = [];

  generateBytes(count: number): Uint8Array {
    const next = this.scripted.shift();
    if (next) {
      const bytes = new Uint8Array(count);
      bytes.set(next.subarray(0, count));
      return bytes;
    }

    const bytes = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      bytes[i] = (this.sequence + i) % 256;
    }
    this.sequence += count;
    return bytes;
  }

  /** Queue `hex` (e.g. 'aaaaaaaaaaaaaaaa') as the next chunk(s). */
  script(...hex: string[]): this {
    for (const h of hex) {
      this.scripted.push(Uint8Array.from(h.match(/../g) ?? [], (pair) => Number.parseInt(pair, 16)));
    }
    return this;
  }

  reset(): void {
    this.sequence = 0;
    this.scripted.length = 0;
  }
}
