import { randomBytes } from 'node:crypto';
import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';

/**
 * CSPRNG-backed entropy (`crypto.randomBytes`, synchronous).
 */
export class NodeRandomEntropy implements RandomEntropyPort {
  generateBytes(count: number): Uint8Array {
    return new Uint8Array(randomBytes(count));
  }
}
