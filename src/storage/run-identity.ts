import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';

/**
 * Identity of the current process run. Minted once, at startup.
 */
export interface RunIdentity {
  /** 16 lowercase hex characters. */
  readonly runId: string;
  readonly pid: number;
  readonly launchedAtMs: number;
}

export const RUN_ID_BYTES = 8;

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

export function mintRunIdentity(entropy: RandomEntropyPort, clock: TimeClockPort): RunIdentity {
  return {
    runId: toHex(entropy.generateBytes(RUN_ID_BYTES)),
    pid: clock.getPid(),
    launchedAtMs: clock.launchedAtMs(),
  };
}
