import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: turns termination into an exception so a test can assert on it
 * instead of losing the worker process.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
