/**
 * The only place a CliResult becomes a process exit.
 */

import type { CliResult } from './types/cli-result.js';
import { toTerminationCode, toNumericExitCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end on its own; pino's sync destination has nothing pending.
      return;
    case 'failure':
      terminator.terminate(toTerminationCode(result.exitCode));
  }
}

/**
 * For failures before the container exists (invalid configuration).
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;
    case 'failure':
      process.exit(toNumericExitCode(result.exitCode));
  }
}
