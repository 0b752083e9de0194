import type { TerminationCode } from '../../runtime/ports/process-terminator.js';

/**
 * Exit codes a command can ask for (Unix conventions):
 * 0 success, 1 operation failed, 2 bad arguments.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'general_error' }
  | { kind: 'misuse' };

export function toTerminationCode(exitCode: ExitCode): TerminationCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Raw value for `process.exit()`. Only for the entrypoint, before the
 * container (and its ProcessTerminator) exists.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
