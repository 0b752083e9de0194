/**
 * Command outcomes. Commands return these; only the entrypoint turns
 * them into output and an exit status.
 */

import type { ExitCode } from './exit-code.js';
import type { StorageError } from '../../storage/errors.js';
import { formatStorageError } from '../../storage/errors.js';

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function successMessage(message: string): CliResult {
  return { kind: 'success', output: { message } };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    warnings?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: options?.exitCode ?? { kind: 'general_error' },
    output: {
      message,
      details: options?.details,
      warnings: options?.warnings,
      suggestions: options?.suggestions,
    },
  };
}

/** Bad arguments: exit status 2. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}

/**
 * A storage operation failed outright. Some errors come with a hint the
 * operator can act on.
 */
export function storageFailure(error: StorageError): CliResult {
  switch (error._tag) {
    case 'DestinationExists':
      return failure(formatStorageError(error), { suggestions: ['Choose another destination or remove the existing entry first'] });
    case 'CrossVolumeMoveFailed':
      return failure(formatStorageError(error), { suggestions: [`Remove ${error.from} once the copy at ${error.to} is verified`] });
    case 'DirectoryUnavailable':
      return failure(formatStorageError(error), { suggestions: ['Set FILEKEEP_DATA_DIR or FILEKEEP_TMP_DIR to an absolute, writable directory'] });
    default:
      return failure(formatStorageError(error));
  }
}
