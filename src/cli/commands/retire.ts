/**
 * Retire Command
 *
 * Moves a file out of the way under a random extension so a fresh one
 * can take its name.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { successMessage, storageFailure } from '../types/cli-result.js';
import type { StorageError } from '../../storage/errors.js';

export interface RetireCommandDeps {
  readonly renameFilePathUsingRandomExtension: (filePath: string) => ResultAsync<string, StorageError>;
}

export async function executeRetireCommand(filePath: string, deps: RetireCommandDeps): Promise<CliResult> {
  return deps.renameFilePathUsingRandomExtension(filePath).match(
    (renamed) => successMessage(`Renamed ${filePath} to ${renamed}`),
    (error) => storageFailure(error)
  );
}
