/**
 * Move Command
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, storageFailure } from '../types/cli-result.js';
import type { MoveOutcome } from '../../storage/safe-file-ops.js';
import type { StorageError } from '../../storage/errors.js';

export interface MoveCommandDeps {
  readonly moveFilePath: (fromPath: string, toPath: string) => ResultAsync<MoveOutcome, StorageError>;
}

export async function executeMoveCommand(fromPath: string, toPath: string, deps: MoveCommandDeps): Promise<CliResult> {
  return deps.moveFilePath(fromPath, toPath).match(
    (outcome) =>
      success({
        message: `Moved ${outcome.from} to ${outcome.to}`,
        details: outcome.strategy === 'copy_then_remove' ? ['Crossed volumes: copied, then removed the source'] : undefined,
      }),
    (error) => storageFailure(error)
  );
}
