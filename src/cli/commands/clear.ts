/**
 * Clear Command
 *
 * Empties a directory, keeping the directory itself.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, storageFailure } from '../types/cli-result.js';
import type { CleanupReport } from '../../storage/directory-janitor.js';
import type { StorageError } from '../../storage/errors.js';
import { formatStorageError } from '../../storage/errors.js';

export interface ClearCommandDeps {
  readonly deleteContentsOfDirectory: (dirPath: string) => ResultAsync<CleanupReport, StorageError>;
}

export async function executeClearCommand(dirPath: string, deps: ClearCommandDeps): Promise<CliResult> {
  return deps.deleteContentsOfDirectory(dirPath).match(
    (report) => {
      const removed = report.removed.length;
      if (!report.fullySucceeded) {
        const total = removed + report.failures.length;
        return failure(`Could not remove ${report.failures.length} of ${total} entries in ${dirPath}`, {
          details: report.failures.map((f) => formatStorageError(f.error)),
        });
      }
      return success({ message: `Removed ${removed} ${removed === 1 ? 'entry' : 'entries'} from ${dirPath}` });
    },
    (error) => storageFailure(error)
  );
}
