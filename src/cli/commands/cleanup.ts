/**
 * Cleanup Command
 *
 * Purges temporary directories left behind by earlier runs.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, storageFailure } from '../types/cli-result.js';
import type { PurgeReport } from '../../storage/directory-janitor.js';
import type { StorageError } from '../../storage/errors.js';
import { formatStorageError } from '../../storage/errors.js';

export interface CleanupCommandDeps {
  readonly clearOldTemporaryDirectories: () => ResultAsync<PurgeReport, StorageError>;
}

export async function executeCleanupCommand(deps: CleanupCommandDeps): Promise<CliResult> {
  return deps.clearOldTemporaryDirectories().match(
    (report) => {
      const count = report.purged.length;
      return success({
        message:
          count === 0
            ? 'No stale temporary directories found'
            : `Purged ${count} stale temporary ${count === 1 ? 'directory' : 'directories'}`,
        details: [
          ...report.purged.map((name) => `purged ${name}`),
          ...report.skipped.map((entry) => `kept ${entry.name} (${entry.reason})`),
        ],
        // Purging is best-effort: leftovers are reported, not fatal.
        warnings: report.failures.map((f) => formatStorageError(f.error)),
      });
    },
    (error) => storageFailure(error)
  );
}
