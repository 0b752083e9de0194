/**
 * Size Command
 *
 * Size of a file, by path or `file:` URL.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, storageFailure } from '../types/cli-result.js';
import type { FileSize } from '../../storage/safe-file-ops.js';
import type { StorageError } from '../../storage/errors.js';
import { formatBytes } from '../output-formatter.js';

export interface SizeCommandDeps {
  readonly fileSizeOfPath: (filePath: string) => ResultAsync<FileSize, StorageError>;
  readonly fileSizeOfUrl: (fileUrl: string) => ResultAsync<FileSize, StorageError>;
}

const URL_LIKE = /^[a-z][a-z0-9+.-]+:\/\//i;

export async function executeSizeCommand(target: string, deps: SizeCommandDeps): Promise<CliResult> {
  const size = URL_LIKE.test(target) ? deps.fileSizeOfUrl(target) : deps.fileSizeOfPath(target);

  return size.match(
    (result): CliResult => {
      switch (result.kind) {
        case 'present':
          return success({ message: `${target}: ${formatBytes(result.bytes)}`, details: [`${result.bytes} bytes`] });
        case 'absent':
          return failure(`No file at ${target}`);
      }
    },
    (error) => storageFailure(error)
  );
}
