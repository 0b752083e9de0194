/**
 * Roots Command
 *
 * Resolves (and creates) every storage root and lists where it lives.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { StorageRootKind } from '../../storage/storage-root.js';
import { STORAGE_ROOT_KINDS } from '../../storage/storage-root.js';
import type { StorageError } from '../../storage/errors.js';
import { formatStorageError } from '../../storage/errors.js';

export interface RootsCommandDeps {
  readonly resolve: (kind: StorageRootKind) => ResultAsync<string, StorageError>;
  /** Without an application group the shared root is skipped, not failed. */
  readonly sharedDataConfigured: boolean;
}

export async function executeRootsCommand(deps: RootsCommandDeps): Promise<CliResult> {
  const details: string[] = [];
  const warnings: string[] = [];
  const unavailable: string[] = [];

  for (const kind of STORAGE_ROOT_KINDS) {
    if (kind === 'shared_data' && !deps.sharedDataConfigured) {
      warnings.push('shared_data skipped: FILEKEEP_APP_GROUP is not set');
      continue;
    }

    const resolved = await deps.resolve(kind);
    if (resolved.isOk()) {
      details.push(`${kind}: ${resolved.value}`);
    } else {
      unavailable.push(formatStorageError(resolved.error));
    }
  }

  if (unavailable.length > 0) {
    return failure(`${unavailable.length} of ${unavailable.length + details.length} storage roots are unavailable`, {
      details: [...details, ...unavailable],
      warnings,
    });
  }

  return success({ message: `Resolved ${details.length} storage roots`, details, warnings });
}
