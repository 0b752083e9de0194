import { okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { StartupFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { StorageLayer } from '../../storage/create-storage-layer.js';
import type { PurgeReport } from '../../storage/directory-janitor.js';
import { formatStorageError } from '../../storage/errors.js';
import type { StorageRootKind } from '../../storage/storage-root.js';

export type ResolvedRoots = Readonly<Partial<Record<StorageRootKind, string>>>;

export interface PreparedStorage {
  readonly roots: ResolvedRoots;
  /** null when the purge itself could not run. */
  readonly purge: PurgeReport | null;
}

const CORE_ROOTS: readonly StorageRootKind[] = [
  'documents',
  'library',
  'caches',
  'temporary_after_first_auth',
  'temporary',
];

/**
 * Startup: every core root must resolve, otherwise the app cannot run.
 * The shared root joins them only when a group is configured. Purging
 * stale temporary directories afterwards is best-effort.
 */
export function prepareStorage(layer: StorageLayer, logger: Logger): ResultAsync<PreparedStorage, StartupFailedError> {
  const kinds: readonly StorageRootKind[] =
    layer.config.appGroupId === null ? CORE_ROOTS : [...CORE_ROOTS, 'shared_data'];

  return resolveInOrder(layer, kinds, {}).andThen((roots) =>
    layer.janitor
      .clearOldTemporaryDirectories()
      .map((purge): PreparedStorage => ({ roots, purge }))
      .orElse((error) => {
        logger.warn({ error }, 'Could not purge stale temporary directories; continuing');
        return okAsync<PreparedStorage, never>({ roots, purge: null });
      })
  );
}

function resolveInOrder(
  layer: StorageLayer,
  kinds: readonly StorageRootKind[],
  resolved: ResolvedRoots
): ResultAsync<ResolvedRoots, StartupFailedError> {
  const [kind, ...rest] = kinds;
  if (kind === undefined) return okAsync(resolved);

  return layer.resolver
    .resolve(kind)
    .mapErr((error) => Err.startupFailed('storage_roots', formatStorageError(error), error))
    .andThen((dir) => resolveInOrder(layer, rest, { ...resolved, [kind]: dir }));
}
