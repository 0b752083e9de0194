import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { EntryKind, EntryMetadataPort, FsError } from '../ports/fs.port.js';

/**
 * Kind of the entry at `entryPath`, or null when nothing is there.
 *
 * A symlink reports the kind of what it points at; a dangling link stays
 * `symlink`.
 */
export function followedEntryKind(fs: EntryMetadataPort, entryPath: string): ResultAsync<EntryKind | null, FsError> {
  return fs
    .lstat(entryPath)
    .map((stat): EntryKind | null => stat.kind)
    .orElse((e): ResultAsync<EntryKind | null, FsError> => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(e)))
    .andThen((kind): ResultAsync<EntryKind | null, FsError> => {
      if (kind !== 'symlink') return okAsync(kind);
      return fs
        .stat(entryPath)
        .map((target): EntryKind | null => target.kind)
        .orElse((e): ResultAsync<EntryKind | null, FsError> =>
          e.code === 'FS_NOT_FOUND' ? okAsync('symlink') : errAsync(e)
        );
    });
}
