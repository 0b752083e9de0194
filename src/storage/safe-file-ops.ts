import * as path from 'path';
import { fileURLToPath } from 'url';
import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { EntryKind, FileSystemPort, FsError } from '../ports/fs.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { Logger } from '../core/logging/index.js';
import type { StorageError } from './errors.js';
import { StorageErr, fromFsError } from './errors.js';
import { toHex } from './run-identity.js';
import { followedEntryKind } from './entry-kind.js';

/**
 * Size of a file that may not exist. `absent` is not an error: callers
 * need to tell "no file" apart from "empty file".
 */
export type FileSize =
  | { readonly kind: 'present'; readonly bytes: number }
  | { readonly kind: 'absent' };

export type EnsureOutcome = 'created' | 'existing';

export type DeleteOutcome = 'deleted' | 'absent';

export type MoveStrategy = 'rename' | 'copy_then_remove';

export interface MoveOutcome {
  readonly from: string;
  readonly to: string;
  readonly strategy: MoveStrategy;
}

export interface SafeFileOpsOptions {
  /** Attempts at finding an unused random name before giving up. */
  readonly renameAttempts: number;
}

export const RANDOM_EXTENSION_BYTES = 8;

/**
 * File mutations with defined failure semantics.
 *
 * Nothing here throws for expected failures; every operation resolves to a
 * `StorageError` instead. No state is kept between calls.
 */
export class SafeFileOps {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly entropy: RandomEntropyPort,
    private readonly options: SafeFileOpsOptions,
    private readonly logger: Logger
  ) {}

  /**
   * Create `dirPath` and any missing parents. An existing directory, or a
   * symlink to one, is success; anything else occupying the path is
   * `PathConflict`.
   */
  ensureDirectoryExists(dirPath: string): ResultAsync<EnsureOutcome, StorageError> {
    return this.probeFollowing(dirPath).andThen((kind) => {
      if (kind === 'directory') return okAsync('existing' as const);
      if (kind !== null) return errAsync(StorageErr.pathConflict(dirPath, 'directory'));

      return this.fs
        .mkdirp(dirPath)
        .map(() => 'created' as const)
        .mapErr((e) => {
          const error = e.code === 'FS_ALREADY_EXISTS' ? StorageErr.pathConflict(dirPath, 'directory') : fromFsError(e, dirPath);
          this.logger.warn({ path: dirPath, error }, 'Could not create directory');
          return error;
        });
    });
  }

  /**
   * Create an empty file at `filePath` unless one (or a symlink to one) is
   * already there. The parent directory must exist.
   */
  ensureFileExists(filePath: string): ResultAsync<EnsureOutcome, StorageError> {
    return this.probeFollowing(filePath).andThen((kind) => {
      if (kind === 'file') return okAsync('existing' as const);
      if (kind !== null) return errAsync(StorageErr.pathConflict(filePath, 'file'));

      return this.fs
        .createExclusive(filePath)
        .map(() => 'created' as const)
        .orElse((e) => {
          // Lost a race with another creator: the file exists, which is all we promised.
          if (e.code === 'FS_ALREADY_EXISTS') return okAsync('existing' as const);
          return errAsync(fromFsError(e, filePath));
        });
    });
  }

  /**
   * Move `fromPath` to `toPath`.
   *
   * Same volume: one rename. Across volumes: copy (never overwriting), then
   * remove the source. If the source cannot be removed after a good copy the
   * move fails with `CrossVolumeMoveFailed` and both copies remain.
   */
  moveFilePath(fromPath: string, toPath: string): ResultAsync<MoveOutcome, StorageError> {
    return this.probe(fromPath)
      .andThen((sourceKind) => (sourceKind === null ? errAsync(StorageErr.pathNotFound(fromPath)) : this.probe(toPath)))
      .andThen((destKind) => (destKind !== null ? errAsync(StorageErr.destinationExists(toPath)) : okAsync(undefined)))
      .andThen(() =>
        this.fs
          .rename(fromPath, toPath)
          .map((): MoveOutcome => ({ from: fromPath, to: toPath, strategy: 'rename' }))
          .orElse((e) => {
            if (e.code === 'FS_CROSS_DEVICE') return this.copyThenRemove(fromPath, toPath);
            return errAsync(this.moveError(e, fromPath, toPath));
          })
      );
  }

  /**
   * Rename `filePath` to `<filePath>.<random hex>` so a fresh file can take
   * its place. Resolves to the new path.
   */
  renameFilePathUsingRandomExtension(filePath: string): ResultAsync<string, StorageError> {
    return this.probe(filePath).andThen((kind) =>
      kind === null ? errAsync(StorageErr.pathNotFound(filePath)) : this.renameWithRandomExtension(filePath, 1)
    );
  }

  fileSizeOfPath(filePath: string): ResultAsync<FileSize, StorageError> {
    return this.fs
      .lstat(filePath)
      .map((stat): FileSize | null => (stat.kind === 'directory' ? null : { kind: 'present', bytes: stat.sizeBytes }))
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(ABSENT) : errAsync(e)))
      .mapErr((e) => fromFsError(e, filePath))
      .andThen((size) => (size === null ? errAsync(StorageErr.pathConflict(filePath, 'file')) : okAsync(size)));
  }

  fileSizeOfUrl(fileUrl: URL | string): ResultAsync<FileSize, StorageError> {
    const asPath = urlToPath(fileUrl);
    return asPath === null ? errAsync(StorageErr.unsupportedUrl(String(fileUrl))) : this.fileSizeOfPath(asPath);
  }

  deleteFileIfExists(filePath: string): ResultAsync<DeleteOutcome, StorageError> {
    return this.fs
      .remove(filePath)
      .map(() => 'deleted' as const)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync('absent' as const) : errAsync(fromFsError(e, filePath))));
  }

  fileOrFolderExists(entryPath: string): ResultAsync<boolean, StorageError> {
    return this.probe(entryPath).map((kind) => kind !== null);
  }

  // ---------------------------------------------------------------------------

  /**
   * Kind of the entry at `entryPath`, or null when nothing is there.
   */
  private probe(entryPath: string): ResultAsync<EntryKind | null, StorageError> {
    return this.fs
      .lstat(entryPath)
      .map((stat): EntryKind | null => stat.kind)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(fromFsError(e, entryPath))));
  }

  private probeFollowing(entryPath: string): ResultAsync<EntryKind | null, StorageError> {
    return followedEntryKind(this.fs, entryPath).mapErr((e) => fromFsError(e, entryPath));
  }

  private copyThenRemove(fromPath: string, toPath: string): ResultAsync<MoveOutcome, StorageError> {
    this.logger.debug({ from: fromPath, to: toPath }, 'Rename crossed volumes; copying instead');

    return this.fs
      .copy(fromPath, toPath)
      .orElse((copyError) => {
        // Someone else's entry appeared at the destination: not ours to clean up.
        if (copyError.code === 'FS_ALREADY_EXISTS') return errAsync(copyError);

        // Leave nothing half-written at the destination.
        return this.fs
          .remove(toPath)
          .orElse(() => okAsync(undefined))
          .andThen(() => errAsync(copyError));
      })
      .mapErr((e) => this.moveError(e, fromPath, toPath))
      .andThen(() =>
        this.fs.remove(fromPath).mapErr((e) => {
          const error = StorageErr.crossVolumeMoveFailed(fromPath, toPath, e.message);
          this.logger.error({ from: fromPath, to: toPath, error }, 'Cross-volume move left the source behind');
          return error;
        })
      )
      .map((): MoveOutcome => ({ from: fromPath, to: toPath, strategy: 'copy_then_remove' }));
  }

  private renameWithRandomExtension(filePath: string, attempt: number): ResultAsync<string, StorageError> {
    const attempts = this.options.renameAttempts;
    if (attempt > attempts) {
      const error = StorageErr.renameExhausted(filePath, attempts);
      this.logger.error({ error }, 'Random rename exhausted');
      return errAsync(error);
    }

    const candidate = `${filePath}.${toHex(this.entropy.generateBytes(RANDOM_EXTENSION_BYTES))}`;
    const retry = () => {
      this.logger.debug({ path: filePath, candidate, attempt }, 'Random name already taken; retrying');
      return this.renameWithRandomExtension(filePath, attempt + 1);
    };

    return this.probe(candidate).andThen((existing) => {
      if (existing !== null) return retry();

      return this.fs
        .rename(filePath, candidate)
        .map(() => candidate)
        .orElse((e) => {
          if (e.code === 'FS_ALREADY_EXISTS' || e.code === 'FS_NOT_EMPTY') return retry();
          return errAsync(fromFsError(e, filePath));
        });
    });
  }

  private moveError(e: FsError, fromPath: string, toPath: string): StorageError {
    switch (e.code) {
      // The source was there a moment ago; what is missing is the destination's parent.
      case 'FS_NOT_FOUND':
        return StorageErr.pathNotFound(path.dirname(toPath));
      case 'FS_ALREADY_EXISTS':
      case 'FS_NOT_EMPTY':
        return StorageErr.destinationExists(toPath);
      default:
        return fromFsError(e, `${fromPath} -> ${toPath}`);
    }
  }
}

const ABSENT: FileSize = { kind: 'absent' };

function urlToPath(fileUrl: URL | string): string | null {
  let url: URL;
  try {
    url = typeof fileUrl === 'string' ? new URL(fileUrl) : fileUrl;
  } catch {
    return null;
  }
  if (url.protocol !== 'file:') return null;
  try {
    return fileURLToPath(url);
  } catch {
    return null;
  }
}
