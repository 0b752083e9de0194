import * as path from 'path';
import { pathToFileURL } from 'url';
import { err, errAsync, okAsync } from 'neverthrow';
import type { Result, ResultAsync } from 'neverthrow';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { StandardDirectoriesPort } from '../ports/standard-directories.port.js';
import type { Logger } from '../core/logging/index.js';
import type { StorageRootKind } from './storage-root.js';
import { STORAGE_ROOTS } from './storage-root.js';
import type { RunIdentity } from './run-identity.js';
import { toHex } from './run-identity.js';
import { formatTempDirName } from './temp-dir-name.js';
import type { ProtectionManager } from './protection-manager.js';
import type { StorageError } from './errors.js';
import { StorageErr } from './errors.js';
import { followedEntryKind } from './entry-kind.js';

export interface PathResolverOptions {
  readonly appName: string;
  readonly appGroupId: string | null;
  readonly runIdentity: RunIdentity;
}

export const TEMP_FILE_NAME_BYTES = 16;

/**
 * Canonical storage roots, one absolute path per kind for the life of
 * the resolver.
 *
 * A root exists on disk before its path is handed out. `create_if_missing`
 * roots are created and given their default protection; protection
 * failures are logged and do not fail resolution. Failed resolutions are
 * not cached, so a later call retries.
 */
export class PathResolver {
  private readonly resolved = new Map<StorageRootKind, ResultAsync<string, StorageError>>();

  constructor(
    private readonly fs: FileSystemPort,
    private readonly directories: StandardDirectoriesPort,
    private readonly protection: ProtectionManager,
    private readonly entropy: RandomEntropyPort,
    private readonly options: PathResolverOptions,
    private readonly logger: Logger
  ) {}

  get runIdentity(): RunIdentity {
    return this.options.runIdentity;
  }

  /** `tmp-<pid>-<runId>` for this run. */
  get currentTemporaryDirectoryName(): string {
    return formatTempDirName(this.options.runIdentity);
  }

  resolve(kind: StorageRootKind): ResultAsync<string, StorageError> {
    const cached = this.resolved.get(kind);
    if (cached) return cached;

    const pending: ResultAsync<string, StorageError> = this.locateAndCreate(kind).mapErr((error) => {
      if (this.resolved.get(kind) === pending) this.resolved.delete(kind);
      return error;
    });
    this.resolved.set(kind, pending);
    return pending;
  }

  /**
   * Scratch space owned by this run. Purged by the janitor once the run
   * is over.
   */
  temporaryDirectory(): ResultAsync<string, StorageError> {
    return this.resolve('temporary');
  }

  temporaryDirectoryAccessibleAfterFirstAuth(): ResultAsync<string, StorageError> {
    return this.resolve('temporary_after_first_auth');
  }

  appDocumentDirectoryPath(): ResultAsync<string, StorageError> {
    return this.resolve('documents');
  }

  appLibraryDirectoryPath(): ResultAsync<string, StorageError> {
    return this.resolve('library');
  }

  appSharedDataDirectoryPath(): ResultAsync<string, StorageError> {
    return this.resolve('shared_data');
  }

  appSharedDataDirectoryURL(): ResultAsync<URL, StorageError> {
    return this.appSharedDataDirectoryPath().map((dir) => pathToFileURL(dir));
  }

  cachesDirectoryPath(): ResultAsync<string, StorageError> {
    return this.resolve('caches');
  }

  /**
   * A fresh path directly inside the run's temporary directory. Nothing is
   * created at the path itself. Only the last segment of `extension` is
   * used, so it cannot lead out of the directory.
   */
  temporaryFilePath(extension?: string): ResultAsync<string, StorageError> {
    return this.temporaryDirectory().map((dir) => {
      const stem = toHex(this.entropy.generateBytes(TEMP_FILE_NAME_BYTES));
      const cleaned = extension === undefined ? '' : extensionSegment(extension);
      return path.join(dir, cleaned.length > 0 ? `${stem}.${cleaned}` : stem);
    });
  }

  // ---------------------------------------------------------------------------

  private locateAndCreate(kind: StorageRootKind): ResultAsync<string, StorageError> {
    if (kind === 'temporary') {
      return this.resolve('temporary_after_first_auth').andThen((parent) =>
        this.materialize(kind, path.join(parent, this.currentTemporaryDirectoryName))
      );
    }

    const located = this.locate(kind);
    return located.isErr() ? errAsync(located.error) : this.materialize(kind, located.value);
  }

  private locate(kind: Exclude<StorageRootKind, 'temporary'>): Result<string, StorageError> {
    const unavailable = (e: { reason: string }) => StorageErr.directoryUnavailable(kind, e.reason);

    switch (kind) {
      case 'documents':
        return this.directories.documents().mapErr(unavailable);
      case 'library':
        return this.directories.library().mapErr(unavailable);
      case 'caches':
        return this.directories.caches().mapErr(unavailable);
      case 'shared_data': {
        const group = this.options.appGroupId;
        if (group === null) {
          return err(StorageErr.directoryUnavailable(kind, 'no application group identifier configured'));
        }
        return this.directories.sharedGroup(group).mapErr(unavailable);
      }
      case 'temporary_after_first_auth':
        return this.directories
          .temporaryBase()
          .mapErr(unavailable)
          .map((base) => path.join(base, this.options.appName));
    }
  }

  private materialize(kind: StorageRootKind, dir: string): ResultAsync<string, StorageError> {
    const definition = STORAGE_ROOTS[kind];

    return followedEntryKind(this.fs, dir)
      .mapErr((e) => StorageErr.directoryUnavailable(kind, e.message))
      .andThen((found) => {
        if (found === 'directory') return okAsync(dir);
        if (found !== null) {
          return errAsync(StorageErr.directoryUnavailable(kind, `${dir} exists but is not a directory`));
        }
        if (definition.creation === 'assume_exists') {
          return errAsync(StorageErr.directoryUnavailable(kind, `${dir} does not exist`));
        }

        return this.fs
          .mkdirp(dir)
          .mapErr((e) => StorageErr.directoryUnavailable(kind, e.message))
          .map(() => {
            this.logger.debug({ root: kind, path: dir }, 'Created storage root');
            return dir;
          });
      })
      .andThen((ready) => (definition.creation === 'create_if_missing' ? this.protectRoot(kind, ready) : okAsync(ready)));
  }

  private protectRoot(kind: StorageRootKind, dir: string): ResultAsync<string, never> {
    const protection = STORAGE_ROOTS[kind].defaultProtection;

    return this.protection
      .protect(dir, protection)
      .map(() => dir)
      .orElse((error) => {
        this.logger.warn({ root: kind, path: dir, protection, error }, 'Could not protect storage root; continuing');
        return okAsync(dir);
      });
  }
}

function extensionSegment(extension: string): string {
  return path.posix.basename(extension.replace(/\\/g, '/')).replace(/^\.+/, '');
}
