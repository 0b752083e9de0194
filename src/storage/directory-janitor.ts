import * as path from 'path';
import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';
import type { ProcessProbePort } from '../ports/process-probe.port.js';
import type { Logger } from '../core/logging/index.js';
import type { PathResolver } from './path-resolver.js';
import { parseTempDirName } from './temp-dir-name.js';
import type { StorageError } from './errors.js';
import { StorageErr, fromFsError } from './errors.js';

export interface CleanupFailure {
  readonly path: string;
  readonly error: StorageError;
}

export interface CleanupReport {
  readonly directory: string;
  /** Full paths of removed children. */
  readonly removed: readonly string[];
  readonly failures: readonly CleanupFailure[];
  readonly fullySucceeded: boolean;
}

export type SkipReason = 'current_run' | 'owner_alive' | 'recently_modified' | 'unrecognized';

export interface SkippedEntry {
  readonly name: string;
  readonly reason: SkipReason;
}

export interface PurgeReport {
  readonly root: string;
  /** Names of purged `tmp-<pid>-<runId>` directories. */
  readonly purged: readonly string[];
  readonly skipped: readonly SkippedEntry[];
  readonly failures: readonly CleanupFailure[];
  readonly fullySucceeded: boolean;
}

type Verdict = { readonly kind: 'stale' } | { readonly kind: 'skip'; readonly reason: SkipReason };

/**
 * Bulk removal: directory contents on request, and temporary directories
 * left behind by earlier runs.
 *
 * Both operations are best-effort. One child that cannot be removed is
 * logged and reported; the rest are still processed.
 */
export class DirectoryJanitor {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly resolver: PathResolver,
    private readonly probe: ProcessProbePort,
    private readonly logger: Logger
  ) {}

  /**
   * Remove every child of `dirPath`, keeping `dirPath` itself.
   * A missing directory is already clean.
   */
  deleteContentsOfDirectory(dirPath: string): ResultAsync<CleanupReport, StorageError> {
    return this.fs
      .lstat(dirPath)
      .map((stat) => stat.kind)
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(fromFsError(e, dirPath))))
      .andThen((kind) => {
        if (kind === null) return okAsync(emptyCleanup(dirPath));
        if (kind !== 'directory') return errAsync(StorageErr.pathConflict(dirPath, 'directory'));

        return this.fs
          .readdir(dirPath)
          .mapErr((e) => fromFsError(e, dirPath))
          .andThen((names) => ResultAsync.fromSafePromise(this.removeAll(dirPath, names)));
      });
  }

  /**
   * Purge `tmp-<pid>-<runId>` directories of earlier runs from the
   * after-first-auth temporary root.
   *
   * A directory goes only when all of these hold: it is not this run's,
   * its owning process is gone, and it was last modified before this
   * process started. Anything else is skipped with a reason.
   */
  clearOldTemporaryDirectories(): ResultAsync<PurgeReport, StorageError> {
    return this.resolver
      .temporaryDirectoryAccessibleAfterFirstAuth()
      .andThen((root) =>
        this.fs
          .readdir(root)
          .mapErr((e) => fromFsError(e, root))
          .andThen((names) => ResultAsync.fromSafePromise(this.purge(root, names)))
      );
  }

  // ---------------------------------------------------------------------------

  private async removeAll(dirPath: string, names: readonly string[]): Promise<CleanupReport> {
    const removed: string[] = [];
    const failures: CleanupFailure[] = [];

    for (const name of names) {
      const childPath = path.join(dirPath, name);
      const result = await this.fs.remove(childPath);

      if (result.isOk()) {
        removed.push(childPath);
      } else if (result.error.code !== 'FS_NOT_FOUND') {
        failures.push(this.failure(childPath, result.error, 'Could not remove directory entry; continuing'));
      }
    }

    const report: CleanupReport = { directory: dirPath, removed, failures, fullySucceeded: failures.length === 0 };
    this.logger.info(
      { directory: dirPath, removed: removed.length, failed: failures.length },
      'Cleared directory contents'
    );
    return report;
  }

  private async purge(root: string, names: readonly string[]): Promise<PurgeReport> {
    const purged: string[] = [];
    const skipped: SkippedEntry[] = [];
    const failures: CleanupFailure[] = [];

    for (const name of names) {
      const entryPath = path.join(root, name);
      const verdict = await this.judge(entryPath, name);

      if (verdict.isErr()) {
        failures.push(this.failure(entryPath, verdict.error, 'Could not inspect temporary directory; skipping'));
        continue;
      }
      if (verdict.value.kind === 'skip') {
        skipped.push({ name, reason: verdict.value.reason });
        continue;
      }

      const removed = await this.fs.remove(entryPath);
      if (removed.isOk() || removed.error.code === 'FS_NOT_FOUND') {
        purged.push(name);
      } else {
        failures.push(this.failure(entryPath, removed.error, 'Could not purge stale temporary directory; continuing'));
      }
    }

    const report: PurgeReport = { root, purged, skipped, failures, fullySucceeded: failures.length === 0 };
    this.logger.info(
      { root, purged: purged.length, skipped: skipped.length, failed: failures.length },
      'Purged stale temporary directories'
    );
    return report;
  }

  private judge(entryPath: string, name: string): ResultAsync<Verdict, FsError> {
    const owner = parseTempDirName(name);
    if (owner === null) return okAsync(skip('unrecognized'));

    const current = this.resolver.runIdentity;
    if (owner.runId === current.runId) return okAsync(skip('current_run'));

    return this.fs.lstat(entryPath).map((stat): Verdict => {
      if (stat.kind !== 'directory') return skip('unrecognized');

      // Same pid, different run: the pid was recycled and its old owner is gone.
      if (owner.pid !== current.pid && this.probe.isAlive(owner.pid)) return skip('owner_alive');

      if (stat.mtimeMs >= current.launchedAtMs) return skip('recently_modified');

      return { kind: 'stale' };
    });
  }

  private failure(entryPath: string, e: FsError, message: string): CleanupFailure {
    const error = fromFsError(e, entryPath);
    this.logger.warn({ path: entryPath, error }, message);
    return { path: entryPath, error };
  }
}

function skip(reason: SkipReason): Verdict {
  return { kind: 'skip', reason };
}

function emptyCleanup(directory: string): CleanupReport {
  return { directory, removed: [], failures: [], fullySucceeded: true };
}
