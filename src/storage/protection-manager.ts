import * as path from 'path';
import { ResultAsync } from 'neverthrow';
import type { EntryKind, FileSystemPort, FsError } from '../ports/fs.port.js';
import type {
  AccessPolicy,
  ApplyOutcome,
  FileProtectionPort,
  ProtectionCapability,
} from '../ports/file-protection.port.js';
import type { Logger } from '../core/logging/index.js';
import type { ProtectionClass } from './protection-class.js';
import type { StorageError } from './errors.js';
import { fromFsError } from './errors.js';

export interface ProtectionFailure {
  readonly path: string;
  readonly error: StorageError;
}

/**
 * Aggregate outcome of a recursive application.
 * `fullySucceeded` is false as soon as one entry could not be protected.
 */
export interface ProtectionReport {
  readonly root: string;
  readonly protection: ProtectionClass;
  readonly applied: number;
  readonly unchanged: number;
  readonly unsupported: number;
  readonly failures: readonly ProtectionFailure[];
  readonly fullySucceeded: boolean;
}

interface MutableTally {
  applied: number;
  unchanged: number;
  unsupported: number;
  readonly failures: ProtectionFailure[];
}

/**
 * Applies and queries protection classes.
 *
 * Single-entry calls surface their first error. Recursive calls are
 * best-effort: a failing entry is recorded and skipped (never retried),
 * and the walk carries on with its siblings.
 */
export class ProtectionManager {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly port: FileProtectionPort,
    private readonly defaultClass: ProtectionClass,
    private readonly logger: Logger
  ) {}

  get capability(): ProtectionCapability {
    return this.port.capability;
  }

  get defaultProtection(): ProtectionClass {
    return this.defaultClass;
  }

  /**
   * Protect one file or directory. Never creates `entryPath`.
   */
  protect(entryPath: string, protection: ProtectionClass = this.defaultClass): ResultAsync<ApplyOutcome, StorageError> {
    return this.fs
      .lstat(entryPath)
      .mapErr((e) => fromFsError(e, entryPath))
      .andThen((stat) => this.applyOne(entryPath, stat.kind, protection));
  }

  /**
   * Protect `rootPath` and everything currently below it. A file root is
   * protected on its own. Entries added later are not covered.
   */
  protectRecursive(
    rootPath: string,
    protection: ProtectionClass = this.defaultClass
  ): ResultAsync<ProtectionReport, StorageError> {
    return this.fs
      .lstat(rootPath)
      .mapErr((e) => fromFsError(e, rootPath))
      .andThen((stat) => {
        const tally: MutableTally = { applied: 0, unchanged: 0, unsupported: 0, failures: [] };

        if (stat.kind !== 'directory') {
          return this.applyOne(rootPath, stat.kind, protection).map((outcome) => {
            count(tally, outcome);
            return this.report(rootPath, protection, tally);
          });
        }

        return ResultAsync.fromSafePromise(this.protectTree(rootPath, protection, tally)).map(() =>
          this.report(rootPath, protection, tally)
        );
      });
  }

  accessPolicyOf(entryPath: string): ResultAsync<AccessPolicy, StorageError> {
    return this.fs
      .lstat(entryPath)
      .mapErr((e) => fromFsError(e, entryPath))
      .andThen(() => this.port.inspect(entryPath).mapErr((e) => fromFsError(e, entryPath)));
  }

  // ---------------------------------------------------------------------------

  private applyOne(entryPath: string, kind: EntryKind, protection: ProtectionClass): ResultAsync<ApplyOutcome, StorageError> {
    return this.port.apply(entryPath, kind, protection).mapErr((e) => fromFsError(e, entryPath));
  }

  private async protectTree(rootPath: string, protection: ProtectionClass, tally: MutableTally): Promise<void> {
    const applied = await this.port.apply(rootPath, 'directory', protection);
    if (applied.isErr()) {
      this.recordFailure(tally, rootPath, applied.error);
    } else {
      count(tally, applied.value);
    }
    await this.walk(rootPath, protection, tally);
  }

  /**
   * Depth-first over the children of `dirPath`. Every failure lands in
   * the tally; the returned promise never rejects.
   */
  private async walk(dirPath: string, protection: ProtectionClass, tally: MutableTally): Promise<void> {
    const listed = await this.fs.readdir(dirPath);
    if (listed.isErr()) {
      this.recordFailure(tally, dirPath, listed.error);
      return;
    }

    for (const name of listed.value) {
      const childPath = path.join(dirPath, name);

      const stat = await this.fs.lstat(childPath);
      if (stat.isErr()) {
        this.recordFailure(tally, childPath, stat.error);
        continue;
      }

      // Symlinks may point outside the tree; chmod would follow them.
      if (stat.value.kind === 'symlink') continue;

      const applied = await this.port.apply(childPath, stat.value.kind, protection);
      if (applied.isErr()) {
        this.recordFailure(tally, childPath, applied.error);
      } else {
        count(tally, applied.value);
      }

      if (stat.value.kind === 'directory') {
        await this.walk(childPath, protection, tally);
      }
    }
  }

  private recordFailure(tally: MutableTally, entryPath: string, e: FsError): void {
    const error = fromFsError(e, entryPath);
    this.logger.warn({ path: entryPath, error }, 'Could not protect entry; continuing');
    tally.failures.push({ path: entryPath, error });
  }

  private report(root: string, protection: ProtectionClass, tally: MutableTally): ProtectionReport {
    const report: ProtectionReport = {
      root,
      protection,
      applied: tally.applied,
      unchanged: tally.unchanged,
      unsupported: tally.unsupported,
      failures: [...tally.failures],
      fullySucceeded: tally.failures.length === 0,
    };

    if (!report.fullySucceeded) {
      this.logger.warn(
        { root, protection, failed: report.failures.length, applied: report.applied },
        'Recursive protection finished with failures'
      );
    } else {
      this.logger.debug({ root, protection, applied: report.applied, unchanged: report.unchanged }, 'Recursive protection finished');
    }

    return report;
  }
}

function count(tally: MutableTally, outcome: ApplyOutcome): void {
  switch (outcome) {
    case 'applied':
      tally.applied++;
      return;
    case 'unchanged':
      tally.unchanged++;
      return;
    case 'unsupported':
      tally.unsupported++;
      return;
  }
}

