import { okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { EntryKind, FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type {
  AccessPolicy,
  ApplyOutcome,
  FileProtectionPort,
  ProtectionCapability,
} from '../../../ports/file-protection.port.js';
import type { ProtectionClass } from '../../../storage/protection-class.js';
import { isRestrictive } from '../../../storage/protection-class.js';

const OWNER_ONLY = { file: 0o600, directory: 0o700 } as const;
const SHARED = { file: 0o644, directory: 0o755 } as const;

const GROUP_AND_OTHER_BITS = 0o077;

/**
 * Target permission bits for a protection class.
 *
 * POSIX has no notion of "readable until first unlock", so every restrictive
 * class collapses to owner-only access. Returns null for entries that carry
 * no meaningful mode of their own (symlinks, sockets, devices).
 */
export function modeFor(kind: EntryKind, protection: ProtectionClass): number | null {
  if (kind !== 'file' && kind !== 'directory') return null;
  return isRestrictive(protection) ? OWNER_ONLY[kind] : SHARED[kind];
}

/**
 * Protection classes expressed as permission bits.
 */
export class PosixModeProtection implements FileProtectionPort {
  readonly capability: ProtectionCapability = { kind: 'posix_mode' };

  constructor(private readonly fs: FileSystemPort) {}

  apply(entryPath: string, kind: EntryKind, protection: ProtectionClass): ResultAsync<ApplyOutcome, FsError> {
    const target = modeFor(kind, protection);
    if (target === null) return okAsync('unchanged' as const);

    return this.fs.lstat(entryPath).andThen((stat) => {
      if (stat.mode === target) return okAsync('unchanged' as const);
      return this.fs.chmod(entryPath, target).map(() => 'applied' as const);
    });
  }

  inspect(entryPath: string): ResultAsync<AccessPolicy, FsError> {
    return this.fs.lstat(entryPath).map((stat): AccessPolicy =>
      (stat.mode & GROUP_AND_OTHER_BITS) === 0
        ? { kind: 'owner_only', mode: stat.mode }
        : { kind: 'shared', mode: stat.mode }
    );
  }
}
