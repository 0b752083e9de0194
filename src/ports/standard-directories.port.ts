import type { Result } from 'neverthrow';

/**
 * Why the OS could not supply a base directory.
 */
export interface BaseDirectoryUnavailable {
  readonly reason: string;
}

/**
 * Port: OS-standard base locations for each lifecycle class.
 *
 * Returns paths only; creating and protecting them is the resolver's job.
 *
 * Guarantees:
 * - every returned path is absolute
 * - the same inputs always produce the same path
 */
export interface StandardDirectoriesPort {
  documents(): Result<string, BaseDirectoryUnavailable>;
  library(): Result<string, BaseDirectoryUnavailable>;
  caches(): Result<string, BaseDirectoryUnavailable>;
  sharedGroup(groupId: string): Result<string, BaseDirectoryUnavailable>;
  /** Base under which the app's temporary roots are created. */
  temporaryBase(): Result<string, BaseDirectoryUnavailable>;
}
