import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_NOT_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_IS_A_DIRECTORY'; readonly message: string }
  | { readonly code: 'FS_NOT_EMPTY'; readonly message: string }
  | { readonly code: 'FS_CROSS_DEVICE'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

export type FsErrorCode = FsError['code'];

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface EntryStat {
  readonly kind: EntryKind;
  readonly sizeBytes: number;
  /** Permission bits only (`mode & 0o777`). */
  readonly mode: number;
  readonly mtimeMs: number;
}

/**
 * Port: directory creation and listing.
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;

  /**
   * Entry names (not full paths) of a directory.
   */
  readdir(dirPath: string): ResultAsync<readonly string[], FsError>;
}

/**
 * Port: entry metadata. `lstat` never follows a final symlink; `stat`
 * always does, so its kind is never `symlink`.
 */
export interface EntryMetadataPort {
  lstat(entryPath: string): ResultAsync<EntryStat, FsError>;
  stat(entryPath: string): ResultAsync<EntryStat, FsError>;
}

/**
 * Port: structural changes.
 */
export interface EntryManipulationPort {
  /**
   * Single rename syscall. Fails with FS_CROSS_DEVICE when source and
   * destination live on different volumes.
   */
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;

  /**
   * Copy a file or a directory tree. Never overwrites: an existing
   * destination fails with FS_ALREADY_EXISTS.
   */
  copy(fromPath: string, toPath: string): ResultAsync<void, FsError>;

  /**
   * Remove a file or a directory tree. A missing entry is FS_NOT_FOUND.
   */
  remove(entryPath: string): ResultAsync<void, FsError>;

  /**
   * Create an empty file; FS_ALREADY_EXISTS if anything is at the path.
   */
  createExclusive(filePath: string): ResultAsync<void, FsError>;

  chmod(entryPath: string, mode: number): ResultAsync<void, FsError>;
}

/**
 * Composite port used by the storage services.
 */
export interface FileSystemPort extends DirectoryOpsPort, EntryMetadataPort, EntryManipulationPort {}
