/**
 * Storage errors - discriminated union on `_tag`.
 *
 * Errors are data: every service returns them through `ResultAsync`,
 * nothing here is thrown. A missing file's size is not an error at all
 * (see `FileSize`).
 */

import type { FsError } from '../ports/fs.port.js';
import type { StorageRootKind } from './storage-root.js';
import { assertNever } from '../runtime/assert-never.js';

export interface DirectoryUnavailableError {
  readonly _tag: 'DirectoryUnavailable';
  readonly root: StorageRootKind;
  readonly reason: string;
  readonly message: string;
}

export interface PathNotFoundError {
  readonly _tag: 'PathNotFound';
  readonly path: string;
  readonly message: string;
}

export interface PermissionDeniedError {
  readonly _tag: 'PermissionDenied';
  readonly path: string;
  readonly message: string;
}

export interface DestinationExistsError {
  readonly _tag: 'DestinationExists';
  readonly path: string;
  readonly message: string;
}

export interface PathConflictError {
  readonly _tag: 'PathConflict';
  readonly path: string;
  readonly expected: 'file' | 'directory';
  readonly message: string;
}

/**
 * Copy to the destination volume succeeded, removing the source did not.
 * Both copies exist; the caller decides which one to keep.
 */
export interface CrossVolumeMoveFailedError {
  readonly _tag: 'CrossVolumeMoveFailed';
  readonly from: string;
  readonly to: string;
  readonly stage: 'remove_source';
  readonly message: string;
}

export interface RenameExhaustedError {
  readonly _tag: 'RenameExhausted';
  readonly path: string;
  readonly attempts: number;
  readonly message: string;
}

export interface UnsupportedUrlError {
  readonly _tag: 'UnsupportedUrl';
  readonly url: string;
  readonly message: string;
}

export interface IoError {
  readonly _tag: 'IoError';
  readonly path: string;
  readonly message: string;
}

export type StorageError =
  | DirectoryUnavailableError
  | PathNotFoundError
  | PermissionDeniedError
  | DestinationExistsError
  | PathConflictError
  | CrossVolumeMoveFailedError
  | RenameExhaustedError
  | UnsupportedUrlError
  | IoError;

export type StorageErrorTag = StorageError['_tag'];

export const StorageErr = {
  directoryUnavailable: (root: StorageRootKind, reason: string): DirectoryUnavailableError => ({
    _tag: 'DirectoryUnavailable',
    root,
    reason,
    message: `Storage root '${root}' is unavailable: ${reason}`,
  }),

  pathNotFound: (path: string): PathNotFoundError => ({
    _tag: 'PathNotFound',
    path,
    message: `No such file or directory: ${path}`,
  }),

  permissionDenied: (path: string): PermissionDeniedError => ({
    _tag: 'PermissionDenied',
    path,
    message: `Permission denied: ${path}`,
  }),

  destinationExists: (path: string): DestinationExistsError => ({
    _tag: 'DestinationExists',
    path,
    message: `Destination already exists: ${path}`,
  }),

  pathConflict: (path: string, expected: 'file' | 'directory'): PathConflictError => ({
    _tag: 'PathConflict',
    path,
    expected,
    message: `Expected a ${expected} at ${path}`,
  }),

  crossVolumeMoveFailed: (from: string, to: string, detail: string): CrossVolumeMoveFailedError => ({
    _tag: 'CrossVolumeMoveFailed',
    from,
    to,
    stage: 'remove_source',
    message: `Copied ${from} to ${to} but could not remove the source: ${detail}`,
  }),

  renameExhausted: (path: string, attempts: number): RenameExhaustedError => ({
    _tag: 'RenameExhausted',
    path,
    attempts,
    message: `Could not find a free random name for ${path} after ${attempts} attempts`,
  }),

  unsupportedUrl: (url: string): UnsupportedUrlError => ({
    _tag: 'UnsupportedUrl',
    url,
    message: `Only file: URLs are supported, got ${url}`,
  }),

  io: (path: string, message: string): IoError => ({
    _tag: 'IoError',
    path,
    message,
  }),
} as const;

/**
 * Lift a port-level error into the storage taxonomy.
 * Codes without a dedicated storage variant become `IoError`.
 */
export function fromFsError(e: FsError, path: string): StorageError {
  switch (e.code) {
    case 'FS_NOT_FOUND':
      return StorageErr.pathNotFound(path);
    case 'FS_PERMISSION_DENIED':
      return StorageErr.permissionDenied(path);
    case 'FS_ALREADY_EXISTS':
      return StorageErr.destinationExists(path);
    case 'FS_NOT_A_DIRECTORY':
      return StorageErr.pathConflict(path, 'directory');
    case 'FS_IS_A_DIRECTORY':
      return StorageErr.pathConflict(path, 'file');
    case 'FS_CROSS_DEVICE':
    case 'FS_NOT_EMPTY':
    case 'FS_UNSUPPORTED':
    case 'FS_IO_ERROR':
      return StorageErr.io(path, e.message);
    default:
      return assertNever(e);
  }
}

export function formatStorageError(error: StorageError): string {
  switch (error._tag) {
    case 'DirectoryUnavailable':
    case 'PathNotFound':
    case 'PermissionDenied':
    case 'DestinationExists':
    case 'PathConflict':
    case 'RenameExhausted':
    case 'UnsupportedUrl':
    case 'IoError':
      return error.message;
    case 'CrossVolumeMoveFailed':
      return `${error.message} (duplicate data remains at ${error.from})`;
    default:
      return assertNever(error);
  }
}
