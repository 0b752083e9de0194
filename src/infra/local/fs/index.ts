import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import type { Stats } from 'fs';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { EntryKind, EntryStat, FileSystemPort, FsError } from '../../../ports/fs.port.js';

export function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}

export function mapFsError(e: unknown, target: string): FsError {
  const code = nodeErrorCode(e);

  switch (code) {
    case 'ENOENT':
      return { code: 'FS_NOT_FOUND', message: `Not found: ${target}` };
    case 'EEXIST':
    case 'ERR_FS_CP_EEXIST':
      return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${target}` };
    case 'EACCES':
    case 'EPERM':
      return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${target}` };
    case 'ENOTDIR':
      return { code: 'FS_NOT_A_DIRECTORY', message: `Not a directory: ${target}` };
    case 'EISDIR':
      return { code: 'FS_IS_A_DIRECTORY', message: `Is a directory: ${target}` };
    case 'ENOTEMPTY':
      return { code: 'FS_NOT_EMPTY', message: `Directory not empty: ${target}` };
    case 'EXDEV':
      return { code: 'FS_CROSS_DEVICE', message: `Cross-device operation: ${target}` };
    case 'ENOTSUP':
    case 'EOPNOTSUPP':
      return { code: 'FS_UNSUPPORTED', message: `Unsupported operation: ${target}` };
    default:
      return { code: 'FS_IO_ERROR', message: `FS error at ${target}: ${e instanceof Error ? e.message : String(e)}` };
  }
}

function entryKind(s: Stats): EntryKind {
  if (s.isSymbolicLink()) return 'symlink';
  if (s.isDirectory()) return 'directory';
  if (s.isFile()) return 'file';
  return 'other';
}

function toEntryStat(s: Stats): EntryStat {
  return { kind: entryKind(s), sizeBytes: s.size, mode: s.mode & 0o777, mtimeMs: s.mtimeMs };
}

/**
 * Node adapter for FileSystemPort on top of `fs/promises`.
 */
export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readdir(dirPath: string): ResultAsync<readonly string[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath), (e) => mapFsError(e, dirPath));
  }

  lstat(entryPath: string): ResultAsync<EntryStat, FsError> {
    return RA.fromPromise(fs.lstat(entryPath), (e) => mapFsError(e, entryPath)).map(toEntryStat);
  }

  stat(entryPath: string): ResultAsync<EntryStat, FsError> {
    return RA.fromPromise(fs.stat(entryPath), (e) => mapFsError(e, entryPath)).map(toEntryStat);
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  copy(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    const target = `${fromPath} -> ${toPath}`;
    return RA.fromPromise(
      (async () => {
        const source = await fs.lstat(fromPath);
        if (source.isDirectory()) {
          // `cp` silently merges into an existing directory; refuse that up front.
          await fs.mkdir(toPath, { mode: 0o700 });
          await fs.cp(fromPath, toPath, { recursive: true, force: false, errorOnExist: true, preserveTimestamps: true });
          // `cp` only carries the mode onto directories it creates itself.
          await fs.chmod(toPath, source.mode & 0o777);
          return;
        }
        await fs.copyFile(fromPath, toPath, fsConstants.COPYFILE_EXCL);
      })(),
      (e) => mapFsError(e, target)
    );
  }

  remove(entryPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(entryPath, { recursive: true, force: false }), (e) => mapFsError(e, entryPath));
  }

  createExclusive(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, new Uint8Array(0), { flag: 'wx' }), (e) => mapFsError(e, filePath));
  }

  chmod(entryPath: string, mode: number): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.chmod(entryPath, mode), (e) => mapFsError(e, entryPath));
  }
}
