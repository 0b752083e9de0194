import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { createStorageLayer } from '../../src/storage/create-storage-layer.js';
import type { StorageLayer } from '../../src/storage/create-storage-layer.js';
import { formatTempDirName } from '../../src/storage/temp-dir-name.js';
import { prepareStorage } from '../../src/application/use-cases/prepare-storage.js';
import { loadConfig } from '../../src/config/app-config.js';
import { FakeLogger } from '../helpers/FakeLogger.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { makeTempDir, removeTempDir, isWindows } from '../helpers/platform.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { StorageErr } from '../../src/storage/errors.js';

describe('storage layer on a real disk', () => {
  let root: string;
  let layer: StorageLayer;

  beforeEach(async () => {
    root = await makeTempDir();
    const config = expectOk(
      loadConfig({
        env: {
          FILEKEEP_APP_NAME: 'notes',
          FILEKEEP_DATA_DIR: path.join(root, 'data'),
          FILEKEEP_TMP_DIR: path.join(root, 'tmp'),
        },
      }),
      'config'
    );
    layer = createStorageLayer(config, { loggerFactory: new FakeLoggerFactory() });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('prepares every core root on disk', async () => {
    const prepared = expectOk(await prepareStorage(layer, new FakeLogger().asLogger()), 'prepare');
    const temporary = path.join(root, 'tmp', 'notes', formatTempDirName(layer.runIdentity));

    expect(prepared.roots.documents).toBe(path.join(root, 'data', 'Documents'));
    expect(prepared.roots.temporary).toBe(temporary);
    expect((await fsp.stat(temporary)).isDirectory()).toBe(true);
    expect(layer.runIdentity.pid).toBe(process.pid);
  });

  it.skipIf(isWindows)('leaves roots readable by the owner only', async () => {
    const documents = expectOk(await layer.resolver.appDocumentDirectoryPath(), 'documents');

    expect((await fsp.stat(documents)).mode & 0o777).toBe(0o700);
    expect(expectOk(await layer.protection.accessPolicyOf(documents), 'policy')).toEqual({ kind: 'owner_only', mode: 0o700 });
  });

  it('purges an old temporary directory of an earlier run with a recycled pid', async () => {
    const afa = expectOk(await layer.resolver.temporaryDirectoryAccessibleAfterFirstAuth(), 'afa');
    const stale = path.join(afa, formatTempDirName({ pid: process.pid, runId: 'ffffffffffffffff' }));
    await fsp.mkdir(path.join(stale, 'inner'), { recursive: true });
    const longAgo = new Date(Date.UTC(2001, 0, 1));
    await fsp.utimes(stale, longAgo, longAgo);

    const report = expectOk(await layer.janitor.clearOldTemporaryDirectories(), 'purge');

    expect(report.purged).toEqual([path.basename(stale)]);
    await expect(fsp.stat(stale)).rejects.toThrow();
  });

  it('runs the file operations end to end', async () => {
    const documents = expectOk(await layer.resolver.appDocumentDirectoryPath(), 'documents');
    const draft = path.join(documents, 'draft.txt');
    const final = path.join(documents, 'final.txt');

    expect(expectOk(await layer.fileOps.ensureFileExists(draft), 'ensure')).toBe('created');
    await fsp.writeFile(draft, 'hello');
    expect(expectOk(await layer.fileOps.fileSizeOfPath(draft), 'size')).toEqual({ kind: 'present', bytes: 5 });

    expect(expectOk(await layer.fileOps.moveFilePath(draft, final), 'move').strategy).toBe('rename');
    expect(expectOk(await layer.fileOps.fileSizeOfPath(draft), 'size after move')).toEqual({ kind: 'absent' });

    const retired = expectOk(await layer.fileOps.renameFilePathUsingRandomExtension(final), 'retire');
    expect(retired).toMatch(/final\.txt\.[0-9a-f]{16}$/);
    expect(await fsp.readFile(retired, 'utf8')).toBe('hello');

    const report = expectOk(await layer.janitor.deleteContentsOfDirectory(documents), 'clear');
    expect(report.removed).toEqual([retired]);
    expect(await fsp.readdir(documents)).toEqual([]);
  });

  describe.skipIf(isWindows)('symlinks', () => {
    it('accepts a symlink to a directory or a file as already existing', async () => {
      await fsp.mkdir(path.join(root, 'real'));
      await fsp.writeFile(path.join(root, 'real', 'notes.txt'), 'n');
      await fsp.symlink(path.join(root, 'real'), path.join(root, 'link'));
      await fsp.symlink(path.join(root, 'real', 'notes.txt'), path.join(root, 'notes-link'));

      expect(expectOk(await layer.fileOps.ensureDirectoryExists(path.join(root, 'link')), 'dir link')).toBe('existing');
      expect(expectOk(await layer.fileOps.ensureFileExists(path.join(root, 'notes-link')), 'file link')).toBe('existing');
      expect(expectErr(await layer.fileOps.ensureFileExists(path.join(root, 'link')), 'file over dir link')).toEqual(
        StorageErr.pathConflict(path.join(root, 'link'), 'file')
      );
    });

    it('still refuses a dangling symlink', async () => {
      const dangling = path.join(root, 'dangling');
      await fsp.symlink(path.join(root, 'gone'), dangling);

      expect(expectErr(await layer.fileOps.ensureDirectoryExists(dangling), 'dangling')).toEqual(
        StorageErr.pathConflict(dangling, 'directory')
      );
    });

    it('prepares storage when a root is a symlink to a directory elsewhere', async () => {
      await fsp.mkdir(path.join(root, 'elsewhere'));
      await fsp.mkdir(path.join(root, 'data'));
      await fsp.symlink(path.join(root, 'elsewhere'), path.join(root, 'data', 'Library'));

      const prepared = expectOk(await prepareStorage(layer, new FakeLogger().asLogger()), 'prepare');

      expect(prepared.roots.library).toBe(path.join(root, 'data', 'Library'));
      expect((await fsp.lstat(path.join(root, 'data', 'Library'))).isSymbolicLink()).toBe(true);
    });
  });
});
