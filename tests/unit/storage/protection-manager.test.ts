import { describe, it, expect, beforeEach } from 'vitest';
import { ProtectionManager } from '../../../src/storage/protection-manager.js';
import { NoopProtection, PosixModeProtection } from '../../../src/infra/local/protection/index.js';
import { StorageErr } from '../../../src/storage/errors.js';
import { InMemoryFileSystem } from '../../fakes/index.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('ProtectionManager', () => {
  let fs: InMemoryFileSystem;
  let logger: FakeLogger;
  let manager: ProtectionManager;

  beforeEach(() => {
    fs = new InMemoryFileSystem();
    logger = new FakeLogger();
    manager = new ProtectionManager(fs, new PosixModeProtection(fs), 'complete-until-first-auth', logger.asLogger());
  });

  describe('protect', () => {
    it('applies the configured default class', async () => {
      fs.addFile('/data/a.txt', 0, { mode: 0o644 });

      expect(expectOk(await manager.protect('/data/a.txt'), 'protect')).toBe('applied');
      expect(fs.modeOf('/data/a.txt')).toBe(0o600);
    });

    it('can relax protection again', async () => {
      fs.addFile('/data/a.txt', 0, { mode: 0o600 });

      expect(expectOk(await manager.protect('/data/a.txt', 'none'), 'protect none')).toBe('applied');
      expect(fs.modeOf('/data/a.txt')).toBe(0o644);
    });

    it('is a no-op success when the class is already in place', async () => {
      fs.addDir('/data/dir', { mode: 0o700 });

      expect(expectOk(await manager.protect('/data/dir', 'complete'), 'protect')).toBe('unchanged');
    });

    it('never creates the target', async () => {
      const error = expectErr(await manager.protect('/data/missing'), 'protect missing');

      expect(error).toEqual(StorageErr.pathNotFound('/data/missing'));
      expect(fs.has('/data/missing')).toBe(false);
    });
  });

  describe('protectRecursive', () => {
    beforeEach(() => {
      fs.addDir('/data/root', { mode: 0o755 })
        .addFile('/data/root/a.txt', 1, { mode: 0o644 })
        .addDir('/data/root/sub', { mode: 0o755 })
        .addFile('/data/root/sub/b.txt', 1, { mode: 0o600 })
        .addSymlink('/data/root/link');
    });

    it('protects the directory and everything below it, skipping symlinks', async () => {
      const report = expectOk(await manager.protectRecursive('/data/root', 'complete'), 'recursive');

      expect(report).toEqual({
        root: '/data/root',
        protection: 'complete',
        applied: 3,
        unchanged: 1,
        unsupported: 0,
        failures: [],
        fullySucceeded: true,
      });
      expect(fs.modeOf('/data/root')).toBe(0o700);
      expect(fs.modeOf('/data/root/a.txt')).toBe(0o600);
      expect(fs.modeOf('/data/root/sub')).toBe(0o700);
      expect(fs.modeOf('/data/root/link')).toBe(0o777);
    });

    it('records failures and keeps going', async () => {
      fs.addFile('/data/root/sub/b.txt', 1, { mode: 0o644 });
      fs.failOn('chmod', '/data/root/a.txt', 'FS_PERMISSION_DENIED');
      fs.failOn('readdir', '/data/root/sub', 'FS_PERMISSION_DENIED');

      const report = expectOk(await manager.protectRecursive('/data/root', 'complete'), 'recursive');

      expect(report.fullySucceeded).toBe(false);
      expect(report.applied).toBe(2);
      expect(report.failures).toEqual([
        { path: '/data/root/a.txt', error: StorageErr.permissionDenied('/data/root/a.txt') },
        { path: '/data/root/sub', error: StorageErr.permissionDenied('/data/root/sub') },
      ]);
      expect(fs.modeOf('/data/root/sub/b.txt')).toBe(0o644);
      expect(logger.getEntries('warn').map((e) => e.msg)).toEqual([
        'Could not protect entry; continuing',
        'Could not protect entry; continuing',
        'Recursive protection finished with failures',
      ]);
    });

    it('treats a file target as a single entry', async () => {
      const report = expectOk(await manager.protectRecursive('/data/root/a.txt', 'complete'), 'recursive file');

      expect(report.applied).toBe(1);
      expect(report.fullySucceeded).toBe(true);
      expect(fs.callsTo('readdir')).toEqual([]);
    });

    it('fails on a missing target', async () => {
      const error = expectErr(await manager.protectRecursive('/data/nowhere'), 'recursive missing');

      expect(error._tag).toBe('PathNotFound');
    });
  });

  describe('accessPolicyOf', () => {
    it('reflects what protect did', async () => {
      fs.addFile('/data/a.txt', 0, { mode: 0o644 });
      expectOk(await manager.protect('/data/a.txt'), 'protect');

      expect(expectOk(await manager.accessPolicyOf('/data/a.txt'), 'policy')).toEqual({
        kind: 'owner_only',
        mode: 0o600,
      });
    });

    it('fails on a missing entry', async () => {
      expect(expectErr(await manager.accessPolicyOf('/data/none'), 'policy')._tag).toBe('PathNotFound');
    });
  });

  describe('without a protection mechanism', () => {
    it('reports every entry as unsupported and changes nothing', async () => {
      const noop = new ProtectionManager(fs, new NoopProtection(), 'complete', logger.asLogger());
      fs.addDir('/data/root', { mode: 0o755 }).addFile('/data/root/a.txt', 0, { mode: 0o644 });

      expect(noop.capability).toEqual({ kind: 'unsupported' });
      expect(expectOk(await noop.protect('/data/root/a.txt'), 'protect')).toBe('unsupported');

      const report = expectOk(await noop.protectRecursive('/data/root'), 'recursive');
      expect(report.unsupported).toBe(2);
      expect(fs.modeOf('/data/root/a.txt')).toBe(0o644);
    });
  });
});
