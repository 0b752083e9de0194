import { describe, it, expect } from 'vitest';
import { errAsync, okAsync } from 'neverthrow';
import {
  executeCleanupCommand,
  executeClearCommand,
  executeMoveCommand,
  executeProtectCommand,
  executeRetireCommand,
  executeRootsCommand,
  executeSizeCommand,
} from '../../../src/cli/commands/index.js';
import type { ProtectCommandDeps, SizeCommandDeps } from '../../../src/cli/commands/index.js';
import type { FileSize } from '../../../src/storage/safe-file-ops.js';
import { StorageErr } from '../../../src/storage/errors.js';
import type { StorageRootKind } from '../../../src/storage/storage-root.js';

describe('roots command', () => {
  const resolve = (kind: StorageRootKind) => okAsync(`/data/${kind}`);

  it('lists every root and notes the skipped shared root', async () => {
    const result = await executeRootsCommand({ resolve, sharedDataConfigured: false });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Resolved 5 storage roots',
        details: [
          'documents: /data/documents',
          'library: /data/library',
          'caches: /data/caches',
          'temporary: /data/temporary',
          'temporary_after_first_auth: /data/temporary_after_first_auth',
        ],
        warnings: ['shared_data skipped: FILEKEEP_APP_GROUP is not set'],
      },
    });
  });

  it('fails when any root is unavailable', async () => {
    const result = await executeRootsCommand({
      resolve: (kind) =>
        kind === 'shared_data'
          ? errAsync(StorageErr.directoryUnavailable('shared_data', '/g does not exist'))
          : okAsync(`/data/${kind}`),
      sharedDataConfigured: true,
    });

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.exitCode).toEqual({ kind: 'general_error' });
    expect(result.output.message).toBe('1 of 6 storage roots are unavailable');
    expect(result.output.details?.at(-1)).toBe("Storage root 'shared_data' is unavailable: /g does not exist");
  });
});

describe('cleanup command', () => {
  it('reports purged and kept directories', async () => {
    const result = await executeCleanupCommand({
      clearOldTemporaryDirectories: () =>
        okAsync({
          root: '/tmp/notes',
          purged: ['tmp-1-aaaaaaaaaaaaaaaa'],
          skipped: [{ name: 'tmp-2-bbbbbbbbbbbbbbbb', reason: 'owner_alive' as const }],
          failures: [{ path: '/tmp/notes/tmp-3-cccccccccccccccc', error: StorageErr.permissionDenied('/tmp/notes/tmp-3-cccccccccccccccc') }],
          fullySucceeded: false,
        }),
    });

    expect(result).toEqual({
      kind: 'success',
      output: {
        message: 'Purged 1 stale temporary directory',
        details: ['purged tmp-1-aaaaaaaaaaaaaaaa', 'kept tmp-2-bbbbbbbbbbbbbbbb (owner_alive)'],
        warnings: ['Permission denied: /tmp/notes/tmp-3-cccccccccccccccc'],
      },
    });
  });

  it('says so when there is nothing to purge', async () => {
    const result = await executeCleanupCommand({
      clearOldTemporaryDirectories: () =>
        okAsync({ root: '/tmp/notes', purged: [], skipped: [], failures: [], fullySucceeded: true }),
    });

    expect(result.kind === 'success' && result.output?.message).toBe('No stale temporary directories found');
  });

  it('suggests a writable location when the temporary root is unavailable', async () => {
    const result = await executeCleanupCommand({
      clearOldTemporaryDirectories: () =>
        errAsync(StorageErr.directoryUnavailable('temporary_after_first_auth', 'the OS reported no temporary directory')),
    });

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.output.suggestions).toEqual([
      'Set FILEKEEP_DATA_DIR or FILEKEEP_TMP_DIR to an absolute, writable directory',
    ]);
  });
});

describe('clear command', () => {
  it('counts removed entries', async () => {
    const result = await executeClearCommand('/c', {
      deleteContentsOfDirectory: () =>
        okAsync({ directory: '/c', removed: ['/c/a'], failures: [], fullySucceeded: true }),
    });

    expect(result).toEqual({ kind: 'success', output: { message: 'Removed 1 entry from /c' } });
  });

  it('fails when some entries stay', async () => {
    const result = await executeClearCommand('/c', {
      deleteContentsOfDirectory: () =>
        okAsync({
          directory: '/c',
          removed: ['/c/a', '/c/b'],
          failures: [{ path: '/c/x', error: StorageErr.permissionDenied('/c/x') }],
          fullySucceeded: false,
        }),
    });

    expect(result.kind).toBe('failure');
    if (result.kind !== 'failure') return;
    expect(result.output.message).toBe('Could not remove 1 of 3 entries in /c');
    expect(result.output.details).toEqual(['Permission denied: /c/x']);
  });
});

describe('size command', () => {
  const deps: SizeCommandDeps = {
    fileSizeOfPath: (p) => okAsync<FileSize>(p === '/v/a.bin' ? { kind: 'present', bytes: 1536 } : { kind: 'absent' }),
    fileSizeOfUrl: (u) =>
      u.startsWith('file:') ? okAsync<FileSize>({ kind: 'present', bytes: 12 }) : errAsync(StorageErr.unsupportedUrl(u)),
  };

  it('prints a human-readable size', async () => {
    expect(await executeSizeCommand('/v/a.bin', deps)).toEqual({
      kind: 'success',
      output: { message: '/v/a.bin: 1.5 KiB', details: ['1536 bytes'] },
    });
  });

  it('routes URLs to the URL lookup', async () => {
    expect(await executeSizeCommand('file:///v/a.bin', deps)).toEqual({
      kind: 'success',
      output: { message: 'file:///v/a.bin: 12 B', details: ['12 bytes'] },
    });

    const rejected = await executeSizeCommand('https://example.com/a', deps);
    expect(rejected.kind === 'failure' && rejected.output.message).toBe('Only file: URLs are supported, got https://example.com/a');
  });

  it('fails for a missing file', async () => {
    const result = await executeSizeCommand('/v/none', deps);

    expect(result.kind === 'failure' && result.output.message).toBe('No file at /v/none');
  });
});

describe('protect command', () => {
  const deps: ProtectCommandDeps = {
    protect: () => okAsync('applied' as const),
    protectRecursive: (root, protection) =>
      okAsync({ root, protection, applied: 3, unchanged: 1, unsupported: 0, failures: [], fullySucceeded: true }),
    defaultProtection: 'complete-until-first-auth',
  };

  it('applies the default class', async () => {
    expect(await executeProtectCommand('/v/a', {}, deps)).toEqual({
      kind: 'success',
      output: { message: 'Applied complete-until-first-auth to /v/a' },
    });
  });

  it('rejects an unknown class as misuse', async () => {
    const result = await executeProtectCommand('/v/a', { class: 'strict' }, deps);

    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'misuse' },
      output: {
        message: "Unknown protection class 'strict'",
        suggestions: ['Use one of: complete, complete-unless-open, complete-until-first-auth, none'],
      },
    });
  });

  it('warns when the platform cannot protect files', async () => {
    const result = await executeProtectCommand('/v/a', { class: 'complete' }, { ...deps, protect: () => okAsync('unsupported' as const) });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Left /v/a as is', warnings: ['This platform has no file protection mechanism'] },
    });
  });

  it('summarises a recursive run', async () => {
    expect(await executeProtectCommand('/v', { class: 'complete', recursive: true }, deps)).toEqual({
      kind: 'success',
      output: {
        message: 'Applied complete to /v and everything below it',
        details: ['applied: 3', 'unchanged: 1', 'unsupported: 0'],
      },
    });
  });

  it('fails a recursive run with failures', async () => {
    const result = await executeProtectCommand(
      '/v',
      { recursive: true },
      {
        ...deps,
        protectRecursive: (root, protection) =>
          okAsync({
            root,
            protection,
            applied: 1,
            unchanged: 0,
            unsupported: 0,
            failures: [{ path: '/v/x', error: StorageErr.permissionDenied('/v/x') }],
            fullySucceeded: false,
          }),
      }
    );

    expect(result.kind === 'failure' && result.output).toEqual({
      message: '1 entries under /v could not be protected',
      details: ['applied: 1', 'unchanged: 0', 'unsupported: 0', 'Permission denied: /v/x'],
      warnings: undefined,
      suggestions: undefined,
    });
  });
});

describe('move command', () => {
  it('mentions a cross-volume move', async () => {
    const result = await executeMoveCommand('/v/a', '/mnt/a', {
      moveFilePath: (from, to) => okAsync({ from, to, strategy: 'copy_then_remove' as const }),
    });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Moved /v/a to /mnt/a', details: ['Crossed volumes: copied, then removed the source'] },
    });
  });

  it('suggests what to do about leftover source data', async () => {
    const result = await executeMoveCommand('/v/a', '/mnt/a', {
      moveFilePath: (from, to) => errAsync(StorageErr.crossVolumeMoveFailed(from, to, 'busy')),
    });

    expect(result.kind === 'failure' && result.output.suggestions).toEqual(['Remove /v/a once the copy at /mnt/a is verified']);
  });

  it('suggests another destination when it exists', async () => {
    const result = await executeMoveCommand('/v/a', '/v/b', {
      moveFilePath: (_from, to) => errAsync(StorageErr.destinationExists(to)),
    });

    expect(result.kind === 'failure' && result.output.message).toBe('Destination already exists: /v/b');
  });
});

describe('retire command', () => {
  it('prints the new name', async () => {
    const result = await executeRetireCommand('/v/log.txt', {
      renameFilePathUsingRandomExtension: (p) => okAsync(`${p}.0001020304050607`),
    });

    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Renamed /v/log.txt to /v/log.txt.0001020304050607' },
    });
  });
});
