import { describe, it, expect } from 'vitest';
import { formatTempDirName, parseTempDirName } from '../../../src/storage/temp-dir-name.js';
import { mintRunIdentity, toHex } from '../../../src/storage/run-identity.js';
import { FakeRandomEntropy, FakeTimeClock } from '../../fakes/index.js';

describe('temporary directory names', () => {
  it('formats pid and run id', () => {
    expect(formatTempDirName({ pid: 4242, runId: 'abcdef0123456789' })).toBe('tmp-4242-abcdef0123456789');
  });

  it('parses what it formats', () => {
    expect(parseTempDirName('tmp-4242-abcdef0123456789')).toEqual({ pid: 4242, runId: 'abcdef0123456789' });
  });

  it.each([
    ['not-a-temp-dir'],
    ['tmp-4242'],
    ['tmp-4242-ABCDEF0123456789'],
    ['tmp-4242-abcdef012345678'],
    ['tmp-0-abcdef0123456789'],
    ['tmp--1-abcdef0123456789'],
    ['tmp-4242-abcdef0123456789.bak'],
  ])('rejects %s', (name) => {
    expect(parseTempDirName(name)).toBeNull();
  });
});

describe('run identity', () => {
  it('takes 8 bytes of entropy as 16 hex characters plus pid and launch time', () => {
    const clock = new FakeTimeClock();
    clock.setPid(77);
    clock.setLaunchedAt(5_000);

    const identity = mintRunIdentity(new FakeRandomEntropy(), clock);

    expect(identity).toEqual({ runId: '0001020304050607', pid: 77, launchedAtMs: 5_000 });
  });

  it('pads single-digit bytes', () => {
    expect(toHex(Uint8Array.from([0, 15, 16, 255]))).toBe('000f10ff');
  });
});
