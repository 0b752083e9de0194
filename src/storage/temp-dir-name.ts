import type { RunIdentity } from './run-identity.js';

/**
 * Naming convention for run-scoped temporary directories: `tmp-<pid>-<runId>`.
 *
 * The janitor only ever considers names that parse; anything else in the
 * temp root belongs to somebody else.
 */
const TEMP_DIR_PATTERN = /^tmp-(\d+)-([0-9a-f]{16})$/;

export interface TempDirOwner {
  readonly pid: number;
  readonly runId: string;
}

export function formatTempDirName(owner: Pick<RunIdentity, 'pid' | 'runId'>): string {
  return `tmp-${owner.pid}-${owner.runId}`;
}

export function parseTempDirName(name: string): TempDirOwner | null {
  const match = TEMP_DIR_PATTERN.exec(name);
  if (!match) return null;

  const [, pid, runId] = match;
  if (pid === undefined || runId === undefined) return null;

  const parsedPid = Number.parseInt(pid, 10);
  if (!Number.isSafeInteger(parsedPid) || parsedPid <= 0) return null;

  return { pid: parsedPid, runId };
}
