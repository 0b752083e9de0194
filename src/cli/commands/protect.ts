/**
 * Protect Command
 *
 * Applies a protection class to one entry, or to a whole tree.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse, storageFailure } from '../types/cli-result.js';
import type { ApplyOutcome } from '../../ports/file-protection.port.js';
import type { ProtectionClass } from '../../storage/protection-class.js';
import { PROTECTION_CLASSES, isProtectionClass } from '../../storage/protection-class.js';
import type { ProtectionReport } from '../../storage/protection-manager.js';
import type { StorageError } from '../../storage/errors.js';
import { formatStorageError } from '../../storage/errors.js';

export interface ProtectCommandDeps {
  readonly protect: (entryPath: string, protection: ProtectionClass) => ResultAsync<ApplyOutcome, StorageError>;
  readonly protectRecursive: (
    entryPath: string,
    protection: ProtectionClass
  ) => ResultAsync<ProtectionReport, StorageError>;
  readonly defaultProtection: ProtectionClass;
}

export interface ProtectCommandOptions {
  readonly class?: string;
  readonly recursive?: boolean;
}

export async function executeProtectCommand(
  entryPath: string,
  options: ProtectCommandOptions,
  deps: ProtectCommandDeps
): Promise<CliResult> {
  const requested = options.class ?? deps.defaultProtection;
  if (!isProtectionClass(requested)) {
    return misuse(`Unknown protection class '${requested}'`, [`Use one of: ${PROTECTION_CLASSES.join(', ')}`]);
  }

  if (options.recursive) {
    return deps.protectRecursive(entryPath, requested).match(
      (report) => fromReport(report),
      (error) => storageFailure(error)
    );
  }

  return deps.protect(entryPath, requested).match(
    (outcome) => fromOutcome(entryPath, requested, outcome),
    (error) => storageFailure(error)
  );
}

function fromOutcome(entryPath: string, protection: ProtectionClass, outcome: ApplyOutcome): CliResult {
  switch (outcome) {
    case 'applied':
      return success({ message: `Applied ${protection} to ${entryPath}` });
    case 'unchanged':
      return success({ message: `${entryPath} already has ${protection}` });
    case 'unsupported':
      return success({
        message: `Left ${entryPath} as is`,
        warnings: ['This platform has no file protection mechanism'],
      });
  }
}

function fromReport(report: ProtectionReport): CliResult {
  const counts = [`applied: ${report.applied}`, `unchanged: ${report.unchanged}`, `unsupported: ${report.unsupported}`];

  if (!report.fullySucceeded) {
    return failure(`${report.failures.length} entries under ${report.root} could not be protected`, {
      details: [...counts, ...report.failures.map((f) => formatStorageError(f.error))],
    });
  }

  return success({ message: `Applied ${report.protection} to ${report.root} and everything below it`, details: counts });
}
