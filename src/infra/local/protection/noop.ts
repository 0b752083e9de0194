import { okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { FsError } from '../../../ports/fs.port.js';
import type {
  AccessPolicy,
  ApplyOutcome,
  FileProtectionPort,
  ProtectionCapability,
} from '../../../ports/file-protection.port.js';

/**
 * Platforms without a usable protection mechanism: every call succeeds and
 * changes nothing.
 */
export class NoopProtection implements FileProtectionPort {
  readonly capability: ProtectionCapability = { kind: 'unsupported' };

  apply(): ResultAsync<ApplyOutcome, FsError> {
    return okAsync('unsupported' as const);
  }

  inspect(): ResultAsync<AccessPolicy, FsError> {
    return okAsync({ kind: 'unsupported' } as const);
  }
}
