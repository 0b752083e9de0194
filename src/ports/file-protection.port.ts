import type { ResultAsync } from 'neverthrow';
import type { FsError, EntryKind } from './fs.port.js';
import type { ProtectionClass } from '../storage/protection-class.js';

/**
 * What the platform can do about protection classes.
 */
export type ProtectionCapability =
  | { readonly kind: 'posix_mode' }
  | { readonly kind: 'unsupported' };

export type ApplyOutcome = 'applied' | 'unchanged' | 'unsupported';

/**
 * Observed access policy of one entry.
 */
export type AccessPolicy =
  | { readonly kind: 'unsupported' }
  | { readonly kind: 'owner_only'; readonly mode: number }
  | { readonly kind: 'shared'; readonly mode: number };

/**
 * Port: the OS mechanism behind protection classes, one entry at a time.
 *
 * Adapters never create entries and never recurse; the ProtectionManager
 * owns traversal and aggregation.
 */
export interface FileProtectionPort {
  readonly capability: ProtectionCapability;

  apply(entryPath: string, kind: EntryKind, protection: ProtectionClass): ResultAsync<ApplyOutcome, FsError>;

  inspect(entryPath: string): ResultAsync<AccessPolicy, FsError>;
}
