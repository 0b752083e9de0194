import type { ProtectionClass } from './protection-class.js';

/**
 * Lifecycle classes of top-level storage.
 */
export type StorageRootKind =
  | 'documents'
  | 'library'
  | 'shared_data'
  | 'caches'
  | 'temporary'
  | 'temporary_after_first_auth';

export type CreationPolicy = 'create_if_missing' | 'assume_exists';

export interface StorageRootDefinition {
  readonly kind: StorageRootKind;
  readonly creation: CreationPolicy;
  readonly defaultProtection: ProtectionClass;
  readonly description: string;
}

export const STORAGE_ROOTS: Readonly<Record<StorageRootKind, StorageRootDefinition>> = {
  documents: {
    kind: 'documents',
    creation: 'create_if_missing',
    defaultProtection: 'complete-until-first-auth',
    description: 'User-visible application documents',
  },
  library: {
    kind: 'library',
    creation: 'create_if_missing',
    defaultProtection: 'complete-until-first-auth',
    description: 'Application support data (databases, settings)',
  },
  shared_data: {
    kind: 'shared_data',
    // The group container belongs to every cooperating process; none of them invents it.
    creation: 'assume_exists',
    defaultProtection: 'complete-until-first-auth',
    description: 'Data shared between the app and its cooperating processes',
  },
  caches: {
    kind: 'caches',
    creation: 'create_if_missing',
    defaultProtection: 'complete-until-first-auth',
    description: 'Re-creatable cached data',
  },
  temporary: {
    kind: 'temporary',
    creation: 'create_if_missing',
    defaultProtection: 'complete-unless-open',
    description: 'Scratch space for the current run; unreadable while locked',
  },
  temporary_after_first_auth: {
    kind: 'temporary_after_first_auth',
    creation: 'create_if_missing',
    defaultProtection: 'complete-until-first-auth',
    description: 'Scratch space that stays readable after first unlock and survives restarts until purged',
  },
};

export const STORAGE_ROOT_KINDS: readonly StorageRootKind[] = [
  'documents',
  'library',
  'shared_data',
  'caches',
  'temporary',
  'temporary_after_first_auth',
];
