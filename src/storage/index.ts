export type { ProtectionClass } from './protection-class.js';
export { PROTECTION_CLASSES, ProtectionClassSchema, isProtectionClass, isRestrictive } from './protection-class.js';

export type { StorageRootKind, CreationPolicy, StorageRootDefinition } from './storage-root.js';
export { STORAGE_ROOTS, STORAGE_ROOT_KINDS } from './storage-root.js';

export type { RunIdentity } from './run-identity.js';
export { mintRunIdentity, RUN_ID_BYTES } from './run-identity.js';

export type { TempDirOwner } from './temp-dir-name.js';
export { formatTempDirName, parseTempDirName } from './temp-dir-name.js';

export type {
  StorageError,
  StorageErrorTag,
  DirectoryUnavailableError,
  PathNotFoundError,
  PermissionDeniedError,
  DestinationExistsError,
  PathConflictError,
  CrossVolumeMoveFailedError,
  RenameExhaustedError,
  UnsupportedUrlError,
  IoError,
} from './errors.js';
export { StorageErr, fromFsError, formatStorageError } from './errors.js';

export type { ProtectionFailure, ProtectionReport } from './protection-manager.js';
export { ProtectionManager } from './protection-manager.js';

export type { PathResolverOptions } from './path-resolver.js';
export { PathResolver } from './path-resolver.js';

export type {
  FileSize,
  EnsureOutcome,
  DeleteOutcome,
  MoveStrategy,
  MoveOutcome,
  SafeFileOpsOptions,
} from './safe-file-ops.js';
export { SafeFileOps } from './safe-file-ops.js';

export type { CleanupFailure, CleanupReport, SkipReason, SkippedEntry, PurgeReport } from './directory-janitor.js';
export { DirectoryJanitor } from './directory-janitor.js';

export type { StoragePorts, StorageLayer, CreateStorageLayerOptions } from './create-storage-layer.js';
export { createStorageLayer, localDirectoriesFor } from './create-storage-layer.js';
