// DI Container exports
export { initializeContainer, container, resetContainer, isInitialized } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Configuration
export type { AppConfig, ValidatedConfig, LoadConfigOptions, LoadConfigResult } from './config/app-config.js';
export { loadConfig, createValidatedConfig, defaultAppConfig } from './config/app-config.js';

// Errors
export type { AppError, ConfigInvalidError, StartupFailedError } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';

// Logging
export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, createBootstrapLogger } from './core/logging/index.js';

// Storage services
export * from './storage/index.js';

// Startup
export type { PreparedStorage, ResolvedRoots } from './application/use-cases/prepare-storage.js';
export { prepareStorage } from './application/use-cases/prepare-storage.js';

// Ports
export type { FileSystemPort, FsError, FsErrorCode, EntryKind, EntryStat } from './ports/fs.port.js';
export type { StandardDirectoriesPort, BaseDirectoryUnavailable } from './ports/standard-directories.port.js';
export type {
  FileProtectionPort,
  ProtectionCapability,
  ApplyOutcome,
  AccessPolicy,
} from './ports/file-protection.port.js';
export type { RandomEntropyPort } from './ports/random-entropy.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { ProcessProbePort } from './ports/process-probe.port.js';

// Node adapters
export { NodeFileSystem } from './infra/local/fs/index.js';
export { LocalStandardDirectories } from './infra/local/standard-directories/index.js';
export type { LocalStandardDirectoriesOptions } from './infra/local/standard-directories/index.js';
export { PosixModeProtection, NoopProtection, selectFileProtection } from './infra/local/protection/index.js';
export type { ProtectionMechanism } from './infra/local/protection/index.js';
export { NodeRandomEntropy } from './infra/local/random-entropy/index.js';
export { NodeTimeClock } from './infra/local/time-clock/index.js';
export { NodeProcessProbe } from './infra/local/process-probe/index.js';
