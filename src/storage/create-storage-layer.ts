import type { ValidatedConfig } from '../config/app-config.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { FileProtectionPort } from '../ports/file-protection.port.js';
import type { ProcessProbePort } from '../ports/process-probe.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { StandardDirectoriesPort } from '../ports/standard-directories.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { LocalStandardDirectories } from '../infra/local/standard-directories/index.js';
import { selectFileProtection } from '../infra/local/protection/index.js';
import { NodeRandomEntropy } from '../infra/local/random-entropy/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { NodeProcessProbe } from '../infra/local/process-probe/index.js';
import type { RunIdentity } from './run-identity.js';
import { mintRunIdentity } from './run-identity.js';
import { ProtectionManager } from './protection-manager.js';
import { PathResolver } from './path-resolver.js';
import { SafeFileOps } from './safe-file-ops.js';
import { DirectoryJanitor } from './directory-janitor.js';

export interface StoragePorts {
  readonly fs: FileSystemPort;
  readonly directories: StandardDirectoriesPort;
  readonly protection: FileProtectionPort;
  readonly entropy: RandomEntropyPort;
  readonly clock: TimeClockPort;
  readonly probe: ProcessProbePort;
}

export interface StorageLayer {
  readonly config: ValidatedConfig;
  readonly ports: StoragePorts;
  readonly runIdentity: RunIdentity;
  readonly protection: ProtectionManager;
  readonly resolver: PathResolver;
  readonly fileOps: SafeFileOps;
  readonly janitor: DirectoryJanitor;
}

export interface CreateStorageLayerOptions {
  /** Replace individual ports; the rest get their Node adapters. */
  readonly ports?: Partial<StoragePorts>;
  readonly loggerFactory?: ILoggerFactory;
  readonly platform?: NodeJS.Platform;
}

/**
 * Wire the four storage services against one set of ports.
 *
 * The run identity is minted here, once; every service of the layer
 * shares it.
 */
export function createStorageLayer(config: ValidatedConfig, options: CreateStorageLayerOptions = {}): StorageLayer {
  const overrides = options.ports ?? {};
  const loggers = options.loggerFactory ?? new PinoLoggerFactory();

  const fs = overrides.fs ?? new NodeFileSystem();
  const ports: StoragePorts = {
    fs,
    directories: overrides.directories ?? localDirectoriesFor(config, options.platform),
    protection: overrides.protection ?? selectFileProtection(config.protection.mechanism, fs, options.platform),
    entropy: overrides.entropy ?? new NodeRandomEntropy(),
    clock: overrides.clock ?? new NodeTimeClock(),
    probe: overrides.probe ?? new NodeProcessProbe(),
  };

  const runIdentity = mintRunIdentity(ports.entropy, ports.clock);

  const protection = new ProtectionManager(
    ports.fs,
    ports.protection,
    config.protection.defaultClass,
    loggers.create('ProtectionManager')
  );

  const resolver = new PathResolver(
    ports.fs,
    ports.directories,
    protection,
    ports.entropy,
    { appName: config.appName, appGroupId: config.appGroupId, runIdentity },
    loggers.create('PathResolver')
  );

  const fileOps = new SafeFileOps(
    ports.fs,
    ports.entropy,
    { renameAttempts: config.fileOps.renameAttempts },
    loggers.create('SafeFileOps')
  );

  const janitor = new DirectoryJanitor(ports.fs, resolver, ports.probe, loggers.create('DirectoryJanitor'));

  return { config, ports, runIdentity, protection, resolver, fileOps, janitor };
}

export function localDirectoriesFor(config: ValidatedConfig, platform?: NodeJS.Platform): LocalStandardDirectories {
  return new LocalStandardDirectories({
    appName: config.appName,
    dataDir: config.paths.dataDir ?? undefined,
    tmpDir: config.paths.tmpDir ?? undefined,
    platform,
  });
}
