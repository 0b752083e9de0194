import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { FileProtectionPort } from '../ports/file-protection.port.js';
import type { ProcessProbePort } from '../ports/process-probe.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { StandardDirectoriesPort } from '../ports/standard-directories.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { NodeFileSystem } from '../infra/local/fs/index.js';
import { selectFileProtection } from '../infra/local/protection/index.js';
import { NodeRandomEntropy } from '../infra/local/random-entropy/index.js';
import { NodeTimeClock } from '../infra/local/time-clock/index.js';
import { NodeProcessProbe } from '../infra/local/process-probe/index.js';
import type { StorageLayer } from '../storage/create-storage-layer.js';
import { createStorageLayer, localDirectoriesFor } from '../storage/create-storage-layer.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Environment the config is parsed from. Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, AppError> {
  // Tests may inject config before initialization; do not overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  const configResult = loadConfig({ env });
  if (configResult.isErr()) return err(configResult.error);

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  return ok(undefined);
}

function registerLogging(): void {
  if (container.isRegistered(DI.Logging.Factory)) return;

  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function registerRuntime(mode: RuntimeMode): void {
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORT REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerPort<T>(token: symbol, create: (c: DependencyContainer) => T): void {
  if (container.isRegistered(token)) return;
  container.register<T>(token, { useFactory: instanceCachingFactory<T>(create) });
}

function registerPorts(): void {
  registerPort<FileSystemPort>(DI.Ports.FileSystem, () => new NodeFileSystem());
  registerPort<StandardDirectoriesPort>(DI.Ports.StandardDirectories, (c) =>
    localDirectoriesFor(c.resolve<ValidatedConfig>(DI.Config.App))
  );
  registerPort<FileProtectionPort>(DI.Ports.FileProtection, (c) =>
    selectFileProtection(
      c.resolve<ValidatedConfig>(DI.Config.App).protection.mechanism,
      c.resolve<FileSystemPort>(DI.Ports.FileSystem)
    )
  );
  registerPort<RandomEntropyPort>(DI.Ports.RandomEntropy, () => new NodeRandomEntropy());
  registerPort<TimeClockPort>(DI.Ports.TimeClock, () => new NodeTimeClock());
  registerPort<ProcessProbePort>(DI.Ports.ProcessProbe, () => new NodeProcessProbe());
}

// ═══════════════════════════════════════════════════════════════════════════
// STORAGE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerStorage(): void {
  container.register<StorageLayer>(DI.Storage.Layer, {
    useFactory: instanceCachingFactory((c: DependencyContainer) =>
      createStorageLayer(c.resolve<ValidatedConfig>(DI.Config.App), {
        ports: {
          fs: c.resolve<FileSystemPort>(DI.Ports.FileSystem),
          directories: c.resolve<StandardDirectoriesPort>(DI.Ports.StandardDirectories),
          protection: c.resolve<FileProtectionPort>(DI.Ports.FileProtection),
          entropy: c.resolve<RandomEntropyPort>(DI.Ports.RandomEntropy),
          clock: c.resolve<TimeClockPort>(DI.Ports.TimeClock),
          probe: c.resolve<ProcessProbePort>(DI.Ports.ProcessProbe),
        },
        loggerFactory: c.resolve<ILoggerFactory>(DI.Logging.Factory),
      })
    ),
  });

  // Service tokens delegate to the layer so all of them share one run identity.
  const layer = (c: DependencyContainer) => c.resolve<StorageLayer>(DI.Storage.Layer);
  container.register(DI.Storage.PathResolver, { useFactory: (c) => layer(c).resolver });
  container.register(DI.Storage.ProtectionManager, { useFactory: (c) => layer(c).protection });
  container.register(DI.Storage.SafeFileOps, { useFactory: (c) => layer(c).fileOps });
  container.register(DI.Storage.DirectoryJanitor, { useFactory: (c) => layer(c).janitor });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 *
 * Config errors come back as data; the composition root decides how to
 * report them and whether to exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;

  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));
  const configured = registerConfig(env);
  if (configured.isErr()) return configured;

  registerLogging();
  registerPorts();
  registerStorage();

  initialized = true;
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
