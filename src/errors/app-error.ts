import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** Startup steps that can fail after config is valid. */
export type StartupPhase = 'storage_roots';

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: StartupPhase;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError;

/**
 * Marks config that came out of `loadConfig` (or a test constructor),
 * so services can demand it without re-checking.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
