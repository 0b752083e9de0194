/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import * as path from 'path';
import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { ProtectionClass } from '../storage/protection-class.js';
import { ProtectionClassSchema } from '../storage/protection-class.js';
import type { ProtectionMechanism } from '../infra/local/protection/index.js';

// =============================================================================
// Branded primitives
// =============================================================================

export type AppName = Brand<string, 'AppName'>;
export type AppGroupId = Brand<string, 'AppGroupId'>;
export type AbsoluteDir = Brand<string, 'AbsoluteDir'>;
export type RenameAttempts = Brand<number, 'RenameAttempts'>;

export interface AppConfig {
  readonly appName: AppName;
  readonly appGroupId: AppGroupId | null;
  readonly paths: {
    readonly dataDir: AbsoluteDir | null;
    readonly tmpDir: AbsoluteDir | null;
  };
  readonly protection: {
    readonly mechanism: ProtectionMechanism;
    readonly defaultClass: ProtectionClass;
  };
  readonly fileOps: {
    readonly renameAttempts: RenameAttempts;
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export const DEFAULT_APP_NAME = 'filekeep';
export const DEFAULT_RENAME_ATTEMPTS = 5;

// =============================================================================
// Schema
// =============================================================================

const SAFE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const absoluteDir = (variable: string) =>
  z
    .string()
    .min(1, `${variable} cannot be empty`)
    .refine((v) => path.isAbsolute(v), `${variable} must be an absolute path`)
    .optional();

const EnvSchema = z.object({
  FILEKEEP_APP_NAME: z
    .string()
    .regex(SAFE_NAME, 'FILEKEEP_APP_NAME may only contain letters, digits, ".", "_" and "-"')
    .default(DEFAULT_APP_NAME),

  FILEKEEP_APP_GROUP: z
    .string()
    .regex(SAFE_NAME, 'FILEKEEP_APP_GROUP may only contain letters, digits, ".", "_" and "-"')
    .optional(),

  FILEKEEP_DATA_DIR: absoluteDir('FILEKEEP_DATA_DIR'),
  FILEKEEP_TMP_DIR: absoluteDir('FILEKEEP_TMP_DIR'),

  FILEKEEP_PROTECTION: z.enum(['auto', 'posix', 'none']).default('auto'),
  FILEKEEP_DEFAULT_PROTECTION: ProtectionClassSchema.default('complete-until-first-auth'),

  FILEKEEP_RENAME_ATTEMPTS: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('FILEKEEP_RENAME_ATTEMPTS must be an integer')
        .min(1, 'FILEKEEP_RENAME_ATTEMPTS must be at least 1')
        .max(20, 'FILEKEEP_RENAME_ATTEMPTS cannot exceed 20')
        .default(DEFAULT_RENAME_ATTEMPTS)
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(markValidated(buildConfig(parsed.data)));
}

/**
 * Tests and embedding apps: a validated config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return markValidated(value);
}

/**
 * Defaults with selected overrides; the shape every test starts from.
 */
export function defaultAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    appName: DEFAULT_APP_NAME as AppName,
    appGroupId: null,
    paths: { dataDir: null, tmpDir: null },
    protection: { mechanism: 'auto', defaultClass: 'complete-until-first-auth' },
    fileOps: { renameAttempts: DEFAULT_RENAME_ATTEMPTS as RenameAttempts },
    ...overrides,
  };
}

// =============================================================================
// Internal
// =============================================================================

function markValidated(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    appName: env.FILEKEEP_APP_NAME as AppName,
    appGroupId: env.FILEKEEP_APP_GROUP === undefined ? null : (env.FILEKEEP_APP_GROUP as AppGroupId),
    paths: {
      dataDir: env.FILEKEEP_DATA_DIR === undefined ? null : (path.resolve(env.FILEKEEP_DATA_DIR) as AbsoluteDir),
      tmpDir: env.FILEKEEP_TMP_DIR === undefined ? null : (path.resolve(env.FILEKEEP_TMP_DIR) as AbsoluteDir),
    },
    protection: {
      mechanism: env.FILEKEEP_PROTECTION,
      defaultClass: env.FILEKEEP_DEFAULT_PROTECTION,
    },
    fileOps: {
      renameAttempts: env.FILEKEEP_RENAME_ATTEMPTS as RenameAttempts,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
