/**
 * Redaction configuration for pino.
 *
 * Storage logs carry paths, not credentials, but callers pass arbitrary
 * context objects through; keep the usual secret-bearing keys out.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',
    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',
    'env.*_TOKEN',
    'env.*_SECRET',
  ],
  censor: '[REDACTED]',
};
