/**
 * How the current process was started.
 * Injected through DI so services never sniff env vars for it.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
