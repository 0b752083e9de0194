/**
 * Port for ending the current process.
 * Only composition roots (CLI entrypoint) may use it.
 */
export type TerminationCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}
