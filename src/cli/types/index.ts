export type { ExitCode } from './exit-code.js';
export { toTerminationCode, toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult } from './cli-result.js';
export { success, successMessage, failure, misuse, storageFailure } from './cli-result.js';
