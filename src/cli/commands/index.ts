/**
 * CLI Commands - Public API
 */

export { executeRootsCommand, type RootsCommandDeps } from './roots.js';
export { executeCleanupCommand, type CleanupCommandDeps } from './cleanup.js';
export { executeClearCommand, type ClearCommandDeps } from './clear.js';
export { executeSizeCommand, type SizeCommandDeps } from './size.js';
export { executeProtectCommand, type ProtectCommandDeps, type ProtectCommandOptions } from './protect.js';
export { executeMoveCommand, type MoveCommandDeps } from './move.js';
export { executeRetireCommand, type RetireCommandDeps } from './retire.js';
