#!/usr/bin/env node
/**
 * filekeep CLI - Composition Root
 *
 * Wires services into each command and turns the CliResult into an exit
 * status. No business logic lives here; see src/cli/commands/*.ts.
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { StorageLayer } from './storage/create-storage-layer.js';
import { formatAppError } from './errors/formatter.js';
import { PROTECTION_CLASSES } from './storage/protection-class.js';

import { createBootstrapLogger } from './core/logging/index.js';

import type { CliResult } from './cli/types/index.js';
import { failure } from './cli/types/index.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import {
  executeRootsCommand,
  executeCleanupCommand,
  executeClearCommand,
  executeSizeCommand,
  executeProtectCommand,
  executeMoveCommand,
  executeRetireCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the container, run one command against the storage layer,
 * interpret its result. A config error ends the process before any
 * command runs.
 */
async function runWithStorage(command: (layer: StorageLayer) => Promise<CliResult>): Promise<void> {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    createBootstrapLogger('cli').error({ error: initialized.error }, 'Container initialization failed');
    interpretCliResultWithoutDI(failure(formatAppError(initialized.error), { exitCode: { kind: 'misuse' } }));
    return;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const layer = container.resolve<StorageLayer>(DI.Storage.Layer);

  interpretCliResult(await command(layer), terminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('filekeep')
  .description('Storage roots, file protection and fail-safe file operations')
  .version('0.1.0');

program
  .command('roots')
  .description('Resolve every storage root, creating missing ones, and print their paths')
  .action(() =>
    runWithStorage((layer) =>
      executeRootsCommand({
        resolve: (kind) => layer.resolver.resolve(kind),
        sharedDataConfigured: layer.config.appGroupId !== null,
      })
    )
  );

program
  .command('cleanup')
  .description('Purge temporary directories left behind by earlier runs')
  .action(() =>
    runWithStorage((layer) =>
      executeCleanupCommand({ clearOldTemporaryDirectories: () => layer.janitor.clearOldTemporaryDirectories() })
    )
  );

program
  .command('clear <dir>')
  .description('Delete everything inside a directory, keeping the directory')
  .action((dir: string) =>
    runWithStorage((layer) =>
      executeClearCommand(dir, { deleteContentsOfDirectory: (p) => layer.janitor.deleteContentsOfDirectory(p) })
    )
  );

program
  .command('size <path>')
  .description('Print the size of a file, given a path or a file: URL')
  .action((target: string) =>
    runWithStorage((layer) =>
      executeSizeCommand(target, {
        fileSizeOfPath: (p) => layer.fileOps.fileSizeOfPath(p),
        fileSizeOfUrl: (u) => layer.fileOps.fileSizeOfUrl(u),
      })
    )
  );

program
  .command('protect <path>')
  .description('Apply a protection class to a file or directory')
  .option('-c, --class <class>', `Protection class (${PROTECTION_CLASSES.join(', ')})`)
  .option('-r, --recursive', 'Also protect everything currently below a directory')
  .action((entryPath: string, options: { class?: string; recursive?: boolean }) =>
    runWithStorage((layer) =>
      executeProtectCommand(entryPath, options, {
        protect: (p, c) => layer.protection.protect(p, c),
        protectRecursive: (p, c) => layer.protection.protectRecursive(p, c),
        defaultProtection: layer.protection.defaultProtection,
      })
    )
  );

program
  .command('move <from> <to>')
  .description('Move a file or directory; never overwrites the destination')
  .action((from: string, to: string) =>
    runWithStorage((layer) => executeMoveCommand(from, to, { moveFilePath: (f, t) => layer.fileOps.moveFilePath(f, t) }))
  );

program
  .command('retire <path>')
  .description('Rename a file to <path>.<random hex> so a fresh file can take its place')
  .action((filePath: string) =>
    runWithStorage((layer) =>
      executeRetireCommand(filePath, {
        renameFilePathUsingRandomExtension: (p) => layer.fileOps.renameFilePathUsingRandomExtension(p),
      })
    )
  );

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

await program.parseAsync(process.argv);
