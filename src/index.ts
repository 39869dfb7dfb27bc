#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { ensureEnvsnapDirectories } from './core/directory.js';
import { createExecutionContext } from './core/execution-context.js';
import { getVersion } from './utils/package.js';
import { LogLevel } from './types/index.js';

import { setupSnapshotCommand } from './commands/snapshot.js';
import { setupInsertCommand } from './commands/insert.js';
import { setupRestoreCommand } from './commands/restore.js';
import { setupConfigCommand } from './commands/config.js';

/**
 * envsnap CLI - Main entry point
 *
 * Captures and restores the exact package versions of an R environment.
 */

const program = new Command();

program
  .name('envsnap')
  .description('envsnap - Snapshot and restore R package environments')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'print diagnostic logs (same as ENVSNAP_VERBOSE=1)')
  .configureHelp({ sortSubcommands: true });

// === SNAPSHOT COMMANDS ===
setupSnapshotCommand(program);
setupInsertCommand(program);
setupRestoreCommand(program);

// === CONFIGURATION ===
setupConfigCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string; verbose?: boolean }>();
  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    try {
      const ctx = await createExecutionContext({ cwd: opts.cwd });
      logger.info(`Working directory will be: ${ctx.cwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with ENVSNAP_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with ENVSNAP_VERBOSE=1 for details.');
  process.exit(1);
});

async function initializeEnvsnap(): Promise<void> {
  try {
    await ensureEnvsnapDirectories();
    logger.debug('envsnap directories initialized successfully');
  } catch (error) {
    logger.error('Failed to initialize envsnap directories', { error });
    console.error('❌ Failed to initialize ~/.envsnap. Please check permissions.');
    process.exit(1);
  }
}

/**
 * Main execution function
 */
export async function run(): Promise<void> {
  try {
    await initializeEnvsnap();

    if (process.argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync();
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('envsnap')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
