/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext for commands.
 * The context decides which directory relative snapshot paths resolve against.
 */

import { resolve } from 'path';
import { stat, access, constants as fsConstants } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * cwd is resolve(process.cwd(), --cwd) when the flag is given, else process.cwd().
 *
 * @throws Error if the directory is missing, not a directory, or not writable
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const cwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  const context: ExecutionContext = { cwd };

  await validateExecutionContext(context);

  logger.debug('Created execution context', { cwd: context.cwd });

  return context;
}

/**
 * Validate an ExecutionContext.
 *
 * Checks:
 * - cwd exists and is a directory
 * - cwd is readable and writable (insert writes the snapshot below it)
 */
async function validateExecutionContext(context: ExecutionContext): Promise<void> {
  try {
    const cwdStat = await stat(context.cwd);
    if (!cwdStat.isDirectory()) {
      throw new Error(`Working path is not a directory: ${context.cwd}`);
    }

    await access(context.cwd, fsConstants.R_OK | fsConstants.W_OK);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new Error(
        `Working directory does not exist: ${context.cwd}\n\n` +
        `Hint: Create the directory or specify a different one with --cwd`
      );
    }
    if (code === 'EACCES') {
      throw new Error(
        `Working directory is not accessible: ${context.cwd}\n\n` +
        `Hint: Check directory permissions`
      );
    }
    throw new Error(
      `Invalid working directory: ${context.cwd}\n` +
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
