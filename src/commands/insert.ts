/**
 * @fileoverview Command setup for 'envsnap insert'
 *
 * Stores a snapshot inside the package being developed, so that it ships
 * with the package and can be restored from there later.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runInsertPipeline } from '../core/snapshot/snapshot-pipeline.js';
import { createCliExecutionContext } from '../cli/context.js';
import type { InsertOptions } from '../types/index.js';

export function setupInsertCommand(program: Command): void {
  program
    .command('insert')
    .argument('<package>', 'installed package whose environment is captured')
    .description('Store a snapshot of a package inside the package source in the working directory')
    .option('--path <file>', 'snapshot location relative to the package root (default from config)')
    .option('-f, --force', 'overwrite an existing snapshot without asking')
    .action(
      withErrorHandling(async (rootPackage: string, options: InsertOptions, command: Command) => {
        const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
        const ctx = await createCliExecutionContext({ cwd });
        const result = await runInsertPipeline(rootPackage, options, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Insert failed');
        }
      })
    );
}
