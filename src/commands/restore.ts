/**
 * @fileoverview Command setup for 'envsnap restore'
 *
 * Installs the exact package versions recorded in a snapshot, in order.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runRestorePipeline } from '../core/restore/restore-pipeline.js';
import { createCliExecutionContext } from '../cli/context.js';
import type { RestoreCommandOptions } from '../types/index.js';

export function setupRestoreCommand(program: Command): void {
  program
    .command('restore')
    .argument('[file]', 'snapshot CSV (default: the snapshot stored in the package in the working directory)')
    .description('Restore the package versions recorded in a snapshot')
    .option('--github <owner/repo[/subpath]>', 'read the snapshot from a GitHub repository')
    .option('--path-in-repo <file>', 'snapshot location inside the GitHub repository (default from config)')
    .option('--strict', 'install the exact version even when a compatible newer one is present')
    .option('--stop-on-wrong-runtime', 'fail when the R version differs from the snapshot')
    .option('--no-skip-last', 'also restore the last entry (the snapshotted package itself)')
    .option('--dry-run', 'report what would be installed without installing')
    .option('--library <dir>', 'library to install packages into')
    .action(
      withErrorHandling(async (file: string | undefined, options: RestoreCommandOptions, command: Command) => {
        const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
        const ctx = await createCliExecutionContext({ cwd });
        const result = await runRestorePipeline(file, options, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Restore failed');
        }
      })
    );
}
