/**
 * @fileoverview Command setup for 'envsnap snapshot'
 *
 * Captures the installed versions of a package and all of its dependencies.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runSnapshotPipeline } from '../core/snapshot/snapshot-pipeline.js';
import { createCliExecutionContext } from '../cli/context.js';
import type { SnapshotOptions } from '../types/index.js';

export function setupSnapshotCommand(program: Command): void {
  program
    .command('snapshot')
    .argument('<package>', 'installed package whose environment is captured')
    .description('Capture the installed versions of a package and its dependencies')
    .option('-o, --output <file>', 'write the snapshot as CSV instead of printing it')
    .option('-f, --force', 'overwrite an existing output file without asking')
    .action(
      withErrorHandling(async (rootPackage: string, options: SnapshotOptions, command: Command) => {
        const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
        const ctx = await createCliExecutionContext({ cwd });
        const result = await runSnapshotPipeline(rootPackage, options, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Snapshot failed');
        }
      })
    );
}
