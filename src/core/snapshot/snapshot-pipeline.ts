import { resolve } from 'path';

import type { CommandResult, EnvsnapConfig, ExecutionContext, InsertOptions, SnapshotOptions } from '../../types/index.js';
import type { Snapshot } from './types.js';
import { buildSnapshot } from './snapshot-builder.js';
import { writeSnapshotCsv } from './snapshot-store.js';
import { configManager } from '../config.js';
import { openREnvironment, type REnvironment } from '../runtime/r-environment.js';
import { resolveOutput, type OutputPort } from '../ports/index.js';
import { exists } from '../../utils/fs.js';
import { formatPathForDisplay, formatSnapshotTable } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';

export interface SnapshotPipelineDeps {
  config: EnvsnapConfig;
  environment: REnvironment;
}

async function resolveDeps(deps: Partial<SnapshotPipelineDeps>): Promise<SnapshotPipelineDeps> {
  const config = deps.config ?? await configManager.load();
  const environment = deps.environment ?? await openREnvironment(config);
  return { config, environment };
}

async function captureSnapshot(
  rootPackage: string,
  environment: REnvironment,
  out: OutputPort,
  warnings: string[]
): Promise<Snapshot> {
  const spinner = out.spinner();
  spinner.start(`Resolving dependencies of ${rootPackage}`);
  try {
    const snapshot = await buildSnapshot(rootPackage, {
      ...environment,
      onWarning: message => warnings.push(message)
    });
    spinner.stop(`Resolved ${snapshot.length - 2} dependencies of ${rootPackage}`);
    return snapshot;
  } catch (error) {
    spinner.stop(`Could not snapshot ${rootPackage}`);
    throw error;
  }
}

/**
 * Write a snapshot, asking before replacing an existing file unless `force`.
 * Returns false when the user declined.
 */
async function writeWithConfirmation(
  path: string,
  snapshot: Snapshot,
  force: boolean,
  ctx: ExecutionContext,
  out: OutputPort
): Promise<boolean> {
  const displayPath = formatPathForDisplay(path, ctx.cwd);
  if (!force && await exists(path)) {
    const overwrite = await out.confirm(`${displayPath} already exists. Overwrite it?`, { initial: true });
    if (!overwrite) {
      return false;
    }
  }

  await writeSnapshotCsv(path, snapshot);
  out.success(`Wrote snapshot of ${snapshot.length - 1} packages to ${displayPath}`);
  return true;
}

/**
 * Take a snapshot of `rootPackage` and either print it or write it to `options.output`.
 */
export async function runSnapshotPipeline(
  rootPackage: string,
  options: SnapshotOptions,
  ctx: ExecutionContext,
  deps: Partial<SnapshotPipelineDeps> = {}
): Promise<CommandResult<Snapshot>> {
  const out = resolveOutput(ctx);
  const { environment } = await resolveDeps(deps);
  const warnings: string[] = [];

  const snapshot = await captureSnapshot(rootPackage, environment, out, warnings);
  warnings.forEach(warning => out.warn(warning));

  if (!options.output) {
    out.note(formatSnapshotTable(snapshot), `Snapshot of ${rootPackage}`);
    return { success: true, data: snapshot, warnings };
  }

  const outputPath = resolve(ctx.cwd, options.output);
  if (!await writeWithConfirmation(outputPath, snapshot, options.force ?? false, ctx, out)) {
    return { success: false, error: `Snapshot not written; ${options.output} was left unchanged` };
  }

  logger.debug('Snapshot written', { rootPackage, outputPath });
  return { success: true, data: snapshot, warnings };
}

/**
 * Take a snapshot of `rootPackage` and store it inside the package being
 * developed (the working directory), at the configured snapshot path.
 */
export async function runInsertPipeline(
  rootPackage: string,
  options: InsertOptions,
  ctx: ExecutionContext,
  deps: Partial<SnapshotPipelineDeps> = {}
): Promise<CommandResult<Snapshot>> {
  const out = resolveOutput(ctx);
  const { config, environment } = await resolveDeps(deps);
  const warnings: string[] = [];

  const snapshot = await captureSnapshot(rootPackage, environment, out, warnings);
  warnings.forEach(warning => out.warn(warning));

  const relativePath = options.path ?? config.snapshotPath;
  const targetPath = resolve(ctx.cwd, relativePath);
  if (!await writeWithConfirmation(targetPath, snapshot, options.force ?? false, ctx, out)) {
    return { success: false, error: `Snapshot not written; ${relativePath} was left unchanged` };
  }

  return { success: true, data: snapshot, warnings };
}
