import { resolve } from 'path';

import type { CommandResult, EnvsnapConfig, ExecutionContext, RestoreCommandOptions } from '../../types/index.js';
import type { Snapshot } from '../snapshot/types.js';
import type { Installer, RestoreReport } from './types.js';
import { fetchSnapshot, readSnapshotCsv, resolveGithubSnapshotUrl } from '../snapshot/snapshot-store.js';
import { restoreEnvironment, selectRestoreEntries } from './restore-engine.js';
import { createRestorePolicy } from './policy.js';
import { RCmdInstaller } from './r-cmd-installer.js';
import { configManager } from '../config.js';
import { getTarballCacheDirectory } from '../directory.js';
import { openREnvironment, type REnvironment } from '../runtime/r-environment.js';
import { resolveOutput } from '../ports/index.js';
import type { TextFetcher } from '../../utils/http.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface RestorePipelineDeps {
  config: EnvsnapConfig;
  environment: REnvironment;
  installer: Installer;
  fetcher: TextFetcher;
}

/**
 * Load the snapshot a restore works from: a GitHub repository when
 * `options.github` is set, else `snapshotFile`, else the snapshot stored in
 * the package in the working directory.
 */
async function loadRestoreSnapshot(
  snapshotFile: string | undefined,
  options: RestoreCommandOptions,
  ctx: ExecutionContext,
  config: EnvsnapConfig,
  fetcher: TextFetcher | undefined
): Promise<{ snapshot: Snapshot; origin: string }> {
  if (options.github) {
    if (snapshotFile) {
      throw new ValidationError('Pass either a snapshot file or --github, not both');
    }
    const url = resolveGithubSnapshotUrl(
      options.github,
      options.pathInRepo ?? config.snapshotPath,
      config.github.branch
    );
    const snapshot = await fetchSnapshot(url, { timeoutMs: config.downloadTimeoutMs, fetcher });
    return { snapshot, origin: url };
  }

  if (options.pathInRepo) {
    throw new ValidationError('--path-in-repo only applies together with --github');
  }

  const path = resolve(ctx.cwd, snapshotFile ?? config.snapshotPath);
  return { snapshot: await readSnapshotCsv(path), origin: formatPathForDisplay(path, ctx.cwd) };
}

/**
 * Restore the R environment recorded in a snapshot.
 */
export async function runRestorePipeline(
  snapshotFile: string | undefined,
  options: RestoreCommandOptions,
  ctx: ExecutionContext,
  deps: Partial<RestorePipelineDeps> = {}
): Promise<CommandResult<RestoreReport>> {
  const out = resolveOutput(ctx);
  const config = deps.config ?? await configManager.load();
  const installLibrary = options.library ? resolve(ctx.cwd, options.library) : config.installLibrary;

  const { snapshot, origin } = await loadRestoreSnapshot(snapshotFile, options, ctx, config, deps.fetcher);
  const skipLast = options.skipLast ?? true;
  out.step(`Restoring ${selectRestoreEntries(snapshot, skipLast).length} packages from ${origin}`);

  const environment = deps.environment ?? await openREnvironment(config, { installLibrary });
  const installer = deps.installer ?? new RCmdInstaller({
    primaryRegistryUrl: config.primaryRegistry.url,
    cacheDir: getTarballCacheDirectory(),
    timeoutMs: config.downloadTimeoutMs,
    rCommand: config.rCommand,
    library: installLibrary
  });

  const report = await restoreEnvironment(
    snapshot,
    {
      stopOnWrongRuntimeVersion: options.stopOnWrongRuntime ?? false,
      strict: options.strict ?? false,
      skipLast,
      dryRun: options.dryRun ?? false
    },
    {
      ...environment,
      installer,
      policy: createRestorePolicy(config),
      output: out
    }
  );

  logger.debug('Restore finished', { origin, installed: report.installed, elapsedMs: report.elapsedMs });

  const warnings = report.runtimeVersion.matches
    ? []
    : [`R version ${report.runtimeVersion.found} differs from snapshot version ${report.runtimeVersion.required}`];
  return { success: true, data: report, warnings };
}
