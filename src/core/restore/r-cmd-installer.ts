import { join } from 'path';

import type { Installer, SourceHint } from './types.js';
import { primaryRegistryUrls, tarballFileName } from './registry-urls.js';
import { runCommand, type CommandRunner } from '../../utils/command-runner.js';
import { fetchBinary, type BinaryFetcher } from '../../utils/http.js';
import { ensureDir, exists, moveFile, removeFile, writeBinaryFile } from '../../utils/fs.js';
import { InstallError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface RCmdInstallerOptions {
  /** Base URL of the CRAN-like primary registry */
  primaryRegistryUrl: string;
  /** Directory downloaded source archives are kept in */
  cacheDir: string;
  timeoutMs: number;
  /** R executable used for `R CMD INSTALL` */
  rCommand?: string;
  /** Library to install into; R's default library when absent */
  library?: string;
  download?: BinaryFetcher;
  run?: CommandRunner;
}

/**
 * Installer that downloads a source archive and builds it with `R CMD INSTALL`.
 *
 * `R CMD INSTALL` never installs dependencies, so restoring in snapshot order is
 * what guarantees each package's dependencies are already present.
 */
export class RCmdInstaller implements Installer {
  private readonly download: BinaryFetcher;
  private readonly run: CommandRunner;
  private readonly rCommand: string;

  constructor(private readonly options: RCmdInstallerOptions) {
    this.download = options.download ?? fetchBinary;
    this.run = options.run ?? runCommand;
    this.rCommand = options.rCommand ?? 'R';
  }

  async installExact(name: string, version: string, source: SourceHint): Promise<void> {
    const tarball = await this.fetchTarball(name, version, source);

    const args = ['CMD', 'INSTALL'];
    if (this.options.library) {
      try {
        await ensureDir(this.options.library);
      } catch (error) {
        throw new InstallError(name, version, reasonOf(error), { library: this.options.library });
      }
      args.push(`--library=${this.options.library}`);
    }
    args.push(tarball);

    try {
      await this.run(this.rCommand, args);
    } catch (error) {
      await this.evict(tarball);
      throw new InstallError(name, version, reasonOf(error), { tarball });
    }
    logger.debug(`Installed ${name} ${version}`, { tarball, library: this.options.library });
  }

  private async fetchTarball(name: string, version: string, source: SourceHint): Promise<string> {
    const cachePath = join(this.options.cacheDir, source.kind, tarballFileName(name, version));
    if (await exists(cachePath)) {
      logger.debug(`Using cached archive ${cachePath}`);
      return cachePath;
    }

    const candidates = source.kind === 'alternate'
      ? [source.url]
      : primaryRegistryUrls(this.options.primaryRegistryUrl, name, version);

    for (const url of candidates) {
      let content: Buffer | undefined;
      try {
        content = await this.download(url, { timeoutMs: this.options.timeoutMs });
      } catch (error) {
        throw new InstallError(name, version, reasonOf(error), { url });
      }

      if (content !== undefined) {
        await this.store(name, version, cachePath, content);
        return cachePath;
      }
      logger.debug(`No archive at ${url}`);
    }

    throw new InstallError(name, version, `no source archive found (tried ${candidates.join(', ')})`);
  }

  /** Only complete downloads ever appear at `cachePath`. */
  private async store(name: string, version: string, cachePath: string, content: Buffer): Promise<void> {
    const partialPath = `${cachePath}.${process.pid}.partial`;
    try {
      await writeBinaryFile(partialPath, content);
      await moveFile(partialPath, cachePath);
    } catch (error) {
      await this.evict(partialPath);
      throw new InstallError(name, version, reasonOf(error), { cachePath });
    }
  }

  /** Failed builds and partial downloads must not be picked up by the next restore. */
  private async evict(path: string): Promise<void> {
    try {
      await removeFile(path);
    } catch (error) {
      logger.warn(`Could not remove ${path}`, { error: reasonOf(error) });
    }
  }
}
