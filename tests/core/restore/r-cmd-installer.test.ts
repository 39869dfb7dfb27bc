import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { RCmdInstaller, type RCmdInstallerOptions } from '../../../src/core/restore/r-cmd-installer.js';
import type { BinaryFetcher } from '../../../src/utils/http.js';
import type { CommandRunner } from '../../../src/utils/command-runner.js';
import { InstallError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { createTempDir, removeTempDir } from '../../test-helpers.js';

const CRAN = 'https://cran.example.test';

describe('RCmdInstaller', () => {
  let dir: string;
  let downloads: string[];
  let runs: string[][];
  let available: Map<string, string>;

  const download: BinaryFetcher = async url => {
    downloads.push(url);
    const content = available.get(url);
    return content === undefined ? undefined : Buffer.from(content);
  };

  const run: CommandRunner = async (command, args) => {
    runs.push([command, ...args]);
    return { stdout: '', stderr: '' };
  };

  function createInstaller(overrides: Partial<RCmdInstallerOptions> = {}): RCmdInstaller {
    return new RCmdInstaller({
      primaryRegistryUrl: CRAN,
      cacheDir: join(dir, 'cache'),
      timeoutMs: 1000,
      download,
      run,
      ...overrides
    });
  }

  beforeEach(async () => {
    dir = await createTempDir();
    downloads = [];
    runs = [];
    available = new Map();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('falls back to the archive and installs the downloaded tarball', async () => {
    available.set(`${CRAN}/src/contrib/Archive/Rcpp/Rcpp_1.0.4.tar.gz`, 'rcpp-source');
    const tarball = join(dir, 'cache', 'primary', 'Rcpp_1.0.4.tar.gz');

    await createInstaller().installExact('Rcpp', '1.0.4', { kind: 'primary' });

    assert.deepEqual(downloads, [
      `${CRAN}/src/contrib/Rcpp_1.0.4.tar.gz`,
      `${CRAN}/src/contrib/Archive/Rcpp/Rcpp_1.0.4.tar.gz`
    ]);
    assert.equal(await readFile(tarball, 'utf8'), 'rcpp-source');
    assert.deepEqual(runs, [['R', 'CMD', 'INSTALL', tarball]]);
  });

  it('reuses a cached tarball', async () => {
    available.set(`${CRAN}/src/contrib/jsonlite_1.6.tar.gz`, 'jsonlite-source');
    const installer = createInstaller();

    await installer.installExact('jsonlite', '1.6', { kind: 'primary' });
    await installer.installExact('jsonlite', '1.6', { kind: 'primary' });

    assert.equal(downloads.length, 1);
    assert.equal(runs.length, 2);
  });

  it('downloads alternate-registry packages from their URL into the given library', async () => {
    const url = 'https://drat.example.test/src/contrib/CohortMethod_4.0.0.tar.gz';
    available.set(url, 'cm-source');
    const library = join(dir, 'site-library');

    await createInstaller({ rCommand: '/opt/R/bin/R', library })
      .installExact('CohortMethod', '4.0.0', { kind: 'alternate', url });

    const tarball = join(dir, 'cache', 'alternate', 'CohortMethod_4.0.0.tar.gz');
    assert.deepEqual(downloads, [url]);
    assert.deepEqual(runs, [['/opt/R/bin/R', 'CMD', 'INSTALL', `--library=${library}`, tarball]]);
    assert.equal((await stat(library)).isDirectory(), true);
  });

  it('fails when no registry has the version', async () => {
    await assert.rejects(
      createInstaller().installExact('ghost', '0.1', { kind: 'primary' }),
      (error: unknown) => error instanceof InstallError &&
        error.message === 'Failed to install ghost (0.1): no source archive found ' +
          `(tried ${CRAN}/src/contrib/ghost_0.1.tar.gz, ${CRAN}/src/contrib/Archive/ghost/ghost_0.1.tar.gz)`
    );
    assert.deepEqual(runs, []);
  });

  it('wraps a download failure', async () => {
    const failing: BinaryFetcher = async () => {
      throw new Error('HTTP 500');
    };

    await assert.rejects(
      createInstaller({ download: failing }).installExact('Rcpp', '1.0.4', { kind: 'primary' }),
      (error: unknown) => error instanceof InstallError && error.message === 'Failed to install Rcpp (1.0.4): HTTP 500'
    );
  });

  it('wraps a failed build', async () => {
    available.set(`${CRAN}/src/contrib/Rcpp_1.0.5.tar.gz`, 'rcpp-source');
    const failingRun: CommandRunner = async () => {
      throw new Error('R CMD failed: compilation error');
    };

    await assert.rejects(
      createInstaller({ run: failingRun }).installExact('Rcpp', '1.0.5', { kind: 'primary' }),
      (error: unknown) => error instanceof InstallError &&
        error.message === 'Failed to install Rcpp (1.0.5): R CMD failed: compilation error'
    );
  });

  it('drops the cached tarball after a failed build so a retry downloads again', async () => {
    available.set(`${CRAN}/src/contrib/Rcpp_1.0.5.tar.gz`, 'rcpp-source');
    const tarball = join(dir, 'cache', 'primary', 'Rcpp_1.0.5.tar.gz');
    const failingRun: CommandRunner = async () => {
      throw new Error('R CMD failed: compilation error');
    };

    await assert.rejects(
      createInstaller({ run: failingRun }).installExact('Rcpp', '1.0.5', { kind: 'primary' }),
      InstallError
    );
    assert.equal(await exists(tarball), false);

    await createInstaller().installExact('Rcpp', '1.0.5', { kind: 'primary' });

    assert.equal(downloads.length, 2);
    assert.deepEqual(runs, [['R', 'CMD', 'INSTALL', tarball]]);
    assert.deepEqual(await readdir(join(dir, 'cache', 'primary')), ['Rcpp_1.0.5.tar.gz']);
  });

  it('reports an unwritable cache as an install failure', async () => {
    available.set(`${CRAN}/src/contrib/Rcpp_1.0.4.tar.gz`, 'rcpp-source');
    const cacheDir = join(dir, 'cache');
    await writeFile(cacheDir, 'not a directory');

    await assert.rejects(
      createInstaller({ cacheDir }).installExact('Rcpp', '1.0.4', { kind: 'primary' }),
      (error: unknown) => error instanceof InstallError &&
        error.message === 'Failed to install Rcpp (1.0.4): File system error: ' +
          `Failed to locate or create directory: ${join(cacheDir, 'primary')}`
    );
    assert.deepEqual(runs, []);
  });

  it('reports an unusable library as an install failure', async () => {
    available.set(`${CRAN}/src/contrib/Rcpp_1.0.4.tar.gz`, 'rcpp-source');
    const library = join(dir, 'site-library');
    await writeFile(library, 'not a directory');

    await assert.rejects(
      createInstaller({ library }).installExact('Rcpp', '1.0.4', { kind: 'primary' }),
      (error: unknown) => error instanceof InstallError &&
        error.message === `Failed to install Rcpp (1.0.4): File system error: Failed to locate or create directory: ${library}`
    );
    assert.deepEqual(runs, []);
  });
});
