import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { LibraryMetadataStore } from '../../../src/core/metadata/library-store.js';
import { PackageNotFoundError } from '../../../src/utils/errors.js';
import { createTempDir, removeTempDir } from '../../test-helpers.js';

async function installDescription(library: string, name: string, lines: string[]): Promise<void> {
  await mkdir(join(library, name), { recursive: true });
  await writeFile(join(library, name, 'DESCRIPTION'), lines.join('\n') + '\n');
}

describe('LibraryMetadataStore', () => {
  let root: string;
  let userLibrary: string;
  let siteLibrary: string;
  let store: LibraryMetadataStore;

  before(async () => {
    root = await createTempDir();
    userLibrary = join(root, 'user');
    siteLibrary = join(root, 'site');

    await installDescription(userLibrary, 'jsonlite', ['Package: jsonlite', 'Version: 1.7.0']);
    await installDescription(siteLibrary, 'jsonlite', ['Package: jsonlite', 'Version: 1.6']);
    await installDescription(siteLibrary, 'Cyclops', [
      'Package: Cyclops',
      'Version: 2.0.2',
      'Depends: R (>= 3.1.0)',
      'Imports: Rcpp (>= 0.12.12), Matrix,',
      '    survival',
      'Suggests: testthat'
    ]);
    // A package directory without DESCRIPTION is not an installed package
    await mkdir(join(siteLibrary, 'partial'), { recursive: true });

    store = new LibraryMetadataStore([userLibrary, siteLibrary]);
  });

  after(async () => {
    await removeTempDir(root);
  });

  it('reads Depends and Imports separately, leaving Suggests out', async () => {
    assert.deepEqual(await store.declaredDependencies('Cyclops'), {
      mandatory: ['R'],
      imported: ['Rcpp', 'Matrix', 'survival']
    });
  });

  it('takes the first library that has the package', async () => {
    assert.equal(await store.installedVersion('jsonlite'), '1.7.0');
    assert.equal(await new LibraryMetadataStore([siteLibrary, userLibrary]).installedVersion('jsonlite'), '1.6');
  });

  it('reports packages that are not installed', async () => {
    assert.equal(await store.isInstalled('partial'), false);
    assert.equal(await store.isInstalled('ggplot2'), false);
    assert.equal(await store.installedVersion('ggplot2'), undefined);
    await assert.rejects(store.declaredDependencies('ggplot2'), PackageNotFoundError);
  });

  it('sees an installed package', async () => {
    assert.equal(await store.isInstalled('Cyclops'), true);
  });
});
