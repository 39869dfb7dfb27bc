import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { runInsertPipeline, runSnapshotPipeline } from '../../../src/core/snapshot/snapshot-pipeline.js';
import { serializeSnapshotCsv } from '../../../src/core/snapshot/snapshot-store.js';
import { DEFAULT_CONFIG } from '../../../src/core/config.js';
import { formatSnapshotTable } from '../../../src/utils/formatters.js';
import {
  FakeRuntime,
  InMemoryMetadataStore,
  createRecordingOutput,
  createTempDir,
  removeTempDir,
  type FakePackage,
  type RecordingOutput
} from '../../test-helpers.js';

const EXPECTED = [
  { package: 'R', version: '4.0.0' },
  { package: 'jsonlite', version: '1.6' },
  { package: 'study', version: '0.1.0' }
];

describe('snapshot pipelines', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(cwd);
  });

  function deps(packages: Record<string, FakePackage> = {
    study: { version: '0.1.0', imports: ['jsonlite'] },
    jsonlite: { version: '1.6' }
  }) {
    return {
      config: DEFAULT_CONFIG,
      environment: { runtime: new FakeRuntime('4.0.0'), store: new InMemoryMetadataStore(packages) }
    };
  }

  function context(output: RecordingOutput) {
    return { cwd, output };
  }

  it('prints the snapshot when no output file is given', async () => {
    const output = createRecordingOutput();

    const result = await runSnapshotPipeline('study', {}, context(output), deps());

    assert.equal(result.success, true);
    assert.deepEqual(result.data, EXPECTED);
    assert.deepEqual(output.textsOf('note'), [`Snapshot of study\n${formatSnapshotTable(EXPECTED)}`]);
    assert.deepEqual(output.textsOf('spinner'), ['Resolving dependencies of study', 'Resolved 1 dependencies of study']);
  });

  it('writes the snapshot relative to the working directory', async () => {
    const output = createRecordingOutput();

    const result = await runSnapshotPipeline('study', { output: 'out/env.csv' }, context(output), deps());

    assert.equal(result.success, true);
    assert.equal(await readFile(join(cwd, 'out', 'env.csv'), 'utf8'), serializeSnapshotCsv(EXPECTED));
    assert.deepEqual(output.textsOf('success'), ['Wrote snapshot of 2 packages to out/env.csv']);
  });

  it('leaves an existing file alone when overwriting is declined', async () => {
    await writeFile(join(cwd, 'env.csv'), 'previous');
    const output = createRecordingOutput(false);

    const result = await runSnapshotPipeline('study', { output: 'env.csv' }, context(output), deps());

    assert.deepEqual(result, { success: false, error: 'Snapshot not written; env.csv was left unchanged' });
    assert.deepEqual(output.confirmations, ['env.csv already exists. Overwrite it?']);
    assert.equal(await readFile(join(cwd, 'env.csv'), 'utf8'), 'previous');
  });

  it('overwrites without asking when forced', async () => {
    await writeFile(join(cwd, 'env.csv'), 'previous');
    const output = createRecordingOutput(false);

    const result = await runSnapshotPipeline('study', { output: 'env.csv', force: true }, context(output), deps());

    assert.equal(result.success, true);
    assert.deepEqual(output.confirmations, []);
    assert.equal(await readFile(join(cwd, 'env.csv'), 'utf8'), serializeSnapshotCsv(EXPECTED));
  });

  it('surfaces cycle warnings', async () => {
    const output = createRecordingOutput();
    const cyclic = deps({
      study: { version: '0.1.0', imports: ['jsonlite'] },
      jsonlite: { version: '1.6', imports: ['study'] }
    });

    const result = await runSnapshotPipeline('study', {}, context(output), cyclic);

    assert.equal(result.warnings?.length, 1);
    assert.deepEqual(output.textsOf('warn'), result.warnings);
  });

  it('inserts the snapshot at the configured path inside the package', async () => {
    const output = createRecordingOutput();

    const result = await runInsertPipeline('study', {}, context(output), deps());

    assert.equal(result.success, true);
    const written = await readFile(join(cwd, 'inst', 'settings', 'rEnvironmentSnapshot.csv'), 'utf8');
    assert.equal(written, serializeSnapshotCsv(EXPECTED));
    assert.deepEqual(output.textsOf('success'), ['Wrote snapshot of 2 packages to inst/settings/rEnvironmentSnapshot.csv']);
  });

  it('inserts at a custom path', async () => {
    const output = createRecordingOutput();

    await runInsertPipeline('study', { path: 'extras/env.csv' }, context(output), deps());

    assert.equal(await readFile(join(cwd, 'extras', 'env.csv'), 'utf8'), serializeSnapshotCsv(EXPECTED));
  });
});
