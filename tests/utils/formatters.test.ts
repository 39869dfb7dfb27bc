import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { formatDuration, formatPathForDisplay, formatSnapshotTable } from '../../src/utils/formatters.js';

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    assert.equal(formatDuration(850), '850 ms');
    assert.equal(formatDuration(3200), '3.2 secs');
    assert.equal(formatDuration(150_000), '2.5 mins');
    assert.equal(formatDuration(5_400_000), '1.5 hours');
  });
});

describe('formatPathForDisplay', () => {
  it('shows paths inside the working directory relative to it', () => {
    assert.equal(formatPathForDisplay('/work/study/inst/env.csv', '/work/study'), 'inst/env.csv');
  });

  it('leaves relative paths alone', () => {
    assert.equal(formatPathForDisplay('env.csv', '/work/study'), 'env.csv');
  });
});

describe('formatSnapshotTable', () => {
  it('aligns versions in a column at least 20 wide', () => {
    const table = formatSnapshotTable([
      { package: 'R', version: '4.0.0' },
      { package: 'jsonlite', version: '1.6' }
    ]);

    assert.equal(table, [
      'PACKAGE' + ' '.repeat(13) + 'VERSION',
      '-------' + ' '.repeat(13) + '-------',
      'R' + ' '.repeat(19) + '4.0.0',
      'jsonlite' + ' '.repeat(12) + '1.6'
    ].join('\n'));
  });

  it('widens the column for long names', () => {
    const table = formatSnapshotTable([{ package: 'SelfControlledCaseSeries', version: '1.4.1' }]);

    assert.equal(table.split('\n')[2], 'SelfControlledCaseSeries  1.4.1');
  });
});
