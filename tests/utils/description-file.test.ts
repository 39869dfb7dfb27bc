import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { parseDescription, splitPackageList } from '../../src/utils/description-file.js';

const DESCRIPTION = [
  'Package: CohortMethod',
  'Type: Package',
  'Version: 4.0.0',
  'Depends: R (>= 3.5.0),',
  '    DatabaseConnector (>= 3.0.0),',
  '    Cyclops',
  'Imports: methods, ParallelLogger,',
  '\tjsonlite (>= 1.6)',
  'Suggests: testthat',
  ''
].join('\n');

describe('parseDescription', () => {
  it('reads single-line fields', () => {
    const fields = parseDescription(DESCRIPTION);

    assert.equal(fields.Package, 'CohortMethod');
    assert.equal(fields.Version, '4.0.0');
    assert.equal(fields.Suggests, 'testthat');
  });

  it('joins continuation lines with a newline', () => {
    const fields = parseDescription(DESCRIPTION);

    assert.equal(fields.Depends, 'R (>= 3.5.0),\nDatabaseConnector (>= 3.0.0),\nCyclops');
    assert.equal(fields.Imports, 'methods, ParallelLogger,\njsonlite (>= 1.6)');
  });

  it('handles CRLF line endings', () => {
    const fields = parseDescription('Package: a\r\nVersion: 0.2-10\r\n');

    assert.deepEqual(fields, { Package: 'a', Version: '0.2-10' });
  });

  it('keeps colons inside values', () => {
    const fields = parseDescription('URL: https://example.org/pkg');

    assert.equal(fields.URL, 'https://example.org/pkg');
  });
});

describe('splitPackageList', () => {
  it('drops version constraints and whitespace', () => {
    assert.deepEqual(
      splitPackageList('R (>= 3.5.0),\nDatabaseConnector (>= 3.0.0),\nCyclops'),
      ['R', 'DatabaseConnector', 'Cyclops']
    );
  });

  it('returns an empty list for a missing or empty field', () => {
    assert.deepEqual(splitPackageList(undefined), []);
    assert.deepEqual(splitPackageList(''), []);
  });

  it('ignores trailing commas', () => {
    assert.deepEqual(splitPackageList('methods, utils,'), ['methods', 'utils']);
  });
});
