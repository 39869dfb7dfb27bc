/**
 * Snapshot persistence
 *
 * Snapshots are stored as a two-column CSV table (package, version), the same
 * shape R's write.csv produces. Reading goes by header name, so a leading
 * row-name column is tolerated.
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

import type { Snapshot, SnapshotEntry } from './types.js';
import { GITHUB, RUNTIME_PACKAGE, SNAPSHOT_COLUMNS } from '../../constants/index.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { fetchText, type TextFetcher } from '../../utils/http.js';
import { SnapshotFormatError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const csvRowsSchema = z.array(z.array(z.string()));

const snapshotEntrySchema = z.object({
  package: z.string().min(1, 'package name is empty'),
  version: z.string().min(1, 'version is empty')
});

/**
 * Parse snapshot CSV content.
 *
 * @param source - where the content came from, for error messages
 * @throws SnapshotFormatError when columns are missing, a row is incomplete,
 *   or the runtime entry or package entries are absent
 */
export function parseSnapshotCsv(content: string, source: string = 'snapshot'): Snapshot {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (error) {
    throw new SnapshotFormatError(`${source} is not valid CSV: ${error instanceof Error ? error.message : String(error)}`);
  }

  const rows = csvRowsSchema.parse(parsed);
  if (rows.length === 0) {
    throw new SnapshotFormatError(`${source} is empty`);
  }

  const [header, ...records] = rows;
  const packageIndex = header.indexOf(SNAPSHOT_COLUMNS.PACKAGE);
  const versionIndex = header.indexOf(SNAPSHOT_COLUMNS.VERSION);
  if (packageIndex === -1 || versionIndex === -1) {
    throw new SnapshotFormatError(
      `${source} must have '${SNAPSHOT_COLUMNS.PACKAGE}' and '${SNAPSHOT_COLUMNS.VERSION}' columns`,
      { header }
    );
  }

  const entries: SnapshotEntry[] = records.map((record, index) => {
    const result = snapshotEntrySchema.safeParse({
      package: record[packageIndex] ?? '',
      version: record[versionIndex] ?? ''
    });
    if (!result.success) {
      const reason = result.error.issues.map(issue => issue.message).join(', ');
      // +2: one for the header, one for 1-based line numbers
      throw new SnapshotFormatError(`${source} line ${index + 2}: ${reason}`);
    }
    return result.data;
  });

  if (!entries.some(entry => entry.package === RUNTIME_PACKAGE)) {
    throw new SnapshotFormatError(`${source} has no '${RUNTIME_PACKAGE}' runtime entry`);
  }
  if (entries.every(entry => entry.package === RUNTIME_PACKAGE)) {
    throw new SnapshotFormatError(`${source} lists no packages`);
  }

  return entries;
}

/**
 * Serialize a snapshot as CSV with every field quoted.
 */
export function serializeSnapshotCsv(snapshot: Snapshot): string {
  return stringify(
    snapshot.map(entry => [entry.package, entry.version]),
    {
      header: true,
      columns: [SNAPSHOT_COLUMNS.PACKAGE, SNAPSHOT_COLUMNS.VERSION],
      quoted: true
    }
  );
}

export async function readSnapshotCsv(path: string): Promise<Snapshot> {
  logger.debug(`Reading snapshot from ${path}`);
  return parseSnapshotCsv(await readTextFile(path), path);
}

/**
 * Write a snapshot to `path`, creating parent directories as needed.
 */
export async function writeSnapshotCsv(path: string, snapshot: Snapshot): Promise<void> {
  await writeTextFile(path, serializeSnapshotCsv(snapshot));
}

/**
 * Build the raw-content URL for a snapshot stored in a GitHub repository.
 *
 * @param slug - `owner/repo`, optionally followed by a subdirectory (`owner/repo/StudyPackage`)
 * @param pathInRepo - snapshot path inside that directory
 * @param branch - branch the file is read from
 *
 * @example
 * resolveGithubSnapshotUrl('acme/studies/Alpha', 'inst/settings/snapshot.csv', 'master')
 * // => 'https://raw.githubusercontent.com/acme/studies/master/Alpha/inst/settings/snapshot.csv'
 */
export function resolveGithubSnapshotUrl(slug: string, pathInRepo: string, branch: string): string {
  const parts = slug.split('/').filter(part => part.length > 0);
  if (parts.length < 2) {
    throw new ValidationError(`GitHub path '${slug}' must be of the form owner/repo[/subpath]`);
  }

  const [owner, repo, ...subpath] = parts;
  const fileParts = pathInRepo.split('/').filter(part => part.length > 0);
  return [GITHUB.RAW_BASE_URL, owner, repo, branch, ...subpath, ...fileParts].join('/');
}

export interface FetchSnapshotOptions {
  timeoutMs: number;
  fetcher?: TextFetcher;
}

/**
 * Download and parse a snapshot from a URL.
 */
export async function fetchSnapshot(url: string, options: FetchSnapshotOptions): Promise<Snapshot> {
  const fetcher = options.fetcher ?? fetchText;
  const content = await fetcher(url, { timeoutMs: options.timeoutMs });
  return parseSnapshotCsv(content, url);
}
