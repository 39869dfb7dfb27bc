/**
 * Source archive locations for exact package versions.
 */

import { FILE_PATTERNS } from '../../constants/index.js';

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/** `<name>_<version>.tar.gz`, the file name of an R source package */
export function tarballFileName(name: string, version: string): string {
  return `${name}_${version}${FILE_PATTERNS.TARBALL_SUFFIX}`;
}

/**
 * URL of an exact version in the alternate registry: `<base>/<name>_<version>.tar.gz`.
 */
export function alternateRegistryUrl(baseUrl: string, name: string, version: string): string {
  return `${trimTrailingSlash(baseUrl)}/${tarballFileName(name, version)}`;
}

/**
 * Candidate URLs of an exact version in a CRAN-like registry.
 * The current release lives in src/contrib; older releases move to the archive.
 */
export function primaryRegistryUrls(baseUrl: string, name: string, version: string): string[] {
  const contrib = `${trimTrailingSlash(baseUrl)}/src/contrib`;
  const fileName = tarballFileName(name, version);
  return [
    `${contrib}/${fileName}`,
    `${contrib}/Archive/${name}/${fileName}`
  ];
}
