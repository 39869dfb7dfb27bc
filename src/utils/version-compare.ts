import { MalformedVersionError } from './errors.js';

/**
 * Version helpers for R-style package versions ("1.6", "0.2-10", "4.0.0").
 *
 * These are not semantic versions: any run of non-digit characters separates
 * components, so "1.2.3-4" and "1.2.3.4" are the same version.
 */

/** Major, minor, patch and build; later components are ignored. */
const COMPARED_COMPONENTS = 4;

/**
 * Split a version string into its non-negative integer components.
 * Components are bigints so date-stamped builds keep every digit.
 *
 * @throws MalformedVersionError when the string has no numeric component
 */
export function parseVersionComponents(version: string): bigint[] {
  const components = version
    .split(/[^0-9]+/)
    .filter(part => part.length > 0)
    .map(part => BigInt(part));

  if (components.length === 0) {
    throw new MalformedVersionError(version);
  }
  return components;
}

/**
 * True when `installed` may stand in for `required`: same major version and
 * strictly newer at the first differing minor, patch or build component.
 *
 * A component is only compared when both versions have it. Equal versions and
 * older versions both return false; callers check exact equality themselves.
 *
 * @example
 * isNewerCompatible('1.7.2', '1.6.0') // => true
 * isNewerCompatible('2.0.0', '1.9.9') // => false (major differs)
 * isNewerCompatible('1.6', '1.6.1')   // => false (patch absent on one side)
 *
 * @throws MalformedVersionError when either version has no numeric component
 */
export function isNewerCompatible(installed: string, required: string): boolean {
  const installedParts = parseVersionComponents(installed);
  const requiredParts = parseVersionComponents(required);

  if (installedParts[0] !== requiredParts[0]) {
    return false;
  }

  const limit = Math.min(installedParts.length, requiredParts.length, COMPARED_COMPONENTS);
  for (let i = 1; i < limit; i++) {
    if (installedParts[i] > requiredParts[i]) {
      return true;
    }
    if (installedParts[i] < requiredParts[i]) {
      return false;
    }
  }
  return false;
}
