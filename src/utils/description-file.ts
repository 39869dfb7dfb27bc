/**
 * Parsing for R package DESCRIPTION files.
 *
 * DESCRIPTION files use the Debian control file format: `Field: value` lines,
 * where a line starting with whitespace continues the previous field.
 */

export type DescriptionFields = Record<string, string>;

const FIELD_LINE = /^([^\s:][^:]*):\s?(.*)$/;

/**
 * Parse the contents of a DESCRIPTION file into a field map.
 * Continuation lines are joined to their field with a newline.
 */
export function parseDescription(content: string): DescriptionFields {
  const fields: DescriptionFields = {};
  let currentField: string | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    if (rawLine.trim() === '') {
      continue;
    }

    if (/^\s/.test(rawLine)) {
      if (currentField !== null) {
        fields[currentField] += `\n${rawLine.trim()}`;
      }
      continue;
    }

    const match = FIELD_LINE.exec(rawLine);
    if (!match) {
      currentField = null;
      continue;
    }

    currentField = match[1].trim();
    fields[currentField] = match[2].trim();
  }

  return fields;
}

/**
 * Split a package list field (Depends, Imports, ...) into bare package names.
 *
 * Version constraints in parentheses and all whitespace are dropped.
 *
 * @example
 * splitPackageList('R (>= 3.5.0),\n    jsonlite (>= 1.6), utils') // => ['R', 'jsonlite', 'utils']
 */
export function splitPackageList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .replace(/\n/g, '')
    .replace(/\s/g, '')
    .replace(/\([^)]*\)/g, '')
    .split(',')
    .filter(name => name.length > 0);
}
