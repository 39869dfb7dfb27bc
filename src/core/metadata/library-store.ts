import { join } from 'path';
import type { DeclaredDependencies, PackageMetadataStore } from './types.js';
import { DEPENDENCY_FIELDS, FILE_PATTERNS } from '../../constants/index.js';
import { parseDescription, splitPackageList, type DescriptionFields } from '../../utils/description-file.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { PackageNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * PackageMetadataStore backed by R library directories.
 *
 * An installed package is a `<library>/<name>/DESCRIPTION` file. Libraries are
 * searched in order and the first match wins, the same way R resolves them.
 */
export class LibraryMetadataStore implements PackageMetadataStore {
  constructor(private readonly libraryPaths: readonly string[]) {}

  async declaredDependencies(name: string): Promise<DeclaredDependencies> {
    const description = await this.readDescription(name);
    if (!description) {
      throw new PackageNotFoundError(name, { libraryPaths: [...this.libraryPaths] });
    }

    return {
      mandatory: splitPackageList(description[DEPENDENCY_FIELDS.MANDATORY]),
      imported: splitPackageList(description[DEPENDENCY_FIELDS.IMPORTED])
    };
  }

  async installedVersion(name: string): Promise<string | undefined> {
    const description = await this.readDescription(name);
    return description?.Version;
  }

  async isInstalled(name: string): Promise<boolean> {
    return (await this.findDescriptionPath(name)) !== undefined;
  }

  private async findDescriptionPath(name: string): Promise<string | undefined> {
    for (const libraryPath of this.libraryPaths) {
      const candidate = join(libraryPath, name, FILE_PATTERNS.DESCRIPTION);
      if (await exists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private async readDescription(name: string): Promise<DescriptionFields | undefined> {
    const descriptionPath = await this.findDescriptionPath(name);
    if (!descriptionPath) {
      logger.debug(`No DESCRIPTION found for ${name}`, { libraryPaths: this.libraryPaths });
      return undefined;
    }
    return parseDescription(await readTextFile(descriptionPath));
  }
}
