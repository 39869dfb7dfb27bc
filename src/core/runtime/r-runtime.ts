import { runCommand, type CommandRunner } from '../../utils/command-runner.js';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * Live facts about the language runtime itself.
 */
export interface RuntimeProbe {
  /** Version as R reports it: `R.version$major` and `R.version$minor` joined by "." */
  version(): Promise<string>;

  /** Library search path, in lookup order */
  libraryPaths(): Promise<string[]>;
}

const VERSION_EXPRESSION = 'cat(R.version$major, R.version$minor, sep = ".")';
// Site and user profiles may print to stdout; only the lines between the markers are paths.
const PATHS_BEGIN = '<<envsnap:libPaths>>';
const PATHS_END = '<</envsnap:libPaths>>';
const LIBRARY_PATHS_EXPRESSION = `cat("${PATHS_BEGIN}", .libPaths(), "${PATHS_END}", sep = "\\n")`;

/**
 * RuntimeProbe that asks an installed Rscript.
 */
export class RscriptRuntime implements RuntimeProbe {
  private cachedVersion: string | undefined;

  constructor(
    private readonly rscript: string = 'Rscript',
    private readonly run: CommandRunner = runCommand
  ) {}

  async version(): Promise<string> {
    if (this.cachedVersion === undefined) {
      const { stdout } = await this.run(this.rscript, ['--vanilla', '-e', VERSION_EXPRESSION]);
      const version = stdout.trim();
      if (!version) {
        throw new ValidationError(`${this.rscript} did not report an R version`);
      }
      logger.debug(`Detected R version ${version}`);
      this.cachedVersion = version;
    }
    return this.cachedVersion;
  }

  async libraryPaths(): Promise<string[]> {
    const { stdout } = await this.run(this.rscript, ['-e', LIBRARY_PATHS_EXPRESSION]);
    const lines = stdout.split(/\r?\n/).map(line => line.trim());
    const begin = lines.lastIndexOf(PATHS_BEGIN);
    const end = lines.indexOf(PATHS_END, begin + 1);
    if (begin === -1 || end === -1) {
      throw new ValidationError(`${this.rscript} did not report its library paths`);
    }
    const paths = lines.slice(begin + 1, end).filter(line => line.length > 0);
    logger.debug('Detected R library paths', { paths });
    return paths;
  }
}
