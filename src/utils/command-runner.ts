import { execFile } from 'child_process';
import { promisify } from 'util';

import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs an external program to completion. Rejects with an Error whose message
 * carries the program's stderr when it exits non-zero or cannot be started.
 */
export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandOutput>;

function describeFailure(error: unknown): string {
  if (error && typeof error === 'object') {
    const stderr = 'stderr' in error ? String(error.stderr ?? '').trim() : '';
    if (stderr) {
      return stderr;
    }
  }
  return error instanceof Error ? error.message : String(error);
}

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  logger.debug(`Running ${command} ${args.join(' ')}`, { cwd: options.cwd });
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      maxBuffer: 64 * 1024 * 1024
    });
    return { stdout, stderr };
  } catch (error) {
    const invocation = [command, ...args.slice(0, 1)].join(' ');
    throw new Error(`${invocation} failed: ${describeFailure(error)}`);
  }
};
