import type { OutputPort } from '../core/ports/output.js';

/**
 * What a command runs against: the working directory that relative snapshot
 * paths resolve against (the package being developed, for `insert` and a
 * default `restore`), and where user-facing output goes.
 */
export interface ExecutionContext {
  /** Absolute; process.cwd() or the global --cwd */
  cwd: string;

  /** Falls back to plain console output when absent */
  output?: OutputPort;
}

export interface ExecutionOptions {
  /** --cwd, relative to process.cwd() */
  cwd?: string;
}
