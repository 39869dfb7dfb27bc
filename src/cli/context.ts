/**
 * CLI Context Factory
 *
 * Commands build their ExecutionContext here so that pipelines receive the
 * Clack output in a terminal and plain console output everywhere else.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput, type OutputPort } from '../core/ports/index.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Force interactive output on or off; detected from the terminal when undefined */
  interactive?: boolean;
}

let clackOutput: OutputPort | undefined;

function isInteractiveSession(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true && process.env.CI !== 'true';
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  if (options.interactive ?? isInteractiveSession()) {
    clackOutput ??= createClackOutput();
    ctx.output = clackOutput;
  } else {
    ctx.output = consoleOutput;
  }
  return ctx;
}
