import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * The output port carried by a context, or plain console output when it has none.
 */
export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
