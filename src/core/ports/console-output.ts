/**
 * Console Output
 *
 * Line-oriented OutputPort for CI, piped output, and any caller that injects
 * no port. Warnings go to stderr so a printed snapshot table stays clean on stdout.
 */

import type { OutputPort, OutputSpinner } from './output.js';

const print = (prefix: string) => (message: string): void => {
  console.log(prefix ? `${prefix} ${message}` : message);
};

export const consoleOutput: OutputPort = {
  info: print(''),
  step: print('›'),
  success: print('✓'),

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
    return options?.initial ?? false;
  },

  spinner(): OutputSpinner {
    let current = '';
    return {
      start(message: string) {
        current = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        if (finalMessage !== undefined && finalMessage !== current) {
          console.log(`✓ ${finalMessage}`);
        }
      }
    };
  }
};
