/**
 * OutputPort for interactive terminals, rendered with @clack/prompts.
 */

import { cancel, confirm, isCancel, log, note, spinner } from '@clack/prompts';
import type { OutputPort, OutputSpinner } from '../core/ports/output.js';
import { UserCancellationError } from '../utils/errors.js';

function createClackSpinner(): OutputSpinner {
  const indicator = spinner();
  let running = false;

  return {
    start(message: string) {
      if (!running) {
        indicator.start(message);
        running = true;
      }
    },
    stop(finalMessage?: string) {
      if (running) {
        indicator.stop(finalMessage);
        running = false;
      }
    }
  };
}

export function createClackOutput(): OutputPort {
  return {
    info: message => log.info(message),
    step: message => log.step(message),
    success: message => log.success(message),
    warn: message => log.warn(message),
    note: (content, title) => note(content, title),

    async confirm(message, options = {}) {
      const answer = await confirm({ message, initialValue: options.initial ?? false });
      if (isCancel(answer)) {
        cancel('Nothing was changed.');
        throw new UserCancellationError();
      }
      return answer;
    },

    spinner: createClackSpinner
  };
}
