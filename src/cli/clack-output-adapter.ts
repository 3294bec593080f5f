/**
 * Clack Output Adapter
 *
 * CLI OutputPort that routes to @clack/prompts for interactive terminals.
 * Non-interactive sessions use the plain console adapter instead.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    }
  };
}
