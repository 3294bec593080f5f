/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI output adapter injected and
 * an AbortSignal wired to Ctrl-C and the --timeout option.
 */

import type { ExecutionContext } from '../types/execution-context.js';
import { createExecutionContext, type ExecutionOptions } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { logger } from '../utils/logger.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends Omit<ExecutionOptions, 'signal'> {
  /** Seconds before build tool processes are terminated */
  timeout?: number;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

export interface CliContext {
  ctx: ExecutionContext;
  /** Remove the signal handlers and timer */
  dispose(): void;
}

let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

function getCliOutput(isInteractive: boolean): OutputPort {
  if (!isInteractive) {
    return consoleOutput;
  }
  cachedClackOutput ??= createClackOutput();
  return cachedClackOutput;
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<CliContext> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.debug('Interrupted, cancelling build tool');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let timer: NodeJS.Timeout | undefined;
  if (options.timeout !== undefined) {
    timer = setTimeout(() => {
      logger.debug(`Timeout of ${options.timeout}s reached, cancelling build tool`);
      controller.abort();
    }, options.timeout * 1000);
    timer.unref();
  }

  const dispose = (): void => {
    process.removeListener('SIGINT', onInterrupt);
    if (timer) clearTimeout(timer);
  };

  try {
    const ctx = await createExecutionContext({ ...options, signal: controller.signal });
    ctx.output = getCliOutput(detectInteractive(options.interactive));
    return { ctx, dispose };
  } catch (error) {
    dispose();
    throw error;
  }
}
