import { spawn } from 'child_process';
import { UserCancellationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ProcessResult {
  /** Exit code, or null when the process ended on a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunOptions {
  cwd?: string;
  signal?: AbortSignal;
}

export type ProcessRunner = (command: string, args: readonly string[], options?: RunOptions) => Promise<ProcessResult>;

/**
 * Run an external tool with inherited stdio, so its diagnostics reach the
 * terminal untouched. Aborting the signal terminates the child and rejects
 * with UserCancellationError.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
  new Promise<ProcessResult>((resolve, reject) => {
    const { cwd, signal } = options;
    if (signal?.aborted) {
      reject(new UserCancellationError(`${command} cancelled before start`));
      return;
    }

    logger.debug(`Running: ${command} ${args.join(' ')}`, { cwd });
    const child = spawn(command, [...args], { cwd, stdio: 'inherit', signal });
    let settled = false;

    child.on('error', (error: Error) => {
      if (settled) return;
      settled = true;
      if (error.name === 'AbortError') {
        reject(new UserCancellationError(`${command} cancelled`));
      } else {
        reject(error);
      }
    });

    child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      if (signal?.aborted) {
        reject(new UserCancellationError(`${command} cancelled`));
        return;
      }
      logger.debug(`${command} exited`, { code, signal: exitSignal });
      resolve({ exitCode: code, signal: exitSignal });
    });
  });
