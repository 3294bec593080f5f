/**
 * Execution Context Types
 *
 * Carries the directories and port interfaces a command runs with, so the
 * same core logic can be driven from the CLI, from tests or from CI.
 */

import type { OutputPort } from '../core/ports/output.js';

export interface ExecutionContext {
  /**
   * Absolute path of the recipe root (the directory holding recipe.yml).
   */
  recipeRoot: string;

  /**
   * Absolute path of the local registry used for dependency lookups.
   */
  registryRoot: string;

  /**
   * Output port for user-facing messages.
   * Falls back to plain console output when absent.
   */
  output?: OutputPort;

  /**
   * Cancels in-flight build tool processes when aborted.
   */
  signal?: AbortSignal;
}
