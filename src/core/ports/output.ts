/**
 * Output Port Interface
 *
 * Contract for user-facing output. Core logic writes through this interface
 * instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, interactive terminal)
 *   - consoleOutput (default, CI and tests)
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;
}
