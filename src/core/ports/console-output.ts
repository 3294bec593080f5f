/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort, safe for pipelines
 * and headless environments.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  },

  warn(message: string): void {
    console.warn(`⚠ ${message}`);
  }
};

