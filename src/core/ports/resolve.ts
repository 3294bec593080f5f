/**
 * Resolve the OutputPort of an ExecutionContext, falling back to plain
 * console output when none was injected.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
