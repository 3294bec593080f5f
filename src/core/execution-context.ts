/**
 * Execution Context Module
 *
 * Resolves the recipe root and registry a command runs against and checks
 * that the recipe root is a readable directory.
 */

import { resolve } from 'path';
import { stat, access, constants as fsConstants } from 'fs/promises';
import type { ExecutionContext } from '../types/execution-context.js';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { configManager } from './config.js';

export interface ExecutionOptions {
  /** Recipe directory, relative to the working directory */
  path?: string;
  /** Registry root overriding config.jsonc and the default */
  registry?: string;
  signal?: AbortSignal;
}

export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const recipeRoot = resolve(process.cwd(), options.path ?? '.');

  try {
    const stats = await stat(recipeRoot);
    if (!stats.isDirectory()) {
      throw new ConfigError(`'${recipeRoot}' is not a directory`);
    }
    await access(recipeRoot, fsConstants.R_OK);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Recipe directory '${recipeRoot}' is not accessible`, { error });
  }

  const context: ExecutionContext = {
    recipeRoot,
    registryRoot: await configManager.getRegistryRoot(options.registry),
    signal: options.signal
  };
  logger.debug('Execution context', { recipeRoot: context.recipeRoot, registryRoot: context.registryRoot });
  return context;
}
