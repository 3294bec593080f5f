import * as os from 'os';
import * as path from 'path';
import { RecipeKitDirectories } from '../types/index.js';
import { DIR_PATTERNS, RECIPEKIT_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Directory resolution. recipekit keeps its configuration and registry under
 * one dotfile folder (~/.recipekit), overridable with RECIPEKIT_HOME.
 */

export function getRecipeKitHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.RECIPEKIT_HOME;
  if (override && override.trim() !== '') {
    return path.resolve(override);
  }
  return path.join(os.homedir(), DIR_PATTERNS.RECIPEKIT);
}

export function getRecipeKitDirectories(env: NodeJS.ProcessEnv = process.env): RecipeKitDirectories {
  const home = getRecipeKitHome(env);
  return {
    config: home,
    data: home
  };
}

/**
 * Default location of the local package registry
 */
export function getDefaultRegistryRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getRecipeKitDirectories(env).data, RECIPEKIT_DIRS.REGISTRY);
}

/**
 * Ensure all recipekit directories exist
 */
export async function ensureRecipeKitDirectories(env: NodeJS.ProcessEnv = process.env): Promise<RecipeKitDirectories> {
  const dirs = getRecipeKitDirectories(env);
  await ensureDir(dirs.config);
  logger.debug('recipekit directories ensured', dirs);
  return dirs;
}
