/**
 * Filesystem registry.
 *
 * Layout:
 *   <registry>/<name>/<version>/recipe.yml
 *   <registry>/<name>/<version>/package/...
 */

import { join } from 'path';
import semver from 'semver';
import type { Recipe } from '../../types/index.js';
import { FILE_PATTERNS, LAYOUT_DIRS } from '../../constants/index.js';
import { copyDirectory, ensureDir, exists, isDirectory, listDirectories, remove, writeTextFile } from '../../utils/fs.js';
import { DependencyUnavailableError, FileSystemError, InvalidRecipeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseRecipeYml } from '../recipe/recipe-yml.js';
import type { DependencyRegistry, RegistryEntry } from './registry.js';

export class LocalRegistry implements DependencyRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(readonly root: string) {}

  getEntryDir(name: string, version: string): string {
    return join(this.root, name, version);
  }

  async listVersions(name: string): Promise<string[]> {
    const packageDir = join(this.root, name);
    if (!(await isDirectory(packageDir))) {
      throw new DependencyUnavailableError(name, `not found in registry ${this.root}`);
    }
    const versions = (await listDirectories(packageDir)).filter(version => semver.valid(version) !== null);
    logger.debug(`Registry versions of ${name}: ${versions.join(', ') || '(none)'}`);
    return versions.sort(semver.compare);
  }

  async fetch(name: string, version: string): Promise<RegistryEntry> {
    const key = `${name}/${version}`;
    const cached = this.entries.get(key);
    if (cached) {
      return cached;
    }

    const entryDir = this.getEntryDir(name, version);
    const recipePath = join(entryDir, FILE_PATTERNS.RECIPE_YML);
    if (!(await exists(recipePath))) {
      throw new DependencyUnavailableError(name, `missing ${FILE_PATTERNS.RECIPE_YML} for ${key}`);
    }

    let recipe: Recipe;
    try {
      recipe = await parseRecipeYml(recipePath);
    } catch (error) {
      if (error instanceof InvalidRecipeError || error instanceof FileSystemError) {
        throw new DependencyUnavailableError(name, error.message);
      }
      throw error;
    }
    if (recipe.name !== name || recipe.version !== version) {
      throw new InvalidRecipeError(`${recipePath} declares ${recipe.name}/${recipe.version}, expected ${key}`);
    }

    const entry: RegistryEntry = {
      recipe,
      packageFolder: join(entryDir, LAYOUT_DIRS.REGISTRY_PACKAGE)
    };
    this.entries.set(key, entry);
    return entry;
  }

  /**
   * Publish a recipe and its package folder, replacing an existing entry of
   * the same version.
   */
  async publish(recipe: Recipe, recipeContent: string, packageFolder: string | null): Promise<string> {
    const entryDir = this.getEntryDir(recipe.name, recipe.version);
    await remove(entryDir);
    await ensureDir(entryDir);
    await writeTextFile(join(entryDir, FILE_PATTERNS.RECIPE_YML), recipeContent);

    const target = join(entryDir, LAYOUT_DIRS.REGISTRY_PACKAGE);
    if (packageFolder && (await isDirectory(packageFolder))) {
      await copyDirectory(packageFolder, target);
    } else {
      await ensureDir(target);
    }

    this.entries.delete(`${recipe.name}/${recipe.version}`);
    logger.debug(`Published ${recipe.name}/${recipe.version} to ${entryDir}`);
    return entryDir;
  }
}
