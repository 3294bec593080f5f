import { homedir } from 'os';
import { join, resolve } from 'path';
import { ProfileConfig, RecipeKitConfig, RecipeKitDirectories } from '../types/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getRecipeKitDirectories, getDefaultRegistryRoot } from './directory.js';

/**
 * Configuration management for the recipekit CLI.
 * Reads config.jsonc (or config.json) from the recipekit home folder.
 *
 * Example:
 *
 *   {
 *     // where `export` publishes and resolution looks up packages
 *     "registry": "~/.recipekit/registry",
 *     "jobs": 8,
 *     "profiles": {
 *       "debug": { "settings": { "build_type": "Debug" }, "options": { "shared": "True" } }
 *     }
 *   }
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];

const DEFAULT_CONFIG: RecipeKitConfig = {
  profiles: {}
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolve a configured path against the config folder. A leading `~`
 * stands for the user's home directory.
 */
function resolveConfigPath(baseDir: string, value: string): string {
  if (value === '~' || value.startsWith('~/') || value.startsWith('~\\')) {
    return join(homedir(), value.slice(1));
  }
  return resolve(baseDir, value);
}

function stringRecord(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigError(`'${field}' must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(value)) {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new ConfigError(`'${field}.${key}' must be a string`);
    }
    result[key] = String(item);
  }
  return result;
}

function parseProfile(name: string, value: unknown): ProfileConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Profile '${name}' must be an object`);
  }
  const profile: ProfileConfig = {};
  if (typeof value.description === 'string') {
    profile.description = value.description;
  }
  if (value.settings !== undefined) {
    profile.settings = stringRecord(value.settings, `profiles.${name}.settings`);
  }
  if (value.options !== undefined) {
    if (!isRecord(value.options)) {
      throw new ConfigError(`'profiles.${name}.options' must be an object`);
    }
    const options: Record<string, string | number | boolean> = {};
    for (const [key, item] of Object.entries(value.options)) {
      if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
        throw new ConfigError(`'profiles.${name}.options.${key}' must be a string, number or boolean`);
      }
      options[key] = item;
    }
    profile.options = options;
  }
  return profile;
}

/**
 * Validate a parsed configuration document
 */
export function parseConfig(document: unknown, baseDir: string): RecipeKitConfig {
  if (!isRecord(document)) {
    throw new ConfigError('Invalid configuration structure');
  }
  const config: RecipeKitConfig = { profiles: {} };

  if (document.registry !== undefined) {
    if (typeof document.registry !== 'string') {
      throw new ConfigError(`'registry' must be a path`);
    }
    config.registry = resolveConfigPath(baseDir, document.registry);
  }
  if (document.jobs !== undefined) {
    if (typeof document.jobs !== 'number' || !Number.isInteger(document.jobs) || document.jobs < 1) {
      throw new ConfigError(`'jobs' must be a positive integer`);
    }
    config.jobs = document.jobs;
  }
  if (document.profiles !== undefined) {
    if (!isRecord(document.profiles)) {
      throw new ConfigError(`'profiles' must be an object`);
    }
    for (const [name, value] of Object.entries(document.profiles)) {
      config.profiles = { ...config.profiles, [name]: parseProfile(name, value) };
    }
  }
  return config;
}

class ConfigManager {
  private config: RecipeKitConfig | null = null;
  private readonly dirs: RecipeKitDirectories;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.dirs = getRecipeKitDirectories(env);
  }

  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, falling back to defaults when none exists
   */
  async load(): Promise<RecipeKitConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    try {
      this.config = parseConfig(await readJsoncFile(configPath), this.dirs.config);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      if (error instanceof ConfigError) {
        throw new ConfigError(`${configPath}: ${error.message}`);
      }
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
    }
    return this.config;
  }

  /**
   * Registry root: explicit value, then config file, then ~/.recipekit/registry
   */
  async getRegistryRoot(explicit?: string): Promise<string> {
    if (explicit) {
      return resolve(explicit);
    }
    const config = await this.load();
    return config.registry ?? getDefaultRegistryRoot(this.env);
  }

  async getJobs(): Promise<number | undefined> {
    const config = await this.load();
    return config.jobs;
  }

  /**
   * Look up a named profile. Unknown names fail with ConfigError.
   */
  async getProfile(name: string): Promise<ProfileConfig> {
    const config = await this.load();
    const profile = config.profiles?.[name];
    if (!profile) {
      const known = Object.keys(config.profiles ?? {}).sort();
      throw new ConfigError(
        `Unknown profile '${name}'${known.length > 0 ? `. Available: ${known.join(', ')}` : ''}`
      );
    }
    return profile;
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
