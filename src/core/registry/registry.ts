/**
 * Dependency registry port.
 *
 * The resolver only talks to this interface; `LocalRegistry` is the
 * filesystem implementation and tests use in-memory ones.
 */

import { isAbsolute, join } from 'path';
import semver from 'semver';
import type { Recipe, Requirement } from '../../types/index.js';

export interface RegistryEntry {
  recipe: Recipe;
  /** Absolute folder holding the packaged artifacts */
  packageFolder: string;
}

export interface DependencyRegistry {
  /**
   * Published versions of a package.
   * Throws DependencyUnavailableError when the package is unknown or the
   * registry cannot be read.
   */
  listVersions(name: string): Promise<string[]>;

  /**
   * Recipe and package folder of one published version.
   * Throws DependencyUnavailableError when it cannot be loaded.
   */
  fetch(name: string, version: string): Promise<RegistryEntry>;
}

/** Absolute build information a consumer needs to compile and link */
export interface PackageArtifacts {
  rootFolder: string;
  includeDirs: string[];
  libDirs: string[];
  binDirs: string[];
  libs: string[];
  systemLibs: string[];
  defines: string[];
}

export interface RegistryResolution {
  version: string;
  requirements: Requirement[];
  artifacts: PackageArtifacts;
}

export function resolveArtifacts(entry: RegistryEntry): PackageArtifacts {
  const absolute = (dirs: string[]): string[] =>
    dirs.map(dir => (isAbsolute(dir) ? dir : join(entry.packageFolder, dir)));
  const { cppInfo } = entry.recipe;
  return {
    rootFolder: entry.packageFolder,
    includeDirs: absolute(cppInfo.includedirs),
    libDirs: absolute(cppInfo.libdirs),
    binDirs: absolute(cppInfo.bindirs),
    libs: [...cppInfo.libs],
    systemLibs: [...cppInfo.system_libs],
    defines: [...cppInfo.defines]
  };
}

/**
 * Highest version satisfying every range, or null. Prereleases only match
 * ranges that name them explicitly.
 */
export function highestSatisfying(versions: readonly string[], ranges: readonly string[]): string | null {
  const candidates = versions.filter(
    version => semver.valid(version) !== null && ranges.every(range => satisfies(version, range))
  );
  if (candidates.length === 0) {
    return null;
  }
  return candidates.sort(semver.rcompare)[0];
}

export function satisfies(version: string, range: string): boolean {
  try {
    return semver.satisfies(version, range);
  } catch {
    return false;
  }
}

/**
 * Resolve a single constraint: the highest published version satisfying it,
 * with its requirements and artifact paths. Returns null when the package
 * exists but no version matches.
 */
export async function resolve(
  registry: DependencyRegistry,
  name: string,
  constraint: string
): Promise<RegistryResolution | null> {
  const versions = await registry.listVersions(name);
  const version = highestSatisfying(versions, [constraint]);
  if (!version) {
    return null;
  }
  const entry = await registry.fetch(name, version);
  return {
    version,
    requirements: entry.recipe.requires,
    artifacts: resolveArtifacts(entry)
  };
}
