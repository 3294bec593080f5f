/**
 * Shared constants for the recipekit CLI application
 * Single source of truth for directory names, file names and exit codes.
 */

export const DIR_PATTERNS = {
  RECIPEKIT: '.recipekit'
} as const;

export const FILE_PATTERNS = {
  RECIPE_YML: 'recipe.yml',
  RECIPE_INFO_YML: 'recipeinfo.yml',
  STATE_YML: 'recipekit-state.yml',
  TOOLCHAIN: 'recipekit_toolchain.cmake',
  DEPS_AGGREGATE: 'recipekit_deps.cmake',
  TEST_DEPS_AGGREGATE: 'recipekit_test_deps.cmake'
} as const;

export const RECIPEKIT_DIRS = {
  REGISTRY: 'registry'
} as const;

/**
 * Folder names produced by the layout function, relative to the recipe root
 * (build, package) or to the build folder (generators).
 */
export const LAYOUT_DIRS = {
  BUILD: 'build',
  GENERATORS: 'generators',
  PACKAGE: 'package',
  /** Package folder inside a registry entry */
  REGISTRY_PACKAGE: 'package'
} as const;

/** Length of the hexadecimal configuration id used in layout paths */
export const CONFIG_ID_LENGTH = 12;

export const EXIT_CODES = {
  SUCCESS: 0,
  RESOLUTION_FAILED: 1,
  CONFIGURE_FAILED: 2,
  BUILD_FAILED: 3,
  PACKAGE_FAILED: 4
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];
