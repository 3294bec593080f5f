/**
 * Recipe evaluation: loads recipe.yml, layers host, profile and command-line
 * settings, and runs the root's config phases once before freezing.
 */

import { join, resolve } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import type { OptionValue, ProfileConfig, Recipe } from '../../types/index.js';
import { InvalidValueError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { detectHostSettings, describeSettings, mergeSettingsValues } from '../model/host-settings.js';
import { configureOptions } from '../model/option-rules.js';
import { OptionSet } from '../model/option-set.js';
import { Settings } from '../model/settings.js';
import type { ConfiguredRoot } from '../resolution/graph-builder.js';
import { parseRecipeYml } from './recipe-yml.js';

export interface OptionAssignments {
  /** Values for the root's own options */
  root: Record<string, OptionValue>;
  /** Values for dependency options: package → option → value */
  dependencies: Record<string, Record<string, OptionValue>>;
}

export interface EvaluationInput {
  profile?: ProfileConfig;
  /** `-s axis=value` values; win over the profile */
  settings?: Record<string, string>;
  /** `-o name=value` and `-o dep:name=value` values; win over the profile */
  options?: Record<string, OptionValue>;
  /** Host defaults; detected from the running machine when omitted */
  hostSettings?: Record<string, string>;
}

export interface EvaluatedRecipe {
  root: ConfiguredRoot;
  dependencyOptions: Record<string, Record<string, OptionValue>>;
}

/**
 * Parse `key=value` pairs from the command line. The first `=` splits.
 */
export function parseAssignmentList(pairs: readonly string[], flag: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidValueError(flag, pair);
    }
    values[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return values;
}

/**
 * Split option values into the root's and the dependencies'. `dep:name`
 * addresses a dependency; `<root>:name` and bare names address the root.
 */
export function splitOptionAssignments(rootName: string, values: Record<string, OptionValue>): OptionAssignments {
  const assignments: OptionAssignments = { root: {}, dependencies: {} };
  for (const [key, value] of Object.entries(values)) {
    const colon = key.indexOf(':');
    if (colon < 0) {
      assignments.root[key] = value;
      continue;
    }
    const pkg = key.slice(0, colon);
    const option = key.slice(colon + 1);
    if (!pkg || !option) {
      throw new InvalidValueError('option', key);
    }
    if (pkg === rootName) {
      assignments.root[option] = value;
    } else {
      assignments.dependencies[pkg] = { ...assignments.dependencies[pkg], [option]: value };
    }
  }
  return assignments;
}

export function recipePath(recipeRoot: string): string {
  return join(resolve(recipeRoot), FILE_PATTERNS.RECIPE_YML);
}

export async function loadRecipe(recipeRoot: string): Promise<Recipe> {
  return parseRecipeYml(recipePath(recipeRoot));
}

/**
 * Evaluate a recipe against its inputs. The returned settings hold the full
 * profile (frozen) and the options went through config_options, the user
 * values and configure, in that order.
 */
export function evaluateRecipe(recipe: Recipe, input: EvaluationInput = {}): EvaluatedRecipe {
  const settingsValues = mergeSettingsValues(
    input.hostSettings ?? detectHostSettings(),
    input.profile?.settings,
    input.settings
  );
  const settings = Settings.fromValues(settingsValues).freeze();
  logger.debug(`Settings: ${describeSettings(settings)}`);

  const assignments = splitOptionAssignments(recipe.name, { ...input.profile?.options, ...input.options });
  for (const [name, value] of Object.entries(assignments.root)) {
    if (!(name in recipe.options)) {
      throw new InvalidValueError(`option ${recipe.name}:${name} (undeclared)`, value);
    }
  }

  const rootSettings = settings.restrict(recipe.settings, recipe.settingsOverrides);
  const options = configureOptions(
    OptionSet.fromDeclarations(recipe.name, recipe.options),
    rootSettings,
    recipe.rules,
    assignments.root
  );

  return {
    root: { recipe, settings, options },
    dependencyOptions: assignments.dependencies
  };
}
