/**
 * recipe.yml parsing and validation.
 */

import * as yaml from 'js-yaml';
import semver from 'semver';
import {
  ANY_VALUE,
  type CppInfo,
  type OptionDomain,
  type OptionRule,
  type OptionValue,
  type PackageStep,
  type Recipe,
  type RecipeOptionDeclaration,
  type Requirement,
  type RequirementKind,
  type RuleCondition,
  type RulePhase
} from '../../types/index.js';
import { readTextFile } from '../../utils/fs.js';
import { InvalidRecipeError } from '../../utils/errors.js';
import { isConsumed, SETTINGS_AXES } from '../model/settings.js';

const PACKAGE_TYPES: ReadonlyArray<Recipe['packageType']> = ['library', 'application', 'header-library'];
const RULE_PHASES: readonly RulePhase[] = ['config_options', 'configure'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionValue(value: unknown): value is OptionValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function stringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new InvalidRecipeError(`'${field}' must be a list of strings`);
  }
  return value;
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new InvalidRecipeError(`'${field}' must be a string`);
  }
  return String(value);
}

/**
 * Parse a requirement reference: `name/1.2.3`, `name/[>=1.0 <2]` or `name/^1.2`.
 */
export function parseRequirementRef(ref: string, kind: RequirementKind): Requirement {
  const slash = ref.indexOf('/');
  if (slash <= 0 || slash === ref.length - 1) {
    throw new InvalidRecipeError(`requirement '${ref}' must be written as name/version`);
  }
  const name = ref.slice(0, slash).trim();
  let constraint = ref.slice(slash + 1).trim();
  if (constraint.startsWith('[') && constraint.endsWith(']')) {
    constraint = constraint.slice(1, -1).trim();
  }
  if (semver.validRange(constraint) === null) {
    throw new InvalidRecipeError(`requirement '${ref}' has an invalid version constraint '${constraint}'`);
  }
  return { name, constraint, kind };
}

function parseRequirements(value: unknown, field: string, kind: RequirementKind): Requirement[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new InvalidRecipeError(`'${field}' must be a list`);
  }
  return value.map((entry): Requirement => {
    if (typeof entry === 'string') {
      return parseRequirementRef(entry, kind);
    }
    if (isRecord(entry) && typeof entry.ref === 'string') {
      const requirement = parseRequirementRef(entry.ref, kind);
      if (entry.options !== undefined) {
        requirement.options = parseOptionValues(entry.options, `${field}.${requirement.name}.options`);
      }
      return requirement;
    }
    throw new InvalidRecipeError(`entries of '${field}' must be 'name/version' or { ref, options }`);
  });
}

function parseOptionValues(value: unknown, field: string): Record<string, OptionValue> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new InvalidRecipeError(`'${field}' must be a mapping`);
  }
  const result: Record<string, OptionValue> = {};
  for (const [name, optionValue] of Object.entries(value)) {
    if (!isOptionValue(optionValue)) {
      throw new InvalidRecipeError(`'${field}.${name}' must be a string, number or boolean`);
    }
    result[name] = optionValue;
  }
  return result;
}

function parseOptions(rawOptions: unknown, rawDefaults: unknown): Record<string, RecipeOptionDeclaration> {
  const defaults = parseOptionValues(rawDefaults, 'default_options');
  if (rawOptions === undefined || rawOptions === null) {
    if (Object.keys(defaults).length > 0) {
      throw new InvalidRecipeError('default_options given without options');
    }
    return {};
  }
  if (!isRecord(rawOptions)) {
    throw new InvalidRecipeError("'options' must be a mapping of option name to allowed values");
  }

  const declarations: Record<string, RecipeOptionDeclaration> = {};
  for (const [name, rawDomain] of Object.entries(rawOptions)) {
    let domain: OptionDomain;
    if (rawDomain === ANY_VALUE) {
      domain = ANY_VALUE;
    } else if (Array.isArray(rawDomain) && rawDomain.length > 0 && rawDomain.every(isOptionValue)) {
      domain = rawDomain;
    } else {
      throw new InvalidRecipeError(`option '${name}' must list its allowed values or be ANY`);
    }

    const defaultValue = defaults[name] ?? (domain === ANY_VALUE ? undefined : domain[0]);
    if (defaultValue === undefined) {
      throw new InvalidRecipeError(`option '${name}' accepts ANY value and needs a default`);
    }
    declarations[name] = { domain, default: defaultValue };
  }

  for (const name of Object.keys(defaults)) {
    if (!(name in declarations)) {
      throw new InvalidRecipeError(`default_options names undeclared option '${name}'`);
    }
  }
  return declarations;
}

function parseCondition(value: unknown, index: number): RuleCondition {
  if (!isRecord(value)) {
    throw new InvalidRecipeError(`rules[${index}].when must be a mapping`);
  }
  const target = typeof value.setting === 'string'
    ? { kind: 'setting' as const, name: value.setting }
    : typeof value.option === 'string'
      ? { kind: 'option' as const, name: value.option }
      : null;
  if (!target) {
    throw new InvalidRecipeError(`rules[${index}].when needs 'setting' or 'option'`);
  }

  if ('equals' in value) {
    const expected = value.equals;
    if (target.kind === 'setting') {
      if (typeof expected !== 'string') {
        throw new InvalidRecipeError(`rules[${index}].when.equals must be a string for settings`);
      }
      return { setting: target.name, equals: expected };
    }
    if (!isOptionValue(expected)) {
      throw new InvalidRecipeError(`rules[${index}].when.equals must be a scalar`);
    }
    return { option: target.name, equals: expected };
  }

  if (Array.isArray(value.in)) {
    const candidates: unknown[] = value.in;
    if (target.kind === 'setting') {
      return { setting: target.name, in: stringList(candidates, `rules[${index}].when.in`) };
    }
    if (!candidates.every(isOptionValue)) {
      throw new InvalidRecipeError(`rules[${index}].when.in must list scalars`);
    }
    return { option: target.name, in: candidates.filter(isOptionValue) };
  }

  throw new InvalidRecipeError(`rules[${index}].when needs 'equals' or 'in'`);
}

function parseRules(value: unknown): OptionRule[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new InvalidRecipeError("'rules' must be a list");
  }
  return value.map((rawRule: unknown, index): OptionRule => {
    if (!isRecord(rawRule)) {
      throw new InvalidRecipeError(`rules[${index}] must be a mapping`);
    }
    const when = parseCondition(rawRule.when, index);
    const defaultPhase = 'setting' in when ? 'config_options' : 'configure';
    const rawPhase = rawRule.phase ?? defaultPhase;
    const phase = RULE_PHASES.find(candidate => candidate === rawPhase);
    if (!phase) {
      throw new InvalidRecipeError(`rules[${index}].phase must be config_options or configure`);
    }
    if (phase === 'config_options' && 'option' in when) {
      throw new InvalidRecipeError(`rules[${index}] tests an option and cannot run in config_options`);
    }
    return { phase, when, remove: stringList(rawRule.remove, `rules[${index}].remove`) };
  });
}

function parsePackageStep(value: unknown): PackageStep {
  if (value === undefined || value === null || value === 'none') {
    return { kind: 'none' };
  }
  if (value === 'install') {
    return { kind: 'install' };
  }
  if (isRecord(value)) {
    if (value.kind === 'install') return { kind: 'install' };
    if (value.kind === 'none' || value.kind === undefined) {
      return { kind: 'none', message: optionalString(value.message, 'package.message') };
    }
  }
  throw new InvalidRecipeError("'package' must be none, install or { kind, message }");
}

function parseCppInfo(value: unknown, packageType: Recipe['packageType']): CppInfo {
  const headerOnly = packageType === 'header-library';
  const defaults: CppInfo = {
    includedirs: ['include'],
    libdirs: headerOnly ? [] : ['lib'],
    bindirs: headerOnly ? [] : ['bin'],
    libs: [],
    system_libs: [],
    defines: []
  };
  if (value === undefined || value === null) return defaults;
  if (!isRecord(value)) {
    throw new InvalidRecipeError("'cpp_info' must be a mapping");
  }
  return {
    includedirs: value.includedirs === undefined ? defaults.includedirs : stringList(value.includedirs, 'cpp_info.includedirs'),
    libdirs: value.libdirs === undefined ? defaults.libdirs : stringList(value.libdirs, 'cpp_info.libdirs'),
    bindirs: value.bindirs === undefined ? defaults.bindirs : stringList(value.bindirs, 'cpp_info.bindirs'),
    libs: stringList(value.libs, 'cpp_info.libs'),
    system_libs: stringList(value.system_libs, 'cpp_info.system_libs'),
    defines: stringList(value.defines, 'cpp_info.defines')
  };
}

/**
 * Validate a parsed YAML document and turn it into a Recipe
 */
export function recipeFromDocument(document: unknown, origin: string = 'recipe.yml'): Recipe {
  if (!isRecord(document)) {
    throw new InvalidRecipeError(`${origin} must contain a mapping`);
  }

  const name = optionalString(document.name, 'name');
  if (!name) {
    throw new InvalidRecipeError(`${origin} must contain a name field`);
  }
  const version = optionalString(document.version, 'version');
  if (!version || semver.valid(version) === null) {
    throw new InvalidRecipeError(`${origin}: version '${version ?? ''}' of '${name}' is not valid semver`);
  }

  const rawType = document.package_type ?? 'library';
  const packageType = PACKAGE_TYPES.find(type => type === rawType);
  if (!packageType) {
    throw new InvalidRecipeError(`package_type must be one of ${PACKAGE_TYPES.join(', ')}`);
  }

  const settings = stringList(document.settings, 'settings');
  for (const axis of settings) {
    if (!SETTINGS_AXES.includes(axis)) {
      throw new InvalidRecipeError(`unknown settings axis '${axis}'`);
    }
  }

  const overrides: Record<string, string> = {};
  if (document.settings_overrides !== undefined && document.settings_overrides !== null) {
    if (!isRecord(document.settings_overrides)) {
      throw new InvalidRecipeError("'settings_overrides' must be a mapping");
    }
    for (const [axis, value] of Object.entries(document.settings_overrides)) {
      if (typeof value !== 'string' || !isConsumed(axis, settings)) {
        throw new InvalidRecipeError(`settings_overrides.${axis} must be a string for a consumed axis`);
      }
      overrides[axis] = value;
    }
  }

  const options = parseOptions(document.options, document.default_options);
  const rules = parseRules(document.rules);
  for (const rule of rules) {
    if ('option' in rule.when && !(rule.when.option in options)) {
      throw new InvalidRecipeError(`rule condition names undeclared option '${rule.when.option}'`);
    }
  }

  return {
    name,
    version,
    packageType,
    description: optionalString(document.description, 'description'),
    license: optionalString(document.license, 'license'),
    settings,
    settingsOverrides: overrides,
    options,
    requires: parseRequirements(document.requires, 'requires', 'regular'),
    testRequires: parseRequirements(document.test_requires, 'test_requires', 'test'),
    rules,
    sourceFolder: optionalString(document.source_folder, 'source_folder') ?? '.',
    package: parsePackageStep(document.package),
    cppInfo: parseCppInfo(document.cpp_info, packageType)
  };
}

export function parseRecipeYmlContent(content: string, origin: string = 'recipe.yml'): Recipe {
  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new InvalidRecipeError(`${origin} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }
  return recipeFromDocument(document, origin);
}

/**
 * Parse recipe.yml file with validation
 */
export async function parseRecipeYml(recipeYmlPath: string): Promise<Recipe> {
  const content = await readTextFile(recipeYmlPath);
  return parseRecipeYmlContent(content, recipeYmlPath);
}
