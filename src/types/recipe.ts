/**
 * Recipe, settings, option and requirement types shared across the core.
 */

export type OptionValue = string | number | boolean;

/** Marker for an option domain accepting any scalar value */
export const ANY_VALUE = 'ANY' as const;

export type OptionDomain = readonly OptionValue[] | typeof ANY_VALUE;

export type RequirementKind = 'regular' | 'test';

export interface Requirement {
  name: string;
  /** semver range or exact version */
  constraint: string;
  kind: RequirementKind;
  /** Option values the requirer asks for on the dependency */
  options?: Record<string, OptionValue>;
}

export type RulePhase = 'config_options' | 'configure';

export type RuleCondition =
  | { setting: string; equals: string }
  | { setting: string; in: readonly string[] }
  | { option: string; equals: OptionValue }
  | { option: string; in: readonly OptionValue[] };

/**
 * Conditional option removal. All rules of a phase are evaluated against the
 * same snapshot; their removal sets are unioned and subtracted once.
 */
export interface OptionRule {
  phase: RulePhase;
  when: RuleCondition;
  remove: readonly string[];
}

export type PackageStep =
  | { kind: 'none'; message?: string }
  | { kind: 'install' };

/** Consumer-visible build information of a packaged library */
export interface CppInfo {
  includedirs: string[];
  libdirs: string[];
  bindirs: string[];
  libs: string[];
  system_libs: string[];
  defines: string[];
}

export interface RecipeOptionDeclaration {
  domain: OptionDomain;
  default: OptionValue;
}

export interface Recipe {
  name: string;
  version: string;
  packageType: 'library' | 'application' | 'header-library';
  description?: string;
  license?: string;
  /** Settings axes the recipe consumes, in declaration order */
  settings: string[];
  /** Axes pinned by the recipe regardless of the root's value */
  settingsOverrides: Record<string, string>;
  options: Record<string, RecipeOptionDeclaration>;
  requires: Requirement[];
  testRequires: Requirement[];
  rules: OptionRule[];
  /** Source folder relative to the recipe root */
  sourceFolder: string;
  package: PackageStep;
  cppInfo: CppInfo;
}
