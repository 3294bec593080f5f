/**
 * Package-specific build toggles (shared, fPIC, ...).
 */

import { ANY_VALUE, type OptionDomain, type OptionValue, type RecipeOptionDeclaration } from '../../types/index.js';
import { AxisMap, type AxisDomain } from './axis-map.js';

export class OptionSet extends AxisMap<OptionValue> {
  constructor(private readonly packageName: string) {
    super(`option ${packageName}:`);
  }

  static fromDeclarations(packageName: string, declarations: Record<string, RecipeOptionDeclaration>): OptionSet {
    const options = new OptionSet(packageName);
    for (const [name, declaration] of Object.entries(declarations)) {
      options.declareOption(name, declaration.domain, declaration.default);
    }
    return options;
  }

  get owner(): string {
    return this.packageName;
  }

  declareOption(name: string, domain: OptionDomain, defaultValue: OptionValue): this {
    return this.declare(name, toAxisDomain(domain), coerceOptionValue(defaultValue, toAxisDomain(domain)));
  }

  /**
   * Set a value given as text (command line, profile) or as a typed value,
   * coercing it against the option's domain first.
   */
  assign(name: string, value: OptionValue): this {
    const domain = this.domainOf(name);
    return this.set(name, domain === undefined ? value : coerceOptionValue(value, domain));
  }

  /** Values sorted by option name */
  sortedValues(): Array<[string, OptionValue]> {
    return this.values().sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}

function toAxisDomain(domain: OptionDomain): AxisDomain<OptionValue> {
  return domain === ANY_VALUE ? null : domain;
}

/**
 * Coerce text into the domain's value type: 'True'/'false' become booleans
 * and numeric text becomes a number when the domain holds such values.
 */
export function coerceOptionValue(value: OptionValue, domain: AxisDomain<OptionValue>): OptionValue {
  if (typeof value !== 'string' || domain === null || domain.includes(value)) {
    return value;
  }
  const lowered = value.toLowerCase();
  if ((lowered === 'true' || lowered === 'false') && domain.includes(lowered === 'true')) {
    return lowered === 'true';
  }
  const numeric = Number(value);
  if (value.trim() !== '' && !Number.isNaN(numeric) && domain.includes(numeric)) {
    return numeric;
  }
  return value;
}

export function formatOptionValue(value: OptionValue): string {
  return typeof value === 'boolean' ? (value ? 'True' : 'False') : String(value);
}
