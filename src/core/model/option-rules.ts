/**
 * Conditional option removal.
 *
 * Each phase evaluates all of its rules against one snapshot, unions the
 * options the triggered rules remove and subtracts that set once, so the
 * outcome does not depend on rule order and two rules may remove the same
 * option.
 */

import type { OptionRule, OptionValue, RuleCondition, RulePhase } from '../../types/index.js';
import type { Settings } from './settings.js';
import type { OptionSet } from './option-set.js';
import { logger } from '../../utils/logger.js';

export function evaluateCondition(condition: RuleCondition, settings: Settings, options: OptionSet): boolean {
  if ('setting' in condition) {
    const actual = settings.get(condition.setting);
    if (actual === undefined) return false;
    return 'equals' in condition ? actual === condition.equals : condition.in.includes(actual);
  }
  const actual = options.get(condition.option);
  if (actual === undefined) return false;
  return 'equals' in condition ? actual === condition.equals : condition.in.includes(actual);
}

/**
 * Union of the options removed by every triggered rule of the phase.
 */
export function collectRemovals(
  rules: readonly OptionRule[],
  phase: RulePhase,
  settings: Settings,
  options: OptionSet
): Set<string> {
  const removals = new Set<string>();
  for (const rule of rules) {
    if (rule.phase === phase && evaluateCondition(rule.when, settings, options)) {
      for (const name of rule.remove) {
        removals.add(name);
      }
    }
  }
  return removals;
}

/**
 * Apply one rule phase to the option set. Returns the options that were
 * actually present and removed.
 */
export function applyRulePhase(
  options: OptionSet,
  settings: Settings,
  rules: readonly OptionRule[],
  phase: RulePhase
): string[] {
  const removals = collectRemovals(rules, phase, settings, options);
  const removed = Array.from(removals).filter(name => options.has(name)).sort();
  for (const name of removals) {
    options.remove(name);
  }
  if (removed.length > 0) {
    logger.debug(`Removed options of ${options.owner} in ${phase}: ${removed.join(', ')}`);
  }
  return removed;
}

/**
 * Run the config phases of a package exactly once and freeze the result:
 * `config_options` rules, then the requested values, then `configure` rules.
 * Requested values for options an earlier rule removed are dropped.
 */
export function configureOptions(
  options: OptionSet,
  settings: Settings,
  rules: readonly OptionRule[],
  assignments: Record<string, OptionValue> = {}
): OptionSet {
  applyRulePhase(options, settings, rules, 'config_options');

  for (const [name, value] of Object.entries(assignments)) {
    if (!options.has(name)) {
      logger.debug(`Ignoring value for absent option ${options.owner}:${name}`);
      continue;
    }
    options.assign(name, value);
  }

  applyRulePhase(options, settings, rules, 'configure');
  return options.freeze();
}
