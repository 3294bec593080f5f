/**
 * Folder layout of a build configuration.
 *
 *   source     <root>/<source_folder>
 *   build      <root>/build/<build_type>-<configId>
 *   generators <root>/build/<build_type>-<configId>/generators
 *   package    <root>/package/<configId>
 *
 * configId is derived from the frozen settings and options snapshot, so equal
 * snapshots share folders and different snapshots never do.
 */

import { createHash } from 'crypto';
import { join, resolve } from 'path';
import { CONFIG_ID_LENGTH, LAYOUT_DIRS } from '../../constants/index.js';
import type { Settings } from '../model/settings.js';
import { formatOptionValue, type OptionSet } from '../model/option-set.js';

export interface Layout {
  configId: string;
  source: string;
  build: string;
  generators: string;
  package: string;
}

/**
 * Canonical text of a settings/options snapshot: settings in axis order,
 * options sorted by name, one `key=value` per line.
 */
export function snapshotText(settings: Settings, options: OptionSet): string {
  const lines = ['[settings]'];
  for (const [axis, value] of settings.snapshot()) {
    lines.push(`${axis}=${value}`);
  }
  lines.push('[options]');
  for (const [name, value] of options.sortedValues()) {
    lines.push(`${name}=${formatOptionValue(value)}`);
  }
  return `${lines.join('\n')}\n`;
}

export function computeConfigId(settings: Settings, options: OptionSet): string {
  return createHash('sha1').update(snapshotText(settings, options)).digest('hex').slice(0, CONFIG_ID_LENGTH);
}

export function layout(root: string, settings: Settings, options: OptionSet, sourceFolder: string = '.'): Layout {
  const recipeRoot = resolve(root);
  const configId = computeConfigId(settings, options);
  const buildType = settings.get('build_type') ?? 'Default';
  const build = join(recipeRoot, LAYOUT_DIRS.BUILD, `${buildType}-${configId}`);

  return {
    configId,
    source: resolve(recipeRoot, sourceFolder),
    build,
    generators: join(build, LAYOUT_DIRS.GENERATORS),
    package: join(recipeRoot, LAYOUT_DIRS.PACKAGE, configId)
  };
}
