/**
 * recipeinfo.yml: metadata written into the package folder for consumers.
 * Lists regular requirements only; test-only requirements never appear.
 */

import * as yaml from 'js-yaml';
import { FILE_PATTERNS } from '../../constants/index.js';
import { formatOptionValue } from '../model/option-set.js';
import { nodeRef } from '../resolution/graph-serializer.js';
import { compareNames } from '../resolution/graph-builder.js';
import type { DependencyGraph } from '../resolution/types.js';
import type { GeneratedFile } from './types.js';

export function generatePackageInfo(graph: DependencyGraph, configId: string): GeneratedFile {
  const { root } = graph;
  const info = {
    name: root.name,
    version: root.version,
    package_type: root.recipe.packageType,
    config_id: configId,
    settings: Object.fromEntries(root.settings.snapshot()),
    options: Object.fromEntries(root.options.sortedValues().map(([name, value]) => [name, formatOptionValue(value)])),
    requires: root.dependencies.map(nodeRef).sort(compareNames),
    cpp_info: root.recipe.cppInfo
  };

  const content = yaml.dump(info, {
    indent: 2,
    noArrayIndent: true,
    sortKeys: false,
    quotingType: '"'
  });
  return { path: FILE_PATTERNS.RECIPE_INFO_YML, content };
}
