/**
 * Tree rendering of a resolved graph for the `graph` command.
 */

import pico from 'picocolors';
import { formatOptionValue } from '../model/option-set.js';
import { nodeRef } from '../resolution/graph-serializer.js';
import type { DependencyGraph, PackageNode } from '../resolution/types.js';

export interface TreeOptions {
  colors?: boolean;
}

function describeOptions(node: PackageNode): string {
  const values = node.options.sortedValues().map(([name, value]) => `${name}=${formatOptionValue(value)}`);
  return values.length > 0 ? ` [${values.join(', ')}]` : '';
}

/**
 * Render the graph as tree lines. Shared dependencies are expanded once and
 * referenced with `(*)` afterwards.
 */
export function renderGraphTree(graph: DependencyGraph, treeOptions: TreeOptions = {}): string[] {
  const colors = pico.createColors(treeOptions.colors ?? pico.isColorSupported);
  const lines: string[] = [`${colors.bold(nodeRef(graph.root))}${colors.dim(describeOptions(graph.root))}`];
  const expanded = new Set<string>();

  const walk = (children: ReadonlyArray<{ node: PackageNode; label?: string }>, prefix: string): void => {
    children.forEach(({ node, label }, index) => {
      const last = index === children.length - 1;
      const branch = last ? '└── ' : '├── ';
      const tag = label ? colors.yellow(` (${label})`) : '';
      if (expanded.has(node.name)) {
        lines.push(`${prefix}${branch}${nodeRef(node)}${tag}${colors.dim(' (*)')}`);
        return;
      }
      expanded.add(node.name);
      lines.push(`${prefix}${branch}${colors.cyan(nodeRef(node))}${tag}${colors.dim(describeOptions(node))}`);
      walk(node.dependencies.map(dependency => ({ node: dependency })), `${prefix}${last ? '    ' : '│   '}`);
    });
  };

  walk([
    ...graph.root.dependencies.map(node => ({ node })),
    ...graph.testDependencies.map(node => ({ node, label: 'test' }))
  ], '');
  return lines;
}
