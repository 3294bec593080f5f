/**
 * Canonical text form of a resolved graph. Two graphs resolved from the same
 * input serialize to identical text.
 */

import { formatOptionValue } from '../model/option-set.js';
import { compareNames } from './graph-builder.js';
import type { DependencyGraph, PackageNode } from './types.js';

export function nodeRef(node: Pick<PackageNode, 'name' | 'version'>): string {
  return `${node.name}/${node.version}`;
}

function serializeNode(node: PackageNode, header: string, testDependencies: PackageNode[] = []): string[] {
  const settings = node.settings.snapshot().map(([axis, value]) => `${axis}=${value}`);
  const options = node.options.sortedValues().map(([name, value]) => `${name}=${formatOptionValue(value)}`);
  const requires = node.dependencies.map(nodeRef).sort(compareNames);
  const lines = [
    header,
    `  settings: ${settings.join(' ')}`,
    `  options: ${options.join(' ')}`,
    `  requires: ${requires.join(' ')}`
  ];
  if (node.kind === 'root') {
    lines.push(`  test_requires: ${testDependencies.map(nodeRef).sort(compareNames).join(' ')}`);
  }
  return lines.map(line => line.trimEnd());
}

export function serializeGraph(graph: DependencyGraph): string {
  const lines = serializeNode(graph.root, `root ${nodeRef(graph.root)}`, graph.testDependencies);
  const all = [...graph.nodes.values(), ...graph.testNodes.values()].sort((a, b) => compareNames(a.name, b.name));
  for (const node of all) {
    lines.push(...serializeNode(node, `${node.kind} ${nodeRef(node)}`));
  }
  return `${lines.join('\n')}\n`;
}
