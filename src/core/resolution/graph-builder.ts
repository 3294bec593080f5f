/**
 * Dependency graph builder.
 *
 * Runs version selection for the regular requirements, then a separate
 * selection for the root's test-only requirements that reuses regular nodes
 * but whose own nodes stay out of the regular graph. Settings are threaded
 * explicitly from the root snapshot into every node.
 */

import type { OptionValue, Recipe } from '../../types/index.js';
import { CycleDetectedError, InvalidValueError, OptionConflictError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { Settings } from '../model/settings.js';
import { OptionSet } from '../model/option-set.js';
import { configureOptions } from '../model/option-rules.js';
import { resolveArtifacts } from '../registry/registry.js';
import { VersionSolver } from './version-solver.js';
import type { DependencyGraph, OptionRequest, PackageNode, ResolveOptions, Selection } from './types.js';

/**
 * The package being built, already through its config phases.
 */
export interface ConfiguredRoot {
  recipe: Recipe;
  /** Frozen profile settings, before restriction to the root's axes */
  settings: Settings;
  /** Frozen, configured options of the root */
  options: OptionSet;
}

/**
 * Find a cycle reachable from `start`, returned as the closed path
 * (first and last element equal), or null.
 */
export function findCycle(start: string, edges: ReadonlyMap<string, readonly string[]>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    const current = state.get(name);
    if (current === 'visiting') {
      return [...path.slice(path.indexOf(name)), name];
    }
    if (current === 'done') {
      return null;
    }
    state.set(name, 'visiting');
    path.push(name);
    for (const next of edges.get(name) ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    path.pop();
    state.set(name, 'done');
    return null;
  };

  return visit(start);
}

function collectAssignments(
  name: string,
  recipe: Recipe,
  requests: readonly OptionRequest[],
  userValues: Record<string, OptionValue> | undefined
): Record<string, OptionValue> {
  const assignments: Record<string, OptionValue> = {};
  const byOption = new Map<string, OptionRequest[]>();
  for (const request of requests) {
    const list = byOption.get(request.option) ?? [];
    list.push(request);
    byOption.set(request.option, list);
  }

  for (const [option, optionRequests] of byOption) {
    const distinct = new Set(optionRequests.map(request => String(request.value)));
    if (distinct.size > 1) {
      throw new OptionConflictError(
        name,
        option,
        optionRequests.map(request => ({ value: request.value, requestedBy: request.requestedBy }))
      );
    }
    assignments[option] = optionRequests[0].value;
  }

  // User values win over requirer requests
  Object.assign(assignments, userValues ?? {});

  for (const option of Object.keys(assignments)) {
    if (!(option in recipe.options)) {
      throw new InvalidValueError(`option ${name}:${option} (undeclared)`, assignments[option]);
    }
  }
  return assignments;
}

export class GraphBuilder {
  private readonly options: ResolveOptions;

  constructor(options: ResolveOptions) {
    this.options = options;
  }

  async build(root: ConfiguredRoot): Promise<DependencyGraph> {
    const { recipe } = root;
    const rootNode: PackageNode = {
      name: recipe.name,
      version: recipe.version,
      kind: 'root',
      recipe,
      settings: root.settings.restrict(recipe.settings, recipe.settingsOverrides),
      options: root.options,
      dependencies: [],
      artifacts: null
    };

    // Regular graph
    const regular = await new VersionSolver({
      registry: this.options.registry,
      rootName: recipe.name,
      maxIterations: this.options.maxIterations
    }).solve(recipe.requires);
    this.assertAcyclic(recipe.name, regular);

    const nodes = new Map<string, PackageNode>();
    this.materialize(regular, 'regular', root.settings, nodes, new Map([[recipe.name, rootNode]]));
    rootNode.dependencies = this.dependenciesOf(recipe.name, regular, nodes);

    // Test-only graph: sees regular versions, contributes nothing back
    const fixed = new Map<string, string>();
    for (const [name, node] of nodes) {
      fixed.set(name, node.version);
    }
    const testSelection = await new VersionSolver({
      registry: this.options.registry,
      rootName: recipe.name,
      fixed,
      maxIterations: this.options.maxIterations
    }).solve(recipe.testRequires);
    this.assertAcyclic(recipe.name, testSelection);
    this.assertSharedOptions(testSelection, nodes);

    const testNodes = new Map<string, PackageNode>();
    const visible = new Map<string, PackageNode>([[recipe.name, rootNode], ...nodes]);
    this.materialize(testSelection, 'test', root.settings, testNodes, visible);
    const testDependencies = this.dependenciesOf(recipe.name, testSelection, new Map([...nodes, ...testNodes]));

    logger.debug(`Resolved ${nodes.size} regular and ${testNodes.size} test-only package(s) for ${recipe.name}`);
    return { root: rootNode, nodes, testDependencies, testNodes };
  }

  private assertAcyclic(rootName: string, selection: Selection): void {
    const cycle = findCycle(rootName, selection.edges);
    if (cycle) {
      throw new CycleDetectedError(cycle);
    }
  }

  /**
   * Test requirements may ask for options on a package the regular graph
   * already configured; those must agree with the frozen values.
   */
  private assertSharedOptions(selection: Selection, regularNodes: ReadonlyMap<string, PackageNode>): void {
    for (const [name, requests] of selection.optionRequests) {
      const node = regularNodes.get(name);
      if (!node) continue;
      for (const request of requests) {
        const current = node.options.get(request.option);
        if (current === undefined || String(current) !== String(request.value)) {
          throw new OptionConflictError(name, request.option, [
            { value: current ?? '(removed)', requestedBy: 'regular dependency graph' },
            { value: request.value, requestedBy: request.requestedBy }
          ]);
        }
      }
    }
  }

  /**
   * Create the nodes of a selection, dependencies first, so that every
   * requirer links the same node instance.
   */
  private materialize(
    selection: Selection,
    kind: 'regular' | 'test',
    profileSettings: Settings,
    into: Map<string, PackageNode>,
    visible: ReadonlyMap<string, PackageNode>
  ): void {
    const create = (name: string): PackageNode => {
      const existing = into.get(name) ?? visible.get(name);
      if (existing) return existing;

      const entry = selection.entries.get(name);
      const version = selection.versions.get(name);
      if (!entry || version === undefined) {
        throw new InvalidValueError(`package ${name}`, 'not selected');
      }

      const dependencies = (selection.edges.get(name) ?? []).map(create);
      const settings = profileSettings.restrict(entry.recipe.settings, entry.recipe.settingsOverrides);
      const options = configureOptions(
        OptionSet.fromDeclarations(name, entry.recipe.options),
        settings,
        entry.recipe.rules,
        collectAssignments(name, entry.recipe, selection.optionRequests.get(name) ?? [], this.options.dependencyOptions?.[name])
      );

      const node: PackageNode = {
        name,
        version,
        kind,
        recipe: entry.recipe,
        settings,
        options,
        dependencies,
        artifacts: resolveArtifacts(entry)
      };
      into.set(name, node);
      return node;
    };

    for (const name of selection.order) {
      create(name);
    }
  }

  private dependenciesOf(name: string, selection: Selection, nodes: ReadonlyMap<string, PackageNode>): PackageNode[] {
    return (selection.edges.get(name) ?? []).map(dependency => {
      const node = nodes.get(dependency);
      if (!node) {
        throw new InvalidValueError(`package ${dependency}`, 'not resolved');
      }
      return node;
    });
  }
}

/**
 * Resolve the dependency graph of a configured root package.
 */
export async function resolveGraph(root: ConfiguredRoot, options: ResolveOptions): Promise<DependencyGraph> {
  return new GraphBuilder(options).build(root);
}

export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
