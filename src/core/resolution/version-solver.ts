/**
 * Version selection for the dependency graph.
 *
 * Breadth-first expansion by package name. Every constraint on a name is
 * collected and the pick is the highest published version satisfying all of
 * them. When a later constraint excludes a version already expanded, the
 * traversal reruns with the corrected picks until they stop changing, so the
 * transitive requirements always come from the picked versions.
 */

import type { Requirement } from '../../types/index.js';
import { VersionConflictError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { highestSatisfying, satisfies, type DependencyRegistry } from '../registry/registry.js';
import type { Selection, VersionConstraint } from './types.js';

const MAX_ITERATIONS_DEFAULT = 32;

export interface SolverOptions {
  registry: DependencyRegistry;
  /** Name of the package being built; reaching it again is a cycle */
  rootName: string;
  /**
   * Names already resolved elsewhere (the regular graph, seen from the
   * test-only pass). They are checked against new constraints but never
   * re-selected or expanded.
   */
  fixed?: ReadonlyMap<string, string>;
  maxIterations?: number;
}

function emptySelection(): Selection {
  return {
    versions: new Map(),
    entries: new Map(),
    edges: new Map(),
    constraints: new Map(),
    optionRequests: new Map(),
    order: []
  };
}

function pushTo<T>(map: Map<string, T[]>, key: string, value: T): T[] {
  const list = map.get(key) ?? [];
  list.push(value);
  map.set(key, list);
  return list;
}

function conflictFor(name: string, constraints: VersionConstraint[], availableVersions?: string[]): VersionConflictError {
  return new VersionConflictError(name, {
    ranges: constraints.map(c => c.range),
    requestedBy: constraints.map(c => c.requestedBy),
    availableVersions
  });
}

export class VersionSolver {
  private readonly versionCache = new Map<string, string[]>();
  private readonly fixed: ReadonlyMap<string, string>;
  private readonly maxIterations: number;

  constructor(private readonly options: SolverOptions) {
    this.fixed = options.fixed ?? new Map();
    this.maxIterations = options.maxIterations ?? MAX_ITERATIONS_DEFAULT;
  }

  /**
   * Select one version per name reachable from the given requirements.
   * Throws VersionConflictError when the constraints on a name have no
   * common published version in a pass that changed no pick. Constraints
   * seen in an unsettled pass may come from versions about to be replaced.
   */
  async solve(requirements: readonly Requirement[]): Promise<Selection> {
    let picks = new Map<string, string>();
    let lastChange: { name: string; constraints: VersionConstraint[]; versions: string[] } | null = null;

    for (let iteration = 0; iteration < this.maxIterations; iteration++) {
      const selection = await this.traverse(requirements, picks);
      const corrected = new Map<string, string>();
      const unsatisfied: string[] = [];
      let stable = true;

      for (const name of selection.order) {
        const constraints = selection.constraints.get(name) ?? [];
        const versions = await this.versionsOf(name);
        const best = highestSatisfying(versions, constraints.map(c => c.range));
        if (!best) {
          unsatisfied.push(name);
          continue;
        }
        corrected.set(name, best);
        if (best !== selection.versions.get(name)) {
          logger.debug(`Re-selecting ${name}: ${selection.versions.get(name)} -> ${best}`);
          stable = false;
          lastChange = { name, constraints, versions };
        }
      }

      if (stable) {
        const conflicting = unsatisfied[0];
        if (conflicting !== undefined) {
          throw conflictFor(conflicting, selection.constraints.get(conflicting) ?? [], await this.versionsOf(conflicting));
        }
        logger.debug(`Version selection converged after ${iteration + 1} pass(es)`, Object.fromEntries(selection.versions));
        return selection;
      }
      if (unsatisfied.length > 0) {
        logger.debug(`Deferring conflicts on ${unsatisfied.join(', ')} until the picks settle`);
      }
      picks = corrected;
    }

    logger.warn(`Version selection did not settle after ${this.maxIterations} passes`);
    if (lastChange) {
      throw conflictFor(lastChange.name, lastChange.constraints, lastChange.versions);
    }
    throw new VersionConflictError(this.options.rootName, { ranges: [], requestedBy: [] });
  }

  private async versionsOf(name: string): Promise<string[]> {
    const cached = this.versionCache.get(name);
    if (cached) {
      return cached;
    }
    const versions = await this.options.registry.listVersions(name);
    this.versionCache.set(name, versions);
    return versions;
  }

  private async traverse(requirements: readonly Requirement[], picks: ReadonlyMap<string, string>): Promise<Selection> {
    const selection = emptySelection();
    const queue = requirements.map(requirement => ({ requirement, requestedBy: this.options.rootName }));

    // Queue grows while iterating; index-based on purpose
    for (let i = 0; i < queue.length; i++) {
      const { requirement, requestedBy } = queue[i];
      const { name } = requirement;

      const edges = selection.edges.get(requestedBy) ?? [];
      if (!edges.includes(name)) {
        edges.push(name);
        selection.edges.set(requestedBy, edges);
      }
      const constraints = pushTo(selection.constraints, name, { range: requirement.constraint, requestedBy });
      for (const [option, value] of Object.entries(requirement.options ?? {})) {
        pushTo(selection.optionRequests, name, { option, value, requestedBy });
      }

      if (name === this.options.rootName) {
        // Cycle; reported by the graph builder with the full path
        selection.constraints.delete(name);
        continue;
      }

      const fixedVersion = this.fixed.get(name);
      if (fixedVersion !== undefined) {
        selection.constraints.delete(name);
        if (!satisfies(fixedVersion, requirement.constraint)) {
          throw conflictFor(name, [
            { range: fixedVersion, requestedBy: 'regular dependency graph' },
            { range: requirement.constraint, requestedBy }
          ]);
        }
        continue;
      }

      if (selection.versions.has(name)) {
        continue;
      }

      const versions = await this.versionsOf(name);
      const ranges = constraints.map(c => c.range);
      const preferred = picks.get(name);
      // Without a common version the highest published one stands in until
      // solve() knows whether the conflict survives re-selection.
      const version = preferred !== undefined && ranges.every(range => satisfies(preferred, range))
        ? preferred
        : highestSatisfying(versions, ranges) ?? highestSatisfying(versions, []);
      if (!version) {
        throw conflictFor(name, constraints, versions);
      }

      const entry = await this.options.registry.fetch(name, version);
      selection.versions.set(name, version);
      selection.entries.set(name, entry);
      selection.order.push(name);

      for (const dependency of entry.recipe.requires) {
        queue.push({ requirement: dependency, requestedBy: name });
      }
    }

    return selection;
  }
}
