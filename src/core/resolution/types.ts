/**
 * Types for dependency graph resolution.
 */

import type { OptionValue, Recipe, RequirementKind } from '../../types/index.js';
import type { Settings } from '../model/settings.js';
import type { OptionSet } from '../model/option-set.js';
import type { DependencyRegistry, PackageArtifacts, RegistryEntry } from '../registry/registry.js';

/**
 * A resolved package. Every requirer of the same name holds the same node
 * instance, so the graph has at most one version per name.
 */
export interface PackageNode {
  name: string;
  version: string;
  kind: RequirementKind | 'root';
  recipe: Recipe;
  /** Frozen settings snapshot: root settings restricted to the consumed axes */
  settings: Settings;
  /** Frozen options after the config phases */
  options: OptionSet;
  /** Direct dependencies in declaration order */
  dependencies: PackageNode[];
  /** Packaged artifacts; null for the root being built */
  artifacts: PackageArtifacts | null;
}

export interface DependencyGraph {
  root: PackageNode;
  /** Regular dependencies by name (root excluded) */
  nodes: ReadonlyMap<string, PackageNode>;
  /** Direct test-only dependencies of the root */
  testDependencies: PackageNode[];
  /** Nodes introduced by the test-only sub-resolution */
  testNodes: ReadonlyMap<string, PackageNode>;
}

export interface VersionConstraint {
  range: string;
  requestedBy: string;
}

export interface OptionRequest {
  option: string;
  value: OptionValue;
  requestedBy: string;
}

/**
 * Outcome of version selection over one requirement set.
 */
export interface Selection {
  versions: Map<string, string>;
  entries: Map<string, RegistryEntry>;
  /** requester name → required names, declaration order, unique */
  edges: Map<string, string[]>;
  constraints: Map<string, VersionConstraint[]>;
  optionRequests: Map<string, OptionRequest[]>;
  /** Names in discovery order */
  order: string[];
}

export interface ResolveOptions {
  registry: DependencyRegistry;
  /** Option values set by the user for dependencies: package → option → value */
  dependencyOptions?: Record<string, Record<string, OptionValue>>;
  /** Upper bound on re-selection passes before giving up */
  maxIterations?: number;
}

