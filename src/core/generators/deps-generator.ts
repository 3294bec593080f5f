/**
 * CMake dependency-location descriptors.
 *
 * Per dependency:
 *   <name>-config.cmake               imported target <name>::<name>
 *   <name>-<build_type>-data.cmake     paths and flags for one build type
 * Aggregates:
 *   recipekit_deps.cmake              regular dependencies of the root
 *   recipekit_test_deps.cmake         test-only dependencies of the root
 */

import { FILE_PATTERNS } from '../../constants/index.js';
import { compareNames } from '../resolution/graph-builder.js';
import type { DependencyGraph, PackageNode } from '../resolution/types.js';
import { cmakeIdentifier, cmakePath, cmakeString } from './cmake-vocabulary.js';
import type { GeneratedFile } from './types.js';

function cmakeList(values: readonly string[]): string {
  return values.map(cmakeString).join(' ');
}

export function dataFileName(node: PackageNode, buildType: string): string {
  return `${node.name}-${buildType.toLowerCase()}-data.cmake`;
}

export function configFileName(node: PackageNode): string {
  return `${node.name}-config.cmake`;
}

function sortedDependencies(node: PackageNode): PackageNode[] {
  return [...node.dependencies].sort((a, b) => compareNames(a.name, b.name));
}

export function generateConfigFile(node: PackageNode, buildType: string): GeneratedFile {
  const target = `${node.name}::${node.name}`;
  const prefix = cmakeIdentifier(node.name);
  const lines = [
    `# ${node.name}/${node.version} (${node.kind})`,
    'include_guard(GLOBAL)',
    'include(CMakeFindDependencyMacro)'
  ];
  for (const dependency of sortedDependencies(node)) {
    lines.push(`find_dependency(${dependency.name} CONFIG)`);
  }
  lines.push(
    '',
    `set(${node.name}_VERSION ${cmakeString(node.version)})`,
    `set(${prefix}_FOUND TRUE)`,
    `if(NOT TARGET ${target})`,
    `  add_library(${target} INTERFACE IMPORTED)`,
    'endif()',
    `include("\${CMAKE_CURRENT_LIST_DIR}/${dataFileName(node, buildType)}")`
  );
  return { path: configFileName(node), content: `${lines.join('\n')}\n` };
}

export function generateDataFile(node: PackageNode, buildType: string): GeneratedFile {
  const target = `${node.name}::${node.name}`;
  const prefix = cmakeIdentifier(node.name);
  const suffix = cmakeIdentifier(buildType);
  const config = `$<$<CONFIG:${buildType}>:`;
  const artifacts = node.artifacts;
  const includeDirs = (artifacts?.includeDirs ?? []).map(cmakePath);
  const libDirs = (artifacts?.libDirs ?? []).map(cmakePath);
  const libs = artifacts?.libs ?? [];
  const systemLibs = artifacts?.systemLibs ?? [];
  const defines = artifacts?.defines ?? [];

  const lines = [
    `# ${node.name}/${node.version} ${buildType}`,
    `set(${prefix}_PACKAGE_FOLDER_${suffix} ${cmakeString(cmakePath(artifacts?.rootFolder ?? ''))})`,
    `set(${prefix}_INCLUDE_DIRS_${suffix} ${cmakeList(includeDirs)})`,
    `set(${prefix}_LIB_DIRS_${suffix} ${cmakeList(libDirs)})`,
    `set(${prefix}_LIBS_${suffix} ${cmakeList(libs)})`,
    `set(${prefix}_SYSTEM_LIBS_${suffix} ${cmakeList(systemLibs)})`,
    `set(${prefix}_DEFINITIONS_${suffix} ${cmakeList(defines)})`,
    ''
  ];

  for (const lib of libs) {
    const variable = `${prefix}_LIB_${cmakeIdentifier(lib)}_${suffix}`;
    lines.push(
      `find_library(${variable} NAMES ${cmakeString(lib)} PATHS \${${prefix}_LIB_DIRS_${suffix}} NO_DEFAULT_PATH NO_CMAKE_FIND_ROOT_PATH)`,
      `set_property(TARGET ${node.name}::${node.name} APPEND PROPERTY INTERFACE_LINK_LIBRARIES "${config}\${${variable}}>")`
    );
  }
  for (const dependency of sortedDependencies(node)) {
    lines.push(`set_property(TARGET ${target} APPEND PROPERTY INTERFACE_LINK_LIBRARIES ${dependency.name}::${dependency.name})`);
  }
  lines.push(
    `set_property(TARGET ${target} APPEND PROPERTY INTERFACE_LINK_LIBRARIES "${config}\${${prefix}_SYSTEM_LIBS_${suffix}}>")`,
    `set_property(TARGET ${target} APPEND PROPERTY INTERFACE_INCLUDE_DIRECTORIES "${config}\${${prefix}_INCLUDE_DIRS_${suffix}}>")`,
    `set_property(TARGET ${target} APPEND PROPERTY INTERFACE_COMPILE_DEFINITIONS "${config}\${${prefix}_DEFINITIONS_${suffix}}>")`
  );

  return { path: dataFileName(node, buildType), content: `${lines.join('\n')}\n` };
}

function generateAggregate(path: string, title: string, nodes: readonly PackageNode[]): GeneratedFile {
  const lines = [`# ${title}`];
  for (const node of [...nodes].sort((a, b) => compareNames(a.name, b.name))) {
    lines.push(`find_package(${node.name} CONFIG REQUIRED)`);
  }
  return { path, content: `${lines.join('\n')}\n` };
}

/**
 * All dependency descriptors of a graph for one build type.
 */
export function generateDependencyDescriptors(graph: DependencyGraph, buildType: string): GeneratedFile[] {
  const files: GeneratedFile[] = [];
  for (const node of [...graph.nodes.values(), ...graph.testNodes.values()]) {
    files.push(generateConfigFile(node, buildType), generateDataFile(node, buildType));
  }

  const rootRef = `${graph.root.name}/${graph.root.version}`;
  files.push(generateAggregate(FILE_PATTERNS.DEPS_AGGREGATE, `Dependencies of ${rootRef}`, graph.root.dependencies));
  files.push(generateAggregate(FILE_PATTERNS.TEST_DEPS_AGGREGATE, `Test dependencies of ${rootRef}`, graph.testDependencies));
  return files;
}
