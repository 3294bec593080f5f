/**
 * CMake toolchain file for the root package's settings and options.
 */

import { FILE_PATTERNS } from '../../constants/index.js';
import { formatOptionValue } from '../model/option-set.js';
import type { PackageNode } from '../resolution/types.js';
import {
  archMapping,
  cmakeIdentifier,
  cmakeString,
  compilerNames,
  cxxStandard,
  libcxxMapping,
  msvcRuntime,
  systemName
} from './cmake-vocabulary.js';
import type { GeneratedFile } from './types.js';

function onOff(value: boolean): string {
  return value ? 'ON' : 'OFF';
}

export function generateToolchain(root: PackageNode): GeneratedFile {
  const settings = root.settings;
  const compiler = settings.get('compiler');
  const lines: string[] = [
    `# Toolchain for ${root.name}/${root.version}`,
    'include_guard()',
    ''
  ];

  // Every setting, so CMakeLists can branch on them
  for (const [axis, value] of settings.snapshot()) {
    lines.push(`set(RECIPEKIT_SETTING_${cmakeIdentifier(axis)} ${cmakeString(value)})`);
  }

  const os = settings.get('os');
  if (os !== undefined) {
    lines.push(`set(RECIPEKIT_SYSTEM_NAME ${cmakeString(systemName(os))})`);
  }

  const cFlags: string[] = [];
  const cxxFlags: string[] = [];
  const linkerFlags: string[] = [];
  const definitions: string[] = [];

  if (compiler !== undefined) {
    const names = compilerNames(compiler);
    lines.push(`set(CMAKE_C_COMPILER ${cmakeString(names.c)})`);
    lines.push(`set(CMAKE_CXX_COMPILER ${cmakeString(names.cxx)})`);
  }

  const arch = settings.get('arch');
  if (arch !== undefined) {
    const mapping = archMapping(arch, compiler);
    switch (mapping.kind) {
      case 'generator-platform':
        lines.push(`set(CMAKE_GENERATOR_PLATFORM ${cmakeString(mapping.platform)} CACHE STRING "" FORCE)`);
        break;
      case 'osx-architectures':
        lines.push(`set(CMAKE_OSX_ARCHITECTURES ${cmakeString(mapping.architectures)} CACHE STRING "" FORCE)`);
        break;
      case 'flag':
        if (mapping.flag) {
          cFlags.push(mapping.flag);
          cxxFlags.push(mapping.flag);
          linkerFlags.push(mapping.flag);
        }
        break;
    }
  }

  const cppstd = settings.get('compiler.cppstd');
  if (cppstd !== undefined) {
    const std = cxxStandard(cppstd, compiler);
    lines.push(`set(CMAKE_CXX_STANDARD ${std.standard})`);
    lines.push(`set(CMAKE_CXX_EXTENSIONS ${onOff(std.extensions)})`);
    lines.push('set(CMAKE_CXX_STANDARD_REQUIRED ON)');
  }

  const libcxx = settings.get('compiler.libcxx');
  if (libcxx !== undefined) {
    const mapping = libcxxMapping(libcxx, compiler);
    cxxFlags.push(...mapping.cxxFlags);
    definitions.push(...mapping.definitions);
  }

  const runtime = settings.get('compiler.runtime');
  if (runtime !== undefined) {
    lines.push(`set(CMAKE_MSVC_RUNTIME_LIBRARY "${msvcRuntime(runtime, compiler)}")`);
  }

  for (const flag of cFlags) {
    lines.push(`string(APPEND CMAKE_C_FLAGS_INIT " ${flag}")`);
  }
  for (const flag of cxxFlags) {
    lines.push(`string(APPEND CMAKE_CXX_FLAGS_INIT " ${flag}")`);
  }
  for (const flag of linkerFlags) {
    lines.push(`string(APPEND CMAKE_EXE_LINKER_FLAGS_INIT " ${flag}")`);
    lines.push(`string(APPEND CMAKE_SHARED_LINKER_FLAGS_INIT " ${flag}")`);
  }
  if (definitions.length > 0) {
    lines.push(`add_compile_definitions(${definitions.join(' ')})`);
  }

  const options = root.options;
  const shared = options.get('shared');
  if (typeof shared === 'boolean') {
    lines.push(`set(BUILD_SHARED_LIBS ${onOff(shared)} CACHE BOOL "" FORCE)`);
  }
  const fPIC = options.get('fPIC');
  if (typeof fPIC === 'boolean') {
    lines.push(`set(CMAKE_POSITION_INDEPENDENT_CODE ${onOff(fPIC)} CACHE BOOL "" FORCE)`);
  }
  for (const [name, value] of options.sortedValues()) {
    lines.push(`set(RECIPEKIT_OPTION_${cmakeIdentifier(name)} ${cmakeString(formatOptionValue(value))})`);
  }

  lines.push('');
  lines.push('list(PREPEND CMAKE_PREFIX_PATH "${CMAKE_CURRENT_LIST_DIR}")');
  lines.push('list(PREPEND CMAKE_MODULE_PATH "${CMAKE_CURRENT_LIST_DIR}")');
  lines.push('set(CMAKE_FIND_PACKAGE_PREFER_CONFIG ON)');

  return { path: FILE_PATTERNS.TOOLCHAIN, content: `${lines.join('\n')}\n` };
}
