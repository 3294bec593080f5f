/**
 * Translation of settings values into CMake toolchain vocabulary.
 * Values without a mapping raise UnsupportedSettingError.
 */

import { UnsupportedSettingError } from '../../utils/errors.js';

const TOOL = 'CMake';

export interface CompilerNames {
  c: string;
  cxx: string;
}

const COMPILERS: Record<string, CompilerNames> = {
  gcc: { c: 'gcc', cxx: 'g++' },
  clang: { c: 'clang', cxx: 'clang++' },
  'apple-clang': { c: 'clang', cxx: 'clang++' },
  msvc: { c: 'cl', cxx: 'cl' }
};

const SYSTEM_NAMES: Record<string, string> = {
  Windows: 'Windows',
  Linux: 'Linux',
  Macos: 'Darwin',
  FreeBSD: 'FreeBSD',
  Android: 'Android',
  iOS: 'iOS'
};

const MSVC_PLATFORMS: Record<string, string> = {
  x86: 'Win32',
  x86_64: 'x64',
  armv7: 'ARM',
  armv8: 'ARM64'
};

const GNU_ARCH_FLAGS: Record<string, string | null> = {
  x86: '-m32',
  x86_64: '-m64',
  ppc64le: '-m64',
  s390x: '-m64',
  armv7: null,
  armv8: null
};

const APPLE_ARCHITECTURES: Record<string, string> = {
  x86_64: 'x86_64',
  armv8: 'arm64'
};

export function compilerNames(compiler: string): CompilerNames {
  const names = COMPILERS[compiler];
  if (!names) {
    throw new UnsupportedSettingError('compiler', compiler, TOOL);
  }
  return names;
}

export function systemName(os: string): string {
  const name = SYSTEM_NAMES[os];
  if (!name) {
    throw new UnsupportedSettingError('os', os, TOOL);
  }
  return name;
}

export type ArchMapping =
  | { kind: 'flag'; flag: string | null }
  | { kind: 'generator-platform'; platform: string }
  | { kind: 'osx-architectures'; architectures: string };

export function archMapping(arch: string, compiler: string | undefined): ArchMapping {
  if (compiler === 'msvc') {
    const platform = MSVC_PLATFORMS[arch];
    if (!platform) throw new UnsupportedSettingError('arch', arch, `${TOOL} (msvc)`);
    return { kind: 'generator-platform', platform };
  }
  if (compiler === 'apple-clang') {
    const architectures = APPLE_ARCHITECTURES[arch];
    if (!architectures) throw new UnsupportedSettingError('arch', arch, `${TOOL} (apple-clang)`);
    return { kind: 'osx-architectures', architectures };
  }
  if (!(arch in GNU_ARCH_FLAGS)) {
    throw new UnsupportedSettingError('arch', arch, TOOL);
  }
  return { kind: 'flag', flag: GNU_ARCH_FLAGS[arch] ?? null };
}

export interface CxxStandard {
  standard: string;
  extensions: boolean;
}

export function cxxStandard(cppstd: string, compiler: string | undefined): CxxStandard {
  const extensions = cppstd.startsWith('gnu');
  const standard = extensions ? cppstd.slice(3) : cppstd;
  if (compiler === 'msvc' && (extensions || standard === '98' || standard === '11')) {
    throw new UnsupportedSettingError('compiler.cppstd', cppstd, `${TOOL} (msvc)`);
  }
  return { standard, extensions };
}

export interface LibcxxMapping {
  cxxFlags: string[];
  definitions: string[];
}

export function libcxxMapping(libcxx: string, compiler: string | undefined): LibcxxMapping {
  if (compiler === 'msvc') {
    throw new UnsupportedSettingError('compiler.libcxx', libcxx, `${TOOL} (msvc)`);
  }
  const clangFamily = compiler === 'clang' || compiler === 'apple-clang';
  switch (libcxx) {
    case 'libstdc++':
      return {
        cxxFlags: clangFamily ? ['-stdlib=libstdc++'] : [],
        definitions: ['_GLIBCXX_USE_CXX11_ABI=0']
      };
    case 'libstdc++11':
      return {
        cxxFlags: clangFamily ? ['-stdlib=libstdc++'] : [],
        definitions: ['_GLIBCXX_USE_CXX11_ABI=1']
      };
    case 'libc++':
      if (!clangFamily) {
        throw new UnsupportedSettingError('compiler.libcxx', libcxx, `${TOOL} (${compiler ?? 'default compiler'})`);
      }
      return { cxxFlags: ['-stdlib=libc++'], definitions: [] };
    default:
      throw new UnsupportedSettingError('compiler.libcxx', libcxx, TOOL);
  }
}

export function msvcRuntime(runtime: string, compiler: string | undefined): string {
  if (compiler !== 'msvc') {
    throw new UnsupportedSettingError('compiler.runtime', runtime, `${TOOL} (${compiler ?? 'default compiler'})`);
  }
  switch (runtime) {
    case 'static':
      return 'MultiThreaded$<$<CONFIG:Debug>:Debug>';
    case 'dynamic':
      return 'MultiThreaded$<$<CONFIG:Debug>:Debug>DLL';
    default:
      throw new UnsupportedSettingError('compiler.runtime', runtime, TOOL);
  }
}

/** Path in CMake syntax: forward slashes */
export function cmakePath(path: string): string {
  return path.replace(/\\/g, '/');
}

/** Quoted CMake string */
export function cmakeString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$/g, '\\$')}"`;
}

/** Upper-case identifier safe for CMake variable names */
export function cmakeIdentifier(value: string): string {
  return value.replace(/[^A-Za-z0-9_]/g, '_').toUpperCase();
}
