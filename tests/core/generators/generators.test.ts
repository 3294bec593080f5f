import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { generateDescriptors, generatePackageInfo, writeDescriptors } from '../../../src/core/generators/index.js';
import { resolveGraph } from '../../../src/core/resolution/graph-builder.js';
import { evaluateRecipe } from '../../../src/core/recipe/recipe-evaluator.js';
import type { DependencyGraph } from '../../../src/core/resolution/types.js';
import { UnsupportedSettingError } from '../../../src/utils/errors.js';
import { InMemoryRegistry, LINUX_GCC, makeTempDir, recipe, removeDir } from '../../helpers/fixtures.js';

const WINDOWS_MSVC: Record<string, string> = {
  os: 'Windows',
  arch: 'x86_64',
  compiler: 'msvc',
  'compiler.version': '193',
  'compiler.cppstd': '17',
  'compiler.runtime': 'dynamic',
  build_type: 'Release'
};

const registry = new InMemoryRegistry()
  .add({ name: 'zlib', version: '1.3.0', settings: ['os', 'build_type'], cpp_info: { libs: ['z'] } })
  .add({ name: 'gtest', version: '1.14.0', requires: ['zlib/[>=1.2]'], cpp_info: { libs: ['gtest', 'gtest_main'] } });

const libraryDocument = {
  name: 'app',
  version: '1.0.0',
  settings: ['os', 'arch', 'compiler', 'build_type'],
  options: { shared: [false, true], fPIC: [true, false] },
  rules: [{ when: { setting: 'os', equals: 'Windows' }, remove: ['fPIC'] }],
  requires: ['zlib/1.3.0'],
  test_requires: ['gtest/1.14.0']
};

async function graphFor(
  settings: Record<string, string>,
  document: Record<string, unknown> = libraryDocument
): Promise<DependencyGraph> {
  const { root } = evaluateRecipe(recipe(document), { hostSettings: settings });
  return resolveGraph(root, { registry });
}

function contentOf(graph: DependencyGraph, path: string): string {
  const file = generateDescriptors(graph).find(candidate => candidate.path === path);
  assert.ok(file, `${path} not generated`);
  return file.content;
}

describe('toolchain generator', () => {
  it('translates gcc settings into toolchain variables and flags', async () => {
    const lines = contentOf(await graphFor(LINUX_GCC), 'recipekit_toolchain.cmake').split('\n');
    const expected = [
      'set(RECIPEKIT_SETTING_OS "Linux")',
      'set(RECIPEKIT_SETTING_COMPILER_CPPSTD "17")',
      'set(RECIPEKIT_SYSTEM_NAME "Linux")',
      'set(CMAKE_C_COMPILER "gcc")',
      'set(CMAKE_CXX_COMPILER "g++")',
      'set(CMAKE_CXX_STANDARD 17)',
      'set(CMAKE_CXX_EXTENSIONS OFF)',
      'string(APPEND CMAKE_CXX_FLAGS_INIT " -m64")',
      'add_compile_definitions(_GLIBCXX_USE_CXX11_ABI=1)',
      'set(BUILD_SHARED_LIBS OFF CACHE BOOL "" FORCE)',
      'set(CMAKE_POSITION_INDEPENDENT_CODE ON CACHE BOOL "" FORCE)',
      'set(RECIPEKIT_OPTION_FPIC "True")',
      'set(RECIPEKIT_OPTION_SHARED "False")'
    ];
    for (const line of expected) {
      assert.ok(lines.includes(line), `missing: ${line}`);
    }
  });

  it('uses the generator platform and runtime library for msvc', async () => {
    const lines = contentOf(await graphFor(WINDOWS_MSVC), 'recipekit_toolchain.cmake').split('\n');
    assert.ok(lines.includes('set(CMAKE_GENERATOR_PLATFORM "x64" CACHE STRING "" FORCE)'));
    assert.ok(lines.includes('set(CMAKE_MSVC_RUNTIME_LIBRARY "MultiThreaded$<$<CONFIG:Debug>:Debug>DLL")'));
    assert.ok(lines.includes('set(CMAKE_C_COMPILER "cl")'));
    assert.equal(lines.some(line => line.startsWith('set(CMAKE_POSITION_INDEPENDENT_CODE')), false);
  });

  it('rejects settings without a CMake mapping', async () => {
    const emscripten = await graphFor({ ...LINUX_GCC, os: 'Emscripten', arch: 'wasm', compiler: 'clang' });
    assert.throws(() => generateDescriptors(emscripten), UnsupportedSettingError);

    const gccLibcxx = await graphFor({ ...LINUX_GCC, 'compiler.libcxx': 'libc++' });
    assert.throws(() => generateDescriptors(gccLibcxx), UnsupportedSettingError);

    const intel = await graphFor({ ...LINUX_GCC, compiler: 'intel-cc' });
    assert.throws(() => generateDescriptors(intel), UnsupportedSettingError);
  });
});

describe('dependency descriptors', () => {
  it('writes config and data files per dependency, sorted by path', async () => {
    const files = generateDescriptors(await graphFor(LINUX_GCC));
    assert.deepEqual(files.map(file => file.path), [
      'gtest-config.cmake',
      'gtest-release-data.cmake',
      'recipekit_deps.cmake',
      'recipekit_test_deps.cmake',
      'recipekit_toolchain.cmake',
      'zlib-config.cmake',
      'zlib-release-data.cmake'
    ]);
  });

  it('points data files at the package folder of the dependency', async () => {
    const graph = await graphFor(LINUX_GCC);
    const data = contentOf(graph, 'zlib-release-data.cmake').split('\n');
    assert.ok(data.includes('set(ZLIB_PACKAGE_FOLDER_RELEASE "/registry/zlib/1.3.0/package")'));
    assert.ok(data.includes('set(ZLIB_INCLUDE_DIRS_RELEASE "/registry/zlib/1.3.0/package/include")'));
    assert.ok(data.includes('set(ZLIB_LIB_DIRS_RELEASE "/registry/zlib/1.3.0/package/lib")'));
    assert.ok(data.includes('set(ZLIB_LIBS_RELEASE "z")'));

    const gtestData = contentOf(graph, 'gtest-release-data.cmake').split('\n');
    assert.ok(gtestData.includes('set_property(TARGET gtest::gtest APPEND PROPERTY INTERFACE_LINK_LIBRARIES zlib::zlib)'));

    const config = contentOf(graph, 'gtest-config.cmake').split('\n');
    assert.ok(config.includes('find_dependency(zlib CONFIG)'));
    assert.ok(config.includes('  add_library(gtest::gtest INTERFACE IMPORTED)'));
  });

  it('keeps test-only packages out of the regular aggregate (scenario D)', async () => {
    const graph = await graphFor(LINUX_GCC);
    assert.equal(contentOf(graph, 'recipekit_deps.cmake'), '# Dependencies of app/1.0.0\nfind_package(zlib CONFIG REQUIRED)\n');
    assert.equal(
      contentOf(graph, 'recipekit_test_deps.cmake'),
      '# Test dependencies of app/1.0.0\nfind_package(gtest CONFIG REQUIRED)\n'
    );
  });

  it('includes only its own data file when one name prefixes another', async () => {
    const prefixed = new InMemoryRegistry()
      .add({ name: 'zlib', version: '1.3.0' })
      .add({ name: 'zlib-ng', version: '2.2.0' });
    const { root } = evaluateRecipe(
      recipe({ name: 'app', version: '1.0.0', requires: ['zlib/1.3.0', 'zlib-ng/2.2.0'] }),
      { hostSettings: LINUX_GCC }
    );
    const graph = await resolveGraph(root, { registry: prefixed });

    const includes = (path: string): string[] =>
      contentOf(graph, path).split('\n').filter(line => line.startsWith('include("'));
    assert.deepEqual(includes('zlib-config.cmake'), ['include("${CMAKE_CURRENT_LIST_DIR}/zlib-release-data.cmake")']);
    assert.deepEqual(includes('zlib-ng-config.cmake'), ['include("${CMAKE_CURRENT_LIST_DIR}/zlib-ng-release-data.cmake")']);
  });

  it('generates byte-identical files for identical input', async () => {
    const first = generateDescriptors(await graphFor(LINUX_GCC));
    const second = generateDescriptors(await graphFor(LINUX_GCC));
    assert.deepEqual(first, second);
  });
});

describe('package info', () => {
  it('lists regular requirements only (scenario D)', async () => {
    const graph = await graphFor(LINUX_GCC, { ...libraryDocument, settings: ['os', 'build_type'], options: undefined, rules: undefined });
    const info = generatePackageInfo(graph, 'abc123def456');
    assert.equal(info.path, 'recipeinfo.yml');
    assert.deepEqual(yaml.load(info.content), {
      name: 'app',
      version: '1.0.0',
      package_type: 'library',
      config_id: 'abc123def456',
      settings: { os: 'Linux', build_type: 'Release' },
      options: {},
      requires: ['zlib/1.3.0'],
      cpp_info: {
        includedirs: ['include'],
        libdirs: ['lib'],
        bindirs: ['bin'],
        libs: [],
        system_libs: [],
        defines: []
      }
    });
  });
});

describe('writeDescriptors', () => {
  let dir = '';

  after(async () => {
    if (dir) await removeDir(dir);
  });

  it('leaves unchanged files alone on a second write', async () => {
    dir = await makeTempDir('generators');
    const files = generateDescriptors(await graphFor(LINUX_GCC));

    const first = await writeDescriptors(files, dir);
    assert.equal(first.written.length, files.length);
    assert.deepEqual(first.unchanged, []);

    const second = await writeDescriptors(files, dir);
    assert.deepEqual(second.written, []);
    assert.deepEqual(second.removed, []);
    assert.equal(second.unchanged.length, files.length);
  });

  it('removes descriptors of dependencies that left the graph', async () => {
    const before = generateDescriptors(await graphFor(LINUX_GCC));
    const reduced = generateDescriptors(
      await graphFor(LINUX_GCC, { ...libraryDocument, test_requires: undefined })
    );
    const staleDir = await makeTempDir('generators-stale');
    try {
      await writeDescriptors(before, staleDir);
      const summary = await writeDescriptors(reduced, staleDir);

      assert.deepEqual(summary.removed, ['gtest-config.cmake', 'gtest-release-data.cmake']);
      assert.deepEqual((await fs.readdir(staleDir)).sort(), reduced.map(file => file.path));
    } finally {
      await removeDir(staleDir);
    }
  });
});
