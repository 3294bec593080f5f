import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { LocalRegistry } from '../../../src/core/registry/local-registry.js';
import { highestSatisfying, resolve } from '../../../src/core/registry/registry.js';
import { parseRecipeYmlContent } from '../../../src/core/recipe/recipe-yml.js';
import { DependencyUnavailableError, InvalidRecipeError } from '../../../src/utils/errors.js';
import { makeTempDir, removeDir } from '../../helpers/fixtures.js';

function zlibRecipe(version: string): string {
  return `name: zlib\nversion: ${version}\ncpp_info:\n  libs: [z]\n`;
}

describe('LocalRegistry', () => {
  let root = '';
  let registry: LocalRegistry;

  beforeEach(async () => {
    root = await makeTempDir('registry');
    registry = new LocalRegistry(join(root, 'registry'));
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('publishes a recipe with its package folder', async () => {
    const packageFolder = join(root, 'package');
    await fs.mkdir(join(packageFolder, 'include'), { recursive: true });
    await fs.writeFile(join(packageFolder, 'include', 'zlib.h'), '// zlib\n', 'utf8');
    await fs.writeFile(join(packageFolder, '.DS_Store'), '', 'utf8');

    const content = zlibRecipe('1.3.0');
    const entryDir = await registry.publish(parseRecipeYmlContent(content), content, packageFolder);

    assert.equal(entryDir, join(root, 'registry', 'zlib', '1.3.0'));
    assert.equal(await fs.readFile(join(entryDir, 'recipe.yml'), 'utf8'), content);
    assert.equal(await fs.readFile(join(entryDir, 'package', 'include', 'zlib.h'), 'utf8'), '// zlib\n');
    await assert.rejects(fs.access(join(entryDir, 'package', '.DS_Store')));
  });

  it('lists semver versions in ascending order', async () => {
    for (const version of ['1.3.0', '1.2.13', '1.10.0']) {
      const content = zlibRecipe(version);
      await registry.publish(parseRecipeYmlContent(content), content, null);
    }
    await fs.mkdir(join(root, 'registry', 'zlib', 'latest'), { recursive: true });

    assert.deepEqual(await registry.listVersions('zlib'), ['1.2.13', '1.3.0', '1.10.0']);
  });

  it('fetches a published entry', async () => {
    const content = zlibRecipe('1.3.0');
    await registry.publish(parseRecipeYmlContent(content), content, null);

    const entry = await registry.fetch('zlib', '1.3.0');
    assert.equal(entry.recipe.name, 'zlib');
    assert.deepEqual(entry.recipe.cppInfo.libs, ['z']);
    assert.equal(entry.packageFolder, join(root, 'registry', 'zlib', '1.3.0', 'package'));
  });

  it('reports unknown packages and broken entries as unavailable', async () => {
    await assert.rejects(registry.listVersions('openssl'), DependencyUnavailableError);
    await assert.rejects(registry.fetch('zlib', '9.9.9'), DependencyUnavailableError);

    const broken = join(root, 'registry', 'png', '1.6.0');
    await fs.mkdir(broken, { recursive: true });
    await fs.writeFile(join(broken, 'recipe.yml'), 'name: png\n', 'utf8');
    await assert.rejects(registry.fetch('png', '1.6.0'), DependencyUnavailableError);
  });

  it('rejects an entry whose recipe names another package', async () => {
    const entry = join(root, 'registry', 'png', '1.6.0');
    await fs.mkdir(entry, { recursive: true });
    await fs.writeFile(join(entry, 'recipe.yml'), zlibRecipe('1.6.0'), 'utf8');
    await assert.rejects(registry.fetch('png', '1.6.0'), InvalidRecipeError);
  });

  it('resolves a constraint to the highest matching version with absolute artifacts', async () => {
    for (const version of ['1.2.13', '1.3.0', '2.0.0']) {
      const content = zlibRecipe(version);
      await registry.publish(parseRecipeYmlContent(content), content, null);
    }

    const resolution = await resolve(registry, 'zlib', '^1.2');
    assert.ok(resolution);
    assert.equal(resolution.version, '1.3.0');
    assert.deepEqual(resolution.artifacts.includeDirs, [join(root, 'registry', 'zlib', '1.3.0', 'package', 'include')]);
    assert.equal(await resolve(registry, 'zlib', '>=3'), null);
  });
});

describe('highestSatisfying', () => {
  it('skips prereleases unless a range names them', () => {
    assert.equal(highestSatisfying(['1.0.0', '1.1.0-beta'], ['>=1.0.0']), '1.0.0');
    assert.equal(highestSatisfying(['1.0.0-dev'], ['1.0.0-dev']), '1.0.0-dev');
    assert.equal(highestSatisfying(['1.0.0'], ['>=1.0.0', '<1.0.0']), null);
  });
});
