import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { createExecutionContext } from '../../src/core/execution-context.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir } from '../helpers/fixtures.js';

describe('createExecutionContext', () => {
  let root = '';

  beforeEach(async () => {
    root = await makeTempDir('context');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('resolves the recipe and registry roots', async () => {
    const controller = new AbortController();
    const ctx = await createExecutionContext({
      path: root,
      registry: join(root, 'registry'),
      signal: controller.signal
    });

    assert.equal(ctx.recipeRoot, root);
    assert.equal(ctx.registryRoot, join(root, 'registry'));
    assert.equal(ctx.signal, controller.signal);
  });

  it('rejects a recipe path that is not a directory', async () => {
    const file = join(root, 'recipe.yml');
    await fs.writeFile(file, 'name: app\n', 'utf8');

    await assert.rejects(createExecutionContext({ path: file, registry: root }), ConfigError);
    await assert.rejects(createExecutionContext({ path: join(root, 'missing'), registry: root }), /is not accessible/);
  });
});
