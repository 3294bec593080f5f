import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { renderGraphTree } from '../../../src/core/display/graph-tree.js';
import { resolveGraph } from '../../../src/core/resolution/graph-builder.js';
import { evaluateRecipe } from '../../../src/core/recipe/recipe-evaluator.js';
import { InMemoryRegistry, LINUX_GCC, recipe } from '../../helpers/fixtures.js';

describe('renderGraphTree', () => {
  it('expands shared dependencies once and tags test dependencies', async () => {
    const registry = new InMemoryRegistry()
      .add({ name: 'zlib', version: '1.3.0', options: { shared: [false, true] }, default_options: { shared: false } })
      .add({ name: 'png', version: '1.6.0', requires: ['zlib/[^1.3]'] })
      .add({ name: 'gtest', version: '1.14.0' });
    const { root } = evaluateRecipe(
      recipe({ name: 'app', version: '1.0.0', requires: ['png/1.6.0', 'zlib/1.3.0'], test_requires: ['gtest/1.14.0'] }),
      { hostSettings: LINUX_GCC }
    );

    const graph = await resolveGraph(root, { registry });

    assert.deepEqual(renderGraphTree(graph, { colors: false }), [
      'app/1.0.0',
      '├── png/1.6.0',
      '│   └── zlib/1.3.0 [shared=False]',
      '├── zlib/1.3.0 (*)',
      '└── gtest/1.14.0 (test)'
    ]);
  });
});
