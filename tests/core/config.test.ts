import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ConfigManager, parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeDir } from '../helpers/fixtures.js';

describe('parseConfig', () => {
  it('resolves the registry against the config folder', () => {
    const config = parseConfig({ registry: 'packages', jobs: 6 }, '/home/dev/.recipekit');
    assert.equal(config.registry, '/home/dev/.recipekit/packages');
    assert.equal(config.jobs, 6);
    assert.deepEqual(config.profiles, {});
  });

  it('expands a leading ~ in the registry path', () => {
    assert.equal(parseConfig({ registry: '~/.recipekit/registry' }, '/srv/config').registry, join(homedir(), '.recipekit', 'registry'));
    assert.equal(parseConfig({ registry: '~' }, '/srv/config').registry, homedir());
  });

  it('reads profiles with settings and options', () => {
    const config = parseConfig(
      {
        profiles: {
          debug: { description: 'debug build', settings: { build_type: 'Debug', 'compiler.version': 13 }, options: { shared: true } }
        }
      },
      '/tmp'
    );
    assert.deepEqual(config.profiles?.debug, {
      description: 'debug build',
      settings: { build_type: 'Debug', 'compiler.version': '13' },
      options: { shared: true }
    });
  });

  it('rejects malformed documents', () => {
    assert.throws(() => parseConfig([], '/tmp'), ConfigError);
    assert.throws(() => parseConfig({ jobs: 0 }, '/tmp'), /'jobs' must be a positive integer/);
    assert.throws(() => parseConfig({ jobs: 2.5 }, '/tmp'), ConfigError);
    assert.throws(() => parseConfig({ registry: 3 }, '/tmp'), ConfigError);
    assert.throws(() => parseConfig({ profiles: { ci: { settings: { os: ['Linux'] } } } }, '/tmp'), /profiles\.ci\.settings\.os/);
  });
});

describe('ConfigManager', () => {
  let home = '';

  beforeEach(async () => {
    home = await makeTempDir('config');
  });

  afterEach(async () => {
    await removeDir(home);
  });

  it('falls back to defaults without a config file', async () => {
    const manager = new ConfigManager({ RECIPEKIT_HOME: home });
    assert.equal(await manager.getRegistryRoot(), join(home, 'registry'));
    assert.equal(await manager.getJobs(), undefined);
  });

  it('reads config.jsonc with comments and trailing commas', async () => {
    await fs.writeFile(
      join(home, 'config.jsonc'),
      [
        '{',
        '  // shared registry',
        '  "registry": "shared",',
        '  "jobs": 4,',
        '  "profiles": { "debug": { "settings": { "build_type": "Debug" } }, },',
        '}'
      ].join('\n'),
      'utf8'
    );
    const manager = new ConfigManager({ RECIPEKIT_HOME: home });

    assert.equal(await manager.getRegistryRoot(), join(home, 'shared'));
    assert.equal(await manager.getRegistryRoot('/srv/registry'), '/srv/registry');
    assert.equal(await manager.getJobs(), 4);
    assert.deepEqual(await manager.getProfile('debug'), { settings: { build_type: 'Debug' } });
  });

  it('names the available profiles for an unknown one', async () => {
    await fs.writeFile(
      join(home, 'config.json'),
      JSON.stringify({ profiles: { release: {}, debug: {} } }),
      'utf8'
    );
    const manager = new ConfigManager({ RECIPEKIT_HOME: home });

    await assert.rejects(manager.getProfile('asan'), {
      name: 'RecipeKitError',
      message: "Unknown profile 'asan'. Available: debug, release"
    });
  });
});
