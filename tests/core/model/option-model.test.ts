import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Settings } from '../../../src/core/model/settings.js';
import { OptionSet, coerceOptionValue, formatOptionValue } from '../../../src/core/model/option-set.js';
import { applyRulePhase, configureOptions } from '../../../src/core/model/option-rules.js';
import { detectHostSettings, mergeSettingsValues } from '../../../src/core/model/host-settings.js';
import { evaluateRecipe } from '../../../src/core/recipe/recipe-evaluator.js';
import { InvalidValueError } from '../../../src/utils/errors.js';
import type { OptionRule } from '../../../src/types/index.js';
import { LINUX_GCC, recipe } from '../../helpers/fixtures.js';

const libraryDocument = {
  name: 'chesscore',
  version: '1.0.0-dev',
  settings: ['os', 'arch', 'compiler', 'build_type'],
  options: { shared: [false, true], fPIC: [true, false] },
  default_options: { shared: false, fPIC: true },
  rules: [
    { when: { setting: 'os', equals: 'Windows' }, remove: ['fPIC'] },
    { when: { option: 'shared', equals: true }, remove: ['fPIC'] }
  ]
};

const windowsRule: OptionRule = { phase: 'configure', when: { setting: 'os', equals: 'Windows' }, remove: ['fPIC'] };
const sharedRule: OptionRule = { phase: 'configure', when: { option: 'shared', equals: true }, remove: ['fPIC'] };

function libraryOptions(): OptionSet {
  return new OptionSet('lib')
    .declareOption('shared', [false, true], false)
    .declareOption('fPIC', [true, false], true);
}

describe('Settings', () => {
  it('rejects values outside an axis domain', () => {
    assert.throws(() => Settings.fromValues({ os: 'Plan9' }), InvalidValueError);
  });

  it('rejects undeclared axes', () => {
    assert.throws(() => Settings.fromValues({ os: 'Linux', toolset: 'v143' }), InvalidValueError);
  });

  it('accepts any compiler.version', () => {
    assert.equal(Settings.fromValues({ 'compiler.version': '13.2' }).get('compiler.version'), '13.2');
  });

  it('restricts to consumed axes and their sub-settings in canonical order', () => {
    const restricted = Settings.fromValues(LINUX_GCC).restrict(['compiler', 'os']);
    assert.deepEqual(restricted.snapshot(), [
      ['os', 'Linux'],
      ['compiler', 'gcc'],
      ['compiler.version', '13'],
      ['compiler.cppstd', '17'],
      ['compiler.libcxx', 'libstdc++11']
    ]);
    assert.equal(restricted.isFrozen, true);
  });

  it('applies per-package overrides on top of the root values', () => {
    const restricted = Settings.fromValues(LINUX_GCC).restrict(['os', 'build_type'], { build_type: 'Debug' });
    assert.deepEqual(restricted.snapshot(), [['os', 'Linux'], ['build_type', 'Debug']]);
  });

  it('refuses mutation after freeze', () => {
    const settings = Settings.fromValues({ os: 'Linux' }).freeze();
    assert.throws(() => settings.set('os', 'Windows'), InvalidValueError);
    assert.throws(() => settings.remove('os'), InvalidValueError);
  });
});

describe('OptionSet', () => {
  it('falls back to the declared default', () => {
    assert.equal(libraryOptions().get('fPIC'), true);
  });

  it('coerces text values against the domain', () => {
    assert.equal(coerceOptionValue('True', [true, false]), true);
    assert.equal(coerceOptionValue('false', [true, false]), false);
    assert.equal(coerceOptionValue('3', [1, 2, 3]), 3);
    assert.equal(coerceOptionValue('static', null), 'static');
    assert.equal(libraryOptions().assign('shared', 'True').get('shared'), true);
  });

  it('rejects values outside the domain', () => {
    assert.throws(() => libraryOptions().assign('shared', 'maybe'), InvalidValueError);
  });

  it('treats removal of an absent option as a no-op', () => {
    const options = libraryOptions();
    options.remove('fPIC');
    options.remove('fPIC');
    assert.deepEqual(options.axes(), ['shared']);
  });

  it('formats booleans the way the generators print them', () => {
    assert.equal(formatOptionValue(true), 'True');
    assert.equal(formatOptionValue(false), 'False');
    assert.equal(formatOptionValue(14), '14');
  });
});

describe('option rules', () => {
  it('removes an option named by two triggered rules exactly once, whatever the order', () => {
    const settings = Settings.fromValues({ os: 'Windows' }).freeze();
    const forward = libraryOptions().assign('shared', true);
    const backward = libraryOptions().assign('shared', true);

    assert.deepEqual(applyRulePhase(forward, settings, [windowsRule, sharedRule], 'configure'), ['fPIC']);
    assert.deepEqual(applyRulePhase(backward, settings, [sharedRule, windowsRule], 'configure'), ['fPIC']);
    assert.deepEqual(forward.sortedValues(), backward.sortedValues());
    assert.deepEqual(forward.sortedValues(), [['shared', true]]);
  });

  it('evaluates every rule against the values before removal', () => {
    const settings = Settings.fromValues({ os: 'Linux' }).freeze();
    const rules: OptionRule[] = [
      { phase: 'configure', when: { option: 'shared', equals: true }, remove: ['shared'] },
      { phase: 'configure', when: { option: 'shared', in: [true] }, remove: ['fPIC'] }
    ];
    const options = libraryOptions().assign('shared', true);
    assert.deepEqual(applyRulePhase(options, settings, rules, 'configure'), ['fPIC', 'shared']);
  });

  it('ignores rules of another phase', () => {
    const settings = Settings.fromValues({ os: 'Windows' }).freeze();
    const options = libraryOptions();
    assert.deepEqual(applyRulePhase(options, settings, [windowsRule], 'config_options'), []);
    assert.equal(options.has('fPIC'), true);
  });

  it('drops requested values for options a config_options rule removed', () => {
    const settings = Settings.fromValues({ os: 'Windows' }).freeze();
    const rules: OptionRule[] = [{ ...windowsRule, phase: 'config_options' }];
    const options = configureOptions(libraryOptions(), settings, rules, { fPIC: 'False' });
    assert.equal(options.has('fPIC'), false);
    assert.equal(options.isFrozen, true);
  });
});

describe('recipe evaluation', () => {
  it('removes fPIC on Windows (scenario A)', () => {
    const { root } = evaluateRecipe(recipe(libraryDocument), {
      hostSettings: LINUX_GCC,
      settings: { os: 'Windows', compiler: 'msvc', 'compiler.libcxx': 'libstdc++' }
    });
    assert.equal(root.options.has('fPIC'), false);
    assert.equal(root.options.get('shared'), false);
  });

  it('removes fPIC for shared builds on Linux through the option rule (scenario B)', () => {
    const { root } = evaluateRecipe(recipe(libraryDocument), {
      hostSettings: LINUX_GCC,
      options: { shared: 'True' }
    });
    assert.equal(root.settings.get('os'), 'Linux');
    assert.equal(root.options.has('fPIC'), false);
    assert.equal(root.options.get('shared'), true);
  });

  it('keeps fPIC for static Linux builds', () => {
    const { root } = evaluateRecipe(recipe(libraryDocument), { hostSettings: LINUX_GCC });
    assert.deepEqual(root.options.sortedValues(), [['fPIC', true], ['shared', false]]);
  });

  it('layers host, profile and command-line settings', () => {
    const { root } = evaluateRecipe(recipe(libraryDocument), {
      hostSettings: LINUX_GCC,
      profile: { settings: { build_type: 'Debug', arch: 'armv8' } },
      settings: { build_type: 'RelWithDebInfo' }
    });
    assert.equal(root.settings.get('build_type'), 'RelWithDebInfo');
    assert.equal(root.settings.get('arch'), 'armv8');
  });

  it('routes dep:name values to the dependency options', () => {
    const evaluated = evaluateRecipe(recipe(libraryDocument), {
      hostSettings: LINUX_GCC,
      options: { 'zlib:shared': 'True', 'chesscore:shared': 'True' }
    });
    assert.deepEqual(evaluated.dependencyOptions, { zlib: { shared: 'True' } });
    assert.equal(evaluated.root.options.get('shared'), true);
  });

  it('rejects values for undeclared root options', () => {
    assert.throws(
      () => evaluateRecipe(recipe(libraryDocument), { hostSettings: LINUX_GCC, options: { lto: 'True' } }),
      InvalidValueError
    );
  });
});

describe('host settings', () => {
  it('maps the Node platform and architecture', () => {
    assert.deepEqual(detectHostSettings('win32', 'x64'), {
      build_type: 'Release',
      os: 'Windows',
      compiler: 'msvc',
      arch: 'x86_64'
    });
    assert.deepEqual(detectHostSettings('darwin', 'arm64'), {
      build_type: 'Release',
      os: 'Macos',
      compiler: 'apple-clang',
      arch: 'armv8'
    });
  });

  it('lets later layers win', () => {
    assert.deepEqual(mergeSettingsValues({ os: 'Linux', arch: 'x86' }, undefined, { arch: 'x86_64' }), {
      os: 'Linux',
      arch: 'x86_64'
    });
  });
});
