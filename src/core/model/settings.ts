/**
 * Platform settings: os, architecture, compiler and build type.
 */

import { AxisMap, type AxisDomain } from './axis-map.js';

/**
 * Known settings axes in canonical order. Sub-settings (compiler.*) belong to
 * their parent axis when a recipe lists the axes it consumes.
 */
export const SETTINGS_DOMAINS: ReadonlyArray<readonly [string, AxisDomain<string>]> = [
  ['os', ['Windows', 'Linux', 'Macos', 'FreeBSD', 'Android', 'iOS', 'Emscripten']],
  ['arch', ['x86', 'x86_64', 'armv7', 'armv8', 'ppc64le', 's390x', 'wasm']],
  ['compiler', ['gcc', 'clang', 'apple-clang', 'msvc', 'intel-cc']],
  ['compiler.version', null],
  ['compiler.cppstd', ['98', 'gnu98', '11', 'gnu11', '14', 'gnu14', '17', 'gnu17', '20', 'gnu20', '23', 'gnu23']],
  ['compiler.libcxx', ['libstdc++', 'libstdc++11', 'libc++']],
  ['compiler.runtime', ['static', 'dynamic']],
  ['build_type', ['Debug', 'Release', 'RelWithDebInfo', 'MinSizeRel']]
];

export const SETTINGS_AXES: readonly string[] = SETTINGS_DOMAINS.map(([axis]) => axis);

export class Settings extends AxisMap<string> {
  constructor() {
    super('setting');
    for (const [axis, domain] of SETTINGS_DOMAINS) {
      this.declare(axis, domain);
    }
  }

  /**
   * Build settings from plain values. Unknown axes and out-of-domain values
   * fail with InvalidValue.
   */
  static fromValues(values: Record<string, string>): Settings {
    const settings = new Settings();
    for (const axis of SETTINGS_AXES) {
      const value = values[axis];
      if (value !== undefined) {
        settings.set(axis, value);
      }
    }
    for (const [axis, value] of Object.entries(values)) {
      if (!settings.has(axis)) {
        settings.set(axis, value);
      }
    }
    return settings;
  }

  /**
   * Frozen copy holding only the consumed axes (and their sub-settings),
   * overlaid with the package's own overrides.
   */
  restrict(consumed: readonly string[], overrides: Record<string, string> = {}): Settings {
    const values: Record<string, string> = {};
    for (const [axis, value] of this.values()) {
      if (isConsumed(axis, consumed)) {
        values[axis] = value;
      }
    }
    for (const [axis, value] of Object.entries(overrides)) {
      values[axis] = value;
    }
    return Settings.fromValues(values).freeze();
  }

  /** Set axes only, in canonical order */
  snapshot(): Array<[string, string]> {
    return this.values();
  }
}

export function isConsumed(axis: string, consumed: readonly string[]): boolean {
  return consumed.some(parent => axis === parent || axis.startsWith(`${parent}.`));
}
