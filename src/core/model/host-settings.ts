import type { Settings } from './settings.js';

/**
 * Default settings for the machine recipekit runs on. Only fills axes the
 * profile and command line left unset.
 */
export function detectHostSettings(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch
): Record<string, string> {
  const detected: Record<string, string> = { build_type: 'Release' };

  switch (platform) {
    case 'win32':
      detected.os = 'Windows';
      detected.compiler = 'msvc';
      break;
    case 'darwin':
      detected.os = 'Macos';
      detected.compiler = 'apple-clang';
      break;
    case 'freebsd':
      detected.os = 'FreeBSD';
      detected.compiler = 'clang';
      break;
    default:
      detected.os = 'Linux';
      detected.compiler = 'gcc';
  }

  const archMap: Record<string, string> = {
    x64: 'x86_64',
    ia32: 'x86',
    arm64: 'armv8',
    arm: 'armv7',
    ppc64: 'ppc64le',
    s390x: 's390x'
  };
  const mappedArch = archMap[arch];
  if (mappedArch) {
    detected.arch = mappedArch;
  }

  return detected;
}

/**
 * Merge layered settings values; later layers win.
 */
export function mergeSettingsValues(...layers: Array<Record<string, string> | undefined>): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const layer of layers) {
    if (!layer) continue;
    Object.assign(merged, layer);
  }
  return merged;
}

export function describeSettings(settings: Settings): string {
  return settings.snapshot().map(([axis, value]) => `${axis}=${value}`).join(', ');
}
