import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

let cachedVersion: string | undefined;

/**
 * Version of the recipekit package, read from package.json beside src/ or dist/
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  try {
    const manifestPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
    cachedVersion =
      typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string'
        ? manifest.version
        : '0.0.0';
  } catch {
    cachedVersion = '0.0.0';
  }
  return cachedVersion;
}
