/**
 * Generator engine: descriptor files from a resolved graph.
 *
 * `generateDescriptors` is pure. Equal graphs give byte-identical files in
 * the same order, which keeps unchanged descriptors untouched on disk.
 */

import { join } from 'path';
import { ensureDir, listFiles, remove, writeTextFileIfChanged } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { compareNames } from '../resolution/graph-builder.js';
import type { DependencyGraph } from '../resolution/types.js';
import { generateDependencyDescriptors } from './deps-generator.js';
import { generateToolchain } from './toolchain-generator.js';
import type { GeneratedFile } from './types.js';

export type { GeneratedFile } from './types.js';
export { generatePackageInfo } from './package-info.js';

export function generateDescriptors(graph: DependencyGraph): GeneratedFile[] {
  const buildType = graph.root.settings.get('build_type') ?? 'Release';
  const files = [generateToolchain(graph.root), ...generateDependencyDescriptors(graph, buildType)];
  return files.sort((a, b) => compareNames(a.path, b.path));
}

export interface WriteSummary {
  written: string[];
  unchanged: string[];
  /** Files of an earlier graph that are no longer generated */
  removed: string[];
}

/**
 * Write descriptors below `directory`, leaving files whose content did not
 * change untouched. Other files in `directory` are deleted, so it holds
 * exactly the generated set.
 */
export async function writeDescriptors(files: readonly GeneratedFile[], directory: string): Promise<WriteSummary> {
  await ensureDir(directory);
  const summary: WriteSummary = { written: [], unchanged: [], removed: [] };
  const generated = new Set(files.map(file => file.path));
  for (const name of (await listFiles(directory)).sort(compareNames)) {
    if (!generated.has(name)) {
      await remove(join(directory, name));
      summary.removed.push(name);
    }
  }
  for (const file of files) {
    const changed = await writeTextFileIfChanged(join(directory, file.path), file.content);
    (changed ? summary.written : summary.unchanged).push(file.path);
  }
  logger.debug(
    `Descriptors in ${directory}: ${summary.written.length} written, ${summary.unchanged.length} unchanged, ${summary.removed.length} removed`
  );
  return summary;
}
