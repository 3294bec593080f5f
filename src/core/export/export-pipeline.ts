/**
 * Publish the recipe in a recipe root, together with its package folder,
 * into the local registry so other recipes can require it.
 */

import type { ExecutionContext } from '../../types/index.js';
import { isDirectory, readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveOutput } from '../ports/resolve.js';
import { recipePath } from '../recipe/recipe-evaluator.js';
import { LocalRegistry } from '../registry/local-registry.js';
import type { RecipeSession } from '../session.js';

export interface ExportResult {
  reference: string;
  entryDir: string;
  /** False when no package folder existed and an empty one was published */
  withPackage: boolean;
}

export async function runExportPipeline(ctx: ExecutionContext, session: RecipeSession): Promise<ExportResult> {
  const output = resolveOutput(ctx);
  const { recipe, layout } = session;
  const reference = `${recipe.name}/${recipe.version}`;

  const withPackage = await isDirectory(layout.package);
  if (!withPackage && recipe.package.kind === 'install') {
    output.warn(`No package folder for configuration ${layout.configId}; run 'rkit package' first to publish artifacts`);
  }

  const registry = new LocalRegistry(ctx.registryRoot);
  const content = await readTextFile(recipePath(ctx.recipeRoot));
  const entryDir = await registry.publish(recipe, content, withPackage ? layout.package : null);

  logger.debug(`Exported ${reference}`, { entryDir, withPackage });
  output.success(`Exported ${reference} to ${entryDir}`);
  return { reference, entryDir, withPackage };
}
