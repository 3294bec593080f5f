import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runExportPipeline } from '../core/export/export-pipeline.js';
import { addRecipeOptions, withRecipeSession, type RecipeCommandOptions } from '../cli/recipe-options.js';

export function setupExportCommand(program: Command): void {
  addRecipeOptions(
    program
      .command('export')
      .description(
        'Publish the recipe and its package folder into the local registry.\n' +
        'Usage:\n' +
        '  rkit export                      # Default registry (~/.recipekit/registry)\n' +
        '  rkit export --registry ./deps    # Explicit registry'
      )
  ).action(withErrorHandling(async (path: string | undefined, options: RecipeCommandOptions) => {
    await withRecipeSession(path, options, (ctx, session) => runExportPipeline(ctx, session));
  }));
}
