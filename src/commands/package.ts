import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { CMakeBuildTool } from '../core/build/cmake-tool.js';
import { createOrchestrator } from '../core/session.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { addRecipeOptions, withRecipeSession, type RecipeCommandOptions } from '../cli/recipe-options.js';

export function setupPackageCommand(program: Command): void {
  addRecipeOptions(
    program
      .command('package')
      .description('Run the packaging step of a built recipe into its package folder.')
  ).action(withErrorHandling(async (path: string | undefined, options: RecipeCommandOptions) => {
    await withRecipeSession(path, options, async (ctx, session) => {
      const result = await createOrchestrator(ctx, session, new CMakeBuildTool()).package();
      if (result.packageInfo) {
        resolveOutput(ctx).info(`Package info: ${result.packageInfo}`);
      }
    });
  }));
}
