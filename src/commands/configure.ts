import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { CMakeBuildTool } from '../core/build/cmake-tool.js';
import { createOrchestrator } from '../core/session.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { addRecipeOptions, withRecipeSession, type RecipeCommandOptions } from '../cli/recipe-options.js';

export function setupConfigureCommand(program: Command): void {
  addRecipeOptions(
    program
      .command('configure')
      .description(
        'Resolve dependencies, write the generator files and run the configure step.\n' +
        'Usage:\n' +
        '  rkit configure                       # Recipe in the current directory\n' +
        '  rkit configure -s build_type=Debug   # Override a setting'
      )
  ).action(withErrorHandling(async (path: string | undefined, options: RecipeCommandOptions) => {
    await withRecipeSession(path, options, async (ctx, session) => {
      const result = await createOrchestrator(ctx, session, new CMakeBuildTool()).configure();
      const out = resolveOutput(ctx);
      out.info(`Generators: ${session.layout.generators}`);
      if (result.descriptors.written.length > 0) {
        out.message(`Updated: ${result.descriptors.written.join(', ')}`);
      }
      if (result.descriptors.removed.length > 0) {
        out.message(`Removed: ${result.descriptors.removed.join(', ')}`);
      }
    });
  }));
}
