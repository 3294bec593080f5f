import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { addRecipeOptions, withRecipeSession, type RecipeCommandOptions } from '../cli/recipe-options.js';

export function setupLayoutCommand(program: Command): void {
  addRecipeOptions(
    program
      .command('layout')
      .description('Print the folders used for the current settings and options.')
  ).action(withErrorHandling(async (path: string | undefined, options: RecipeCommandOptions) => {
    await withRecipeSession(path, options, async (_ctx, session) => {
      const { layout } = session;
      console.log(`config_id:  ${layout.configId}`);
      console.log(`source:     ${layout.source}`);
      console.log(`build:      ${layout.build}`);
      console.log(`generators: ${layout.generators}`);
      console.log(`package:    ${layout.package}`);
    });
  }));
}
