import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { renderGraphTree } from '../core/display/graph-tree.js';
import { serializeGraph } from '../core/resolution/graph-serializer.js';
import { addRecipeOptions, withRecipeSession, type RecipeCommandOptions } from '../cli/recipe-options.js';

interface GraphCommandOptions extends RecipeCommandOptions {
  canonical?: boolean;
}

export function setupGraphCommand(program: Command): void {
  addRecipeOptions(
    program
      .command('graph')
      .description('Resolve and print the dependency graph without building.')
      .option('--canonical', 'print the canonical text form instead of a tree')
  ).action(withErrorHandling(async (path: string | undefined, options: GraphCommandOptions) => {
    await withRecipeSession(path, options, async (_ctx, session) => {
      if (options.canonical) {
        process.stdout.write(serializeGraph(session.graph));
        return;
      }
      console.log(renderGraphTree(session.graph).join('\n'));
    });
  }));
}
