import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { CMakeBuildTool } from '../core/build/cmake-tool.js';
import { createOrchestrator } from '../core/session.js';
import {
  addJobsOption,
  addRecipeOptions,
  resolveJobs,
  withRecipeSession,
  type BuildCommandOptions
} from '../cli/recipe-options.js';

export function setupBuildCommand(program: Command): void {
  addJobsOption(addRecipeOptions(
    program
      .command('build')
      .description(
        'Configure (when needed) and build the recipe.\n' +
        'Usage:\n' +
        '  rkit build           # Recipe in the current directory\n' +
        '  rkit build -j 8      # Build with 8 parallel jobs'
      )
  )).action(withErrorHandling(async (path: string | undefined, options: BuildCommandOptions) => {
    const jobs = await resolveJobs(options);
    await withRecipeSession(path, options, async (ctx, session) => {
      const orchestrator = createOrchestrator(ctx, session, new CMakeBuildTool(), jobs);
      await orchestrator.configure();
      await orchestrator.build();
    });
  }));
}
