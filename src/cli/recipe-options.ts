/**
 * Options shared by every command that evaluates a recipe, and the glue
 * that turns them into a context and a session.
 */

import { Command, InvalidArgumentError } from 'commander';
import { configManager } from '../core/config.js';
import { openSession, type RecipeSession } from '../core/session.js';
import { parseAssignmentList } from '../core/recipe/recipe-evaluator.js';
import type { ExecutionContext, ProfileConfig } from '../types/index.js';
import { LogLevel } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createCliExecutionContext } from './context.js';

export interface RecipeCommandOptions {
  setting: string[];
  option: string[];
  profile?: string;
  registry?: string;
  timeout?: number;
  verbose?: boolean;
}

export interface BuildCommandOptions extends RecipeCommandOptions {
  jobs?: number;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function addRecipeOptions(command: Command): Command {
  return command
    .argument('[path]', 'recipe directory (defaults to the current directory)')
    .option('-s, --setting <axis=value>', 'set a setting, e.g. -s build_type=Debug (repeatable)', collect, [])
    .option('-o, --option <name=value>', 'set an option, or dep:name=value for a dependency (repeatable)', collect, [])
    .option('-p, --profile <name>', 'apply a profile from config.jsonc')
    .option('--registry <dir>', 'local registry to resolve dependencies from')
    .option('--timeout <seconds>', 'terminate the build tool after this many seconds', parsePositiveInt)
    .option('--verbose', 'print debug logging');
}

export function addJobsOption(command: Command): Command {
  return command.option('-j, --jobs <n>', 'parallel jobs passed to the build tool', parsePositiveInt);
}

export async function resolveJobs(options: BuildCommandOptions): Promise<number | undefined> {
  return options.jobs ?? (await configManager.getJobs());
}

/**
 * Run `fn` with a context and a session for the recipe at `path`, disposing
 * the context's signal handlers afterwards.
 */
export async function withRecipeSession<T>(
  path: string | undefined,
  options: RecipeCommandOptions,
  fn: (ctx: ExecutionContext, session: RecipeSession) => Promise<T>
): Promise<T> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  let profile: ProfileConfig | undefined;
  if (options.profile) {
    profile = await configManager.getProfile(options.profile);
  }

  const { ctx, dispose } = await createCliExecutionContext({
    path,
    registry: options.registry,
    timeout: options.timeout
  });
  try {
    const session = await openSession(ctx, {
      profile,
      settings: parseAssignmentList(options.setting, '--setting'),
      options: parseAssignmentList(options.option, '--option')
    });
    return await fn(ctx, session);
  } finally {
    dispose();
  }
}
