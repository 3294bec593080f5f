/**
 * A recipe session: everything one command needs about the recipe in the
 * current directory, from evaluation to the resolved graph and its layout.
 */

import type { ExecutionContext, OptionValue, ProfileConfig, Recipe } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { BuildOrchestrator } from './build/orchestrator.js';
import type { BuildTool } from './build/build-tool.js';
import { layout, type Layout } from './layout/layout.js';
import { resolveOutput } from './ports/resolve.js';
import { evaluateRecipe, loadRecipe } from './recipe/recipe-evaluator.js';
import { resolveGraph } from './resolution/graph-builder.js';
import type { DependencyGraph } from './resolution/types.js';
import type { DependencyRegistry } from './registry/registry.js';
import { LocalRegistry } from './registry/local-registry.js';

export interface SessionInput {
  profile?: ProfileConfig;
  settings?: Record<string, string>;
  options?: Record<string, OptionValue>;
  hostSettings?: Record<string, string>;
  /** Registry to resolve against; a LocalRegistry at ctx.registryRoot when omitted */
  registry?: DependencyRegistry;
  /** Recipe already loaded by the caller */
  recipe?: Recipe;
}

export interface RecipeSession {
  recipe: Recipe;
  graph: DependencyGraph;
  layout: Layout;
}

export async function openSession(ctx: ExecutionContext, input: SessionInput = {}): Promise<RecipeSession> {
  const recipe = input.recipe ?? (await loadRecipe(ctx.recipeRoot));
  logger.debug(`Evaluating ${recipe.name}/${recipe.version}`, { recipeRoot: ctx.recipeRoot });

  const evaluated = evaluateRecipe(recipe, input);
  const graph = await resolveGraph(evaluated.root, {
    registry: input.registry ?? new LocalRegistry(ctx.registryRoot),
    dependencyOptions: evaluated.dependencyOptions
  });

  const folders = layout(ctx.recipeRoot, graph.root.settings, graph.root.options, recipe.sourceFolder);
  logger.debug(`Layout of ${recipe.name}`, folders);
  return { recipe, graph, layout: folders };
}

export function createOrchestrator(
  ctx: ExecutionContext,
  session: RecipeSession,
  tool: BuildTool,
  jobs?: number
): BuildOrchestrator {
  return new BuildOrchestrator({
    graph: session.graph,
    layout: session.layout,
    tool,
    output: resolveOutput(ctx),
    jobs,
    signal: ctx.signal
  });
}
