#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { ensureRecipeKitDirectories } from './core/directory.js';
import { getVersion } from './utils/package.js';

import { setupConfigureCommand } from './commands/configure.js';
import { setupBuildCommand } from './commands/build.js';
import { setupPackageCommand } from './commands/package.js';
import { setupExportCommand } from './commands/export.js';
import { setupGraphCommand } from './commands/graph.js';
import { setupLayoutCommand } from './commands/layout.js';

/**
 * recipekit CLI - Main entry point
 *
 * Evaluates a package recipe, resolves its dependency graph from a local
 * registry, writes CMake descriptors and drives configure/build/package.
 */

const program = new Command();

program
  .name('recipekit')
  .alias('rkit')
  .description('recipekit - package recipes and build orchestration for C and C++ projects')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true })
  .addHelpText(
    'after',
    '\nExamples:\n' +
    '  rkit graph                          print the resolved dependency tree\n' +
    '  rkit build -s build_type=Debug      configure and build a Debug configuration\n' +
    '  rkit build -o shared=True -j 8      build shared libraries with 8 jobs\n' +
    '  rkit package && rkit export         package and publish to the local registry\n'
  );

// === BUILD COMMANDS ===
setupConfigureCommand(program);
setupBuildCommand(program);
setupPackageCommand(program);

// === REGISTRY ===
setupExportCommand(program);

// === INSPECTION ===
setupGraphCommand(program);
setupLayoutCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    await ensureRecipeKitDirectories();
  } catch (error) {
    logger.error('Failed to initialize recipekit directories', { error });
    console.error('❌ Failed to initialize recipekit directories. Please check permissions.');
    process.exit(1);
  }

  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('rkit') ||
    process.argv[1].endsWith('recipekit')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
