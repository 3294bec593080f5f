/**
 * Build orchestrator: drives configure → build → package for one resolved
 * graph and layout, persisting its state in the build folder.
 *
 *   NotConfigured → Configured → Built → Packaged
 *                        ↓          ↓         ↓
 *                      Failed (build or package step)
 *
 * A failed or interrupted configure leaves NotConfigured. A cancelled step
 * leaves the state of the last completed step.
 */

import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { BuildError, ConfigureError, PackageError, UserCancellationError } from '../../utils/errors.js';
import { ensureDir, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { generateDescriptors, generatePackageInfo, writeDescriptors, type WriteSummary } from '../generators/index.js';
import type { Layout } from '../layout/layout.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import type { DependencyGraph } from '../resolution/types.js';
import type { BuildTool } from './build-tool.js';
import { readBuildState, writeBuildState, type BuildState, type BuildStateRecord, type BuildStep } from './build-state.js';

export interface OrchestratorOptions {
  graph: DependencyGraph;
  layout: Layout;
  tool: BuildTool;
  output?: OutputPort;
  jobs?: number;
  signal?: AbortSignal;
}

export interface ConfigureResult {
  state: BuildState;
  /** False when the tool's configure step was skipped */
  ranTool: boolean;
  descriptors: WriteSummary;
}

export interface PackageResult {
  state: BuildState;
  /** Path of recipeinfo.yml, or null when the recipe defines no packaging */
  packageInfo: string | null;
}

export class BuildOrchestrator {
  private record: BuildStateRecord;
  private loaded = false;
  private readonly output: OutputPort;

  constructor(private readonly options: OrchestratorOptions) {
    this.output = resolveOutput(options);
    this.record = { state: 'NotConfigured', configId: options.layout.configId };
  }

  get state(): BuildState {
    return this.record.state;
  }

  /**
   * Load the persisted state. A state written for another snapshot counts as
   * NotConfigured.
   */
  async load(): Promise<BuildState> {
    if (this.loaded) {
      return this.record.state;
    }
    const { layout } = this.options;
    const persisted = await readBuildState(layout.build);
    if (persisted && persisted.configId === layout.configId) {
      this.record = persisted;
    } else if (persisted) {
      logger.debug(`State file in ${layout.build} belongs to ${persisted.configId}, ignoring`);
    }
    this.loaded = true;
    return this.record.state;
  }

  private isConfigured(): boolean {
    const { state, failedStep } = this.record;
    return state === 'Configured' || state === 'Built' || state === 'Packaged' ||
      (state === 'Failed' && failedStep !== 'configure');
  }

  private isBuilt(): boolean {
    const { state, failedStep } = this.record;
    return state === 'Built' || state === 'Packaged' || (state === 'Failed' && failedStep === 'package');
  }

  private async transition(state: BuildState, failedStep?: BuildStep): Promise<void> {
    this.record = failedStep
      ? { state, configId: this.options.layout.configId, failedStep }
      : { state, configId: this.options.layout.configId };
    await writeBuildState(this.options.layout.build, this.record);
    logger.debug(`Build state: ${state}`, { configId: this.record.configId, failedStep });
  }

  private throwIfAborted(step: BuildStep): void {
    if (this.options.signal?.aborted) {
      throw new UserCancellationError(`${step} cancelled`);
    }
  }

  /**
   * Write the descriptors and run the tool's configure step. Running it again
   * on an unchanged configured snapshot leaves the build untouched.
   */
  async configure(): Promise<ConfigureResult> {
    await this.load();
    const { graph, layout, tool, signal } = this.options;
    this.throwIfAborted('configure');

    await ensureDir(layout.build);
    const descriptors = await writeDescriptors(generateDescriptors(graph), layout.generators);

    if (this.isConfigured() && descriptors.written.length === 0 && descriptors.removed.length === 0) {
      this.output.info(`Already configured (${layout.configId})`);
      return { state: this.record.state, ranTool: false, descriptors };
    }

    await this.transition('NotConfigured');
    this.output.step(`Configuring ${graph.root.name}/${graph.root.version} with ${tool.name}`);

    let exitCode: number | null;
    try {
      exitCode = await tool.configure({
        sourceDir: layout.source,
        buildDir: layout.build,
        toolchainFile: join(layout.generators, FILE_PATTERNS.TOOLCHAIN),
        buildType: graph.root.settings.get('build_type') ?? 'Release',
        signal
      });
    } catch (error) {
      if (error instanceof UserCancellationError) {
        throw error;
      }
      throw new ConfigureError(null, { reason: error instanceof Error ? error.message : String(error) });
    }

    if (exitCode !== 0) {
      throw new ConfigureError(exitCode, { buildFolder: layout.build });
    }
    await this.transition('Configured');
    this.output.success(`Configured ${layout.build}`);
    return { state: this.record.state, ranTool: true, descriptors };
  }

  async build(): Promise<BuildState> {
    await this.load();
    const { graph, layout, tool, jobs, signal } = this.options;
    if (!this.isConfigured()) {
      throw new BuildError(`Cannot build: ${layout.build} is not configured`, { state: this.record.state });
    }
    this.throwIfAborted('build');

    // A rebuild invalidates the previous artifacts until it completes.
    if (this.record.state !== 'Configured') {
      await this.transition('Configured');
    }
    this.output.step(`Building ${graph.root.name}/${graph.root.version}`);

    let exitCode: number | null;
    try {
      exitCode = await tool.build({
        buildDir: layout.build,
        buildType: graph.root.settings.get('build_type') ?? 'Release',
        jobs,
        signal
      });
    } catch (error) {
      if (error instanceof UserCancellationError) {
        throw error;
      }
      await this.transition('Failed', 'build');
      throw new BuildError(`Build step could not run: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (exitCode !== 0) {
      await this.transition('Failed', 'build');
      throw new BuildError(
        `Build step failed${exitCode === null ? ' (terminated)' : ` with exit code ${exitCode}`}`,
        { exitCode, buildFolder: layout.build }
      );
    }
    await this.transition('Built');
    this.output.success(`Built ${graph.root.name}/${graph.root.version}`);
    return this.record.state;
  }

  /**
   * Run the recipe's packaging step. A recipe without one succeeds with its
   * message and no state change.
   */
  async package(): Promise<PackageResult> {
    await this.load();
    const { graph, layout, tool, signal } = this.options;
    const step = graph.root.recipe.package;

    if (step.kind === 'none') {
      this.output.info(step.message ?? `${graph.root.name} defines no packaging step`);
      return { state: this.record.state, packageInfo: null };
    }

    if (!this.isBuilt()) {
      throw new PackageError(`Cannot package: ${graph.root.name} has not been built in ${layout.build}`, {
        state: this.record.state
      });
    }
    this.throwIfAborted('package');
    this.output.step(`Packaging into ${layout.package}`);

    let exitCode: number | null;
    try {
      await ensureDir(layout.package);
      exitCode = await tool.install({
        buildDir: layout.build,
        buildType: graph.root.settings.get('build_type') ?? 'Release',
        prefix: layout.package,
        signal
      });
    } catch (error) {
      if (error instanceof UserCancellationError) {
        throw error;
      }
      await this.transition('Failed', 'package');
      throw new PackageError(`Package step could not run: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (exitCode !== 0) {
      await this.transition('Failed', 'package');
      throw new PackageError(
        `Package step failed${exitCode === null ? ' (terminated)' : ` with exit code ${exitCode}`}`,
        { exitCode, packageFolder: layout.package }
      );
    }

    const info = generatePackageInfo(graph, layout.configId);
    const infoPath = join(layout.package, info.path);
    await writeTextFile(infoPath, info.content);
    await this.transition('Packaged');
    this.output.success(`Packaged ${graph.root.name}/${graph.root.version} into ${layout.package}`);
    return { state: this.record.state, packageInfo: infoPath };
  }
}
