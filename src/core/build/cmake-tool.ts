import type { BuildRequest, BuildTool, ConfigureRequest, InstallRequest } from './build-tool.js';
import { runProcess, type ProcessRunner } from './process-runner.js';

export interface CMakeToolOptions {
  executable?: string;
  /** CMake generator (-G), e.g. "Ninja" */
  generator?: string;
  runner?: ProcessRunner;
}

/**
 * Build tool backed by the cmake executable.
 */
export class CMakeBuildTool implements BuildTool {
  readonly name = 'cmake';
  private readonly executable: string;
  private readonly runner: ProcessRunner;

  constructor(private readonly options: CMakeToolOptions = {}) {
    this.executable = options.executable ?? 'cmake';
    this.runner = options.runner ?? runProcess;
  }

  configureArgs(request: ConfigureRequest): string[] {
    const args = [
      '-S', request.sourceDir,
      '-B', request.buildDir,
      `-DCMAKE_TOOLCHAIN_FILE=${request.toolchainFile}`,
      `-DCMAKE_BUILD_TYPE=${request.buildType}`
    ];
    if (this.options.generator) {
      args.push('-G', this.options.generator);
    }
    return args;
  }

  buildArgs(request: BuildRequest): string[] {
    const args = ['--build', request.buildDir, '--config', request.buildType];
    if (request.jobs !== undefined) {
      args.push('--parallel', String(request.jobs));
    }
    return args;
  }

  installArgs(request: InstallRequest): string[] {
    return ['--install', request.buildDir, '--config', request.buildType, '--prefix', request.prefix];
  }

  async configure(request: ConfigureRequest): Promise<number | null> {
    const result = await this.runner(this.executable, this.configureArgs(request), { signal: request.signal });
    return result.exitCode;
  }

  async build(request: BuildRequest): Promise<number | null> {
    const result = await this.runner(this.executable, this.buildArgs(request), { signal: request.signal });
    return result.exitCode;
  }

  async install(request: InstallRequest): Promise<number | null> {
    const result = await this.runner(this.executable, this.installArgs(request), { signal: request.signal });
    return result.exitCode;
  }
}
