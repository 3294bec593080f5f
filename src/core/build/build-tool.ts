/**
 * Build tool port. Each step returns the tool's exit code (null when it was
 * terminated by a signal); recipekit never parses the tool's output.
 */

export interface ConfigureRequest {
  sourceDir: string;
  buildDir: string;
  toolchainFile: string;
  buildType: string;
  signal?: AbortSignal;
}

export interface BuildRequest {
  buildDir: string;
  buildType: string;
  jobs?: number;
  signal?: AbortSignal;
}

export interface InstallRequest {
  buildDir: string;
  buildType: string;
  prefix: string;
  signal?: AbortSignal;
}

export interface BuildTool {
  readonly name: string;
  configure(request: ConfigureRequest): Promise<number | null>;
  build(request: BuildRequest): Promise<number | null>;
  install(request: InstallRequest): Promise<number | null>;
}
