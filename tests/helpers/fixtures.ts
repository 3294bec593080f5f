/**
 * Shared fixtures: an in-memory registry, a scripted build tool and temp
 * directories.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Recipe } from '../../src/types/index.js';
import { recipeFromDocument } from '../../src/core/recipe/recipe-yml.js';
import type { DependencyRegistry, RegistryEntry } from '../../src/core/registry/registry.js';
import { DependencyUnavailableError } from '../../src/utils/errors.js';
import type { BuildRequest, BuildTool, ConfigureRequest, InstallRequest } from '../../src/core/build/build-tool.js';
import { UserCancellationError } from '../../src/utils/errors.js';
import type { OutputPort } from '../../src/core/ports/output.js';

export const PACKAGES_ROOT = '/registry';

/** Recipe from a recipe.yml-shaped object */
export function recipe(document: Record<string, unknown>): Recipe {
  return recipeFromDocument(document, 'test recipe');
}

export class InMemoryRegistry implements DependencyRegistry {
  private readonly entries = new Map<string, Map<string, Recipe>>();
  readonly fetched: string[] = [];

  add(document: Record<string, unknown>): this {
    const parsed = recipe(document);
    const versions = this.entries.get(parsed.name) ?? new Map<string, Recipe>();
    versions.set(parsed.version, parsed);
    this.entries.set(parsed.name, versions);
    return this;
  }

  async listVersions(name: string): Promise<string[]> {
    const versions = this.entries.get(name);
    if (!versions) {
      throw new DependencyUnavailableError(name, 'not in test registry');
    }
    return Array.from(versions.keys());
  }

  async fetch(name: string, version: string): Promise<RegistryEntry> {
    const found = this.entries.get(name)?.get(version);
    if (!found) {
      throw new DependencyUnavailableError(name, `${version} not in test registry`);
    }
    this.fetched.push(`${name}/${version}`);
    return { recipe: found, packageFolder: `${PACKAGES_ROOT}/${name}/${version}/package` };
  }
}

export interface ToolCall {
  step: 'configure' | 'build' | 'install';
  request: ConfigureRequest | BuildRequest | InstallRequest;
}

/**
 * Build tool returning scripted exit codes. A step scripted as 'hang' waits
 * for its request's signal and rejects like the process runner does.
 */
export class FakeBuildTool implements BuildTool {
  readonly name = 'fake';
  readonly calls: ToolCall[] = [];
  exitCodes: Record<ToolCall['step'], number | null | 'hang'> = { configure: 0, build: 0, install: 0 };

  private run(step: ToolCall['step'], request: ToolCall['request']): Promise<number | null> {
    this.calls.push({ step, request });
    const scripted = this.exitCodes[step];
    if (scripted !== 'hang') {
      return Promise.resolve(scripted);
    }
    return new Promise((_resolve, reject) => {
      const signal = request.signal;
      if (!signal) {
        reject(new Error('hang requested without a signal'));
        return;
      }
      signal.addEventListener('abort', () => reject(new UserCancellationError(`${step} cancelled`)), { once: true });
    });
  }

  configure(request: ConfigureRequest): Promise<number | null> {
    return this.run('configure', request);
  }

  build(request: BuildRequest): Promise<number | null> {
    return this.run('build', request);
  }

  install(request: InstallRequest): Promise<number | null> {
    return this.run('install', request);
  }

  steps(): string[] {
    return this.calls.map(call => call.step);
  }
}

/** OutputPort recording messages by kind */
export function recordingOutput(): OutputPort & { lines: string[] } {
  const lines: string[] = [];
  const record = (kind: string) => (message: string): void => {
    lines.push(`${kind}: ${message}`);
  };
  return {
    lines,
    info: record('info'),
    step: record('step'),
    message: record('message'),
    success: record('success'),
    error: record('error'),
    warn: record('warn')
  };
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `recipekit-${prefix}-`));
}

export async function removeDir(path: string): Promise<void> {
  await fs.rm(path, { recursive: true, force: true });
}

/** Linux/gcc settings used as the default test profile */
export const LINUX_GCC: Record<string, string> = {
  os: 'Linux',
  arch: 'x86_64',
  compiler: 'gcc',
  'compiler.version': '13',
  'compiler.cppstd': '17',
  'compiler.libcxx': 'libstdc++11',
  build_type: 'Release'
};
