import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CMakeBuildTool } from '../../../src/core/build/cmake-tool.js';
import type { ProcessRunner, RunOptions } from '../../../src/core/build/process-runner.js';

interface Invocation {
  command: string;
  args: readonly string[];
  options?: RunOptions;
}

function recordingRunner(exitCode: number | null): { runner: ProcessRunner; invocations: Invocation[] } {
  const invocations: Invocation[] = [];
  const runner: ProcessRunner = async (command, args, options) => {
    invocations.push({ command, args, options });
    return { exitCode, signal: exitCode === null ? 'SIGTERM' : null };
  };
  return { runner, invocations };
}

describe('CMakeBuildTool', () => {
  it('configures with the toolchain file and build type', async () => {
    const { runner, invocations } = recordingRunner(0);
    const tool = new CMakeBuildTool({ runner, generator: 'Ninja' });

    const code = await tool.configure({
      sourceDir: '/work/app',
      buildDir: '/work/app/build/Release-abc',
      toolchainFile: '/work/app/build/Release-abc/generators/recipekit_toolchain.cmake',
      buildType: 'Release'
    });

    assert.equal(code, 0);
    assert.equal(invocations[0]?.command, 'cmake');
    assert.deepEqual(invocations[0]?.args, [
      '-S', '/work/app',
      '-B', '/work/app/build/Release-abc',
      '-DCMAKE_TOOLCHAIN_FILE=/work/app/build/Release-abc/generators/recipekit_toolchain.cmake',
      '-DCMAKE_BUILD_TYPE=Release',
      '-G', 'Ninja'
    ]);
  });

  it('passes the job count to the build step', () => {
    const tool = new CMakeBuildTool();
    assert.deepEqual(tool.buildArgs({ buildDir: 'out', buildType: 'Debug', jobs: 8 }), [
      '--build', 'out', '--config', 'Debug', '--parallel', '8'
    ]);
    assert.deepEqual(tool.buildArgs({ buildDir: 'out', buildType: 'Debug' }), ['--build', 'out', '--config', 'Debug']);
  });

  it('installs into the package prefix', async () => {
    const { runner, invocations } = recordingRunner(0);
    const tool = new CMakeBuildTool({ runner, executable: '/opt/cmake/bin/cmake' });
    const controller = new AbortController();

    await tool.install({ buildDir: 'out', buildType: 'Release', prefix: '/pkg', signal: controller.signal });

    assert.equal(invocations[0]?.command, '/opt/cmake/bin/cmake');
    assert.deepEqual(invocations[0]?.args, ['--install', 'out', '--config', 'Release', '--prefix', '/pkg']);
    assert.equal(invocations[0]?.options?.signal, controller.signal);
  });

  it('returns the exit code of the tool unchanged', async () => {
    const failing = new CMakeBuildTool({ runner: recordingRunner(2).runner });
    assert.equal(await failing.build({ buildDir: 'out', buildType: 'Release' }), 2);

    const killed = new CMakeBuildTool({ runner: recordingRunner(null).runner });
    assert.equal(await killed.build({ buildDir: 'out', buildType: 'Release' }), null);
  });
});
