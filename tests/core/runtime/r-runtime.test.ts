import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { RscriptRuntime } from '../../../src/core/runtime/r-runtime.js';
import type { CommandRunner } from '../../../src/utils/command-runner.js';
import { ValidationError } from '../../../src/utils/errors.js';

function fakeRunner(stdout: string, calls: string[][]): CommandRunner {
  return async (command, args) => {
    calls.push([command, ...args]);
    return { stdout, stderr: '' };
  };
}

describe('RscriptRuntime', () => {
  it('asks Rscript for the version once', async () => {
    const calls: string[][] = [];
    const runtime = new RscriptRuntime('/opt/R/bin/Rscript', fakeRunner('4.0.0\n', calls));

    assert.equal(await runtime.version(), '4.0.0');
    assert.equal(await runtime.version(), '4.0.0');
    assert.deepEqual(calls, [
      ['/opt/R/bin/Rscript', '--vanilla', '-e', 'cat(R.version$major, R.version$minor, sep = ".")']
    ]);
  });

  it('rejects empty version output', async () => {
    const runtime = new RscriptRuntime('Rscript', fakeRunner('  \n', []));

    await assert.rejects(runtime.version(), ValidationError);
  });

  it('lists library paths one per line', async () => {
    const calls: string[][] = [];
    const stdout = '<<envsnap:libPaths>>\n/home/analyst/R/library\n/usr/lib/R/library\n<</envsnap:libPaths>>\n';
    const runtime = new RscriptRuntime('Rscript', fakeRunner(stdout, calls));

    assert.deepEqual(await runtime.libraryPaths(), ['/home/analyst/R/library', '/usr/lib/R/library']);
    assert.deepEqual(calls, [[
      'Rscript',
      '-e',
      'cat("<<envsnap:libPaths>>", .libPaths(), "<</envsnap:libPaths>>", sep = "\\n")'
    ]]);
  });

  it('ignores profile output around the library paths', async () => {
    const stdout = 'Welcome back!\n<<envsnap:libPaths>>\n/usr/lib/R/library\n<</envsnap:libPaths>>\nBye\n';
    const runtime = new RscriptRuntime('Rscript', fakeRunner(stdout, []));

    assert.deepEqual(await runtime.libraryPaths(), ['/usr/lib/R/library']);
  });

  it('rejects output without the library path markers', async () => {
    const runtime = new RscriptRuntime('Rscript', fakeRunner('/usr/lib/R/library\n', []));

    await assert.rejects(runtime.libraryPaths(), ValidationError);
  });
});
