import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import {
  FileNames,
  Info,
  IntegrityError,
  SeededRandom,
  VerificationError,
  WorkloadRegistry,
  createLogger,
  runWorkload,
} from '@stepload/core';
import type { CommandExecutor, CommandResult, InfoInit, WorkloadContext } from '@stepload/core';

import { CommandWorkload } from '../command.js';
import { Workload as Cornet } from '../cornet/flow.js';
import { Workload as Example } from '../example/flow.js';
import { Workload as Nst } from '../nst/flow.js';
import { Workload as Sandstone } from '../sandstone/flow.js';
import { config as nstConfig } from '../nst/config.js';

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    stdout: 'ok',
    stderr: '',
    timedOut: false,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:05.000Z',
    ...overrides,
  };
}

describe('CommandWorkload', () => {
  let outputDir: string;
  let exec: Mock<CommandExecutor['exec']>;

  function context(init: Partial<InfoInit> = {}): WorkloadContext {
    return {
      info: new Info({
        name: 'Command',
        description: 'command test',
        nodes: ['test-host'],
        maxDuration: 60,
        accelerators: 4,
        timeout: 90,
        seed: 5,
        ...init,
      }),
      node: 'test-host',
      random: new SeededRandom(5),
      executor: { exec },
      outputDir,
      signal: new AbortController().signal,
      logger: createLogger('command-test'),
    };
  }

  beforeEach(async () => {
    outputDir = join(await mkdtemp(join(tmpdir(), 'stepload-command-')), 'out');
    exec = vi.fn<CommandExecutor['exec']>(async () => result());
  });

  afterEach(async () => {
    await rm(join(outputDir, '..'), { recursive: true, force: true });
  });

  it('expands the context into the command line and appends args', () => {
    expect(new Nst().command(context({ args: '--verbose' }))).toEqual([
      'nst',
      '--test_mode',
      '--devices',
      '4',
      '--duration',
      '60',
      '--verbose',
      '-t',
      'individual',
    ]);
  });

  it('keeps an explicit test mode from the args', () => {
    expect(new Nst().command(context({ args: '-t pairs' })).slice(-2)).toEqual(['-t', 'pairs']);
  });

  it('fills parameters from their defaults and draws from the step stream', () => {
    const expected = new SeededRandom(5).int(0, 1_000_000_000);
    expect(new Cornet().command(context())).toEqual([
      'cornet',
      '--ranks',
      '4',
      '--iterations',
      '1000',
      '--seed',
      String(expected),
    ]);
  });

  it('expands the node placeholder', () => {
    expect(new Example().command(context())).toEqual([
      'echo',
      'example',
      'workload',
      'on',
      'test-host',
      'for',
      '60s,',
      'parameter',
      '0',
    ]);
  });

  it('leaves unknown placeholders untouched', () => {
    class Custom extends CommandWorkload {
      constructor() {
        super({ name: 'custom', binary: 'tool', description: 'custom tool', run: 'tool {unknown}' });
      }
    }
    expect(new Custom().command(context())).toEqual(['tool', '{unknown}']);
  });

  it('needs a run command or a binary', () => {
    class Bare extends CommandWorkload {
      constructor() {
        super({ name: 'bare', binary: null, description: 'nothing to run' });
      }
    }
    expect(() => new Bare().command(context())).toThrow(
      new IntegrityError('Workload bare has neither a run command nor a binary'),
    );
  });

  it('runs the command in its output folder and writes a log', async () => {
    const ctx = context();
    const registry = new WorkloadRegistry().register('nst', { config: nstConfig, Workload: Nst });
    const output = await runWorkload('nst', registry, ctx);

    expect(exec).toHaveBeenCalledWith(new Nst().command(context()), {
      cwd: outputDir,
      timeoutMs: 90_000,
      signal: ctx.signal,
    });
    expect(output).toEqual({
      stdout: 'ok',
      stderr: '',
      exitCode: 0,
      folder: outputDir,
      log: join(outputDir, FileNames.Log),
    });
    const log = await readFile(join(outputDir, FileNames.Log), 'utf-8');
    expect(log.split('\n').slice(0, 4)).toEqual([
      '$ nst --test_mode --devices 4 --duration 60 -t individual',
      '# started 2026-01-01T00:00:00.000Z, finished 2026-01-01T00:00:05.000Z, exit code 0',
      '## stdout',
      'ok',
    ]);
  });

  it('fails verification on a non-zero exit code', async () => {
    exec.mockResolvedValue(result({ exitCode: 3 }));
    const registry = new WorkloadRegistry().register('nst', { config: nstConfig, Workload: Nst });
    await expect(runWorkload('nst', registry, context())).rejects.toThrow(
      new VerificationError('Workload nst exited with code 3'),
    );
  });

  it('fails sandstone verification when a test reports failure', async () => {
    const sandstone = new Sandstone();
    const ctx = context();
    const output = { stdout: 'tests:\n  - test: fp_fma\n\nexit: fail\n', stderr: '', exitCode: 0, folder: null, log: null };
    await expect(sandstone.verify(ctx, output)).rejects.toThrow('Workload sandstone reported failing tests');
    await expect(sandstone.verify(ctx, { ...output, stdout: 'exit: pass\n' })).resolves.toBeUndefined();
  });
});
