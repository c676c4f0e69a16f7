import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { IntegrityError, ResolutionError } from '../errors.js';
import { LocalProcessExecutor } from '../executor.js';
import { Info } from '../info.js';
import { createLogger } from '../logger.js';
import { SeededRandom } from '../random.js';
import type { WorkloadConfig, WorkloadOutput } from '../types.js';
import {
  WorkloadBase,
  WorkloadRegistry,
  checkWorkloadIntegrity,
  emptyOutput,
  listWorkloads,
  runWorkload,
} from '../workload.js';
import type { WorkloadContext, WorkloadConstructor } from '../workload.js';

const config: WorkloadConfig = { name: 'nst', binary: 'nst', description: 'stress test' };
const calls: string[] = [];

class Nst extends WorkloadBase {
  constructor() {
    super(config);
  }

  protected async _setup(): Promise<void> {
    calls.push('setup');
  }

  protected async _run(ctx: WorkloadContext): Promise<WorkloadOutput> {
    calls.push('run');
    return { ...emptyOutput(ctx.outputDir), stdout: 'done' };
  }

  protected async _teardown(): Promise<void> {
    calls.push('teardown');
  }

  protected async _verify(_ctx: WorkloadContext, output: WorkloadOutput): Promise<void> {
    calls.push(`verify:${output.stdout}`);
  }
}

class Plain extends WorkloadBase {
  constructor() {
    super({ name: 'plain', binary: null, description: 'does nothing' });
  }
}

function context(signal: AbortSignal = new AbortController().signal): WorkloadContext {
  return {
    info: new Info({ name: 'Single', description: 'one workload', nodes: ['test-host'] }),
    node: 'test-host',
    random: new SeededRandom(1),
    executor: new LocalProcessExecutor(),
    outputDir: '/tmp/stepload-out',
    signal,
    logger: createLogger('workload-test'),
  };
}

describe('WorkloadBase', () => {
  it('exposes its identity from the config', () => {
    const nst = new Nst();
    expect(nst.name).toBe('nst');
    expect(nst.binary).toBe('nst');
    expect(nst.description).toBe('stress test');
    expect(nst.cfg).toEqual(config);
    expect(String(nst)).toBe('nst');
  });

  it('rejects an invalid config', () => {
    class Broken extends WorkloadBase {
      constructor() {
        super({ name: '', binary: null, description: 'x' });
      }
    }
    expect(() => new Broken()).toThrow(IntegrityError);
  });

  it('does nothing by default and runs with an empty output', async () => {
    const plain = new Plain();
    const ctx = context();
    await expect(plain.setup(ctx)).resolves.toBeUndefined();
    await expect(plain.run(ctx)).resolves.toEqual(emptyOutput('/tmp/stepload-out'));
    await expect(plain.verify(ctx, emptyOutput())).resolves.toBeUndefined();
  });
});

describe('WorkloadRegistry', () => {
  it('resolves registered names to fresh instances', () => {
    const registry = new WorkloadRegistry().register('nst', { config, Workload: Nst });
    const a = registry.resolve('nst');
    expect(a).toBeInstanceOf(Nst);
    expect(registry.resolve('nst')).not.toBe(a);
    expect(registry.has('nst')).toBe(true);
  });

  it('rejects unknown names', () => {
    expect(() => new WorkloadRegistry().resolve('nst')).toThrow(new ResolutionError('Workload "nst" is not registered'));
  });

  it('rejects duplicate registration', () => {
    const registry = new WorkloadRegistry().register('nst', { config, Workload: Nst });
    expect(() => registry.register('nst', { config, Workload: Nst })).toThrow('Workload "nst" is already registered');
  });

  it('lists names in order', () => {
    const registry = new WorkloadRegistry()
      .register('sandstone', { config: { ...config, name: 'sandstone' }, Workload: Plain })
      .register('cornet', { config: { ...config, name: 'cornet' }, Workload: Plain });
    expect(listWorkloads(registry)).toEqual(['cornet', 'sandstone']);
  });
});

describe('runWorkload', () => {
  beforeEach(() => {
    calls.length = 0;
  });

  const registry = new WorkloadRegistry().register('nst', { config, Workload: Nst });

  it('runs the whole lifecycle by default', async () => {
    const output = await runWorkload('nst', registry, context());
    expect(calls).toEqual(['setup', 'run', 'teardown', 'verify:done']);
    expect(output?.stdout).toBe('done');
  });

  it('runs only the selected phases', async () => {
    await expect(runWorkload('nst', registry, context(), ['setup'])).resolves.toBeNull();
    expect(calls).toEqual(['setup']);
  });

  it('verifies an empty output when run was not selected', async () => {
    await runWorkload('nst', registry, context(), ['verify']);
    expect(calls).toEqual(['verify:']);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runWorkload('nst', registry, context(controller.signal))).rejects.toThrow();
    expect(calls).toEqual([]);
  });
});

describe('checkWorkloadIntegrity', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'stepload-integrity-'));
    await mkdir(join(root, 'nst'));
    await writeFile(join(root, 'nst', 'config.ts'), 'export const config = {};\n');
    await writeFile(join(root, 'nst', 'flow.ts'), 'export class Workload {}\n');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('accepts a complete workload', async () => {
    const registry = new WorkloadRegistry().register('nst', { config, Workload: Nst });
    await expect(checkWorkloadIntegrity('nst', registry, { root })).resolves.toBe(true);
  });

  it('checks only the module when no root is given', async () => {
    const registry = new WorkloadRegistry().register('plain', { config, Workload: Plain });
    await expect(checkWorkloadIntegrity('plain', registry)).resolves.toBe(true);
  });

  it('requires the folder', async () => {
    const registry = new WorkloadRegistry().register('cornet', { config, Workload: Nst });
    await expect(checkWorkloadIntegrity('cornet', registry, { root })).rejects.toThrow(
      `Workload cornet should exist in ${root}`,
    );
  });

  it('requires the flow module', async () => {
    await rm(join(root, 'nst', 'flow.ts'));
    const registry = new WorkloadRegistry().register('nst', { config, Workload: Nst });
    await expect(checkWorkloadIntegrity('nst', registry, { root })).rejects.toThrow(
      `Workload nst should have a flow module in ${join(root, 'nst')}`,
    );
  });

  it('requires registration', async () => {
    await expect(checkWorkloadIntegrity('nst', new WorkloadRegistry(), { root })).rejects.toThrow(
      'Workload nst is not registered',
    );
  });

  it('requires a valid config', async () => {
    const registry = new WorkloadRegistry().register('nst', {
      config: { name: 'nst', binary: null, description: '' },
      Workload: Nst,
    });
    await expect(checkWorkloadIntegrity('nst', registry)).rejects.toThrow('Workload nst should have a valid config');
  });

  it('requires a WorkloadBase subclass', async () => {
    class Impostor {
      setup(): void {}
    }
    // Simulates a module whose flow exports an unrelated class.
    const Workload = Impostor as unknown as WorkloadConstructor;
    const registry = new WorkloadRegistry().register('nst', { config, Workload });
    await expect(checkWorkloadIntegrity('nst', registry)).rejects.toThrow('Workload nst should extend WorkloadBase');
  });

  it('requires every lifecycle method', async () => {
    class Incomplete extends Nst {}
    Object.defineProperty(Incomplete.prototype, 'teardown', { value: undefined });
    const registry = new WorkloadRegistry().register('nst', { config, Workload: Incomplete });
    await expect(checkWorkloadIntegrity('nst', registry)).rejects.toThrow('Workload nst should have a "teardown" method');
  });
});
