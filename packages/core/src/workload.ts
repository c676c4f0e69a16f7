import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';

import { LIFECYCLE_PHASES } from './definitions.js';
import type { LifecyclePhase } from './definitions.js';
import { IntegrityError, ResolutionError, StepLoadError } from './errors.js';
import type { CommandExecutor } from './executor.js';
import type { Info } from './info.js';
import type { SeededRandom } from './random.js';
import { WorkloadConfigSchema } from './schemas.js';
import type { WorkloadConfig, WorkloadOutput } from './types.js';

/** Everything a workload instance may touch while one of its phases runs. */
export interface WorkloadContext {
  info: Info;
  node: string;
  random: SeededRandom;
  executor: CommandExecutor;
  outputDir: string;
  signal: AbortSignal;
  logger: Logger;
}

export function emptyOutput(folder: string | null = null): WorkloadOutput {
  return { stdout: '', stderr: '', exitCode: 0, folder, log: null };
}

/**
 * Base class every workload extends.
 *
 * The public lifecycle methods log and delegate to the protected `_setup`,
 * `_run`, `_teardown` and `_verify` hooks, which subclasses override. The
 * defaults do nothing.
 */
export abstract class WorkloadBase {
  readonly name: string;
  readonly binary: string | null;
  readonly description: string;
  readonly cfg: WorkloadConfig;

  constructor(config: WorkloadConfig) {
    const parsed = WorkloadConfigSchema.safeParse(config);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new IntegrityError(
        `Invalid workload config${issue ? ` at "${issue.path.join('.')}": ${issue.message}` : ''}`,
      );
    }
    this.cfg = parsed.data;
    this.name = parsed.data.name;
    this.binary = parsed.data.binary;
    this.description = parsed.data.description;
  }

  toString(): string {
    return this.name;
  }

  async setup(ctx: WorkloadContext): Promise<void> {
    ctx.logger.debug({ workload: this.name, node: ctx.node }, 'Setting up workload');
    await this._setup(ctx);
  }

  async run(ctx: WorkloadContext): Promise<WorkloadOutput> {
    ctx.logger.info({ workload: this.name, node: ctx.node }, 'Running workload');
    return this._run(ctx);
  }

  async teardown(ctx: WorkloadContext): Promise<void> {
    ctx.logger.debug({ workload: this.name, node: ctx.node }, 'Tearing down workload');
    await this._teardown(ctx);
  }

  async verify(ctx: WorkloadContext, output: WorkloadOutput): Promise<void> {
    ctx.logger.debug({ workload: this.name, node: ctx.node }, 'Verifying workload');
    await this._verify(ctx, output);
  }

  protected async _setup(_ctx: WorkloadContext): Promise<void> {}

  protected async _run(ctx: WorkloadContext): Promise<WorkloadOutput> {
    return emptyOutput(ctx.outputDir);
  }

  protected async _teardown(_ctx: WorkloadContext): Promise<void> {}

  protected async _verify(_ctx: WorkloadContext, _output: WorkloadOutput): Promise<void> {}
}

export type WorkloadConstructor = new () => WorkloadBase;

/** A workload's config paired with the class implementing it. */
export interface WorkloadModule {
  config: WorkloadConfig;
  Workload: WorkloadConstructor;
}

/**
 * Maps workload names to their implementations. Names come from the config;
 * code is only reached through `resolve`.
 */
export class WorkloadRegistry {
  private readonly modules = new Map<string, WorkloadModule>();

  register(name: string, module: WorkloadModule): this {
    if (this.modules.has(name)) {
      throw new IntegrityError(`Workload "${name}" is already registered`);
    }
    this.modules.set(name, module);
    return this;
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  get(name: string): WorkloadModule {
    const module = this.modules.get(name);
    if (!module) {
      throw new ResolutionError(`Workload "${name}" is not registered`);
    }
    return module;
  }

  resolve(name: string): WorkloadBase {
    return new (this.get(name).Workload)();
  }

  list(): string[] {
    return [...this.modules.keys()].sort();
  }
}

export function listWorkloads(registry: WorkloadRegistry): string[] {
  return registry.list();
}

async function existsAs(path: string, kind: 'file' | 'directory'): Promise<boolean> {
  try {
    const info = await stat(path);
    return kind === 'file' ? info.isFile() : info.isDirectory();
  } catch {
    return false;
  }
}

async function anyFile(folder: string, names: readonly string[]): Promise<boolean> {
  for (const name of names) {
    if (await existsAs(join(folder, name), 'file')) return true;
  }
  return false;
}

export interface IntegrityOptions {
  /** Directory holding one folder per workload. Skips the on-disk checks when absent. */
  root?: string;
}

/**
 * Check that a workload satisfies the contract: its folder holds a config and
 * a flow module, its config validates, and its class derives from
 * `WorkloadBase` with every lifecycle method and hook in place.
 */
export async function checkWorkloadIntegrity(
  name: string,
  registry: WorkloadRegistry,
  options: IntegrityOptions = {},
): Promise<true> {
  if (options.root !== undefined) {
    const folder = join(options.root, name);
    if (!(await existsAs(folder, 'directory'))) {
      throw new IntegrityError(`Workload ${name} should exist in ${options.root}`);
    }
    if (!(await anyFile(folder, ['config.ts', 'config.js']))) {
      throw new IntegrityError(`Workload ${name} should have a config module in ${folder}`);
    }
    if (!(await anyFile(folder, ['flow.ts', 'flow.js']))) {
      throw new IntegrityError(`Workload ${name} should have a flow module in ${folder}`);
    }
  }

  let module: WorkloadModule;
  try {
    module = registry.get(name);
  } catch (err) {
    throw new IntegrityError(`Workload ${name} is not registered`, undefined, { cause: err });
  }

  const parsed = WorkloadConfigSchema.safeParse(module.config);
  if (!parsed.success) {
    throw new IntegrityError(`Workload ${name} should have a valid config`, undefined, { cause: parsed.error });
  }

  let instance: unknown;
  try {
    instance = new module.Workload();
  } catch (err) {
    if (err instanceof StepLoadError) throw err;
    throw new IntegrityError(`Workload ${name} could not be instantiated`, undefined, { cause: err });
  }
  if (!(instance instanceof WorkloadBase)) {
    throw new IntegrityError(`Workload ${name} should extend WorkloadBase`);
  }

  for (const attribute of ['name', 'binary', 'description', 'cfg'] as const) {
    if (!(attribute in instance)) {
      throw new IntegrityError(`Workload ${name} should have a "${attribute}" attribute`);
    }
  }
  for (const phase of LIFECYCLE_PHASES) {
    for (const method of [phase, `_${phase}`]) {
      if (typeof Reflect.get(instance, method) !== 'function') {
        throw new IntegrityError(`Workload ${name} should have a "${method}" method`);
      }
    }
  }
  return true;
}

/**
 * Run the given lifecycle phases of a single workload, in order, outside any
 * schedule. Returns the output of `run` when it was among the phases.
 */
export async function runWorkload(
  name: string,
  registry: WorkloadRegistry,
  ctx: WorkloadContext,
  phases: readonly LifecyclePhase[] = LIFECYCLE_PHASES,
): Promise<WorkloadOutput | null> {
  const workload = registry.resolve(name);
  let output: WorkloadOutput | null = null;
  for (const phase of phases) {
    ctx.signal.throwIfAborted();
    switch (phase) {
      case 'setup':
        await workload.setup(ctx);
        break;
      case 'run':
        output = await workload.run(ctx);
        break;
      case 'teardown':
        await workload.teardown(ctx);
        break;
      case 'verify':
        await workload.verify(ctx, output ?? emptyOutput(ctx.outputDir));
        break;
    }
  }
  return output;
}
