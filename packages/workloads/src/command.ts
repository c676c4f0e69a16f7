import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { FileNames, IntegrityError, Limits, VerificationError, WorkloadBase } from '@stepload/core';
import type { WorkloadContext, WorkloadOutput } from '@stepload/core';

const PLACEHOLDER = /\{(\w+)\}/g;

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * A workload that runs its config's `run` command line.
 *
 * `{duration}`, `{timeout}`, `{accelerators}`, `{seed}` and `{node}` expand
 * from the load's context, `{random}` draws from the step's random stream and
 * any other `{name}` falls back to the default of the matching config
 * parameter. The load's `args` are appended.
 */
export class CommandWorkload extends WorkloadBase {
  /** Expanded argv for one run. */
  command(ctx: WorkloadContext): string[] {
    const template = this.cfg.run ?? this.binary;
    if (!template) {
      throw new IntegrityError(`Workload ${this.name} has neither a run command nor a binary`);
    }
    const values: Record<string, string | number> = {
      duration: ctx.info.maxDuration,
      timeout: ctx.info.timeout,
      accelerators: ctx.info.accelerators,
      seed: ctx.info.seed,
      node: ctx.node,
    };
    for (const [key, parameter] of Object.entries(this.cfg.parameters ?? {})) {
      values[key] ??= String(parameter.default);
    }
    const expanded = template.replace(PLACEHOLDER, (match, key: string) => {
      if (key === 'random') return String(ctx.random.int(0, Limits.maxSeed));
      const value = values[key];
      return value === undefined ? match : String(value);
    });
    return [...words(expanded), ...words(ctx.info.args)];
  }

  protected async _setup(ctx: WorkloadContext): Promise<void> {
    await mkdir(ctx.outputDir, { recursive: true });
  }

  protected async _run(ctx: WorkloadContext): Promise<WorkloadOutput> {
    const argv = this.command(ctx);
    ctx.logger.debug({ argv }, 'Executing workload command');

    const result = await ctx.executor.exec(argv, {
      cwd: ctx.outputDir,
      timeoutMs: ctx.info.timeout * 1000,
      signal: ctx.signal,
    });

    const log = join(ctx.outputDir, FileNames.Log);
    await writeFile(
      log,
      [
        `$ ${argv.join(' ')}`,
        `# started ${result.startedAt}, finished ${result.finishedAt}, exit code ${result.exitCode}`,
        '## stdout',
        result.stdout,
        '## stderr',
        result.stderr,
        '',
      ].join('\n'),
      'utf-8',
    );

    if (result.timedOut) {
      ctx.logger.warn({ timeout: ctx.info.timeout }, 'Workload command timed out');
    } else if (result.exitCode !== 0) {
      ctx.logger.warn({ exitCode: result.exitCode }, 'Workload command failed');
    }
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
      folder: ctx.outputDir,
      log,
    };
  }

  protected async _verify(_ctx: WorkloadContext, output: WorkloadOutput): Promise<void> {
    if (output.exitCode !== 0) {
      throw new VerificationError(`Workload ${this.name} exited with code ${output.exitCode}`);
    }
  }
}
