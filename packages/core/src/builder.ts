import { checkConfig, loadConfig } from './config.js';
import type { CheckConfigOptions, ConfigInput } from './config.js';
import { ConstraintError } from './errors.js';
import { parseWorkloadEntries } from './entries.js';
import type { MetadataEntry, SingleEntry } from './entries.js';
import { Info, localNodeId } from './info.js';
import { createLogger } from './logger.js';
import { Load, Schedule, Step, verifySchedule } from './schedule.js';

const log = createLogger('builder');

export interface BuildOptions extends CheckConfigOptions {
  /** Node used when the config names none. Defaults to this host. */
  localNode?: string;
}

/**
 * Turn a configuration mapping into a verified schedule.
 *
 * Entries keep their configured order: a bare name or a metadata object
 * becomes a one-load step, a list becomes one step of parallel loads. Loads
 * share the top-level context unless their entry carries overrides.
 */
export function buildSchedule(config: Record<string, unknown>, options: BuildOptions = {}): Schedule {
  const checked = checkConfig(config, options);

  const info = new Info({
    name: checked.name,
    description: checked.description,
    nodes: checked.nodes ?? [options.localNode ?? localNodeId()],
    debug: checked.debug,
    logLevel: checked.log_level,
    seed: checked.seed,
    args: checked.args,
    maxDuration: checked.duration,
    accelerators: checked.accelerators,
    maxCores: checked.maximum_cores,
    maxThreads: checked.maximum_threads,
    maxMemory: checked.maximum_memory,
    minMemory: checked.minimum_memory,
    minCores: checked.minimum_cores,
    minThreads: checked.minimum_threads,
    minWorkloads: checked.minimum_workloads,
    maxWorkloads: checked.maximum_workloads,
    timeout: checked.timeout,
    delay: checked.delay,
  });

  const entries = parseWorkloadEntries(checked.workloads);
  if (entries.length === 0) {
    throw new ConstraintError(`Invalid configuration "${info.name}": need at least one workload`);
  }
  if (checked.optional_workloads && checked.optional_workloads.length > 0) {
    log.debug({ count: checked.optional_workloads.length }, 'optional workloads are validated but not scheduled');
  }

  const toLoad = (entry: SingleEntry | MetadataEntry): Load =>
    new Load(entry.workload, entry.kind === 'withMetadata' ? info.derive(entry.overrides) : info);

  const steps = entries.map((entry, i) => {
    if (entry.kind !== 'parallel') {
      const load = toLoad(entry);
      return new Step([load], load.info);
    }
    if (entry.entries.length === 0) {
      throw new ConstraintError(`Invalid configuration "${info.name}": parallel group ${i + 1} is empty`);
    }
    return new Step(entry.entries.map(toLoad), info);
  });

  const total = steps.reduce((sum, step) => sum + step.workloads.length, 0);
  if (total < info.minWorkloads) {
    throw new ConstraintError(`Schedule has ${total} workloads, fewer than the minimum of ${info.minWorkloads}`);
  }
  if (total > info.maxWorkloads) {
    throw new ConstraintError(`Schedule has ${total} workloads, more than the maximum of ${info.maxWorkloads}`);
  }

  const schedule = new Schedule(steps, info);
  verifySchedule(schedule);
  log.info({ schedule: info.name, steps: steps.length, workloads: total }, 'schedule built');
  return schedule;
}

/**
 * Build a schedule from a mapping or a path to a JSON/YAML config file.
 */
export async function makeSchedule(input: ConfigInput, options: BuildOptions = {}): Promise<Schedule> {
  const config = await loadConfig(input, { ...options, check: false });
  return buildSchedule(config, options);
}
