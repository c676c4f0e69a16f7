import { join } from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';

import {
  Info,
  LIFECYCLE_PHASES,
  LOG_LEVELS,
  LocalProcessExecutor,
  SeededRandom,
  VERSION,
  ValidationError,
  buildSchedule,
  checkWorkloadIntegrity,
  createLogger,
  createRunLogger,
  loadConfig,
  loadSchedule,
  localNodeId,
  mergeConfig,
  runSchedule,
  runWorkload,
  saveSchedule,
} from '@stepload/core';
import type {
  CommandExecutor,
  LifecyclePhase,
  LogLevel,
  NodeProbe,
  RemoteDispatcher,
  Schedule,
  WorkloadRegistry,
} from '@stepload/core';
import { createRegistry, generateWorkload } from '@stepload/workloads';

import { formatResults, formatSchedule } from './format.js';
import { listConfigs, resolveConfigPath, resolveSettings } from './settings.js';
import type { Settings } from './settings.js';

const log = createLogger('cli');

/** Collaborators the commands use; tests swap in fakes. */
export interface ProgramDeps {
  registry?: WorkloadRegistry;
  probe?: NodeProbe;
  executor?: CommandExecutor;
  dispatcher?: RemoteDispatcher;
  localNode?: string;
  env?: NodeJS.ProcessEnv;
}

interface OverrideOpts {
  seed?: number;
  timeout?: number;
  duration?: number;
  logLevel?: LogLevel;
  nodes?: string[];
  output?: string;
}

interface RunOpts extends OverrideOpts {
  scheduleFile?: string;
  verify: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
  return parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function withOverrides(command: Command): Command {
  return command
    .option('--seed <n>', 'Override the random seed', parseInteger)
    .option('--timeout <seconds>', 'Override the per-workload timeout', parseInteger)
    .option('--duration <seconds>', 'Override the maximum workload duration', parseInteger)
    .addOption(new Option('--log-level <level>', 'Override the log level').choices(LOG_LEVELS))
    .option('--nodes <list>', 'Comma-separated nodes to run on', parseList)
    .option('-o, --output <dir>', 'Output directory');
}

/** Flag values as config keys; flags left unset add nothing. */
function overridesFrom(opts: OverrideOpts): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (opts.seed !== undefined) overrides['seed'] = opts.seed;
  if (opts.timeout !== undefined) overrides['timeout'] = opts.timeout;
  if (opts.duration !== undefined) overrides['duration'] = opts.duration;
  if (opts.logLevel !== undefined) overrides['log_level'] = opts.logLevel;
  if (opts.nodes !== undefined) overrides['nodes'] = opts.nodes;
  return overrides;
}

/**
 * Load every config in order, merge later ones over earlier ones, apply the
 * command-line overrides and build the schedule.
 */
async function scheduleFromConfigs(
  inputs: readonly string[],
  opts: OverrideOpts,
  settings: Settings,
  registry: WorkloadRegistry,
  localNode: string | undefined,
): Promise<Schedule> {
  let merged: Record<string, unknown> = {};
  for (const input of inputs) {
    const path = await resolveConfigPath(input, settings.configDir);
    const config = await loadConfig(path, { check: false });
    const result = mergeConfig(merged, config);
    if (result.overridden.length > 0) log.debug({ config: path, keys: result.overridden }, 'Config keys overridden');
    merged = result.merged;
  }
  merged = mergeConfig(merged, overridesFrom(opts)).merged;
  return buildSchedule(merged, { workloads: registry.list(), localNode });
}

/** Abort signal tied to Ctrl-C for the duration of `fn`. */
async function interruptible<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onInterrupt);
  try {
    return await fn(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const registry = deps.registry ?? createRegistry();

  const program = new Command();
  program.name('stepload').description('Stepwise workload scheduler for stress and qualification runs').version(VERSION);

  // ----- Schedules -----

  withOverrides(
    program
      .command('run')
      .description('Run a schedule built from config files, or a saved schedule')
      .argument('[configs...]', 'Config files or names in the config directory')
      .option('-s, --schedule-file <file>', 'Run a schedule saved by "stepload schedule"')
      .option('--no-verify', 'Skip the verify phase'),
  ).action(async (configs: string[], opts: RunOpts) => {
    const settings = resolveSettings(opts, env);
    let schedule: Schedule;
    if (opts.scheduleFile !== undefined) {
      schedule = await loadSchedule(opts.scheduleFile);
    } else if (configs.length > 0) {
      schedule = await scheduleFromConfigs(configs, opts, settings, registry, deps.localNode);
    } else {
      throw new ValidationError('Provide a config file or --schedule-file');
    }

    console.log(formatSchedule(schedule));
    const results = await interruptible((signal) =>
      runSchedule(schedule, {
        registry,
        probe: deps.probe,
        executor: deps.executor,
        dispatcher: deps.dispatcher,
        localNode: deps.localNode,
        outputRoot: settings.outputDir,
        verify: opts.verify,
        signal,
      }),
    );
    console.log(formatResults(results));
  });

  withOverrides(
    program
      .command('schedule')
      .description('Build a schedule from config files and save it')
      .argument('<configs...>', 'Config files or names in the config directory'),
  ).action(async (configs: string[], opts: OverrideOpts) => {
    const settings = resolveSettings(opts, env);
    const schedule = await scheduleFromConfigs(configs, opts, settings, registry, deps.localNode);
    const file = await saveSchedule(schedule, join(settings.outputDir, 'schedule.json'));
    console.log(formatSchedule(schedule));
    console.log(`Schedule saved to ${file}`);
  });

  withOverrides(
    program
      .command('check')
      .description('Check config files, and optionally every registered workload')
      .argument('[configs...]', 'Config files or names in the config directory')
      .option('-w, --workloads', 'Also check the integrity of every registered workload'),
  ).action(async (configs: string[], opts: OverrideOpts & { workloads?: boolean }) => {
    const settings = resolveSettings(opts, env);
    if (configs.length === 0 && !opts.workloads) {
      throw new ValidationError('Provide a config file or --workloads');
    }
    if (configs.length > 0) {
      const schedule = await scheduleFromConfigs(configs, opts, settings, registry, deps.localNode);
      const total = schedule.steps.reduce((sum, step) => sum + step.workloads.length, 0);
      console.log(`Config "${schedule.info.name}" is valid (steps: ${schedule.steps.length}, workloads: ${total})`);
    }
    if (opts.workloads) {
      for (const name of registry.list()) {
        await checkWorkloadIntegrity(name, registry, { root: settings.workloadDir });
        console.log(`Workload ${name} is valid`);
      }
    }
  });

  // ----- Catalog -----

  program
    .command('list')
    .description('List registered workloads and available config files')
    .action(async () => {
      const settings = resolveSettings({}, env);
      console.log('Workloads:');
      for (const name of registry.list()) console.log(`  ${name}`);
      const configs = await listConfigs(settings.configDir);
      console.log(`Configs in ${settings.configDir}:`);
      if (configs.length === 0) console.log('  (none)');
      for (const config of configs) console.log(`  ${config}`);
    });

  program
    .command('version')
    .description('Print the version')
    .action(() => {
      console.log(VERSION);
    });

  program
    .command('generate')
    .description('Create a new workload folder from an existing one')
    .argument('<name>', 'Name of the new workload')
    .option('--from <workload>', 'Workload to copy', 'example')
    .action(async (name: string, opts: { from: string }) => {
      const settings = resolveSettings({}, env);
      const folder = await generateWorkload(name, { root: settings.workloadDir, registry, from: opts.from });
      console.log(`Workload created in ${folder}`);
    });

  // ----- Single workload phases -----

  const phaseCommands: Array<[string, string, readonly LifecyclePhase[]]> = [
    ['setup', 'Run the setup phase of one workload', ['setup']],
    ['teardown', 'Run the teardown phase of one workload', ['teardown']],
    ['verify', 'Run one workload through its whole lifecycle and verify the output', LIFECYCLE_PHASES],
  ];
  for (const [verb, description, phases] of phaseCommands) {
    withOverrides(
      program.command(verb).description(description).argument('<workload>', 'Registered workload name'),
    ).action(async (name: string, opts: OverrideOpts) => {
      const settings = resolveSettings(opts, env);
      const node = opts.nodes?.[0] ?? deps.localNode ?? localNodeId();
      const info = new Info({
        name: `workload ${name}`,
        description: `Single ${verb} of ${name}`,
        nodes: [node],
        logLevel: opts.logLevel,
        seed: opts.seed,
        timeout: opts.timeout,
        maxDuration: opts.duration,
      });
      const logger = createRunLogger('cli', info, { workload: name });
      const output = await interruptible((signal) =>
        runWorkload(name, registry, {
          info,
          node,
          random: new SeededRandom(info.seed),
          executor: deps.executor ?? new LocalProcessExecutor(),
          outputDir: join(settings.outputDir, name),
          signal,
          logger,
        }, phases),
      );
      if (output) console.log(formatResults({ [name]: output }));
      console.log(`Workload ${name}: ${verb} done`);
    });
  }

  return program;
}
