/**
 * Shared constants: lifecycle verbs, config keys, defaults and bounds.
 */

export const VERSION = '0.1.0';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LIFECYCLE_PHASES = ['setup', 'run', 'teardown', 'verify'] as const;
export type LifecyclePhase = (typeof LIFECYCLE_PHASES)[number];

/** Workloads a configuration may name. Resolution to code happens through a registry. */
export const WORKLOAD_CATALOG = [
  'cornet',
  'floresta',
  'hl_qual',
  'llama2_70b',
  'llama3_70b',
  'llama_3_1_405b',
  'nst',
  'sandstone',
] as const;

export const ConfigKeys = {
  Accelerators: 'accelerators',
  Args: 'args',
  Debug: 'debug',
  Delay: 'delay',
  Description: 'description',
  Duration: 'duration',
  File: 'file',
  LogLevel: 'log_level',
  MaximumCores: 'maximum_cores',
  MaximumMemory: 'maximum_memory',
  MaximumThreads: 'maximum_threads',
  MaximumWorkloads: 'maximum_workloads',
  MinimumCores: 'minimum_cores',
  MinimumMemory: 'minimum_memory',
  MinimumThreads: 'minimum_threads',
  MinimumWorkloads: 'minimum_workloads',
  Name: 'name',
  Nodes: 'nodes',
  OptionalWorkloads: 'optional_workloads',
  Seed: 'seed',
  Timeout: 'timeout',
  Workload: 'workload',
  Workloads: 'workloads',
} as const;

export const MANDATORY_CONFIG_KEYS = [
  ConfigKeys.Name,
  ConfigKeys.Description,
  ConfigKeys.Accelerators,
  ConfigKeys.Workloads,
  ConfigKeys.Timeout,
] as const;

export const ConfigDefaults = {
  accelerators: 8,
  delay: 0,
  debug: false,
  duration: 5 * 60,
  logLevel: 'INFO' as LogLevel,
  maxMemory: null,
  maxCores: null,
  maxThreads: null,
  maxWorkloads: 100,
  minMemory: 2,
  minCores: 1,
  minThreads: 1,
  minWorkloads: 1,
  seed: 12345,
  timeout: 60 * 60,
} as const;

export const Limits = {
  maxSeed: 1_000_000_000,
  maxDurationSeconds: 10_000,
} as const;

/** Node identifiers that always mean "this host". */
export const LOCAL_NODE_ALIASES: readonly string[] = ['', '.', 'local', 'localhost'];

/** Label used in result keys and output folders. */
export function nodeLabel(node: string): string {
  return node === '' || node === '.' ? 'local' : node;
}

export const FileNames = {
  Schedule: 'schedule.json',
  Log: 'stepload.log',
} as const;
