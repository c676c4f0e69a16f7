import { hostname } from 'node:os';

import { ConfigDefaults, LOG_LEVELS, Limits, nodeLabel } from './definitions.js';
import type { LogLevel } from './definitions.js';
import { ConstraintError } from './errors.js';
import type { InfoData } from './types.js';

export interface InfoInit {
  name: string;
  description: string;
  nodes?: readonly string[];
  debug?: boolean;
  logLevel?: LogLevel;
  seed?: number;
  args?: string;
  maxDuration?: number;
  accelerators?: number;
  maxCores?: number | null;
  maxThreads?: number | null;
  maxMemory?: number | null;
  minMemory?: number;
  minCores?: number;
  minThreads?: number;
  minWorkloads?: number;
  maxWorkloads?: number;
  timeout?: number;
  delay?: number;
}

/** Fields a single workload entry may override on the context it inherits. */
export type InfoOverrides = Partial<
  Pick<
    InfoInit,
    | 'description'
    | 'nodes'
    | 'debug'
    | 'logLevel'
    | 'seed'
    | 'args'
    | 'maxDuration'
    | 'accelerators'
    | 'maxCores'
    | 'maxThreads'
    | 'maxMemory'
    | 'timeout'
  >
>;

/** Identifier of the host this process runs on. */
export function localNodeId(): string {
  return hostname();
}

export function validSeed(seed: number): number {
  if (!Number.isInteger(seed)) throw new ConstraintError(`Invalid seed: ${seed} is not an integer`);
  if (seed < 0) throw new ConstraintError(`Invalid seed: ${seed}, seed value should be 0 or higher`);
  if (seed > Limits.maxSeed) {
    throw new ConstraintError(`Invalid seed: ${seed}, seed value should be at most ${Limits.maxSeed}`);
  }
  return seed;
}

/** Durations are whole seconds in (0, 10000]. */
export function validDuration(seconds: number, label = 'duration'): number {
  if (!Number.isInteger(seconds)) throw new ConstraintError(`Invalid ${label}: ${seconds} is not an integer`);
  if (seconds <= 0) throw new ConstraintError(`Invalid ${label}: ${seconds}, value should be higher than 0`);
  if (seconds > Limits.maxDurationSeconds) {
    throw new ConstraintError(
      `Invalid ${label}: ${seconds}, value should be at most ${Limits.maxDurationSeconds} seconds`,
    );
  }
  return seconds;
}

function positive(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConstraintError(`Invalid ${label}: ${value}`);
  }
  return value;
}

function optionalPositive(value: number | null, label: string): number | null {
  return value === null ? null : positive(value, label);
}

function ordered(min: number, max: number | null, label: string): void {
  if (max !== null && max < min) {
    throw new ConstraintError(`Invalid ${label}: maximum (${max}) is lower than minimum (${min})`);
  }
}

/**
 * Run context and constraints governing a schedule, step or load.
 *
 * Every field is checked in the constructor and the instance is frozen, so an
 * `Info` that exists always satisfies its invariants.
 */
export class Info {
  readonly name: string;
  readonly description: string;
  readonly nodes: readonly string[];
  readonly debug: boolean;
  readonly logLevel: LogLevel;
  readonly seed: number;
  readonly args: string;
  readonly maxDuration: number;
  readonly accelerators: number;
  readonly maxCores: number | null;
  readonly maxThreads: number | null;
  readonly maxMemory: number | null;
  readonly minMemory: number;
  readonly minCores: number;
  readonly minThreads: number;
  readonly minWorkloads: number;
  readonly maxWorkloads: number;
  readonly timeout: number;
  readonly delay: number;

  constructor(init: InfoInit) {
    if (!init.name || init.name.trim().length === 0) {
      throw new ConstraintError('Invalid configuration: missing name');
    }
    if (!init.description || init.description.trim().length === 0) {
      throw new ConstraintError('Invalid configuration: missing description');
    }
    this.name = init.name;
    this.description = init.description;

    const nodes = init.nodes ?? [localNodeId()];
    if (nodes.length === 0) throw new ConstraintError('Invalid nodes: at least one node is required');
    // Each node owns one result key and output folder.
    const labels = new Set<string>();
    for (const node of nodes) {
      const label = nodeLabel(node);
      if (labels.has(label)) throw new ConstraintError(`Invalid nodes: "${label}" is listed more than once`);
      labels.add(label);
    }
    this.nodes = Object.freeze([...nodes]);

    this.debug = init.debug ?? ConfigDefaults.debug;
    this.logLevel = init.logLevel ?? ConfigDefaults.logLevel;
    if (!LOG_LEVELS.includes(this.logLevel)) {
      throw new ConstraintError(`Invalid log level: ${String(this.logLevel)}`);
    }
    this.seed = validSeed(init.seed ?? ConfigDefaults.seed);
    this.args = init.args ?? '';
    this.maxDuration = validDuration(init.maxDuration ?? ConfigDefaults.duration, 'duration');
    this.accelerators = positive(init.accelerators ?? ConfigDefaults.accelerators, 'accelerators');

    // TODO: compare the resource ceilings against the nodes' hardware once node inventory exists
    this.maxCores = optionalPositive(init.maxCores ?? ConfigDefaults.maxCores, 'maximum cores');
    this.maxThreads = optionalPositive(init.maxThreads ?? ConfigDefaults.maxThreads, 'maximum threads');
    this.maxMemory = optionalPositive(init.maxMemory ?? ConfigDefaults.maxMemory, 'maximum memory');
    this.minMemory = positive(init.minMemory ?? ConfigDefaults.minMemory, 'minimum memory');
    this.minCores = positive(init.minCores ?? ConfigDefaults.minCores, 'minimum cores');
    this.minThreads = positive(init.minThreads ?? ConfigDefaults.minThreads, 'minimum threads');
    this.minWorkloads = positive(init.minWorkloads ?? ConfigDefaults.minWorkloads, 'minimum workloads');
    this.maxWorkloads = positive(init.maxWorkloads ?? ConfigDefaults.maxWorkloads, 'maximum workloads');
    ordered(this.minCores, this.maxCores, 'cores');
    ordered(this.minThreads, this.maxThreads, 'threads');
    ordered(this.minMemory, this.maxMemory, 'memory');
    ordered(this.minWorkloads, this.maxWorkloads, 'workloads');

    this.timeout = validDuration(init.timeout ?? ConfigDefaults.timeout, 'timeout');
    this.delay = init.delay ?? ConfigDefaults.delay;
    if (!Number.isInteger(this.delay) || this.delay < 0) {
      throw new ConstraintError(`Invalid delay: ${this.delay}`);
    }

    Object.freeze(this);
  }

  /**
   * Build a child context for one load. Overrides may tighten the parent's
   * limits but never exceed them.
   */
  derive(overrides: InfoOverrides): Info {
    const base = this.toJSON();
    const child = new Info({
      ...base,
      description: overrides.description ?? base.description,
      nodes: overrides.nodes ?? base.nodes,
      debug: overrides.debug ?? base.debug,
      logLevel: overrides.logLevel ?? base.logLevel,
      seed: overrides.seed ?? base.seed,
      args: overrides.args ?? base.args,
      maxDuration: overrides.maxDuration ?? base.maxDuration,
      accelerators: overrides.accelerators ?? base.accelerators,
      maxCores: overrides.maxCores ?? base.maxCores,
      maxThreads: overrides.maxThreads ?? base.maxThreads,
      maxMemory: overrides.maxMemory ?? base.maxMemory,
      timeout: overrides.timeout ?? base.timeout,
    });

    const ceilings = [
      ['timeout', this.timeout, child.timeout],
      ['max_duration', this.maxDuration, child.maxDuration],
      ['accelerators', this.accelerators, child.accelerators],
      ['max_cores', this.maxCores, child.maxCores],
      ['max_threads', this.maxThreads, child.maxThreads],
      ['max_memory', this.maxMemory, child.maxMemory],
    ] as const;
    for (const [key, parent, value] of ceilings) {
      if (parent !== null && value !== null && value > parent) {
        throw new ConstraintError(
          `Override ${key} (${value}) for "${this.name}" exceeds the parent limit (${parent})`,
        );
      }
    }
    return child;
  }

  toJSON(): InfoData {
    return {
      name: this.name,
      description: this.description,
      nodes: [...this.nodes],
      debug: this.debug,
      logLevel: this.logLevel,
      seed: this.seed,
      args: this.args,
      maxDuration: this.maxDuration,
      accelerators: this.accelerators,
      maxCores: this.maxCores,
      maxThreads: this.maxThreads,
      maxMemory: this.maxMemory,
      minMemory: this.minMemory,
      minCores: this.minCores,
      minThreads: this.minThreads,
      minWorkloads: this.minWorkloads,
      maxWorkloads: this.maxWorkloads,
      timeout: this.timeout,
      delay: this.delay,
    };
  }
}
