import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { FileNames } from './definitions.js';
import { ScheduleError } from './errors.js';
import { Info } from './info.js';
import { ScheduleDataSchema } from './schemas.js';
import type { InfoData, LoadData, ScheduleData, StepData } from './types.js';

/**
 * A named workload bound to the context that governs it.
 */
export class Load {
  constructor(
    readonly workload: string,
    readonly info: Info,
  ) {
    Object.freeze(this);
  }

  toJSON(): LoadData {
    return { workload: this.workload, info: this.info.toJSON() };
  }
}

/**
 * Loads that run concurrently; one unit of sequencing.
 */
export class Step {
  readonly workloads: readonly Load[];

  constructor(
    workloads: readonly Load[],
    readonly info: Info,
  ) {
    this.workloads = Object.freeze([...workloads]);
    Object.freeze(this);
  }

  toJSON(): StepData {
    return { workloads: this.workloads.map((load) => load.toJSON()), info: this.info.toJSON() };
  }
}

/**
 * Ordered steps plus the top-level context. Steps run strictly in order.
 */
export class Schedule {
  readonly steps: readonly Step[];

  constructor(
    steps: readonly Step[],
    readonly info: Info,
  ) {
    this.steps = Object.freeze([...steps]);
    Object.freeze(this);
  }

  toJSON(): ScheduleData {
    return { steps: this.steps.map((step) => step.toJSON()), info: this.info.toJSON() };
  }
}

/**
 * Structural gate trusted by the runner. Returns true or throws.
 */
export function verifySchedule(schedule: unknown): schedule is Schedule {
  if (!(schedule instanceof Schedule)) throw new ScheduleError('Invalid schedule: not a Schedule');
  if (!Array.isArray(schedule.steps)) throw new ScheduleError('Invalid schedule steps');
  if (schedule.steps.length === 0) throw new ScheduleError('Need at least one step in the schedule');
  schedule.steps.forEach((step: unknown, i) => {
    if (!(step instanceof Step)) throw new ScheduleError(`Invalid schedule step ${i + 1}`);
    if (!(step.info instanceof Info)) throw new ScheduleError(`Invalid info for step ${i + 1}`);
    if (step.workloads.length === 0) throw new ScheduleError(`Step ${i + 1} has no workloads`);
    step.workloads.forEach((load: unknown, j) => {
      if (!(load instanceof Load)) throw new ScheduleError(`Invalid workload ${j + 1} in step ${i + 1}`);
      if (!(load.info instanceof Info)) {
        throw new ScheduleError(`Invalid info for workload ${j + 1} in step ${i + 1}`);
      }
    });
  });
  if (!(schedule.info instanceof Info)) throw new ScheduleError('Invalid schedule info');
  return true;
}

export function scheduleToData(schedule: Schedule): ScheduleData {
  return schedule.toJSON();
}

/**
 * Rebuild a schedule from its plain form. Every `Info` is reconstructed (and so
 * re-checked); identical contexts come back as one shared instance.
 */
export function scheduleFromData(data: unknown): Schedule {
  const parsed = ScheduleDataSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ScheduleError(`Invalid schedule data${where}: ${issue?.message ?? 'unknown error'}`, undefined, {
      cause: parsed.error,
    });
  }

  const infos = new Map<string, Info>();
  const toInfo = (raw: InfoData): Info => {
    const key = JSON.stringify(raw);
    let info = infos.get(key);
    if (!info) {
      info = new Info(raw);
      infos.set(key, info);
    }
    return info;
  };

  const schedule = new Schedule(
    parsed.data.steps.map(
      (step) => new Step(step.workloads.map((load) => new Load(load.workload, toInfo(load.info))), toInfo(step.info)),
    ),
    toInfo(parsed.data.info),
  );
  verifySchedule(schedule);
  return schedule;
}

/** Write a schedule as JSON. Returns the absolute path written. */
export async function saveSchedule(schedule: Schedule, file: string = FileNames.Schedule): Promise<string> {
  const path = resolve(file);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(scheduleToData(schedule), null, 2) + '\n', 'utf-8');
  return path;
}

/** Read a schedule file; a schedule that fails verification is never returned. */
export async function loadSchedule(file: string = FileNames.Schedule): Promise<Schedule> {
  const raw = await readFile(file, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ScheduleError(`Schedule file ${file} is not valid JSON`, undefined, { cause: err });
  }
  return scheduleFromData(data);
}

/** Group loads by each node they are placed on, in schedule order. */
export function splitSchedule(schedule: Schedule): Map<string, Load[]> {
  const byNode = new Map<string, Load[]>();
  for (const step of schedule.steps) {
    for (const load of step.workloads) {
      for (const node of load.info.nodes) {
        const loads = byNode.get(node) ?? [];
        loads.push(load);
        byNode.set(node, loads);
      }
    }
  }
  return byNode;
}
