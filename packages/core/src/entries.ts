import type { InfoOverrides } from './info.js';
import type { RawWorkloadEntry, WorkloadMetadata } from './types.js';

export interface SingleEntry {
  kind: 'single';
  workload: string;
}

export interface MetadataEntry {
  kind: 'withMetadata';
  workload: string;
  overrides: InfoOverrides;
}

export interface ParallelEntry {
  kind: 'parallel';
  entries: Array<SingleEntry | MetadataEntry>;
}

/** One item of a configuration's `workloads` list, parsed once before scheduling. */
export type WorkloadEntry = SingleEntry | MetadataEntry | ParallelEntry;

type RawMember = string | WorkloadMetadata | string[];

export function metadataToOverrides(metadata: WorkloadMetadata): InfoOverrides {
  return {
    description: metadata.description,
    nodes: metadata.system !== undefined ? [metadata.system] : undefined,
    debug: metadata.debug,
    logLevel: metadata.log_level,
    seed: metadata.seed,
    args: metadata.args,
    maxDuration: metadata.max_duration,
    accelerators: metadata.accelerators,
    maxCores: metadata.max_cores,
    maxThreads: metadata.max_threads,
    maxMemory: metadata.max_memory,
    timeout: metadata.timeout,
  };
}

function toMember(raw: string | WorkloadMetadata): SingleEntry | MetadataEntry {
  if (typeof raw === 'string') return { kind: 'single', workload: raw };
  return { kind: 'withMetadata', workload: raw.workload, overrides: metadataToOverrides(raw) };
}

/** Nested lists inside a parallel group join the same group. */
function flatten(members: RawMember[]): Array<SingleEntry | MetadataEntry> {
  return members.flatMap((member) => (Array.isArray(member) ? member.map(toMember) : [toMember(member)]));
}

export function parseWorkloadEntry(raw: RawWorkloadEntry): WorkloadEntry {
  if (Array.isArray(raw)) return { kind: 'parallel', entries: flatten(raw) };
  return toMember(raw);
}

export function parseWorkloadEntries(raw: readonly RawWorkloadEntry[]): WorkloadEntry[] {
  return raw.map(parseWorkloadEntry);
}
