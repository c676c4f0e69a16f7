import { z } from 'zod';

import { LOG_LEVELS, WORKLOAD_CATALOG } from './definitions.js';

// --- Hints surfaced in validation errors ---

export const NAME_HINT = 'The config name should match the format [a-zA-Z0-9_-(). ]+';
export const DESCRIPTION_HINT = 'The description value should be a string containing letters or digits';
export const ACCELERATORS_HINT = 'The accelerator value should be an integer';
export const TIMEOUT_HINT = 'The timeout value should be an integer';
export const WORKLOADS_HINT =
  'The workloads value should be a list whose entries are a workload name, a list of workloads to run in parallel, or an object with a "workload" field';
export const LOG_LEVEL_HINT = `The log level should be one of ${LOG_LEVELS.join(', ')}`;

const NAME_PATTERN = /^[a-zA-Z0-9_\-(). ]+$/;
const HAS_ALPHANUMERIC = /[a-zA-Z0-9]/;

function integer(hint: string) {
  return z.number({ invalid_type_error: hint }).int({ message: hint });
}

function required(key: string, hint: string) {
  return { required_error: `The config requires "${key}"`, invalid_type_error: hint };
}

// --- Log level ---

export const LogLevelSchema = z.enum(LOG_LEVELS, { errorMap: () => ({ message: LOG_LEVEL_HINT }) });

// --- Workload entries ---

export function createWorkloadNameSchema(names: readonly string[]) {
  return z
    .string({ invalid_type_error: WORKLOADS_HINT })
    .refine(
      (name) => names.includes(name),
      (name) => ({ message: `Unknown workload "${name}", expected one of: ${names.join(', ')}` }),
    );
}

export function createWorkloadMetadataSchema(names: readonly string[]) {
  return z.object({
    workload: createWorkloadNameSchema(names),
    max_duration: z.number().int().optional(),
    accelerators: z.number().int().optional(),
    max_cores: z.number().int().optional(),
    max_threads: z.number().int().optional(),
    max_memory: z.number().int().optional(),
    timeout: z.number().int().optional(),
    seed: z.number().int().optional(),
    description: z.string().optional(),
    args: z.string().optional(),
    system: z.string().optional(),
    debug: z.boolean().optional(),
    log_level: LogLevelSchema.optional(),
  });
}

export function createWorkloadEntrySchema(names: readonly string[]) {
  const name = createWorkloadNameSchema(names);
  const metadata = createWorkloadMetadataSchema(names);
  const group = z.array(z.union([name, metadata, z.array(name)]));
  return z.union([name, group, metadata], { errorMap: () => ({ message: WORKLOADS_HINT }) });
}

// --- Configuration ---

export function createConfigSchema(names: readonly string[] = WORKLOAD_CATALOG) {
  const entry = createWorkloadEntrySchema(names);
  return z
    .object({
      name: z.string(required('name', NAME_HINT)).regex(NAME_PATTERN, { message: NAME_HINT }),
      description: z
        .string(required('description', DESCRIPTION_HINT))
        .regex(HAS_ALPHANUMERIC, { message: DESCRIPTION_HINT }),
      accelerators: z.number(required('accelerators', ACCELERATORS_HINT)).int({ message: ACCELERATORS_HINT }),
      workloads: z.array(entry, required('workloads', WORKLOADS_HINT)),
      timeout: z.number(required('timeout', TIMEOUT_HINT)).int({ message: TIMEOUT_HINT }),
      optional_workloads: z.array(entry).optional(),
      nodes: z.array(z.string()).nullable().optional(),
      delay: integer('The delay value should be an integer').optional(),
      duration: integer('The duration value should be an integer').optional(),
      seed: integer('The seed value should be an integer').optional(),
      maximum_memory: integer('The maximum memory value should be an integer').nullable().optional(),
      maximum_cores: integer('The maximum cores value should be an integer').nullable().optional(),
      maximum_threads: integer('The maximum threads value should be an integer').nullable().optional(),
      maximum_workloads: integer('The maximum workloads value should be an integer').optional(),
      minimum_memory: integer('The minimum memory value should be an integer').optional(),
      minimum_cores: integer('The minimum cores value should be an integer').optional(),
      minimum_threads: integer('The minimum threads value should be an integer').optional(),
      minimum_workloads: integer('The minimum workloads value should be an integer').optional(),
      debug: z.boolean().optional(),
      log_level: LogLevelSchema.optional(),
      args: z.string().optional(),
      file: z.string().optional(),
    })
    .passthrough();
}

export const ConfigSchema = createConfigSchema();
export const WorkloadMetadataSchema = createWorkloadMetadataSchema(WORKLOAD_CATALOG);
export const WorkloadEntrySchema = createWorkloadEntrySchema(WORKLOAD_CATALOG);

// --- Serialized schedule ---

export const InfoDataSchema = z.object({
  name: z.string(),
  description: z.string(),
  nodes: z.array(z.string()),
  debug: z.boolean(),
  logLevel: LogLevelSchema,
  seed: z.number().int(),
  args: z.string(),
  maxDuration: z.number().int(),
  accelerators: z.number().int(),
  maxCores: z.number().int().nullable(),
  maxThreads: z.number().int().nullable(),
  maxMemory: z.number().int().nullable(),
  minMemory: z.number().int(),
  minCores: z.number().int(),
  minThreads: z.number().int(),
  minWorkloads: z.number().int(),
  maxWorkloads: z.number().int(),
  timeout: z.number().int(),
  delay: z.number().int(),
});

export const LoadDataSchema = z.object({
  workload: z.string().min(1),
  info: InfoDataSchema,
});

export const StepDataSchema = z.object({
  workloads: z.array(LoadDataSchema),
  info: InfoDataSchema,
});

export const ScheduleDataSchema = z.object({
  steps: z.array(StepDataSchema),
  info: InfoDataSchema,
});

// --- Workload module config ---

export const WorkloadParameterSchema = z.object({
  description: z.string(),
  type: z.enum(['int', 'float', 'string', 'bool']),
  default: z.union([z.number(), z.string(), z.boolean()]),
});

export const WorkloadConfigSchema = z.object({
  name: z.string().min(1),
  binary: z.string().nullable(),
  description: z.string().min(1),
  run: z.string().optional(),
  download: z.string().optional(),
  parameters: z.record(z.string(), WorkloadParameterSchema).optional(),
});

// --- RetryStrategy ---

export const RetryStrategySchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  backoff: z.enum(['exponential', 'linear', 'constant']),
  baseDelayMs: z.number().int().positive(),
  maxDelayMs: z.number().int().positive(),
}).refine(
  (data) => data.maxDelayMs >= data.baseDelayMs,
  { message: 'maxDelayMs must be >= baseDelayMs' },
);
