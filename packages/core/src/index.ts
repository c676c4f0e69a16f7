// Constants
export {
  ConfigDefaults,
  ConfigKeys,
  FileNames,
  LIFECYCLE_PHASES,
  LOCAL_NODE_ALIASES,
  LOG_LEVELS,
  Limits,
  MANDATORY_CONFIG_KEYS,
  VERSION,
  WORKLOAD_CATALOG,
} from './definitions.js';
export type { LifecyclePhase, LogLevel } from './definitions.js';

// Zod schemas
export {
  ACCELERATORS_HINT,
  ConfigSchema,
  DESCRIPTION_HINT,
  InfoDataSchema,
  LOG_LEVEL_HINT,
  LoadDataSchema,
  LogLevelSchema,
  NAME_HINT,
  RetryStrategySchema,
  ScheduleDataSchema,
  StepDataSchema,
  TIMEOUT_HINT,
  WORKLOADS_HINT,
  WorkloadConfigSchema,
  WorkloadEntrySchema,
  WorkloadMetadataSchema,
  WorkloadParameterSchema,
  createConfigSchema,
  createWorkloadEntrySchema,
  createWorkloadMetadataSchema,
  createWorkloadNameSchema,
} from './schemas.js';

// TypeScript types (inferred from Zod)
export type {
  InfoData,
  LoadData,
  RawWorkloadEntry,
  RetryStrategy,
  ScheduleConfig,
  ScheduleData,
  StepData,
  WorkloadConfig,
  WorkloadMetadata,
  WorkloadOutput,
  WorkloadParameter,
} from './types.js';

// Error model
export {
  ConnectivityError,
  ConstraintError,
  DispatchError,
  IntegrityError,
  ResolutionError,
  ScheduleError,
  StepLoadError,
  ValidationError,
  VerificationError,
} from './errors.js';

// Retry
export { DEFAULT_PROBE_RETRY, withRetry } from './retry.js';

// Telemetry
export { initTelemetry, shutdownTelemetry, getTracer, withSpan } from './telemetry.js';
export type { Tracer } from '@opentelemetry/api';

// Logger
export { logger, createLogger, createRunLogger, toPinoLevel } from './logger.js';
export type { RunLogSettings } from './logger.js';
export type { Logger } from 'pino';

// Configuration
export { checkConfig, loadConfig, mergeConfig, validateWithSchema } from './config.js';
export type { CheckConfigOptions, ConfigInput, MergeResult } from './config.js';

// Run context and schedule model
export { Info, localNodeId, validDuration, validSeed } from './info.js';
export type { InfoInit, InfoOverrides } from './info.js';
export {
  Load,
  Schedule,
  Step,
  loadSchedule,
  saveSchedule,
  scheduleFromData,
  scheduleToData,
  splitSchedule,
  verifySchedule,
} from './schedule.js';
export { metadataToOverrides, parseWorkloadEntries, parseWorkloadEntry } from './entries.js';
export type { MetadataEntry, ParallelEntry, SingleEntry, WorkloadEntry } from './entries.js';
export { buildSchedule, makeSchedule } from './builder.js';
export type { BuildOptions } from './builder.js';

// Execution
export { SeededRandom } from './random.js';
export { LocalProcessExecutor } from './executor.js';
export type { CommandExecutor, CommandOptions, CommandResult } from './executor.js';
export { TcpNodeProbe, isLocalNode, nodeLabel } from './node.js';
export type { NodeProbe } from './node.js';
export { RemoteDispatcherStub, resultKey, runSchedule } from './runner.js';
export type { DispatchRequest, RemoteDispatcher, RunOptions, ScheduleResult } from './runner.js';

// Workload lifecycle contract
export {
  WorkloadBase,
  WorkloadRegistry,
  checkWorkloadIntegrity,
  emptyOutput,
  listWorkloads,
  runWorkload,
} from './workload.js';
export type { IntegrityOptions, WorkloadConstructor, WorkloadContext, WorkloadModule } from './workload.js';
