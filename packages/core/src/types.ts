import type { z } from 'zod';

import type {
  ConfigSchema,
  InfoDataSchema,
  LoadDataSchema,
  RetryStrategySchema,
  ScheduleDataSchema,
  StepDataSchema,
  WorkloadConfigSchema,
  WorkloadEntrySchema,
  WorkloadMetadataSchema,
  WorkloadParameterSchema,
} from './schemas.js';

export type ScheduleConfig = z.infer<typeof ConfigSchema>;
export type RawWorkloadEntry = z.infer<typeof WorkloadEntrySchema>;
export type WorkloadMetadata = z.infer<typeof WorkloadMetadataSchema>;
export type InfoData = z.infer<typeof InfoDataSchema>;
export type LoadData = z.infer<typeof LoadDataSchema>;
export type StepData = z.infer<typeof StepDataSchema>;
export type ScheduleData = z.infer<typeof ScheduleDataSchema>;
export type WorkloadConfig = z.infer<typeof WorkloadConfigSchema>;
export type WorkloadParameter = z.infer<typeof WorkloadParameterSchema>;
export type RetryStrategy = z.infer<typeof RetryStrategySchema>;

/** Result of running one load on one node. */
export interface WorkloadOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
  folder: string | null;
  log: string | null;
}
