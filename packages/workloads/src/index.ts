import { fileURLToPath } from 'node:url';

import { WorkloadRegistry } from '@stepload/core';

import { config as cornetConfig } from './cornet/config.js';
import { Workload as Cornet } from './cornet/flow.js';
import { config as exampleConfig } from './example/config.js';
import { Workload as Example } from './example/flow.js';
import { config as florestaConfig } from './floresta/config.js';
import { Workload as Floresta } from './floresta/flow.js';
import { config as hlQualConfig } from './hl_qual/config.js';
import { Workload as HlQual } from './hl_qual/flow.js';
import { config as llama2Config } from './llama2_70b/config.js';
import { Workload as Llama2 } from './llama2_70b/flow.js';
import { config as llama3Config } from './llama3_70b/config.js';
import { Workload as Llama3 } from './llama3_70b/flow.js';
import { config as llama31Config } from './llama_3_1_405b/config.js';
import { Workload as Llama31 } from './llama_3_1_405b/flow.js';
import { config as nstConfig } from './nst/config.js';
import { Workload as Nst } from './nst/flow.js';
import { config as sandstoneConfig } from './sandstone/config.js';
import { Workload as Sandstone } from './sandstone/flow.js';

/** Directory holding one folder per workload. */
export const WORKLOADS_DIR = fileURLToPath(new URL('.', import.meta.url));

/** Registry of every bundled workload, keyed by folder name. */
export function createRegistry(): WorkloadRegistry {
  return new WorkloadRegistry()
    .register('cornet', { config: cornetConfig, Workload: Cornet })
    .register('example', { config: exampleConfig, Workload: Example })
    .register('floresta', { config: florestaConfig, Workload: Floresta })
    .register('hl_qual', { config: hlQualConfig, Workload: HlQual })
    .register('llama2_70b', { config: llama2Config, Workload: Llama2 })
    .register('llama3_70b', { config: llama3Config, Workload: Llama3 })
    .register('llama_3_1_405b', { config: llama31Config, Workload: Llama31 })
    .register('nst', { config: nstConfig, Workload: Nst })
    .register('sandstone', { config: sandstoneConfig, Workload: Sandstone });
}

export { CommandWorkload } from './command.js';
export { generateWorkload } from './generate.js';
export type { GenerateOptions } from './generate.js';
