import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'llama_3_1_405b',
  binary: 'run_inference',
  description: 'Llama 3.1 405B inference benchmark',
  run: 'run_inference --model llama3.1-405b --devices {accelerators} --duration {duration} --seed {seed}',
};
