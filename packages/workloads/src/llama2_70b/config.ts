import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'llama2_70b',
  binary: 'run_inference',
  description: 'Llama 2 70B inference benchmark',
  run: 'run_inference --model llama2-70b --devices {accelerators} --duration {duration} --seed {seed}',
};
