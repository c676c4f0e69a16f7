import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'llama3_70b',
  binary: 'run_inference',
  description: 'Llama 3 70B inference benchmark',
  run: 'run_inference --model llama3-70b --devices {accelerators} --duration {duration} --seed {seed}',
};
