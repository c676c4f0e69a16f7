import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'cornet',
  binary: 'cornet',
  description: 'Collective communication stress between accelerators',
  run: 'cornet --ranks {accelerators} --iterations {iterations} --seed {random}',
  parameters: {
    iterations: {
      description: 'All-reduce iterations per rank',
      type: 'int',
      default: 1000,
    },
  },
};
