import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'example',
  binary: 'echo',
  description: 'Example workload',
  run: 'echo example workload on {node} for {duration}s, parameter {level}',
  parameters: {
    level: {
      description: 'Example parameter',
      type: 'int',
      default: 0,
    },
  },
  download: '',
};
