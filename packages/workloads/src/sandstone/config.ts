import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'sandstone',
  binary: 'sandstone',
  description: 'CPU functional self-test suite',
  run: 'sandstone -T {duration}s --seed {random} --output-format yaml',
};
