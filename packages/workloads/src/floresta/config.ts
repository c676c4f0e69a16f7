import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'floresta',
  binary: 'floresta',
  description: 'Memory and interconnect bandwidth sweep',
  run: 'floresta --time {duration}',
};
