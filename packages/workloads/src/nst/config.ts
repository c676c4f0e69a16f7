import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'nst',
  binary: 'nst',
  description: 'Node stress test across every accelerator',
  run: 'nst --test_mode --devices {accelerators} --duration {duration}',
};
