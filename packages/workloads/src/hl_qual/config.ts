import type { WorkloadConfig } from '@stepload/core';

export const config: WorkloadConfig = {
  name: 'hl_qual',
  binary: 'hl_qual',
  description: 'Accelerator qualification suite',
  run: 'hl_qual -c all -rmod parallel -dis_mon -t {duration}',
};
