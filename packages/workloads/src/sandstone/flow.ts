import { VerificationError } from '@stepload/core';
import type { WorkloadContext, WorkloadOutput } from '@stepload/core';

import { CommandWorkload } from '../command.js';
import { config } from './config.js';

const FAILED_RUN = /^exit:\s*fail\b/m;

export class Workload extends CommandWorkload {
  constructor() {
    super(config);
  }

  protected async _verify(ctx: WorkloadContext, output: WorkloadOutput): Promise<void> {
    await super._verify(ctx, output);
    if (FAILED_RUN.test(output.stdout)) {
      throw new VerificationError(`Workload ${this.name} reported failing tests`);
    }
  }
}
