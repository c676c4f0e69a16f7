import type { WorkloadContext } from '@stepload/core';

import { CommandWorkload } from '../command.js';
import { config } from './config.js';

export class Workload extends CommandWorkload {
  constructor() {
    super(config);
  }

  protected async _setup(ctx: WorkloadContext): Promise<void> {
    await super._setup(ctx);
    ctx.logger.info('Preparing example workload');
  }
}
