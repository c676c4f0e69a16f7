import type { WorkloadContext } from '@stepload/core';

import { CommandWorkload } from '../command.js';
import { config } from './config.js';

export class Workload extends CommandWorkload {
  constructor() {
    super(config);
  }

  /** Tests every device individually unless the load says otherwise. */
  command(ctx: WorkloadContext): string[] {
    const argv = super.command(ctx);
    return argv.includes('-t') ? argv : [...argv, '-t', 'individual'];
  }
}
