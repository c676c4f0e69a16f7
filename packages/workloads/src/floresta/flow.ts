import { CommandWorkload } from '../command.js';
import { config } from './config.js';

export class Workload extends CommandWorkload {
  constructor() {
    super(config);
  }
}
