#!/usr/bin/env tsx
import { initTelemetry, shutdownTelemetry } from '@stepload/core';

import { createProgram } from './stepload.js';

async function main(): Promise<void> {
  initTelemetry({ serviceName: 'stepload' });
  try {
    await createProgram().parseAsync(process.argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  } finally {
    await shutdownTelemetry();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
