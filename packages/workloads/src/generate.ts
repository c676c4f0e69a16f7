import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { IntegrityError, checkWorkloadIntegrity, createLogger } from '@stepload/core';
import type { WorkloadRegistry } from '@stepload/core';

const log = createLogger('generate');

const WORKLOAD_NAME = /^[a-z][a-z0-9_]*$/;
const TEMPLATE_MODULES = ['config', 'flow'] as const;

export interface GenerateOptions {
  /** Directory holding one folder per workload. */
  root: string;
  /** Registry the source workload is checked against. */
  registry: WorkloadRegistry;
  /** Workload copied as the template. */
  from?: string;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create a workload folder from an existing workload. Every mention of the
 * source name, in any case, becomes the new name. Returns the new folder.
 */
export async function generateWorkload(name: string, options: GenerateOptions): Promise<string> {
  const target = name.toLowerCase();
  const from = options.from ?? 'example';
  if (!WORKLOAD_NAME.test(target)) {
    throw new IntegrityError(
      `Invalid workload name "${name}": use letters, digits and underscores, starting with a letter`,
    );
  }

  const folder = join(options.root, target);
  if (options.registry.has(target) || (await exists(folder))) {
    throw new IntegrityError(`Workload ${target} already exists`);
  }

  await checkWorkloadIntegrity(from, options.registry, { root: options.root });

  const pattern = new RegExp(escapeRegExp(from), 'gi');
  const sources: Array<[string, string]> = [];
  for (const module of TEMPLATE_MODULES) {
    const file = (await exists(join(options.root, from, `${module}.ts`))) ? `${module}.ts` : `${module}.js`;
    sources.push([file, await readFile(join(options.root, from, file), 'utf-8')]);
  }

  await mkdir(folder);
  for (const [file, text] of sources) {
    await writeFile(join(folder, file), text.replace(pattern, target), 'utf-8');
  }

  log.info({ workload: target, from, folder }, 'Generated workload; register it to make it schedulable');
  return folder;
}
