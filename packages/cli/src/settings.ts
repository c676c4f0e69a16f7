import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { ValidationError } from '@stepload/core';
import { WORKLOADS_DIR } from '@stepload/workloads';

const CONFIG_EXTENSIONS = ['.yaml', '.yml', '.json'];

export interface Settings {
  outputDir: string;
  configDir: string;
  workloadDir: string;
}

/** Flags win over the environment, which wins over the defaults. */
export function resolveSettings(flags: { output?: string }, env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    outputDir: resolve(flags.output ?? env['STEPLOAD_OUTPUT_DIR'] ?? 'results'),
    configDir: resolve(env['STEPLOAD_CONFIG_DIR'] ?? 'configs'),
    workloadDir: resolve(env['STEPLOAD_WORKLOAD_DIR'] ?? WORKLOADS_DIR),
  };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find a config by path, or by name inside the config directory with or
 * without its extension.
 */
export async function resolveConfigPath(input: string, configDir: string): Promise<string> {
  const candidates = [resolve(input), join(configDir, input)];
  if (!extname(input)) {
    for (const ext of CONFIG_EXTENSIONS) candidates.push(join(configDir, `${input}${ext}`));
  }
  for (const candidate of candidates) {
    if (await isFile(candidate)) return candidate;
  }
  throw new ValidationError(`Config file not found: ${input}`, '', `Looked in the working directory and ${configDir}`);
}

export async function listConfigs(configDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(configDir);
  } catch {
    return [];
  }
  return entries.filter((entry) => CONFIG_EXTENSIONS.includes(extname(entry).toLowerCase())).sort();
}
