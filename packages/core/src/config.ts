import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import YAML from 'yaml';
import type { ZodType } from 'zod';

import { ConfigKeys, WORKLOAD_CATALOG } from './definitions.js';
import { ValidationError } from './errors.js';
import { createConfigSchema } from './schemas.js';
import type { ScheduleConfig } from './types.js';

export type ConfigInput = Record<string, unknown> | string;

export interface CheckConfigOptions {
  /** Workload names a config may reference. Defaults to the built-in catalog. */
  workloads?: readonly string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function preview(instance: unknown): string {
  const text = JSON.stringify(instance) ?? String(instance);
  return text.length > 32 ? `${text.slice(0, 32)}...` : text;
}

/**
 * Validate `instance` against a zod schema. On failure the first issue is
 * reported with its path and the schema's own message as the hint.
 */
export function validateWithSchema<T>(instance: unknown, schema: ZodType<T>, sourceName?: string): T {
  const result = schema.safeParse(instance);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = issue ? issue.path.join('.') : '';
  const hint = issue?.message;
  let message = `Error validating ${preview(instance)}`;
  if (sourceName) message += ` from ${sourceName}`;
  if (path) message += ` at "${path}"`;
  if (hint) message += ` because ${hint}`;
  throw new ValidationError(message, path, hint, { cause: result.error });
}

/**
 * Check a configuration mapping for mandatory keys and value shapes.
 * Returns the mapping's content unchanged on success.
 */
export function checkConfig(config: unknown, options: CheckConfigOptions = {}): ScheduleConfig {
  if (!isRecord(config) || Object.keys(config).length === 0) {
    throw new ValidationError('No data present in provided config', '', 'Provide a mapping with the mandatory keys');
  }
  const name = config[ConfigKeys.Name] ?? config[ConfigKeys.File];
  const sourceName = typeof name === 'string' ? name : undefined;
  const schema = createConfigSchema(options.workloads ?? WORKLOAD_CATALOG);
  return validateWithSchema(config, schema, sourceName);
}

async function readConfigFile(path: string): Promise<unknown> {
  const ext = extname(path).toLowerCase();
  if (ext !== '.json' && ext !== '.yaml' && ext !== '.yml') {
    throw new ValidationError(`Invalid configuration file: ${path}`, '', 'Use a .json, .yaml or .yml file');
  }
  const raw = await readFile(path, 'utf-8');
  try {
    return ext === '.json' ? JSON.parse(raw) : YAML.parse(raw);
  } catch (err) {
    throw new ValidationError(`Could not parse configuration file ${path}`, '', undefined, { cause: err });
  }
}

/**
 * Load a configuration from a mapping or a JSON/YAML file, then check it.
 * Files are tagged with their path under `file`.
 */
export async function loadConfig(
  input: ConfigInput,
  options: CheckConfigOptions & { check?: boolean } = {},
): Promise<Record<string, unknown>> {
  let config: Record<string, unknown>;
  if (typeof input === 'string') {
    const data = await readConfigFile(input);
    if (!isRecord(data)) {
      throw new ValidationError(`Configuration file ${input} does not contain a mapping`, '');
    }
    config = { ...data, [ConfigKeys.File]: input };
  } else {
    config = input;
  }
  if (options.check ?? true) checkConfig(config, options);
  return config;
}

export interface MergeResult {
  merged: Record<string, unknown>;
  overridden: string[];
}

/**
 * Deep-merge `override` onto a copy of `base`. Nested mappings merge
 * recursively; a mapping cannot replace a list or the reverse.
 */
export function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): MergeResult {
  const overridden: string[] = [];

  const mergeInto = (dest: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> => {
    for (const [key, value] of Object.entries(source)) {
      if (!(key in dest)) {
        dest[key] = structuredClone(value);
        continue;
      }
      const current = dest[key];
      overridden.push(key);
      if (isRecord(current) && isRecord(value)) {
        dest[key] = mergeInto({ ...current }, value);
      } else if ((isRecord(current) && Array.isArray(value)) || (Array.isArray(current) && isRecord(value))) {
        throw new ValidationError(
          `During merge, "${key}" is a ${Array.isArray(current) ? 'list' : 'mapping'} in the base config and a ${
            Array.isArray(value) ? 'list' : 'mapping'
          } in the override. These are not compatible`,
          key,
        );
      } else {
        dest[key] = structuredClone(value);
      }
    }
    return dest;
  };

  return { merged: mergeInto(structuredClone(base), override), overridden };
}
