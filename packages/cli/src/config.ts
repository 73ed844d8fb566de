/**
 * gcpkit configuration
 *
 * Optional defaults read from gcpkit.config.json (or .gcpkit/config.json)
 * in the working directory. Command-line flags win over environment
 * variables, which win over the file, which wins over built-in defaults.
 */

import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors';
import { STORAGE_CLASSES, type StorageClass } from './gcp/storage';

const CONFIG_FILENAMES = ['gcpkit.config.json', path.join('.gcpkit', 'config.json')];

export const PROJECT_ENV_VARS = ['GCPKIT_PROJECT', 'CLOUDSDK_CORE_PROJECT'];

export const DEFAULTS = {
  location: 'us',
  storageClass: 'standard',
  indexPage: 'index.html',
  errorPage: '404.html',
} as const;

export const storageClassSchema = z.enum(STORAGE_CLASSES);

/** Billing account IDs look like 01A2B3-C4D5E6-F7A8B9 */
export const BILLING_ACCOUNT_PATTERN = /^[0-9A-Fa-f]{6}-[0-9A-Fa-f]{6}-[0-9A-Fa-f]{6}$/;

export const configSchema = z
  .object({
    project: z.string().min(1).optional(),
    location: z.string().min(1).optional(),
    storageClass: storageClassSchema.optional(),
    indexPage: z.string().min(1).optional(),
    errorPage: z.string().min(1).optional(),
    billingAccount: z
      .string()
      .regex(BILLING_ACCOUNT_PATTERN, 'expected XXXXXX-XXXXXX-XXXXXX')
      .optional(),
  })
  .strict();

export type GcpkitConfig = z.infer<typeof configSchema>;

/**
 * Find the config file in the given directory
 */
export function findConfigFile(dir: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const filepath = path.resolve(dir, filename);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Parse and validate a config file
 */
export function parseConfig(configPath: string): GcpkitConfig {
  const content = readFileSync(configPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid JSON in config file ${configPath}: ${reason}`);
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid config file ${configPath}: ${details}`);
  }
  return result.data;
}

/**
 * Load config from a directory; an absent file means no overrides
 */
export function loadConfig(dir: string = process.cwd()): GcpkitConfig {
  const configPath = findConfigFile(dir);
  return configPath ? parseConfig(configPath) : {};
}

export function parseStorageClass(value: string): StorageClass {
  const result = storageClassSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new ValidationError(
      `Invalid storage class: ${value}`,
      `Options: ${STORAGE_CLASSES.join(', ')}`
    );
  }
  return result.data;
}

/**
 * Project ID from flag, then environment, then config file
 */
export function resolveProjectId(
  flag: string | undefined,
  config: GcpkitConfig,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (flag) return flag;

  for (const name of PROJECT_ENV_VARS) {
    const value = env[name];
    if (value) return value;
  }
  return config.project;
}

export interface SiteSettingsFlags {
  location?: string;
  storageClass?: string;
  index?: string;
  error?: string;
}

export interface SiteSettings {
  location: string;
  storageClass: StorageClass;
  indexPage: string;
  errorPage: string;
}

export function resolveSiteSettings(flags: SiteSettingsFlags, config: GcpkitConfig): SiteSettings {
  return {
    location: flags.location ?? config.location ?? DEFAULTS.location,
    storageClass: flags.storageClass
      ? parseStorageClass(flags.storageClass)
      : config.storageClass ?? DEFAULTS.storageClass,
    indexPage: flags.index ?? config.indexPage ?? DEFAULTS.indexPage,
    errorPage: flags.error ?? config.errorPage ?? DEFAULTS.errorPage,
  };
}
