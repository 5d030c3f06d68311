/**
 * Configuration loader for the CVM inventory.
 *
 * Loads configuration from a YAML file, validates the structure, applies
 * credential overrides from the environment, and caches parsed files.
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import { INSTANCE_STATES } from '@shared/types';
import type { Credentials, InstanceState, InventoryConfig } from '@shared/types';
import { isNotFound } from '@shared/utils/atomicFile';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cvm-inventory:config');

export const DEFAULT_CONFIG_FILE = 'tencent_cloud.yml';

/**
 * Default configuration file, at the project root beside `bin/`.
 */
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../../..', DEFAULT_CONFIG_FILE);
export const CONFIG_PATH_ENV = 'TENCENTCLOUD_INVENTORY_CONFIG';

const REGION_PATTERN = /^[a-z]{2,}-[a-z0-9]+(-[a-z0-9]+)*$/;

/**
 * Accepts either a YAML list or a comma-separated string.
 */
const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .transform((items) => items.map((item) => item.trim()).filter((item) => item.length > 0));

const regionList = stringList.pipe(
  z.array(z.string().regex(REGION_PATTERN, { message: 'Invalid region name' }))
);

const instanceStateList = stringList
  .transform((items) => items.map((item) => item.toLowerCase()))
  .pipe(z.array(z.enum(INSTANCE_STATES)));

/**
 * Host patterns match from the start of the address, like a `^`-anchored regex.
 */
const hostPattern = z.string().transform((source, ctx) => {
  try {
    return new RegExp(`^(?:${source})`);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid regular expression: ${String(error)}`,
    });
    return z.NEVER;
  }
});

/**
 * Configuration schema validation using Zod.
 *
 * Every group_by toggle defaults to enabled. Booleans must be real YAML
 * booleans; quoted strings such as "yes" are rejected.
 */
const ConfigSchema = z
  .object({
    cvm: z
      .object({
        regions: z.union([z.literal('all'), regionList]).default('all'),
        regions_exclude: regionList.default([]),
        api_region: z.string().regex(REGION_PATTERN).default('ap-guangzhou'),
        destination_variable: z
          .enum(['public_ip_address', 'private_ip_address'])
          .default('public_ip_address'),
        all_instances: z.boolean().default(false),
        instance_states: instanceStateList.default(['running']),
        cache_path: z.string().default('~/.ansible/tmp'),
        cache_max_age: z.number().nonnegative().default(300),
        nested_groups: z.boolean().default(false),
        max_concurrency: z.number().int().positive().default(8),
        pattern_include: hostPattern.optional(),
        pattern_exclude: hostPattern.optional(),
        group_by_instance_id: z.boolean().default(true),
        group_by_region: z.boolean().default(true),
        group_by_availability_zone: z.boolean().default(true),
        group_by_image_id: z.boolean().default(true),
        group_by_instance_type: z.boolean().default(true),
        group_by_vpc_id: z.boolean().default(true),
        group_by_subnet_id: z.boolean().default(true),
        group_by_security_group: z.boolean().default(true),
        group_by_tag_keys: z.boolean().default(true),
        group_by_tag_none: z.boolean().default(true),
      })
      .passthrough()
      .default({}),
    // tencentcloud_* keys are accepted as aliases of the short names
    credentials: z
      .object({
        secret_id: z.string().optional(),
        secret_key: z.string().optional(),
        security_token: z.string().optional(),
        tencentcloud_secret_id: z.string().optional(),
        tencentcloud_secret_key: z.string().optional(),
        tencentcloud_security_token: z.string().optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

type ConfigFile = z.infer<typeof ConfigSchema>;

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when an explicitly requested configuration file does not exist.
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigNotFoundError';
  }
}

/**
 * Raised when the configuration has invalid values.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * LRU cache of validated configuration files, keyed by absolute path.
 */
const configCache = new LRUCache<string, ConfigFile>({
  max: 16,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Picks the configuration path: explicit argument, then environment, then the default file.
 *
 * @returns Absolute path and whether the caller asked for it explicitly
 */
export function resolveConfigPath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  defaultPath: string = DEFAULT_CONFIG_PATH
): { path: string; explicit: boolean } {
  const requested = explicitPath ?? env[CONFIG_PATH_ENV];
  if (requested) {
    return { path: path.resolve(expandHome(requested)), explicit: true };
  }
  return { path: defaultPath, explicit: false };
}

/**
 * Loads the inventory configuration.
 *
 * A missing default file yields the built-in defaults; a missing explicit
 * file is an error. Credentials from TENCENTCLOUD_SECRET_ID,
 * TENCENTCLOUD_SECRET_KEY and TENCENTCLOUD_SECURITY_TOKEN take precedence
 * over the file.
 *
 * @param configPath - Optional path to the YAML file
 * @param env - Environment to read overrides from
 * @param defaultPath - File used when neither a path nor the environment names one
 * @returns Resolved configuration
 *
 * @throws {ConfigNotFoundError} If an explicit file does not exist
 * @throws {ConfigError} If the file cannot be read or parsed
 * @throws {ConfigValidationError} If values are invalid
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  defaultPath: string = DEFAULT_CONFIG_PATH
): Promise<InventoryConfig> {
  const resolved = resolveConfigPath(configPath, env, defaultPath);
  const file = configCache.get(resolved.path) ?? (await readConfigFile(resolved));
  configCache.set(resolved.path, file);

  return toInventoryConfig(file, env);
}

/**
 * Parses and validates configuration from YAML text.
 *
 * @param text - YAML document
 * @param env - Environment to read credential overrides from
 */
export function parseConfig(text: string, env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  return toInventoryConfig(validate(parseYaml(text, '<inline>')), env);
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}

async function readConfigFile(resolved: { path: string; explicit: boolean }): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(resolved.path, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      if (resolved.explicit) {
        throw new ConfigNotFoundError(`Configuration file not found: ${resolved.path}`, {
          cause: error,
        });
      }
      logger.info(`No configuration file at ${resolved.path}, using defaults`);
      return validate({});
    }
    throw new ConfigError(`Failed to read configuration file ${resolved.path}: ${String(error)}`, {
      cause: error,
    });
  }

  logger.info(`Loading config from ${resolved.path}`);
  return validate(parseYaml(text, resolved.path));
}

function parseYaml(text: string, source: string): unknown {
  try {
    // An empty file loads as undefined
    return yaml.load(text) ?? {};
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML configuration from ${source}: ${String(error)}`, {
      cause: error,
    });
  }
}

function validate(raw: unknown): ConfigFile {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    throw new ConfigValidationError(`Configuration validation failed. ${problems.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function toInventoryConfig(file: ConfigFile, env: NodeJS.ProcessEnv): InventoryConfig {
  const cvm = file.cvm;

  return {
    regions: cvm.regions === 'all' || cvm.regions.length === 0 ? 'all' : cvm.regions,
    regionsExclude: cvm.regions_exclude,
    apiRegion: cvm.api_region,
    destinationVariable: cvm.destination_variable,
    allInstances: cvm.all_instances,
    instanceStates: uniqueStates(cvm.instance_states),
    cachePath: path.resolve(expandHome(cvm.cache_path)),
    cacheMaxAge: cvm.cache_max_age,
    nestedGroups: cvm.nested_groups,
    maxConcurrency: cvm.max_concurrency,
    patternInclude: cvm.pattern_include,
    patternExclude: cvm.pattern_exclude,
    groupBy: {
      group_by_instance_id: cvm.group_by_instance_id,
      group_by_region: cvm.group_by_region,
      group_by_availability_zone: cvm.group_by_availability_zone,
      group_by_image_id: cvm.group_by_image_id,
      group_by_instance_type: cvm.group_by_instance_type,
      group_by_vpc_id: cvm.group_by_vpc_id,
      group_by_subnet_id: cvm.group_by_subnet_id,
      group_by_security_group: cvm.group_by_security_group,
      group_by_tag_keys: cvm.group_by_tag_keys,
      group_by_tag_none: cvm.group_by_tag_none,
    },
    credentials: resolveCredentials(file.credentials, env),
  };
}

/**
 * Environment variables win over file values; empty strings count as unset.
 */
function resolveCredentials(
  fromFile: ConfigFile['credentials'],
  env: NodeJS.ProcessEnv
): Credentials {
  return {
    secretId:
      env.TENCENTCLOUD_SECRET_ID || fromFile.secret_id || fromFile.tencentcloud_secret_id,
    secretKey:
      env.TENCENTCLOUD_SECRET_KEY || fromFile.secret_key || fromFile.tencentcloud_secret_key,
    securityToken:
      env.TENCENTCLOUD_SECURITY_TOKEN ||
      fromFile.security_token ||
      fromFile.tencentcloud_security_token,
  };
}

function uniqueStates(states: InstanceState[]): InstanceState[] {
  return [...new Set(states)];
}

function expandHome(value: string): string {
  if (value === '~') {
    return homedir();
  }
  if (value.startsWith('~/')) {
    return path.join(homedir(), value.slice(2));
  }
  return value;
}
