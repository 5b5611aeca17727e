/**
 * Migrator Configuration Management
 * Centralized configuration with validation and type safety
 *
 * Configuration Priority:
 * 1. CLI flags
 * 2. Environment Variables (.env file included)
 * 3. Default values
 *
 * @module config/migrator-config
 */

import { z } from 'zod';
import { ClusterConnectionSettings } from '../adapters';
import { MigrationSettings } from '../types';
import { isValidVersion } from '../utils/version';

const flag = z
  .union([z.boolean(), z.string()])
  .transform((value) =>
    typeof value === 'boolean' ? value : ['true', '1', 'yes'].includes(value.trim().toLowerCase())
  );

/**
 * Configuration Schema with Validation
 */
const MigratorConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8080),
  endpoint: z.string().url('Cluster endpoint must be a valid URL').default('http://localhost:9200'),
  region: z.string().min(1).default('eu-west-1'),
  auth: z.enum(['aws', 'none']).default('none'),
  aliasName: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_.-]*$/, {
      message: 'Alias name must be lowercase and start with a letter or digit',
    })
    .default('concepts'),
  indexVersion: z
    .string()
    .default('')
    .refine((version) => version === '' || isValidVersion(version), {
      message: 'Index version must be a semantic version',
    }),
  mappingFile: z.string().min(1).default('./mapping.json'),
  aliasFilterFile: z.string().min(1).optional(),
  unfilteredAlias: z.string().min(1).optional(),
  pollIntervalMs: z.coerce.number().int().min(1).default(60000),
  maxStallErrors: z.coerce.number().int().min(0).default(3),
  readOnlyMaxRetries: z.coerce.number().int().min(0).default(5),
  connectRetryIntervalMs: z.coerce.number().int().min(1).default(60000),
  trace: flag.default(false),
  systemCode: z.string().min(1).default('index-migrator'),
  panicGuideUrl: z.string().default(''),
  logLevel: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
});

export type MigratorConfig = z.infer<typeof MigratorConfigSchema>;

/**
 * Load configuration from environment variables. Empty values count as unset.
 */
export function loadFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Record<string, string | undefined> {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value;
  };

  return {
    port: read('PORT'),
    endpoint: read('OPENSEARCH_ENDPOINT'),
    region: read('AWS_REGION'),
    auth: read('OPENSEARCH_AUTH'),
    aliasName: read('INDEX_ALIAS'),
    indexVersion: read('INDEX_VERSION'),
    mappingFile: read('MAPPING_FILE'),
    aliasFilterFile: read('ALIAS_FILTER_FILE'),
    unfilteredAlias: read('UNFILTERED_ALIAS'),
    pollIntervalMs: read('POLL_INTERVAL_MS'),
    maxStallErrors: read('MAX_STALL_ERRORS'),
    readOnlyMaxRetries: read('READ_ONLY_MAX_RETRIES'),
    connectRetryIntervalMs: read('CONNECT_RETRY_INTERVAL_MS'),
    trace: read('OPENSEARCH_TRACE'),
    systemCode: read('SYSTEM_CODE'),
    panicGuideUrl: read('PANIC_GUIDE_URL'),
    logLevel: read('LOG_LEVEL'),
  };
}

function definedOnly(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

/**
 * Load and validate migrator configuration
 *
 * @throws {Error} listing every invalid setting
 *
 * @example
 * ```typescript
 * const config = loadMigratorConfig({ overrides: { indexVersion: '2.0.0' } });
 * console.log(config.aliasName); // concepts
 * ```
 */
export function loadMigratorConfig(
  options: {
    env?: NodeJS.ProcessEnv;
    overrides?: Record<string, unknown>;
  } = {}
): MigratorConfig {
  const merged = {
    ...definedOnly(loadFromEnvironment(options.env)),
    ...definedOnly(options.overrides ?? {}),
  };

  const result = MigratorConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues;
    throw new Error(
      `Invalid migrator configuration:\n${issues
        .map((issue: z.ZodIssue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n')}`
    );
  }

  return result.data;
}

export function toMigrationSettings(config: MigratorConfig): MigrationSettings {
  return {
    aliasName: config.aliasName,
    indexVersion: config.indexVersion,
    mappingFile: config.mappingFile,
    aliasFilterFile: config.aliasFilterFile,
    unfilteredAlias: config.unfilteredAlias,
    pollIntervalMs: config.pollIntervalMs,
    maxStallErrors: config.maxStallErrors,
    readOnlyMaxRetries: config.readOnlyMaxRetries,
  };
}

export function toConnectionSettings(config: MigratorConfig): ClusterConnectionSettings {
  return {
    endpoint: config.endpoint,
    region: config.region,
    auth: config.auth,
    trace: config.trace,
  };
}
