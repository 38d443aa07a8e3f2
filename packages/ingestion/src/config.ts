/**
 * @fileoverview Configuration schema and environment loading.
 *
 * @module @tickbase/ingestion/config
 */

import { z } from 'zod';
import { ConfigurationError } from '@tickbase/contracts';
import { createLogger, type Logger } from '@tickbase/logger';

const providerList = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0)
      : value,
  z.array(z.string().min(1)).min(1, 'at least one provider is required')
);

/**
 * Configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  database: z
    .object({
      url: z.string().min(1).default('sqlite:tickbase.db'),
    })
    .default({}),

  ingestion: z
    .object({
      providers: providerList.default(['fixture']),
      maxRetries: z.number().int().min(1).default(3),
      baseDelay: z.number().positive().default(1),
      maxDelay: z.number().positive().default(60),
      allowFutureTimestamps: z.boolean().default(false),
    })
    .refine((ingestion) => ingestion.maxDelay >= ingestion.baseDelay, {
      message: 'maxDelay must be greater than or equal to baseDelay',
      path: ['maxDelay'],
    })
    .default({}),

  fixtures: z
    .object({
      path: z.string().default('./fixtures'),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable to [section, key] mapping
 */
export const envMapping: Readonly<Record<string, readonly [string, string]>> = {
  LOG_LEVEL: ['logging', 'level'],
  LOG_FORMAT: ['logging', 'format'],
  LOG_FILE: ['logging', 'filePath'],
  DATABASE_URL: ['database', 'url'],
  INGESTION_PROVIDERS: ['ingestion', 'providers'],
  INGESTION_MAX_RETRIES: ['ingestion', 'maxRetries'],
  INGESTION_BASE_DELAY: ['ingestion', 'baseDelay'],
  INGESTION_MAX_DELAY: ['ingestion', 'maxDelay'],
  INGESTION_ALLOW_FUTURE: ['ingestion', 'allowFutureTimestamps'],
  FIXTURES_PATH: ['fixtures', 'path'],
};

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws {ConfigurationError} Listing every invalid setting
 *
 * @example
 * ```typescript
 * const config = loadConfig({ INGESTION_PROVIDERS: 'primary,backup', INGESTION_MAX_RETRIES: '5' });
 * config.ingestion.providers; // ['primary', 'backup']
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const raw: Record<string, Record<string, unknown>> = {};

  for (const [envKey, [section, key]] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value === undefined || value === '') {
      continue;
    }
    const target = raw[section] ?? {};
    target[key] = parseEnvValue(value);
    raw[section] = target;
  }

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    throw new ConfigurationError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  logger?.info('Configuration loaded', {
    providers: result.data.ingestion.providers,
    max_retries: result.data.ingestion.maxRetries,
    log_level: result.data.logging.level,
  });

  return result.data;
}

/**
 * Root logger for a loaded configuration
 */
export function createConfiguredLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    ...(config.logging.filePath === undefined ? {} : { filePath: config.logging.filePath }),
  });
}
