/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from './analyzer/errors';

dotenv.config();

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Configuration schema with validation and defaults.
 */
export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  NODE_ENV: z.string().optional(),

  // Grammars handed to node-sql-parser, tried in order
  SQL_DIALECTS: z
    .string()
    .default('snowflake,postgresql,mysql')
    .transform((v) =>
      v
        .split(',')
        .map((d) => d.trim())
        .filter((d) => d.length > 0),
    )
    .pipe(z.array(z.string()).min(1)),

  SLOW_QUERY_THRESHOLD_MS: z.coerce.number().positive().default(1000),
  INCLUDE_MAX_ROWS: z.coerce.number().int().nonnegative().default(5000),
  SMALL_SORT_ROWS: z.coerce.number().int().nonnegative().default(10000),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from an environment-like record.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`, result.error.issues);
  }
  return result.data;
}

export const config = loadConfig();
