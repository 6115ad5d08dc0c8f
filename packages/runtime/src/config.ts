// Engine configuration, read from environment variables

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logging/index.js';

const logLevelSchema = z.custom<LogLevel>(
  (value) => typeof value === 'string' && LOG_LEVELS.some((level) => level === value),
  { message: `expected one of ${LOG_LEVELS.join(', ')}` }
);

const sizeSchema = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const environmentSchema = z.object({
  TESSERA_LOG_LEVEL: logLevelSchema.default('info'),
  TESSERA_PATTERN_CACHE_SIZE: sizeSchema(512),
  TESSERA_GUARD_CACHE_SIZE: sizeSchema(1024),
  TESSERA_WARMUP_BATCH_SIZE: sizeSchema(10000),
  DATABASE_URL: z.string().url().optional(),
});

export type EngineConfig = {
  logLevel: LogLevel;

  /**
   * Capacity of the compiled pattern LRU
   */
  patternCacheSize: number;

  /**
   * Capacity of the GuardCache LRU
   */
  guardCacheSize: number;

  /**
   * Page size used when warming up an EnfoldCache
   */
  warmupBatchSize: number;

  databaseUrl?: string;
};

export type Environment = { readonly [name: string]: string | undefined };

/**
 * Load the engine configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig(); // reads process.env
 * const custom = loadConfig({ TESSERA_LOG_LEVEL: 'debug' });
 * ```
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadConfig(env: Environment = process.env): EngineConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map((i) => `${i.variable} (${i.message})`).join(', ')}`,
      { issues }
    );
  }

  const parsed = result.data;
  return {
    logLevel: parsed.TESSERA_LOG_LEVEL,
    patternCacheSize: parsed.TESSERA_PATTERN_CACHE_SIZE,
    guardCacheSize: parsed.TESSERA_GUARD_CACHE_SIZE,
    warmupBatchSize: parsed.TESSERA_WARMUP_BATCH_SIZE,
    ...(parsed.DATABASE_URL !== undefined ? { databaseUrl: parsed.DATABASE_URL } : {}),
  };
}
