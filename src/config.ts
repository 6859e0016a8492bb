import { z } from 'zod';
import { createLogger, LOG_LEVELS, type Logger } from './logger.js';

/** Environment variable naming a custom database file. */
export const ENV_DATABASE_PATH = 'THINGSDB';

const OptionalPath = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

export const envSchema = z.object({
  [ENV_DATABASE_PATH]: OptionalPath,
  THINGS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export type ThingsEnv = z.infer<typeof envSchema>;

export const clientOptionsSchema = z.object({
  /** Explicit database file; takes precedence over THINGSDB and discovery. */
  databasePath: OptionalPath,
  /** Log every statement at info level instead of debug. */
  logSQL: z.boolean().default(false),
  /**
   * How loosely typed date filter input that matches no accepted form is
   * treated: ignored (`permissive`) or rejected with a FormatError (`strict`).
   */
  dateParsing: z.enum(['permissive', 'strict']).default('permissive'),
});

export type ClientOptions = z.input<typeof clientOptionsSchema> & {
  logger?: Logger;
  env?: Record<string, string | undefined>;
};

export interface ResolvedConfig {
  databasePath: string | undefined;
  envDatabasePath: string | undefined;
  logSQL: boolean;
  dateParsing: 'permissive' | 'strict';
  logger: Logger;
}

export function parseEnv(env: Record<string, string | undefined> = process.env): ThingsEnv {
  return envSchema.parse(env);
}

/**
 * Validates client options and fills defaults. Without an explicit logger a
 * pino logger is created at THINGS_LOG_LEVEL, or `info` when logSQL is set,
 * and is silent otherwise.
 */
export function resolveConfig(options: ClientOptions = {}): ResolvedConfig {
  const { logger, env, ...rest } = options;
  const parsed = clientOptionsSchema.parse(rest);
  const parsedEnv = parseEnv(env);
  return {
    databasePath: parsed.databasePath,
    envDatabasePath: parsedEnv[ENV_DATABASE_PATH],
    logSQL: parsed.logSQL,
    dateParsing: parsed.dateParsing,
    logger: logger ?? createLogger(parsedEnv.THINGS_LOG_LEVEL ?? (parsed.logSQL ? 'info' : 'silent')),
  };
}
