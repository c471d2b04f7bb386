import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger, setLogLevel, type LogLevel } from './logger';
import { ValidationError } from '../services/base/ServiceError';

export const IN_MEMORY_DB_PATH = ':memory:';

const EnvSchema = z.object({
  LOCATION_SCOUT_DB_PATH: z.string().trim().min(1).optional(),
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error']))
    .optional(),
});

export interface DataLayerConfig {
  dbPath: string;
  logLevel: LogLevel;
}

/**
 * Loads a .env file into process.env if one exists. Variables already set in the
 * environment win over the file.
 */
export function loadEnvFile(envPath: string = path.resolve(process.cwd(), '.env')): boolean {
  if (!fs.existsSync(envPath)) {
    logger.debug(`[Config] No .env file at ${envPath}. Using process environment only.`);
    return false;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    throw new ValidationError(`Failed to parse .env file at ${envPath}: ${result.error.message}`);
  }
  logger.info(`[Config] Loaded .env file from: ${envPath}`);
  return true;
}

/**
 * Resolves the data layer configuration from environment variables.
 * 1. `LOCATION_SCOUT_DB_PATH`: ':memory:' is kept as is, other paths are resolved.
 * 2. Falls back to `./data/location_scout.db` relative to `process.cwd()`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DataLayerConfig {
  const parsed = EnvSchema.safeParse({
    LOCATION_SCOUT_DB_PATH: env.LOCATION_SCOUT_DB_PATH,
    LOG_LEVEL: env.LOG_LEVEL,
  });
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${parsed.error.message}`, parsed.error.issues);
  }

  const { LOCATION_SCOUT_DB_PATH: rawPath, LOG_LEVEL: logLevel } = parsed.data;

  let dbPath: string;
  if (rawPath === IN_MEMORY_DB_PATH) {
    dbPath = IN_MEMORY_DB_PATH;
  } else if (rawPath) {
    dbPath = path.resolve(rawPath);
  } else {
    dbPath = path.resolve(process.cwd(), 'data', 'location_scout.db');
    logger.debug(`[Config] LOCATION_SCOUT_DB_PATH not set. Using fallback path: ${dbPath}`);
  }

  return {
    dbPath,
    logLevel: logLevel ?? (env.NODE_ENV === 'test' ? 'error' : 'info'),
  };
}

/**
 * Loads .env, parses the environment and applies the log level.
 */
export function initConfig(envPath?: string): DataLayerConfig {
  loadEnvFile(envPath);
  const config = loadConfig();
  setLogLevel(config.logLevel);
  return config;
}
