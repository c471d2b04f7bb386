import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { IN_MEMORY_DB_PATH, loadConfig } from '../utils/config';
import { BUSY_TIMEOUT_MS } from './constants';

let sharedConnection: Database.Database | null = null;

/**
 * The app-wide connection opened by `initDb()` without a path.
 */
export function getDb(): Database.Database {
  if (!sharedConnection || !sharedConnection.open) {
    logger.error('[DB] getDb called without an open shared connection.');
    throw new Error('Database accessed before initialization. Call initDb first.');
  }
  return sharedConnection;
}

/**
 * Opens a connection to the location database.
 *
 * Without `dbPath` the configured location is used and the connection becomes the
 * shared one returned by `getDb()` (an open shared connection is reused). An
 * explicit path always gets a private connection, which is what tests rely on.
 * Pragmas and migrations are left to `DatabaseContext.initialize()`.
 */
export function initDb(dbPath?: string): Database.Database {
  if (!dbPath && sharedConnection?.open) {
    logger.debug('[DB] Reusing the open shared connection.');
    return sharedConnection;
  }

  const target = dbPath ?? getDbPath();
  if (target !== IN_MEMORY_DB_PATH) {
    ensureParentDirectory(target);
  }

  const connection = new Database(target, { timeout: BUSY_TIMEOUT_MS });
  logger.info(`[DB] Opened ${target === IN_MEMORY_DB_PATH ? 'in-memory database' : target}.`);

  if (!dbPath) {
    sharedConnection = connection;
  }
  return connection;
}

/**
 * Closes the shared connection. Private connections are closed by their owner.
 */
export function closeDb(): void {
  if (sharedConnection?.open) {
    sharedConnection.close();
    logger.info('[DB] Shared connection closed.');
  }
  sharedConnection = null;
}

/**
 * `LOCATION_SCOUT_DB_PATH`, or `./data/location_scout.db` under the working directory.
 */
export function getDbPath(): string {
  return loadConfig().dbPath;
}

function ensureParentDirectory(dbFile: string): void {
  const directory = path.dirname(dbFile);
  if (fs.existsSync(directory)) {
    return;
  }
  try {
    fs.mkdirSync(directory, { recursive: true });
    logger.info(`[DB] Created database directory ${directory}`);
  } catch (error) {
    logger.error(`[DB] Could not create database directory ${directory}:`, error);
    throw new Error(
      `Failed to create database directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}
