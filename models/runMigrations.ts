import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { getDb } from './db';
import { logger } from '../utils/logger';

const MIGRATIONS_TABLE = 'schema_migrations';

// NNNN_description.sql; the file name without extension is the version
const MIGRATION_FILE = /^\d{4}_[\w-]+\.sql$/;

function readAppliedVersions(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      version TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT (strftime('%Y-%m-%dT%H:%M:%S.000Z', 'now'))
    );
  `);
  const versions = db.prepare(`SELECT version FROM ${MIGRATIONS_TABLE}`).pluck().all();
  return new Set(versions.filter((version): version is string => typeof version === 'string'));
}

/**
 * Locates the .sql files. Compiled code under dist/models still reads them from
 * the source tree.
 */
export function resolveMigrationsDir(): string | null {
  const candidates = [path.join(__dirname, 'migrations'), path.resolve(__dirname, '..', '..', 'models', 'migrations')];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    logger.warn(`[Migrations] No migrations directory in: ${candidates.join(', ')}`);
  }
  return found ?? null;
}

function listMigrationFiles(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter(file => MIGRATION_FILE.test(file))
    .sort();
}

/**
 * Applies pending migrations in version order. Each file runs in its own
 * transaction together with its schema_migrations row, and the first failure
 * stops the run.
 *
 * @param dbInstance - Defaults to the shared connection from getDb()
 * @returns How many migrations were applied
 */
function runMigrations(dbInstance?: Database.Database, migrationsDir?: string): number {
  const db = dbInstance ?? getDb();
  const directory = migrationsDir ?? resolveMigrationsDir();
  if (!directory) {
    return 0;
  }

  const applied = readAppliedVersions(db);
  const pending = listMigrationFiles(directory).filter(file => !applied.has(path.basename(file, '.sql')));
  if (pending.length === 0) {
    logger.debug('[Migrations] Schema is up to date.');
    return 0;
  }

  const record = db.prepare(`INSERT INTO ${MIGRATIONS_TABLE} (version) VALUES (?)`);
  for (const file of pending) {
    const version = path.basename(file, '.sql');
    const sql = fs.readFileSync(path.join(directory, file), 'utf8');
    logger.info(`[Migrations] Applying ${version}...`);
    try {
      db.transaction(() => {
        db.exec(sql);
        record.run(version);
      })();
    } catch (error) {
      logger.error(`[Migrations] ${version} failed:`, error);
      throw new Error(`Migration ${version} failed. Halting further migrations.`, { cause: error });
    }
  }

  logger.info(`[Migrations] Applied ${pending.length} migration(s).`);
  return pending.length;
}

export default runMigrations;
export { runMigrations };
