import Database from 'better-sqlite3';
import { DatabaseContext, type DatabaseContextOptions } from '../models/DatabaseContext';

export interface TestContext {
  db: Database.Database;
  context: DatabaseContext;
}

/**
 * Fresh in-memory database with the full schema applied.
 */
export const setupTestContext = async (options: DatabaseContextOptions = {}): Promise<TestContext> => {
  const db = new Database(':memory:');
  const context = new DatabaseContext(db, options);
  await context.initialize();
  return { db, context };
};

/**
 * Counts rows with a raw statement, bypassing the context.
 */
export const countRows = (db: Database.Database, table: string, where: string = '1 = 1', ...params: Array<string | number>): number => {
  const row: unknown = db.prepare(`SELECT COUNT(*) AS count FROM ${table} WHERE ${where}`).get(...params);
  if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
    return row.count;
  }
  throw new Error(`Unexpected COUNT result for ${table}`);
};
