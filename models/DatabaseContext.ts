import { AsyncLocalStorage } from 'async_hooks';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { AsyncLock } from '../utils/AsyncLock';
import { isCancellation } from '../utils/cancellation';
import { DatabaseError, InvalidStateError, ValidationError } from '../services/base/ServiceError';
import { classifySqliteError } from './sqliteErrors';
import { runMigrations } from './runMigrations';
import { BUSY_TIMEOUT_MS, DEFAULT_BULK_BATCH_SIZE, MAX_CACHED_STATEMENTS } from './constants';

export type SqlParam = string | number | bigint | boolean | null;
export type SqlRow = Record<string, unknown>;
export type RowMapper<T> = (row: SqlRow) => T;
export type ScalarMapper<T> = (value: unknown) => T;

export interface DatabaseContextOptions {
  /** Chunk size for bulk operations. */
  bulkBatchSize?: number;
  /** Overrides the migrations directory lookup. */
  migrationsDir?: string;
  /** Set to false when the schema is managed elsewhere. */
  applyMigrations?: boolean;
}

export interface BatchOptions {
  batchSize?: number;
  signal?: AbortSignal;
}

interface ActiveTransaction {
  readonly id: number;
  /** Opened through beginTransaction(); any caller joins it. */
  readonly manual: boolean;
}

function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null;
}

function bindParams(params: readonly SqlParam[]): Array<string | number | bigint | null> {
  return params.map(param => (typeof param === 'boolean' ? (param ? 1 : 0) : param));
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Scalar mappers for executeScalar().
 */
export const Scalars = {
  number: (value: unknown): number => {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
    throw new ValidationError(`Expected a numeric scalar, got ${typeof value}`);
  },
  boolean: (value: unknown): boolean => {
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'bigint') return value !== 0n;
    if (typeof value === 'boolean') return value;
    throw new ValidationError(`Expected a boolean scalar, got ${typeof value}`);
  },
  string: (value: unknown): string => {
    if (typeof value === 'string') return value;
    throw new ValidationError(`Expected a text scalar, got ${typeof value}`);
  },
};

/**
 * Owns the SQLite connection: transaction demarcation, statement execution and
 * bulk operations. Every repository goes through one shared instance.
 *
 * Transactions are flat. `executeInTransaction` joins a transaction the caller is
 * already running in, and queues behind one owned by another async flow.
 * `beginTransaction` never queues: it fails with InvalidStateError instead.
 */
export class DatabaseContext {
  private readonly db: Database.Database;
  private readonly bulkBatchSize: number;
  private readonly options: DatabaseContextOptions;

  private readonly transactionLock = new AsyncLock();
  private readonly transactionScope = new AsyncLocalStorage<number>();
  private activeTransaction: ActiveTransaction | null = null;
  private transactionCounter = 0;

  private readonly statementCache = new Map<string, Database.Statement>();

  private initialized = false;
  private initializing: Promise<void> | null = null;
  private closed = false;

  constructor(db: Database.Database, options: DatabaseContextOptions = {}) {
    const bulkBatchSize = options.bulkBatchSize ?? DEFAULT_BULK_BATCH_SIZE;
    if (!Number.isInteger(bulkBatchSize) || bulkBatchSize < 1) {
      throw new ValidationError(`bulkBatchSize must be a positive integer, got ${bulkBatchSize}`);
    }
    this.db = db;
    this.bulkBatchSize = bulkBatchSize;
    this.options = options;
  }

  /**
   * Applies connection pragmas and pending migrations. Safe to call repeatedly;
   * concurrent first calls share a single initialization.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    if (this.closed) {
      throw new InvalidStateError('DatabaseContext has been closed');
    }
    if (!this.initializing) {
      this.initializing = Promise.resolve().then(() => this.performInitialization());
    }
    try {
      await this.initializing;
    } catch (error) {
      this.initializing = null;
      throw error;
    }
  }

  private performInitialization(): void {
    if (this.initialized) {
      return;
    }
    const startTime = Date.now();
    logger.info('[DatabaseContext] Initializing database connection...');
    try {
      this.db.pragma('foreign_keys = ON');
      if (!this.db.memory) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('cache_size = -8000');
      this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

      if (this.options.applyMigrations !== false) {
        runMigrations(this.db, this.options.migrationsDir);
      }
      this.db.pragma('optimize');
    } catch (error) {
      logger.error('[DatabaseContext] Initialization failed:', error);
      throw new DatabaseError('initialize', errorMessage(error), {
        kind: classifySqliteError(error),
        cause: error,
      });
    }
    this.initialized = true;
    logger.info(`[DatabaseContext] Initialized in ${Date.now() - startTime}ms.`);
  }

  private async ensureInitialized(): Promise<void> {
    if (this.closed) {
      throw new InvalidStateError('DatabaseContext has been closed');
    }
    if (!this.initialized) {
      await this.initialize();
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  isInTransaction(): boolean {
    return this.activeTransaction !== null;
  }

  /**
   * True when a statement issued from the current async flow would run inside
   * the active transaction (and could still be rolled back).
   */
  isInTransactionScope(): boolean {
    return this.isJoinable();
  }

  // --- Transactions ---

  /**
   * Opens a transaction that stays active until commitTransaction() or
   * rollbackTransaction(). Fails immediately if any transaction is active; a lock
   * held only by a queued statement or transaction is waited for.
   */
  async beginTransaction(): Promise<void> {
    await this.ensureInitialized();
    if (this.activeTransaction) {
      throw new InvalidStateError('Transaction already in progress');
    }
    await this.transactionLock.acquire();
    try {
      this.openTransaction(true);
    } catch (error) {
      this.transactionLock.release();
      throw error;
    }
  }

  async commitTransaction(): Promise<void> {
    this.finishTransaction(this.requireManualTransaction('commit'), 'COMMIT');
  }

  async rollbackTransaction(): Promise<void> {
    this.finishTransaction(this.requireManualTransaction('roll back'), 'ROLLBACK');
  }

  /**
   * Runs `operation` atomically. Commits when it resolves; rolls back and rethrows
   * the same error when it rejects, cancellation included.
   */
  async executeInTransaction<T>(operation: () => Promise<T>): Promise<T> {
    await this.ensureInitialized();

    if (this.isJoinable()) {
      return operation();
    }

    await this.transactionLock.acquire();
    let transaction: ActiveTransaction;
    try {
      transaction = this.openTransaction(false);
    } catch (error) {
      this.transactionLock.release();
      throw error;
    }

    try {
      const result = await this.transactionScope.run(transaction.id, operation);
      this.finishTransaction(transaction, 'COMMIT');
      return result;
    } catch (error) {
      if (this.activeTransaction === transaction) {
        if (isCancellation(error)) {
          logger.debug(`[DatabaseContext] Transaction ${transaction.id} cancelled, rolling back.`);
        } else {
          logger.warn(`[DatabaseContext] Transaction ${transaction.id} failed, rolling back: ${errorMessage(error)}`);
        }
        try {
          this.finishTransaction(transaction, 'ROLLBACK');
        } catch (rollbackError) {
          // the original failure is what the caller needs to see
          logger.error(`[DatabaseContext] Rollback of transaction ${transaction.id} failed:`, rollbackError);
        }
      }
      throw error;
    }
  }

  private isJoinable(): boolean {
    const active = this.activeTransaction;
    return active !== null && (active.manual || this.transactionScope.getStore() === active.id);
  }

  private requireManualTransaction(action: string): ActiveTransaction {
    const active = this.activeTransaction;
    if (!active) {
      throw new InvalidStateError(`No active transaction to ${action}`);
    }
    if (!active.manual) {
      throw new InvalidStateError(`Cannot ${action} a transaction owned by executeInTransaction`);
    }
    return active;
  }

  /** Caller must hold transactionLock. */
  private openTransaction(manual: boolean): ActiveTransaction {
    const transaction: ActiveTransaction = { id: ++this.transactionCounter, manual };
    this.activeTransaction = transaction;
    try {
      this.db.exec('BEGIN');
    } catch (error) {
      this.activeTransaction = null;
      logger.error('[DatabaseContext] Failed to begin transaction:', error);
      throw new DatabaseError('begin transaction', errorMessage(error), {
        kind: classifySqliteError(error),
        sql: 'BEGIN',
        cause: error,
      });
    }
    logger.debug(`[DatabaseContext] Transaction ${transaction.id} started${manual ? ' (manual)' : ''}.`);
    return transaction;
  }

  /**
   * Ends the engine transaction. The active flag is cleared and the lock
   * released whatever the outcome.
   */
  private finishTransaction(transaction: ActiveTransaction, action: 'COMMIT' | 'ROLLBACK'): void {
    try {
      if (action === 'ROLLBACK' && !this.db.inTransaction) {
        // the engine already rolled back, e.g. after SQLITE_FULL
        logger.debug(`[DatabaseContext] Transaction ${transaction.id} was already rolled back by the engine.`);
        return;
      }
      this.db.exec(action);
      logger.debug(`[DatabaseContext] Transaction ${transaction.id} ${action === 'COMMIT' ? 'committed' : 'rolled back'}.`);
    } catch (error) {
      if (action === 'COMMIT' && this.db.inTransaction) {
        try {
          this.db.exec('ROLLBACK');
        } catch (rollbackError) {
          logger.error(`[DatabaseContext] Rollback after failed commit also failed:`, rollbackError);
        }
      }
      throw new DatabaseError(action === 'COMMIT' ? 'commit' : 'rollback', errorMessage(error), {
        kind: classifySqliteError(error),
        sql: action,
        cause: error,
      });
    } finally {
      this.activeTransaction = null;
      this.transactionLock.release();
    }
  }

  // --- Statements ---

  /**
   * Executes a statement and returns the number of affected rows.
   */
  async executeNonQuery(sql: string, params: readonly SqlParam[] = []): Promise<number> {
    return this.runStatement(sql, statement => statement.run(...bindParams(params)).changes);
  }

  /**
   * Returns the first column of the first row, or null when there is no row.
   */
  async executeScalar<T>(sql: string, params: readonly SqlParam[], mapper: ScalarMapper<T>): Promise<T | null> {
    const row = await this.runStatement(sql, statement => statement.get(...bindParams(params)));
    if (!isSqlRow(row)) {
      return null;
    }
    const [value] = Object.values(row);
    return value === null || value === undefined ? null : mapper(value);
  }

  async executeQuery<T>(sql: string, params: readonly SqlParam[], rowMapper: RowMapper<T>): Promise<T[]> {
    const rows = await this.runStatement(sql, statement => statement.all(...bindParams(params)));
    return rows.filter(isSqlRow).map(row => rowMapper(row));
  }

  async executeQuerySingle<T>(sql: string, params: readonly SqlParam[], rowMapper: RowMapper<T>): Promise<T | null> {
    const row = await this.runStatement(sql, statement => statement.get(...bindParams(params)));
    return isSqlRow(row) ? rowMapper(row) : null;
  }

  /**
   * Runs `fn` and returns the rowid it assigned. Both steps run in one
   * transaction so no other insert can slip in between.
   */
  async insert<T>(entity: T, fn: (entity: T) => Promise<unknown>): Promise<number> {
    return this.executeInTransaction(async () => {
      await fn(entity);
      return (await this.executeScalar('SELECT last_insert_rowid()', [], Scalars.number)) ?? 0;
    });
  }

  /**
   * Runs `fn` and returns the number of rows its last statement changed.
   */
  async update<T>(entity: T, fn: (entity: T) => Promise<unknown>): Promise<number> {
    return this.executeInTransaction(async () => {
      await fn(entity);
      return (await this.executeScalar('SELECT changes()', [], Scalars.number)) ?? 0;
    });
  }

  async delete<T>(entity: T, fn: (entity: T) => Promise<unknown>): Promise<number> {
    return this.update(entity, fn);
  }

  /**
   * Inserts every entity inside one transaction, `batchSize` at a time.
   * Any failure rolls back the whole call.
   */
  async bulkInsert<T>(
    entities: readonly T[],
    fn: (entity: T) => Promise<unknown>,
    batchSize: number = this.bulkBatchSize,
    signal?: AbortSignal
  ): Promise<number> {
    return this.executeInBatches(entities, chunk => this.applyEach(chunk, fn), { batchSize, signal });
  }

  async bulkUpdate<T>(
    entities: readonly T[],
    fn: (entity: T) => Promise<unknown>,
    batchSize: number = this.bulkBatchSize,
    signal?: AbortSignal
  ): Promise<number> {
    return this.executeInBatches(entities, chunk => this.applyEach(chunk, fn), { batchSize, signal });
  }

  /**
   * Splits `items` into chunks and hands each chunk to `handler` inside a single
   * transaction. Returns the sum of what the handler reports. The signal is
   * checked before every chunk.
   */
  async executeInBatches<T>(
    items: readonly T[],
    handler: (chunk: readonly T[]) => Promise<number>,
    options: BatchOptions = {}
  ): Promise<number> {
    const batchSize = options.batchSize ?? this.bulkBatchSize;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError(`batchSize must be a positive integer, got ${batchSize}`);
    }
    options.signal?.throwIfAborted();
    if (items.length === 0) {
      return 0;
    }

    return this.executeInTransaction(async () => {
      let total = 0;
      for (let start = 0; start < items.length; start += batchSize) {
        options.signal?.throwIfAborted();
        total += await handler(items.slice(start, start + batchSize));
      }
      logger.debug(`[DatabaseContext] Batched operation processed ${items.length} item(s), batch size ${batchSize}.`);
      return total;
    });
  }

  private async applyEach<T>(chunk: readonly T[], fn: (entity: T) => Promise<unknown>): Promise<number> {
    for (const entity of chunk) {
      await fn(entity);
    }
    return chunk.length;
  }

  /**
   * Prepares (or reuses) a statement and runs `fn` against it. Callers outside
   * the active transaction wait until it has finished.
   */
  private async runStatement<R>(sql: string, fn: (statement: Database.Statement) => R): Promise<R> {
    await this.ensureInitialized();
    const execute = (): R => {
      try {
        return fn(this.prepare(sql));
      } catch (error) {
        logger.error(`[DatabaseContext] Statement failed: ${sql}`, error);
        throw new DatabaseError('statement', errorMessage(error), {
          kind: classifySqliteError(error),
          sql,
          cause: error,
        });
      }
    };
    if (this.activeTransaction && !this.isJoinable()) {
      return this.transactionLock.runExclusive(execute);
    }
    return execute();
  }

  private prepare(sql: string): Database.Statement {
    const cached = this.statementCache.get(sql);
    if (cached) {
      // move to the most recently used end
      this.statementCache.delete(sql);
      this.statementCache.set(sql, cached);
      return cached;
    }
    const statement = this.db.prepare(sql);
    this.statementCache.set(sql, statement);
    if (this.statementCache.size > MAX_CACHED_STATEMENTS) {
      const oldest = this.statementCache.keys().next();
      if (!oldest.done) {
        this.statementCache.delete(oldest.value);
      }
    }
    return statement;
  }

  get cachedStatementCount(): number {
    return this.statementCache.size;
  }

  /**
   * Rolls back any open transaction and closes the connection.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    if (this.activeTransaction) {
      logger.warn(`[DatabaseContext] Closing with transaction ${this.activeTransaction.id} still active; rolling back.`);
      this.finishTransaction(this.activeTransaction, 'ROLLBACK');
    }
    this.closed = true;
    this.statementCache.clear();
    if (this.db.open) {
      this.db.close();
    }
    logger.info('[DatabaseContext] Connection closed.');
  }
}
