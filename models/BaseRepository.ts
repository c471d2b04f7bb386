import { z } from 'zod';
import { logger } from '../utils/logger';
import { isCancellation } from '../utils/cancellation';
import {
  DatabaseError,
  InvalidStateError,
  RepositoryError,
  ValidationError,
  type DatabaseErrorKind,
  type RepositoryErrorCode,
} from '../services/base/ServiceError';
import type { DatabaseContext, SqlRow } from './DatabaseContext';
import { DEFAULT_BULK_BATCH_SIZE } from './constants';

const KIND_TO_CODE: Record<DatabaseErrorKind, RepositoryErrorCode> = {
  unique_violation: 'DUPLICATE_KEY',
  foreign_key_violation: 'CONSTRAINT_VIOLATION',
  check_violation: 'CONSTRAINT_VIOLATION',
  not_null_violation: 'CONSTRAINT_VIOLATION',
  busy: 'TIMEOUT',
  locked: 'TIMEOUT',
  read_only: 'AUTHORIZATION',
  permission: 'AUTHORIZATION',
  io: 'DATABASE_ERROR',
  corrupt: 'DATABASE_ERROR',
  sql_error: 'DATABASE_ERROR',
  unknown: 'DATABASE_ERROR',
};

export interface RepositoryOptions {
  /** Rows per statement for bulk operations. */
  batchSize?: number;
  /** Clock used for write timestamps. */
  now?: () => Date;
}

/**
 * Base class for all repositories: shared access to the DatabaseContext, row
 * decoding and the mapping of failures into RepositoryError.
 */
export abstract class BaseRepository {
  protected readonly context: DatabaseContext;
  protected readonly batchSize: number;
  protected readonly now: () => Date;
  protected abstract readonly entityName: string;

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    this.context = context;
    this.batchSize = options.batchSize ?? DEFAULT_BULK_BATCH_SIZE;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Get the database context (for transaction support)
   */
  getDatabaseContext(): DatabaseContext {
    return this.context;
  }

  /**
   * Runs a repository operation and classifies anything it throws.
   * @param operation - Tag attached to mapped errors, e.g. "GetByKey"
   */
  protected async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.mapError(error, operation);
    }
  }

  /**
   * Classifies a failure once. Cancellation, transaction misuse and errors that
   * are already classified pass through untouched.
   */
  protected mapError(error: unknown, operation: string): unknown {
    if (isCancellation(error) || error instanceof InvalidStateError) {
      return error;
    }
    if (error instanceof RepositoryError) {
      logger.debug(`[${this.entityName}Repository] ${operation} rejected: ${error.code} ${error.message}`);
      return error;
    }

    let code: RepositoryErrorCode;
    if (error instanceof DatabaseError) {
      code = KIND_TO_CODE[error.kind];
    } else if (error instanceof ValidationError) {
      code = 'VALIDATION_ERROR';
    } else {
      code = 'INFRASTRUCTURE_ERROR';
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[${this.entityName}Repository] DB error in ${operation} (${code}): ${message}`, error);
    return new RepositoryError(this.entityName, operation, code, `${operation} failed: ${message}`, error);
  }

  /**
   * Decodes a raw row with a zod schema. A row that doesn't match the schema
   * means the table no longer matches this code.
   */
  protected decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: SqlRow): T {
    const result = schema.safeParse(row);
    if (!result.success) {
      throw new DatabaseError('decode row', `Unexpected ${this.entityName} row shape: ${result.error.message}`);
    }
    return result.data;
  }

  protected placeholders(count: number): string {
    return Array.from({ length: count }, () => '?').join(', ');
  }
}

/** Escapes LIKE wildcards so user text matches literally (use with ESCAPE '\'). */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, match => `\\${match}`);
}

/** SQLite stores booleans as 0/1. */
export const sqliteBoolean = z.union([z.literal(0), z.literal(1)]).transform(value => value === 1);
