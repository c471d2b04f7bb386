/**
 * Base error class for all data layer errors
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(message: string, code: string, statusCode: number = 500, details?: unknown, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ServiceError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an operation is called in a state that forbids it,
 * e.g. beginning a transaction while another one is active.
 */
export class InvalidStateError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_STATE', 500, details);
    this.name = 'InvalidStateError';
  }
}

/**
 * Engine failure categories, classified once from the driver's error code.
 */
export type DatabaseErrorKind =
  | 'unique_violation'
  | 'foreign_key_violation'
  | 'check_violation'
  | 'not_null_violation'
  | 'busy'
  | 'locked'
  | 'read_only'
  | 'permission'
  | 'io'
  | 'corrupt'
  | 'sql_error'
  | 'unknown';

/**
 * Error thrown when a database operation fails
 */
export class DatabaseError extends ServiceError {
  public readonly operation: string;
  public readonly kind: DatabaseErrorKind;
  public readonly sql?: string;

  constructor(
    operation: string,
    message: string,
    options: { kind?: DatabaseErrorKind; sql?: string; cause?: unknown } = {}
  ) {
    super(
      `Database ${operation} failed: ${message}`,
      'DATABASE_ERROR',
      500,
      { kind: options.kind ?? 'unknown', sql: options.sql },
      options.cause
    );
    this.name = 'DatabaseError';
    this.operation = operation;
    this.kind = options.kind ?? 'unknown';
    this.sql = options.sql;
  }
}

export type RepositoryErrorCode =
  | 'DUPLICATE_KEY'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CONSTRAINT_VIOLATION'
  | 'DATABASE_ERROR'
  | 'INFRASTRUCTURE_ERROR'
  | 'TIMEOUT'
  | 'AUTHORIZATION';

const REPOSITORY_STATUS_CODES: Record<RepositoryErrorCode, number> = {
  DUPLICATE_KEY: 409,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONSTRAINT_VIOLATION: 409,
  DATABASE_ERROR: 500,
  INFRASTRUCTURE_ERROR: 503,
  TIMEOUT: 504,
  AUTHORIZATION: 403,
};

/**
 * Error raised by a repository. Carries the entity and operation so the
 * service layer can report a failure without inspecting the cause.
 */
export class RepositoryError extends ServiceError {
  public readonly code: RepositoryErrorCode;
  public readonly entity: string;
  public readonly operation: string;

  constructor(
    entity: string,
    operation: string,
    code: RepositoryErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message, code, REPOSITORY_STATUS_CODES[code], { entity, operation }, cause);
    this.name = 'RepositoryError';
    this.code = code;
    this.entity = entity;
    this.operation = operation;
  }

  static notFound(entity: string, operation: string, identifier: string | number): RepositoryError {
    return new RepositoryError(entity, operation, 'NOT_FOUND', `${entity} '${identifier}' not found`);
  }

  static duplicate(entity: string, operation: string, identifier: string | number): RepositoryError {
    return new RepositoryError(entity, operation, 'DUPLICATE_KEY', `${entity} '${identifier}' already exists`);
  }
}
