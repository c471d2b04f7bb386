import type { DatabaseErrorKind } from '../services/base/ServiceError';

const EXACT_CODES: Record<string, DatabaseErrorKind> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique_violation',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique_violation',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key_violation',
  SQLITE_CONSTRAINT_CHECK: 'check_violation',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null_violation',
  SQLITE_READONLY: 'read_only',
  SQLITE_PERM: 'permission',
  SQLITE_AUTH: 'permission',
  SQLITE_CORRUPT: 'corrupt',
  SQLITE_NOTADB: 'corrupt',
  SQLITE_ERROR: 'sql_error',
};

// Extended result codes share the primary code as prefix (SQLITE_BUSY_SNAPSHOT, SQLITE_IOERR_WRITE, ...)
const PREFIX_CODES: Array<[string, DatabaseErrorKind]> = [
  ['SQLITE_BUSY', 'busy'],
  ['SQLITE_LOCKED', 'locked'],
  ['SQLITE_READONLY', 'read_only'],
  ['SQLITE_IOERR', 'io'],
  ['SQLITE_CANTOPEN', 'io'],
  ['SQLITE_FULL', 'io'],
  ['SQLITE_CORRUPT', 'corrupt'],
];

export function getSqliteErrorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Maps a driver error to a DatabaseErrorKind using its SQLite result code.
 */
export function classifySqliteError(error: unknown): DatabaseErrorKind {
  const code = getSqliteErrorCode(error);
  if (!code) {
    return 'unknown';
  }
  const exact = EXACT_CODES[code];
  if (exact) {
    return exact;
  }
  for (const [prefix, kind] of PREFIX_CODES) {
    if (code.startsWith(prefix)) {
      return kind;
    }
  }
  return 'unknown';
}
