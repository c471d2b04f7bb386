/**
 * Base service infrastructure exports
 */

export { BaseService } from './BaseService';
export type { RepositoryResult, RepositorySuccess, RepositoryFailure } from './BaseService';

export {
  ServiceError,
  ValidationError,
  InvalidStateError,
  DatabaseError,
  RepositoryError
} from './ServiceError';
export type { DatabaseErrorKind, RepositoryErrorCode } from './ServiceError';
