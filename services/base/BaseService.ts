import { logger } from '../../utils/logger';
import { isCancellation } from '../../utils/cancellation';
import { InvalidStateError, RepositoryError, ServiceError } from './ServiceError';

export interface RepositorySuccess<T> {
  success: true;
  data: T;
}

export interface RepositoryFailure {
  success: false;
  /** Human-readable message, shown as is by callers. */
  error: string;
  code: string;
  operation: string;
}

export type RepositoryResult<T> = RepositorySuccess<T> | RepositoryFailure;

/**
 * Base for the data services. Wraps repository calls with timing logs and turns
 * repository failures into RepositoryResult values.
 */
export abstract class BaseService<TDeps = {}> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /** Called once by initDataLayer after the schema is in place. */
  async initialize(): Promise<void> {}

  /** Called from DataLayer.close() before the connection goes away. */
  async cleanup(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /**
   * Runs `fn` with start/finish debug logs. Errors are logged and rethrown;
   * cancellations only at debug level.
   */
  protected async execute<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const started = Date.now();
    const details = context ? ` ${JSON.stringify(context)}` : '';
    this.logger.debug(`[${this.serviceName}] ${operation}${details}`);

    try {
      const result = await fn();
      this.logger.debug(`[${this.serviceName}] ${operation} done in ${Date.now() - started}ms`);
      return result;
    } catch (error) {
      const duration = Date.now() - started;
      if (isCancellation(error)) {
        this.logger.debug(`[${this.serviceName}] ${operation} cancelled after ${duration}ms`);
      } else {
        this.logger.error(`[${this.serviceName}] ${operation} failed after ${duration}ms:`, error);
      }
      throw error;
    }
  }

  /**
   * Like execute(), but reports failures as a RepositoryFailure instead of
   * throwing. Cancellation and transaction misuse still throw.
   */
  protected async executeResult<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<RepositoryResult<T>> {
    try {
      const data = await this.execute(operation, fn, context);
      return { success: true, data };
    } catch (error) {
      if (isCancellation(error) || error instanceof InvalidStateError) {
        throw error;
      }
      return this.toFailure(error, operation);
    }
  }

  protected toFailure(error: unknown, operation: string): RepositoryFailure {
    if (error instanceof RepositoryError) {
      return { success: false, error: error.message, code: error.code, operation: error.operation };
    }
    if (error instanceof ServiceError) {
      return { success: false, error: error.message, code: error.code, operation };
    }
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: 'INFRASTRUCTURE_ERROR',
      operation,
    };
  }
}
