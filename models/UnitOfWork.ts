import { logger } from '../utils/logger';
import { InvalidStateError } from '../services/base/ServiceError';
import type { DatabaseContext } from './DatabaseContext';
import { LocationRepository } from './LocationRepository';
import { SettingRepository, type SettingRepositoryOptions } from './SettingRepository';
import { TipRepository } from './TipRepository';
import { TipTypeRepository } from './TipTypeRepository';
import { WeatherRepository } from './WeatherRepository';
import { SubscriptionRepository } from './SubscriptionRepository';
import type { RepositoryOptions } from './BaseRepository';

/**
 * Registry of all repositories sharing one DatabaseContext
 */
export interface RepositoryRegistry {
  locations: LocationRepository;
  settings: SettingRepository;
  tips: TipRepository;
  tipTypes: TipTypeRepository;
  weather: WeatherRepository;
  subscriptions: SubscriptionRepository;
}

export interface RepositoryRegistryOptions extends RepositoryOptions {
  settings?: SettingRepositoryOptions;
}

/**
 * Instantiates every repository against the same context.
 */
export function createRepositories(
  context: DatabaseContext,
  options: RepositoryRegistryOptions = {}
): RepositoryRegistry {
  const { settings, ...shared } = options;
  return {
    locations: new LocationRepository(context, shared),
    settings: new SettingRepository(context, { ...shared, ...settings }),
    tips: new TipRepository(context, shared),
    tipTypes: new TipTypeRepository(context, shared),
    weather: new WeatherRepository(context, shared),
    subscriptions: new SubscriptionRepository(context, shared),
  };
}

/**
 * Groups the repositories behind one transaction boundary.
 *
 * Repositories write through the context immediately; there is no change
 * buffer. Work that must be atomic across repositories goes through
 * executeInTransaction() or an explicit begin/commit pair.
 */
export class UnitOfWork implements RepositoryRegistry {
  readonly locations: LocationRepository;
  readonly settings: SettingRepository;
  readonly tips: TipRepository;
  readonly tipTypes: TipTypeRepository;
  readonly weather: WeatherRepository;
  readonly subscriptions: SubscriptionRepository;

  private readonly context: DatabaseContext;
  private ownsTransaction = false;

  constructor(context: DatabaseContext, repositories: RepositoryRegistry = createRepositories(context)) {
    this.context = context;
    this.locations = repositories.locations;
    this.settings = repositories.settings;
    this.tips = repositories.tips;
    this.tipTypes = repositories.tipTypes;
    this.weather = repositories.weather;
    this.subscriptions = repositories.subscriptions;
  }

  getDatabaseContext(): DatabaseContext {
    return this.context;
  }

  /**
   * Pass-through: every repository call has already been written through the
   * context by the time it resolved.
   */
  async saveChanges(): Promise<void> {
    logger.debug(
      `[UnitOfWork] saveChanges: nothing staged${this.ownsTransaction ? ', transaction still open until commit()' : ''}.`
    );
  }

  async beginTransaction(): Promise<void> {
    if (this.ownsTransaction) {
      throw new InvalidStateError('Unit of work already has an open transaction');
    }
    await this.context.beginTransaction();
    this.ownsTransaction = true;
  }

  /**
   * Commits the transaction this unit began. No-op when there is none.
   */
  async commit(): Promise<void> {
    if (!this.ownsTransaction) {
      logger.debug('[UnitOfWork] commit called without an open transaction; nothing to do.');
      return;
    }
    try {
      await this.context.commitTransaction();
    } finally {
      this.ownsTransaction = false;
    }
  }

  async rollback(): Promise<void> {
    if (!this.ownsTransaction) {
      throw new InvalidStateError('Unit of work has no open transaction to roll back');
    }
    try {
      await this.context.rollbackTransaction();
    } finally {
      this.ownsTransaction = false;
    }
  }

  hasOpenTransaction(): boolean {
    return this.ownsTransaction;
  }

  async executeInTransaction<T>(operation: () => Promise<T>): Promise<T> {
    return this.context.executeInTransaction(operation);
  }

  /**
   * Rolls back a transaction this unit left open.
   */
  async dispose(): Promise<void> {
    if (this.ownsTransaction) {
      logger.warn('[UnitOfWork] Disposed with an open transaction; rolling back.');
      await this.rollback();
    }
  }
}
