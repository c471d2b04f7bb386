import type Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { initDb } from '../models/db';
import { DatabaseContext } from '../models/DatabaseContext';
import { UnitOfWork, createRepositories, type RepositoryRegistry } from '../models/UnitOfWork';
import { TtlCache } from '../models/cache/TtlCache';
import { LocationService } from '../services/LocationService';
import { SettingService } from '../services/SettingService';
import { TipService } from '../services/TipService';
import { WeatherService } from '../services/WeatherService';
import { SubscriptionService } from '../services/SubscriptionService';
import type { IService } from '../services/interfaces';
import type { Setting } from '../shared/types';

export interface DataLayerOptions {
  /** Defaults to the configured path; ':memory:' for an in-memory database. */
  dbPath?: string;
  /** Use an already opened connection instead of opening dbPath. */
  db?: Database.Database;
  cacheTtlMs?: number;
  bulkBatchSize?: number;
  migrationsDir?: string;
}

/**
 * Registry of all services
 */
export interface ServiceRegistry {
  locationService: LocationService;
  settingService: SettingService;
  tipService: TipService;
  weatherService: WeatherService;
  subscriptionService: SubscriptionService;
}

export interface DataLayer {
  context: DatabaseContext;
  repositories: RepositoryRegistry;
  /** Unit of work over the shared repositories, for handlers that span several. */
  unitOfWork: UnitOfWork;
  services: ServiceRegistry;
  close(): Promise<void>;
}

/**
 * Opens the database, applies pragmas and migrations, and wires repositories
 * and services. This is the single source of truth for data layer instantiation.
 */
export async function initDataLayer(options: DataLayerOptions = {}): Promise<DataLayer> {
  logger.info('[DataLayerBootstrap] Initializing data layer...');

  // no path: the configured file, opened as the shared connection
  const db = options.db ?? initDb(options.dbPath);
  const context = new DatabaseContext(db, {
    bulkBatchSize: options.bulkBatchSize,
    migrationsDir: options.migrationsDir,
  });

  try {
    await context.initialize();

    const repositories = createRepositories(context, {
      batchSize: options.bulkBatchSize,
      settings: { cache: new TtlCache<string, Setting>({ ttlMs: options.cacheTtlMs }) },
    });
    const unitOfWork = new UnitOfWork(context, repositories);

    const services: ServiceRegistry = {
      locationService: new LocationService({ locations: repositories.locations }),
      settingService: new SettingService({ settings: repositories.settings }),
      tipService: new TipService({ tips: repositories.tips, tipTypes: repositories.tipTypes }),
      weatherService: new WeatherService({ weather: repositories.weather }),
      subscriptionService: new SubscriptionService({ subscriptions: repositories.subscriptions }),
    };

    const lifecycle: IService[] = Object.values(services);
    for (const service of lifecycle) {
      await service.initialize();
    }
    logger.info('[DataLayerBootstrap] Data layer ready.');

    return {
      context,
      repositories,
      unitOfWork,
      services,
      async close(): Promise<void> {
        logger.info('[DataLayerBootstrap] Shutting down data layer...');
        await unitOfWork.dispose();
        for (const service of lifecycle) {
          await service.cleanup();
        }
        await context.close();
      },
    };
  } catch (error) {
    logger.error('[DataLayerBootstrap] Initialization failed:', error);
    // an injected connection belongs to the caller
    if (!options.db && db.open) {
      db.close();
    }
    throw error;
  }
}
