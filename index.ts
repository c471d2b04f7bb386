export { initDataLayer } from './bootstrap/initDataLayer';
export type { DataLayer, DataLayerOptions, ServiceRegistry } from './bootstrap/initDataLayer';

export { DatabaseContext, Scalars } from './models/DatabaseContext';
export type { SqlParam, SqlRow, RowMapper, ScalarMapper, DatabaseContextOptions } from './models/DatabaseContext';
export { UnitOfWork, createRepositories } from './models/UnitOfWork';
export type { RepositoryRegistry } from './models/UnitOfWork';
export { TtlCache } from './models/cache/TtlCache';
export { SettingRepository } from './models/SettingRepository';
export { LocationRepository } from './models/LocationRepository';
export { TipRepository } from './models/TipRepository';
export { TipTypeRepository } from './models/TipTypeRepository';
export { WeatherRepository } from './models/WeatherRepository';
export { SubscriptionRepository } from './models/SubscriptionRepository';
export { initDb, closeDb, getDb } from './models/db';
export { runMigrations } from './models/runMigrations';

export * from './services/base';
export type * from './services/interfaces';
export { LocationService } from './services/LocationService';
export { SettingService } from './services/SettingService';
export { TipService } from './services/TipService';
export { WeatherService } from './services/WeatherService';
export { SubscriptionService } from './services/SubscriptionService';

export * from './shared/domain';
export * from './shared/types';
export { initConfig, loadConfig } from './utils/config';
export type { DataLayerConfig } from './utils/config';
export { logger, setLogLevel } from './utils/logger';
