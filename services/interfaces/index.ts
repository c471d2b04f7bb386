import type { RepositoryResult } from '../base/BaseService';
import type {
  Location,
  LocationInput,
  PagedList,
  Setting,
  SettingInput,
  Subscription,
  SubscriptionInput,
  Tip,
  TipInput,
  TipType,
  TipTypeInput,
  Weather,
  WeatherInput,
} from '../../shared/types';

/**
 * Base interface for all services
 */
export interface IService {
  /**
   * Initialize the service during application bootstrap
   */
  initialize(): Promise<void>;

  /**
   * Cleanup resources during application shutdown
   */
  cleanup(): Promise<void>;

  /**
   * Check if the service is healthy
   */
  healthCheck(): Promise<boolean>;
}

/*
 * The surfaces below are what use-case handlers call. Every method resolves to a
 * RepositoryResult; "not found" on a read is a success carrying null.
 */

export interface ILocationService extends IService {
  getById(id: number): Promise<RepositoryResult<Location | null>>;
  getAll(): Promise<RepositoryResult<Location[]>>;
  getActive(): Promise<RepositoryResult<Location[]>>;
  create(input: LocationInput): Promise<RepositoryResult<Location>>;
  update(location: Location): Promise<RepositoryResult<Location>>;
  delete(id: number): Promise<RepositoryResult<boolean>>;
  restore(id: number): Promise<RepositoryResult<boolean>>;
  getByTitle(title: string): Promise<RepositoryResult<Location | null>>;
  getNearby(latitude: number, longitude: number, distanceKm: number): Promise<RepositoryResult<Location[]>>;
  getPaged(
    pageNumber: number,
    pageSize: number,
    searchTerm?: string,
    includeDeleted?: boolean
  ): Promise<RepositoryResult<PagedList<Location>>>;
}

export interface ISettingService extends IService {
  getByKey(key: string): Promise<RepositoryResult<Setting | null>>;
  getAll(): Promise<RepositoryResult<Setting[]>>;
  create(input: SettingInput): Promise<RepositoryResult<Setting>>;
  update(setting: Setting): Promise<RepositoryResult<Setting>>;
  delete(key: string): Promise<RepositoryResult<boolean>>;
  upsert(key: string, value: string, description?: string | null): Promise<RepositoryResult<Setting>>;
  getAllAsDictionary(): Promise<RepositoryResult<Record<string, string>>>;
}

export interface ITipService extends IService {
  getById(id: number): Promise<RepositoryResult<Tip | null>>;
  getAll(): Promise<RepositoryResult<Tip[]>>;
  getByType(tipTypeId: number): Promise<RepositoryResult<Tip[]>>;
  create(input: TipInput): Promise<RepositoryResult<Tip>>;
  update(tip: Tip): Promise<RepositoryResult<Tip>>;
  delete(id: number): Promise<RepositoryResult<boolean>>;
  getRandomByType(tipTypeId: number): Promise<RepositoryResult<Tip | null>>;
  getTipTypes(): Promise<RepositoryResult<TipType[]>>;
  createTipType(input: TipTypeInput): Promise<RepositoryResult<TipType>>;
}

export interface IWeatherService extends IService {
  getById(id: number): Promise<RepositoryResult<Weather | null>>;
  getByLocationId(locationId: number): Promise<RepositoryResult<Weather | null>>;
  save(input: WeatherInput): Promise<RepositoryResult<Weather>>;
  delete(id: number): Promise<RepositoryResult<boolean>>;
  getRecent(count?: number): Promise<RepositoryResult<Weather[]>>;
  getExpired(maxAgeHours: number): Promise<RepositoryResult<Weather[]>>;
}

export interface ISubscriptionService extends IService {
  create(input: SubscriptionInput): Promise<RepositoryResult<Subscription>>;
  getActive(userId: string): Promise<RepositoryResult<Subscription | null>>;
  getByTransactionId(transactionId: string): Promise<RepositoryResult<Subscription | null>>;
  getByPurchaseToken(purchaseToken: string): Promise<RepositoryResult<Subscription | null>>;
  getByUserId(userId: string): Promise<RepositoryResult<Subscription[]>>;
  update(subscription: Subscription): Promise<RepositoryResult<Subscription>>;
  getById(id: number): Promise<RepositoryResult<Subscription | null>>;
  delete(id: number): Promise<RepositoryResult<boolean>>;
  getExpired(): Promise<RepositoryResult<Subscription[]>>;
  getNeedingVerification(maxAgeHours?: number): Promise<RepositoryResult<Subscription[]>>;
}
