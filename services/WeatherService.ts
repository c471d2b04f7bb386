import type { WeatherRepository } from '../models/WeatherRepository';
import { createWeather } from '../shared/domain';
import type { Weather, WeatherInput } from '../shared/types';
import { BaseService, type RepositoryResult } from './base/BaseService';
import type { IWeatherService } from './interfaces';

interface WeatherServiceDeps {
  weather: WeatherRepository;
}

/**
 * Stores weather snapshots handed over by the weather API client. Fetching the
 * data is not this service's job.
 */
export class WeatherService extends BaseService<WeatherServiceDeps> implements IWeatherService {
  constructor(deps: WeatherServiceDeps) {
    super('WeatherService', deps);
  }

  async getById(id: number): Promise<RepositoryResult<Weather | null>> {
    return this.executeResult('getById', () => this.deps.weather.getById(id), { id });
  }

  async getByLocationId(locationId: number): Promise<RepositoryResult<Weather | null>> {
    return this.executeResult('getByLocationId', () => this.deps.weather.getByLocationId(locationId), {
      locationId,
    });
  }

  /**
   * Creates the location's snapshot, or replaces the existing one and its forecasts.
   */
  async save(input: WeatherInput): Promise<RepositoryResult<Weather>> {
    return this.executeResult(
      'save',
      () =>
        this.deps.weather.getDatabaseContext().executeInTransaction(async () => {
          const existing = await this.deps.weather.getByLocationId(input.locationId);
          if (existing) {
            return this.deps.weather.update(createWeather({ ...input, id: existing.id }));
          }
          return this.deps.weather.create(createWeather({ ...input, id: 0 }));
        }),
      { locationId: input.locationId }
    );
  }

  async delete(id: number): Promise<RepositoryResult<boolean>> {
    return this.executeResult('delete', () => this.deps.weather.delete(id), { id });
  }

  async getRecent(count: number = 10): Promise<RepositoryResult<Weather[]>> {
    return this.executeResult('getRecent', () => this.deps.weather.getRecent(count), { count });
  }

  async getExpired(maxAgeHours: number): Promise<RepositoryResult<Weather[]>> {
    return this.executeResult('getExpired', () => this.deps.weather.getExpired(maxAgeHours), { maxAgeHours });
  }
}
