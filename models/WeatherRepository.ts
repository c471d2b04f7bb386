import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError } from '../services/base/ServiceError';
import { createWeather } from '../shared/domain';
import type { Weather, WeatherForecast, WeatherForecastInput } from '../shared/types';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';
import { Scalars, type DatabaseContext, type SqlParam } from './DatabaseContext';

const WeatherRecordSchema = z.object({
  id: z.number().int(),
  location_id: z.number().int(),
  latitude: z.number(),
  longitude: z.number(),
  timezone: z.string(),
  timezone_offset: z.number().int(),
  last_update: z.number(),
});

type WeatherRecord = z.infer<typeof WeatherRecordSchema>;

const epochMs = z.number().transform(value => new Date(value));

const ForecastRecordSchema = z.object({
  id: z.number().int(),
  weather_id: z.number().int(),
  date: epochMs,
  sunrise: epochMs,
  sunset: epochMs,
  temperature: z.number(),
  min_temperature: z.number(),
  max_temperature: z.number(),
  description: z.string(),
  icon: z.string(),
  wind_speed: z.number(),
  wind_direction: z.number(),
  wind_gust: z.number().nullable(),
  humidity: z.number().int(),
  pressure: z.number().int(),
  clouds: z.number().int(),
  uv_index: z.number(),
  precipitation: z.number().nullable(),
  moon_rise: epochMs.nullable(),
  moon_set: epochMs.nullable(),
  moon_phase: z.number(),
});

type ForecastRecord = z.infer<typeof ForecastRecordSchema>;

function mapRecordToForecast(record: ForecastRecord): WeatherForecastInput {
  return {
    id: record.id,
    weatherId: record.weather_id,
    date: record.date,
    sunrise: record.sunrise,
    sunset: record.sunset,
    temperature: record.temperature,
    minTemperature: record.min_temperature,
    maxTemperature: record.max_temperature,
    description: record.description,
    icon: record.icon,
    windSpeed: record.wind_speed,
    windDirection: record.wind_direction,
    windGust: record.wind_gust,
    humidity: record.humidity,
    pressure: record.pressure,
    clouds: record.clouds,
    uvIndex: record.uv_index,
    precipitation: record.precipitation,
    moonRise: record.moon_rise,
    moonSet: record.moon_set,
    moonPhase: record.moon_phase,
  };
}

function mapRecordToWeather(record: WeatherRecord, forecasts: readonly WeatherForecastInput[]): Weather {
  return createWeather({
    id: record.id,
    locationId: record.location_id,
    latitude: record.latitude,
    longitude: record.longitude,
    timezone: record.timezone,
    timezoneOffset: record.timezone_offset,
    lastUpdate: new Date(record.last_update),
    forecasts,
  });
}

const WEATHER_COLUMNS = 'id, location_id, latitude, longitude, timezone, timezone_offset, last_update';
const FORECAST_COLUMNS = `id, weather_id, date, sunrise, sunset, temperature, min_temperature, max_temperature,
  description, icon, wind_speed, wind_direction, wind_gust, humidity, pressure, clouds, uv_index,
  precipitation, moon_rise, moon_set, moon_phase`;

const HOUR_MS = 60 * 60 * 1000;

const toEpoch = (date: Date | null): number | null => (date ? date.getTime() : null);

/**
 * Weather snapshots per location. A snapshot and its daily forecasts are
 * always written together in one transaction.
 */
export class WeatherRepository extends BaseRepository {
  protected readonly entityName = 'Weather';

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    super(context, options);
  }

  async getById(id: number): Promise<Weather | null> {
    return this.run('GetById', async () => {
      const [weather] = await this.queryWeather(`SELECT ${WEATHER_COLUMNS} FROM weather WHERE id = ?`, [id]);
      return weather ?? null;
    });
  }

  async getByLocationId(locationId: number): Promise<Weather | null> {
    return this.run('GetByLocationId', async () => {
      const [weather] = await this.queryWeather(`SELECT ${WEATHER_COLUMNS} FROM weather WHERE location_id = ?`, [
        locationId,
      ]);
      return weather ?? null;
    });
  }

  async create(weather: Weather): Promise<Weather> {
    return this.run('Create', () =>
      this.context.executeInTransaction(async () => {
        const exists = await this.context.executeScalar(
          'SELECT EXISTS(SELECT 1 FROM weather WHERE location_id = ?)',
          [weather.locationId],
          Scalars.boolean
        );
        if (exists) {
          throw RepositoryError.duplicate(this.entityName, 'Create', `location ${weather.locationId}`);
        }
        const lastUpdate = this.now();
        const id = await this.context.insert(weather, w =>
          this.context.executeNonQuery(
            `INSERT INTO weather (location_id, latitude, longitude, timezone, timezone_offset, last_update)
             VALUES (?, ?, ?, ?, ?, ?)`,
            [
              w.locationId,
              w.coordinate.latitude,
              w.coordinate.longitude,
              w.timezone,
              w.timezoneOffset,
              lastUpdate.getTime(),
            ]
          )
        );
        await this.insertForecasts(id, weather.forecasts);
        logger.debug(`[WeatherRepository] Created weather ${id} for location ${weather.locationId}`);
        return this.requireWeather(id, 'Create');
      })
    );
  }

  /**
   * Updates the snapshot and replaces all of its forecasts.
   */
  async update(weather: Weather): Promise<Weather> {
    return this.run('Update', () =>
      this.context.executeInTransaction(async () => {
        const changes = await this.context.update(weather, w =>
          this.context.executeNonQuery(
            `UPDATE weather SET location_id = ?, latitude = ?, longitude = ?, timezone = ?, timezone_offset = ?,
               last_update = ?
             WHERE id = ?`,
            [
              w.locationId,
              w.coordinate.latitude,
              w.coordinate.longitude,
              w.timezone,
              w.timezoneOffset,
              this.now().getTime(),
              w.id,
            ]
          )
        );
        if (changes === 0) {
          throw RepositoryError.notFound(this.entityName, 'Update', weather.id);
        }
        await this.context.executeNonQuery('DELETE FROM weather_forecasts WHERE weather_id = ?', [weather.id]);
        await this.insertForecasts(weather.id, weather.forecasts);
        return this.requireWeather(weather.id, 'Update');
      })
    );
  }

  async delete(id: number): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM weather WHERE id = ?', [id]);
      return changes > 0;
    });
  }

  /**
   * Most recently updated snapshots first.
   */
  async getRecent(count: number = 10): Promise<Weather[]> {
    return this.run('GetRecent', () =>
      this.queryWeather(`SELECT ${WEATHER_COLUMNS} FROM weather ORDER BY last_update DESC, id DESC LIMIT ?`, [
        Math.max(0, Math.trunc(count)),
      ])
    );
  }

  /**
   * Snapshots last updated more than `maxAgeHours` ago.
   */
  async getExpired(maxAgeHours: number): Promise<Weather[]> {
    return this.run('GetExpired', () => {
      const cutoff = this.now().getTime() - maxAgeHours * HOUR_MS;
      return this.queryWeather(
        `SELECT ${WEATHER_COLUMNS} FROM weather WHERE last_update < ? ORDER BY last_update`,
        [cutoff]
      );
    });
  }

  private async requireWeather(id: number, operation: string): Promise<Weather> {
    const [weather] = await this.queryWeather(`SELECT ${WEATHER_COLUMNS} FROM weather WHERE id = ?`, [id]);
    if (!weather) {
      throw RepositoryError.notFound(this.entityName, operation, id);
    }
    return weather;
  }

  /**
   * Loads weather rows and attaches their forecasts with one extra query.
   */
  private async queryWeather(sql: string, params: readonly SqlParam[]): Promise<Weather[]> {
    const records = await this.context.executeQuery(sql, params, row => this.decode(WeatherRecordSchema, row));
    if (records.length === 0) {
      return [];
    }

    const ids = records.map(record => record.id);
    const forecasts = await this.context.executeQuery(
      `SELECT ${FORECAST_COLUMNS} FROM weather_forecasts
       WHERE weather_id IN (${this.placeholders(ids.length)})
       ORDER BY date`,
      ids,
      row => mapRecordToForecast(this.decode(ForecastRecordSchema, row))
    );

    const byWeather = new Map<number, WeatherForecastInput[]>();
    for (const forecast of forecasts) {
      const weatherId = forecast.weatherId ?? 0;
      const list = byWeather.get(weatherId) ?? [];
      list.push(forecast);
      byWeather.set(weatherId, list);
    }
    return records.map(record => mapRecordToWeather(record, byWeather.get(record.id) ?? []));
  }

  private async insertForecasts(weatherId: number, forecasts: readonly WeatherForecast[]): Promise<void> {
    for (const forecast of forecasts) {
      await this.context.executeNonQuery(
        `INSERT INTO weather_forecasts (weather_id, date, sunrise, sunset, temperature, min_temperature,
           max_temperature, description, icon, wind_speed, wind_direction, wind_gust, humidity, pressure, clouds,
           uv_index, precipitation, moon_rise, moon_set, moon_phase)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          weatherId,
          forecast.date.getTime(),
          forecast.sunrise.getTime(),
          forecast.sunset.getTime(),
          forecast.temperature,
          forecast.minTemperature,
          forecast.maxTemperature,
          forecast.description,
          forecast.icon,
          forecast.windSpeed,
          forecast.windDirection,
          forecast.windGust,
          forecast.humidity,
          forecast.pressure,
          forecast.clouds,
          forecast.uvIndex,
          forecast.precipitation,
          toEpoch(forecast.moonRise),
          toEpoch(forecast.moonSet),
          forecast.moonPhase,
        ]
      );
    }
  }
}
