import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { WeatherRepository } from '../WeatherRepository';
import { LocationRepository } from '../LocationRepository';
import { DatabaseContext } from '../DatabaseContext';
import { RepositoryError } from '../../services/base/ServiceError';
import { createLocation, createWeather, replaceForecasts, withWeatherId } from '../../shared/domain';
import type { WeatherForecastInput } from '../../shared/types';
import { setupTestContext, countRows } from '../../test-utils/setupDatabase';

vi.mock('../../utils/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const HOUR_MS = 60 * 60 * 1000;
const START = Date.parse('2024-06-01T00:00:00.000Z');

const forecast = (day: number, temperature: number = 18): WeatherForecastInput => ({
  date: new Date(START + day * 24 * HOUR_MS),
  sunrise: new Date(START + day * 24 * HOUR_MS + 5 * HOUR_MS),
  sunset: new Date(START + day * 24 * HOUR_MS + 21 * HOUR_MS),
  temperature,
  minTemperature: temperature - 5,
  maxTemperature: temperature + 5,
  description: 'clear sky',
  icon: '01d',
  windSpeed: 3.5,
  windDirection: 270,
  humidity: 60,
  pressure: 1013,
  clouds: 10,
  uvIndex: 5.2,
  moonPhase: 0.5,
});

const captureError = async (promise: Promise<unknown>): Promise<RepositoryError> => {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof RepositoryError)) {
    throw new Error(`Expected a RepositoryError, got ${String(error)}`);
  }
  return error;
};

describe('WeatherRepository', () => {
  let db: Database.Database;
  let context: DatabaseContext;
  let repository: WeatherRepository;
  let clock: number;
  let locationId: number;

  const weatherFor = (id: number, forecasts: readonly WeatherForecastInput[] = []) =>
    createWeather({
      locationId: id,
      latitude: 47.6,
      longitude: -122.3,
      timezone: 'America/Los_Angeles',
      timezoneOffset: -25200,
      forecasts,
    });

  beforeEach(async () => {
    ({ db, context } = await setupTestContext());
    clock = START;
    repository = new WeatherRepository(context, { now: () => new Date(clock) });
    const locations = new LocationRepository(context);
    locationId = (await locations.create(createLocation({ title: 'Lookout', latitude: 47.6, longitude: -122.3 }))).id;
  });

  afterEach(async () => {
    await context.close();
  });

  it('should store the snapshot with its forecasts in date order', async () => {
    const created = await repository.create(weatherFor(locationId, [forecast(2), forecast(0), forecast(1)]));

    expect(created.id).toBeGreaterThan(0);
    expect(created.lastUpdate.getTime()).toBe(START);
    expect(created.forecasts.map(f => f.date.getTime())).toEqual([
      START,
      START + 24 * HOUR_MS,
      START + 48 * HOUR_MS,
    ]);
    expect(created.forecasts.every(f => f.weatherId === created.id)).toBe(true);
    expect(created.forecasts[0].windGust).toBeNull();
    expect(created.forecasts[0].moonRise).toBeNull();

    const byLocation = await repository.getByLocationId(locationId);
    expect(byLocation).toEqual(created);
  });

  it('should allow one snapshot per location', async () => {
    await repository.create(weatherFor(locationId));
    const error = await captureError(repository.create(weatherFor(locationId)));

    expect(error.code).toBe('DUPLICATE_KEY');
    expect(error.message).toBe(`Weather 'location ${locationId}' already exists`);
  });

  it('should reject a snapshot for an unknown location', async () => {
    const error = await captureError(repository.create(weatherFor(9999, [forecast(0)])));

    expect(error.code).toBe('CONSTRAINT_VIOLATION');
    expect(countRows(db, 'weather')).toBe(0);
    expect(countRows(db, 'weather_forecasts')).toBe(0);
  });

  it('should replace forecasts on update', async () => {
    const created = await repository.create(weatherFor(locationId, [forecast(0), forecast(1)]));
    clock += HOUR_MS;

    const updated = await repository.update(replaceForecasts(created, [forecast(3, 25)]));

    expect(updated.forecasts).toHaveLength(1);
    expect(updated.forecasts[0].temperature).toBe(25);
    expect(updated.lastUpdate.getTime()).toBe(START + HOUR_MS);
    expect(countRows(db, 'weather_forecasts')).toBe(1);
  });

  it('should report NOT_FOUND when updating an unknown snapshot', async () => {
    const error = await captureError(repository.update(withWeatherId(weatherFor(locationId), 42)));
    expect(error.code).toBe('NOT_FOUND');
  });

  it('should delete the snapshot together with its forecasts', async () => {
    const created = await repository.create(weatherFor(locationId, [forecast(0), forecast(1)]));

    expect(await repository.delete(created.id)).toBe(true);
    expect(await repository.getById(created.id)).toBeNull();
    expect(countRows(db, 'weather_forecasts')).toBe(0);
  });

  it('should list recent and expired snapshots by update time', async () => {
    const locations = new LocationRepository(context);
    const second = await locations.create(createLocation({ title: 'Second', latitude: 10, longitude: 10 }));

    const older = await repository.create(weatherFor(locationId));
    clock += 7 * HOUR_MS;
    const newer = await repository.create(weatherFor(second.id));

    expect((await repository.getRecent()).map(w => w.id)).toEqual([newer.id, older.id]);
    expect((await repository.getRecent(1)).map(w => w.id)).toEqual([newer.id]);
    expect((await repository.getExpired(6)).map(w => w.id)).toEqual([older.id]);
    expect(await repository.getExpired(8)).toEqual([]);
  });
});
