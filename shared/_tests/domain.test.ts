import { describe, it, expect } from 'vitest';
import {
  attachPhoto,
  boundingBox,
  cancelSubscription,
  createCoordinate,
  createLocation,
  createSetting,
  createSubscription,
  createTip,
  createWeather,
  distanceKm,
  forecastForDate,
  isSubscriptionActive,
  isWeatherStale,
  markLocationDeleted,
  removePhoto,
  renewSubscription,
  restoreLocation,
  settingAsBoolean,
  settingAsDate,
  settingAsFloat,
  settingAsInt,
  updateLocationCoordinate,
  updateSettingValue,
} from '../domain';
import { ValidationError } from '../../services/base/ServiceError';

const HOUR_MS = 60 * 60 * 1000;

describe('coordinates', () => {
  it('should reject out-of-range values', () => {
    expect(() => createCoordinate(91, 0)).toThrow(ValidationError);
    expect(() => createCoordinate(0, -180.5)).toThrow(ValidationError);
    expect(() => createCoordinate(Number.NaN, 0)).toThrow(ValidationError);
  });

  it('should measure great-circle distance', () => {
    const origin = createCoordinate(0, 0);
    expect(distanceKm(origin, origin)).toBe(0);
    expect(distanceKm(origin, createCoordinate(1, 0))).toBeCloseTo(111.1949, 3);
    expect(distanceKm(origin, createCoordinate(0, 180))).toBeCloseTo(20015.09, 1);
  });

  it('should build a box that contains the whole radius', () => {
    const center = createCoordinate(60, 10);
    const box = boundingBox(center, 500);

    expect(box.spansAllLongitudes).toBe(false);
    expect(box.maxLatitude - center.latitude).toBeCloseTo(4.4966, 3);
    // a point due east at the radius must fall inside the longitude window
    const east = [...Array(200).keys()]
      .map(i => createCoordinate(60, 10 + i * 0.1))
      .filter(point => distanceKm(center, point) <= 500)
      .pop();
    expect(east).toBeDefined();
    expect(east?.longitude ?? Infinity).toBeLessThanOrEqual(box.maxLongitude);
  });

  it('should drop the longitude filter across the antimeridian and near poles', () => {
    expect(boundingBox(createCoordinate(0, 179.9), 50).spansAllLongitudes).toBe(true);
    expect(boundingBox(createCoordinate(89.9, 0), 50).spansAllLongitudes).toBe(true);
    expect(boundingBox(createCoordinate(0, 0), 50).spansAllLongitudes).toBe(false);
  });
});

describe('settings', () => {
  const setting = (value: string) => createSetting({ key: 'k', value });

  it('should default optional fields', () => {
    const created = createSetting({ key: 'Units', value: 'metric' });
    expect(created.id).toBe(0);
    expect(created.description).toBeNull();
    expect(Object.isFrozen(created)).toBe(true);
  });

  it('should reject a blank key', () => {
    expect(() => createSetting({ key: '  ', value: 'x' })).toThrow('Invalid Setting: key: Key cannot be empty');
  });

  it('should stamp value updates', () => {
    const now = new Date('2024-01-02T03:04:05.000Z');
    const updated = updateSettingValue(setting('a'), 'b', now);
    expect(updated.value).toBe('b');
    expect(updated.timestamp).toEqual(now);
  });

  it('should convert values', () => {
    expect(settingAsBoolean(setting(' TRUE '))).toBe(true);
    expect(settingAsBoolean(setting('yes'))).toBe(false);
    expect(settingAsInt(setting('42'))).toBe(42);
    expect(settingAsInt(setting('4.2'))).toBeNull();
    expect(settingAsFloat(setting('4.25'))).toBe(4.25);
    expect(settingAsFloat(setting(''))).toBeNull();
    expect(settingAsDate(setting('2024-02-29T00:00:00.000Z'))?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(settingAsDate(setting('not a date'))).toBeNull();
  });
});

describe('locations', () => {
  const base = () => createLocation({ title: 'Pier', latitude: 10, longitude: 20 });

  it('should default address and flags', () => {
    const location = base();
    expect(location.address).toEqual({ city: '', state: '' });
    expect(location.photoPath).toBeNull();
    expect(location.isDeleted).toBe(false);
  });

  it('should limit the description to 500 characters', () => {
    expect(() => createLocation({ title: 'Long', latitude: 0, longitude: 0, description: 'x'.repeat(501) })).toThrow(
      ValidationError
    );
  });

  it('should attach and remove photos', () => {
    const withPhoto = attachPhoto(base(), '/photos/pier.jpg');
    expect(withPhoto.photoPath).toBe('/photos/pier.jpg');
    expect(removePhoto(withPhoto).photoPath).toBeNull();
    expect(() => attachPhoto(base(), '   ')).toThrow('Photo path cannot be empty');
  });

  it('should toggle deletion and validate new coordinates', () => {
    const deleted = markLocationDeleted(base());
    expect(deleted.isDeleted).toBe(true);
    expect(restoreLocation(deleted).isDeleted).toBe(false);
    expect(() => updateLocationCoordinate(base(), 100, 0)).toThrow(ValidationError);
  });
});

describe('tips', () => {
  it('should require a positive tip type id', () => {
    expect(() => createTip({ tipTypeId: 0, title: 'Bad' })).toThrow(ValidationError);
    expect(createTip({ tipTypeId: 1, title: 'Good' }).i8n).toBe('en-US');
  });
});

describe('weather', () => {
  const day = (iso: string) => ({
    date: new Date(iso),
    sunrise: new Date(iso),
    sunset: new Date(iso),
    temperature: 20,
    minTemperature: 15,
    maxTemperature: 25,
    windSpeed: 2,
    windDirection: 90,
    humidity: 50,
    pressure: 1010,
    clouds: 0,
    uvIndex: 3,
    moonPhase: 0.25,
  });

  const weather = createWeather({
    id: 7,
    locationId: 1,
    latitude: 0,
    longitude: 0,
    timezone: 'UTC',
    timezoneOffset: 0,
    lastUpdate: new Date('2024-06-01T00:00:00.000Z'),
    forecasts: [day('2024-06-02T12:00:00.000Z'), day('2024-06-01T12:00:00.000Z')],
  });

  it('should sort forecasts and tie them to the snapshot', () => {
    expect(weather.forecasts.map(f => f.date.toISOString())).toEqual([
      '2024-06-01T12:00:00.000Z',
      '2024-06-02T12:00:00.000Z',
    ]);
    expect(weather.forecasts.map(f => f.weatherId)).toEqual([7, 7]);
  });

  it('should find the forecast for a calendar day', () => {
    expect(forecastForDate(weather, new Date('2024-06-02T01:00:00.000Z'))?.date.toISOString()).toBe(
      '2024-06-02T12:00:00.000Z'
    );
    expect(forecastForDate(weather, new Date('2024-06-05T00:00:00.000Z'))).toBeNull();
  });

  it('should report staleness against a max age', () => {
    const now = new Date('2024-06-01T03:00:00.000Z');
    expect(isWeatherStale(weather, 2 * HOUR_MS, now)).toBe(true);
    expect(isWeatherStale(weather, 3 * HOUR_MS, now)).toBe(false);
  });
});

describe('subscriptions', () => {
  const start = new Date('2024-01-01T00:00:00.000Z');
  const expiry = new Date('2024-02-01T00:00:00.000Z');
  const base = () =>
    createSubscription({
      userId: 'user-1',
      productId: 'pro_monthly',
      transactionId: 'txn-1',
      purchaseToken: 'token-1',
      startDate: start,
      expirationDate: expiry,
    });

  it('should default to pending', () => {
    const subscription = base();
    expect(subscription.status).toBe('pending');
    expect(isSubscriptionActive(subscription, start)).toBe(false);
  });

  it('should reject an expiration before the start', () => {
    expect(() =>
      createSubscription({
        userId: 'u',
        productId: 'p',
        transactionId: 't',
        purchaseToken: '',
        startDate: expiry,
        expirationDate: start,
      })
    ).toThrow('Invalid Subscription: expirationDate precedes startDate');
  });

  it('should renew and cancel', () => {
    const next = new Date('2024-03-01T00:00:00.000Z');
    const renewed = renewSubscription(base(), next);
    expect(renewed.status).toBe('active');
    expect(renewed.renewalCount).toBe(1);
    expect(isSubscriptionActive(renewed, new Date('2024-02-15T00:00:00.000Z'))).toBe(true);
    expect(isSubscriptionActive(renewed, next)).toBe(false);

    const cancelled = cancelSubscription(renewed, start);
    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.autoRenewing).toBe(false);
    expect(cancelled.cancelledAt).toEqual(start);
  });
});
