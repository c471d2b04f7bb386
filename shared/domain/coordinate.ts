import type { Coordinate } from '../types';
import { CoordinateSchema, validateDomain } from '../schemas/domainSchemas';

const EARTH_RADIUS_KM = 6371;

export function createCoordinate(latitude: number, longitude: number): Coordinate {
  const parsed = validateDomain(CoordinateSchema, 'Coordinate', { latitude, longitude });
  return Object.freeze({ latitude: parsed.latitude, longitude: parsed.longitude });
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle (haversine) distance in kilometres.
 */
export function distanceKm(from: Coordinate, to: Coordinate): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  return EARTH_RADIUS_KM * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export interface BoundingBox {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
  /** True when the window crosses the antimeridian or a pole; longitude can't be filtered. */
  spansAllLongitudes: boolean;
}

/**
 * Latitude/longitude window that contains every point within `radiusKm`.
 * Used as a cheap SQL pre-filter before the exact distance check.
 */
export function boundingBox(center: Coordinate, radiusKm: number): BoundingBox {
  const angular = radiusKm / EARTH_RADIUS_KM;
  const latDelta = angular * (180 / Math.PI);
  const ratio = Math.sin(angular) / Math.cos(toRadians(center.latitude));
  const lonDelta = angular >= Math.PI / 2 || ratio >= 1 ? 360 : Math.asin(ratio) * (180 / Math.PI);
  const minLongitude = center.longitude - lonDelta;
  const maxLongitude = center.longitude + lonDelta;
  const spansAllLongitudes = minLongitude < -180 || maxLongitude > 180;
  return {
    minLatitude: Math.max(-90, center.latitude - latDelta),
    maxLatitude: Math.min(90, center.latitude + latDelta),
    minLongitude: spansAllLongitudes ? -180 : minLongitude,
    maxLongitude: spansAllLongitudes ? 180 : maxLongitude,
    spansAllLongitudes,
  };
}
