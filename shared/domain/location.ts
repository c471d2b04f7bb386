import type { Location, LocationInput } from '../types';
import { LocationSchema, validateDomain } from '../schemas/domainSchemas';
import { ValidationError } from '../../services/base/ServiceError';

export function createLocation(input: LocationInput): Location {
  const parsed = validateDomain(LocationSchema, 'Location', {
    id: input.id ?? 0,
    title: input.title,
    description: input.description ?? '',
    latitude: input.latitude,
    longitude: input.longitude,
    city: input.city ?? '',
    state: input.state ?? '',
    photoPath: input.photoPath ?? null,
    isDeleted: input.isDeleted ?? false,
    timestamp: input.timestamp ?? new Date(),
  });
  return Object.freeze({
    id: parsed.id,
    title: parsed.title,
    description: parsed.description,
    coordinate: Object.freeze({ latitude: parsed.latitude, longitude: parsed.longitude }),
    address: Object.freeze({ city: parsed.city, state: parsed.state }),
    photoPath: parsed.photoPath,
    isDeleted: parsed.isDeleted,
    timestamp: parsed.timestamp,
  });
}

function toInput(location: Location): LocationInput {
  return {
    id: location.id,
    title: location.title,
    description: location.description,
    latitude: location.coordinate.latitude,
    longitude: location.coordinate.longitude,
    city: location.address.city,
    state: location.address.state,
    photoPath: location.photoPath,
    isDeleted: location.isDeleted,
    timestamp: location.timestamp,
  };
}

export function withLocationId(location: Location, id: number): Location {
  return createLocation({ ...toInput(location), id });
}

export function updateLocationDetails(
  location: Location,
  title: string,
  description: string,
  now: Date = new Date()
): Location {
  return createLocation({ ...toInput(location), title, description, timestamp: now });
}

export function updateLocationCoordinate(
  location: Location,
  latitude: number,
  longitude: number,
  now: Date = new Date()
): Location {
  return createLocation({ ...toInput(location), latitude, longitude, timestamp: now });
}

export function updateLocationAddress(location: Location, city: string, state: string, now: Date = new Date()): Location {
  return createLocation({ ...toInput(location), city, state, timestamp: now });
}

export function attachPhoto(location: Location, photoPath: string, now: Date = new Date()): Location {
  if (photoPath.trim().length === 0) {
    throw new ValidationError('Photo path cannot be empty');
  }
  return createLocation({ ...toInput(location), photoPath, timestamp: now });
}

export function removePhoto(location: Location, now: Date = new Date()): Location {
  return createLocation({ ...toInput(location), photoPath: null, timestamp: now });
}

export function markLocationDeleted(location: Location, now: Date = new Date()): Location {
  return createLocation({ ...toInput(location), isDeleted: true, timestamp: now });
}

export function restoreLocation(location: Location, now: Date = new Date()): Location {
  return createLocation({ ...toInput(location), isDeleted: false, timestamp: now });
}
