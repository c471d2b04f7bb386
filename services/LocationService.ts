import type { LocationRepository } from '../models/LocationRepository';
import { createLocation } from '../shared/domain';
import type { Location, LocationInput, PagedList } from '../shared/types';
import { BaseService, type RepositoryResult } from './base/BaseService';
import type { ILocationService } from './interfaces';

interface LocationServiceDeps {
  locations: LocationRepository;
}

export class LocationService extends BaseService<LocationServiceDeps> implements ILocationService {
  constructor(deps: LocationServiceDeps) {
    super('LocationService', deps);
  }

  async getById(id: number): Promise<RepositoryResult<Location | null>> {
    return this.executeResult('getById', () => this.deps.locations.getById(id), { id });
  }

  async getAll(): Promise<RepositoryResult<Location[]>> {
    return this.executeResult('getAll', () => this.deps.locations.getAll());
  }

  async getActive(): Promise<RepositoryResult<Location[]>> {
    return this.executeResult('getActive', () => this.deps.locations.getActive());
  }

  async create(input: LocationInput): Promise<RepositoryResult<Location>> {
    return this.executeResult('create', () => this.deps.locations.create(createLocation(input)), {
      title: input.title,
    });
  }

  async update(location: Location): Promise<RepositoryResult<Location>> {
    return this.executeResult('update', () => this.deps.locations.update(location), { id: location.id });
  }

  /**
   * Soft delete; the location can be brought back with restore().
   */
  async delete(id: number): Promise<RepositoryResult<boolean>> {
    return this.executeResult('delete', () => this.deps.locations.softDelete(id), { id });
  }

  async restore(id: number): Promise<RepositoryResult<boolean>> {
    return this.executeResult('restore', () => this.deps.locations.restore(id), { id });
  }

  async getByTitle(title: string): Promise<RepositoryResult<Location | null>> {
    return this.executeResult('getByTitle', () => this.deps.locations.getByTitle(title), { title });
  }

  async getNearby(latitude: number, longitude: number, distanceKm: number): Promise<RepositoryResult<Location[]>> {
    return this.executeResult('getNearby', () => this.deps.locations.getNearby(latitude, longitude, distanceKm), {
      latitude,
      longitude,
      distanceKm,
    });
  }

  async getPaged(
    pageNumber: number,
    pageSize: number,
    searchTerm?: string,
    includeDeleted: boolean = false
  ): Promise<RepositoryResult<PagedList<Location>>> {
    return this.executeResult(
      'getPaged',
      () => this.deps.locations.getPaged(pageNumber, pageSize, searchTerm, includeDeleted),
      { pageNumber, pageSize }
    );
  }
}
