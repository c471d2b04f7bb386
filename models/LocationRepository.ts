import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError, ValidationError } from '../services/base/ServiceError';
import { boundingBox, createCoordinate, createLocation, distanceKm, withLocationId } from '../shared/domain';
import type { Location, PagedList } from '../shared/types';
import { BaseRepository, escapeLike, sqliteBoolean, type RepositoryOptions } from './BaseRepository';
import { Scalars, type DatabaseContext, type SqlParam, type SqlRow } from './DatabaseContext';

const LocationRecordSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  city: z.string(),
  state: z.string(),
  photo_path: z.string().nullable(),
  is_deleted: sqliteBoolean,
  timestamp: z.number(),
});

type LocationRecord = z.infer<typeof LocationRecordSchema>;

function mapRecordToLocation(record: LocationRecord): Location {
  return createLocation({
    id: record.id,
    title: record.title,
    description: record.description,
    latitude: record.latitude,
    longitude: record.longitude,
    city: record.city,
    state: record.state,
    photoPath: record.photo_path,
    isDeleted: record.is_deleted,
    timestamp: new Date(record.timestamp),
  });
}

const COLUMNS = 'id, title, description, latitude, longitude, city, state, photo_path, is_deleted, timestamp';

export const MAX_PAGE_SIZE = 500;

export class LocationRepository extends BaseRepository {
  protected readonly entityName = 'Location';

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    super(context, options);
    logger.info('[LocationRepository] Initialized.');
  }

  private toLocation = (row: SqlRow): Location => mapRecordToLocation(this.decode(LocationRecordSchema, row));

  async getById(id: number): Promise<Location | null> {
    return this.run('GetById', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM locations WHERE id = ?`, [id], this.toLocation)
    );
  }

  /**
   * All locations, soft-deleted ones included.
   */
  async getAll(): Promise<Location[]> {
    return this.run('GetAll', () =>
      this.context.executeQuery(`SELECT ${COLUMNS} FROM locations ORDER BY title`, [], this.toLocation)
    );
  }

  async getActive(): Promise<Location[]> {
    return this.run('GetActive', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM locations WHERE is_deleted = 0 ORDER BY title`,
        [],
        this.toLocation
      )
    );
  }

  async getByTitle(title: string): Promise<Location | null> {
    return this.run('GetByTitle', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM locations WHERE title = ?`, [title], this.toLocation)
    );
  }

  async create(location: Location): Promise<Location> {
    return this.run('Create', () =>
      this.context.executeInTransaction(async () => {
        const exists = await this.context.executeScalar(
          'SELECT EXISTS(SELECT 1 FROM locations WHERE title = ?)',
          [location.title],
          Scalars.boolean
        );
        if (exists) {
          throw RepositoryError.duplicate(this.entityName, 'Create', location.title);
        }
        return this.insertLocation(location);
      })
    );
  }

  /**
   * Inserts several locations in one transaction; a failure keeps none of them.
   */
  async bulkCreate(locations: readonly Location[], signal?: AbortSignal): Promise<Location[]> {
    return this.run('BulkCreate', async () => {
      const created: Location[] = [];
      await this.context.bulkInsert(
        locations,
        async location => {
          created.push(await this.insertLocation(location));
        },
        this.batchSize,
        signal
      );
      return created;
    });
  }

  async update(location: Location): Promise<Location> {
    return this.run('Update', async () => {
      const candidate = createLocation({
        id: location.id,
        title: location.title,
        description: location.description,
        latitude: location.coordinate.latitude,
        longitude: location.coordinate.longitude,
        city: location.address.city,
        state: location.address.state,
        photoPath: location.photoPath,
        isDeleted: location.isDeleted,
        timestamp: this.now(),
      });
      const changes = await this.context.update(candidate, l =>
        this.context.executeNonQuery(
          `UPDATE locations SET title = ?, description = ?, latitude = ?, longitude = ?, city = ?, state = ?,
             photo_path = ?, is_deleted = ?, timestamp = ?
           WHERE id = ?`,
          [
            l.title,
            l.description,
            l.coordinate.latitude,
            l.coordinate.longitude,
            l.address.city,
            l.address.state,
            l.photoPath,
            l.isDeleted,
            l.timestamp.getTime(),
            l.id,
          ]
        )
      );
      if (changes === 0) {
        throw RepositoryError.notFound(this.entityName, 'Update', location.id);
      }
      return candidate;
    });
  }

  /**
   * Marks a location deleted without removing the row.
   * @returns false when no location has that id
   */
  async softDelete(id: number): Promise<boolean> {
    return this.run('SoftDelete', () => this.setDeleted(id, true));
  }

  async restore(id: number): Promise<boolean> {
    return this.run('Restore', () => this.setDeleted(id, false));
  }

  /**
   * Removes the row, together with its weather data.
   */
  async delete(id: number): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM locations WHERE id = ?', [id]);
      return changes > 0;
    });
  }

  /**
   * Active locations within `distanceKm` of the given point, nearest first.
   */
  async getNearby(latitude: number, longitude: number, distanceKmLimit: number): Promise<Location[]> {
    return this.run('GetNearby', async () => {
      if (!Number.isFinite(distanceKmLimit) || distanceKmLimit < 0) {
        throw new ValidationError(`Distance must be a non-negative number, got ${distanceKmLimit}`);
      }
      const center = createCoordinate(latitude, longitude);
      const box = boundingBox(center, distanceKmLimit);

      let sql = `SELECT ${COLUMNS} FROM locations WHERE is_deleted = 0 AND latitude BETWEEN ? AND ?`;
      const params: SqlParam[] = [box.minLatitude, box.maxLatitude];
      if (!box.spansAllLongitudes) {
        sql += ' AND longitude BETWEEN ? AND ?';
        params.push(box.minLongitude, box.maxLongitude);
      }

      const candidates = await this.context.executeQuery(sql, params, this.toLocation);
      return candidates
        .map(location => ({ location, distance: distanceKm(center, location.coordinate) }))
        .filter(entry => entry.distance <= distanceKmLimit)
        .sort((a, b) => a.distance - b.distance)
        .map(entry => entry.location);
    });
  }

  /**
   * One page of locations ordered by title. `searchTerm` matches title,
   * description, city or state.
   */
  async getPaged(
    pageNumber: number,
    pageSize: number,
    searchTerm?: string,
    includeDeleted: boolean = false
  ): Promise<PagedList<Location>> {
    return this.run('GetPaged', async () => {
      if (!Number.isInteger(pageNumber) || pageNumber < 1) {
        throw new ValidationError(`Page number must be a positive integer, got ${pageNumber}`);
      }
      if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
        throw new ValidationError(`Page size must be between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
      }

      const conditions: string[] = [];
      const params: SqlParam[] = [];
      if (!includeDeleted) {
        conditions.push('is_deleted = 0');
      }
      const term = searchTerm?.trim();
      if (term) {
        const pattern = `%${escapeLike(term)}%`;
        conditions.push(
          `(title LIKE ? ESCAPE '\\' OR description LIKE ? ESCAPE '\\' OR city LIKE ? ESCAPE '\\' OR state LIKE ? ESCAPE '\\')`
        );
        params.push(pattern, pattern, pattern, pattern);
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

      const totalCount =
        (await this.context.executeScalar(`SELECT COUNT(*) FROM locations ${where}`, params, Scalars.number)) ?? 0;
      const items = await this.context.executeQuery(
        `SELECT ${COLUMNS} FROM locations ${where} ORDER BY title LIMIT ? OFFSET ?`,
        [...params, pageSize, (pageNumber - 1) * pageSize],
        this.toLocation
      );

      const totalPages = Math.ceil(totalCount / pageSize);
      return {
        items,
        totalCount,
        pageNumber,
        pageSize,
        totalPages,
        hasPreviousPage: pageNumber > 1,
        hasNextPage: pageNumber < totalPages,
      };
    });
  }

  private async insertLocation(location: Location): Promise<Location> {
    const candidate = createLocation({
      title: location.title,
      description: location.description,
      latitude: location.coordinate.latitude,
      longitude: location.coordinate.longitude,
      city: location.address.city,
      state: location.address.state,
      photoPath: location.photoPath,
      isDeleted: location.isDeleted,
      timestamp: this.now(),
    });
    const id = await this.context.insert(candidate, l =>
      this.context.executeNonQuery(
        `INSERT INTO locations (title, description, latitude, longitude, city, state, photo_path, is_deleted, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          l.title,
          l.description,
          l.coordinate.latitude,
          l.coordinate.longitude,
          l.address.city,
          l.address.state,
          l.photoPath,
          l.isDeleted,
          l.timestamp.getTime(),
        ]
      )
    );
    logger.debug(`[LocationRepository] Created location: ${candidate.title} (id ${id})`);
    return withLocationId(candidate, id);
  }

  private async setDeleted(id: number, isDeleted: boolean): Promise<boolean> {
    const changes = await this.context.executeNonQuery(
      'UPDATE locations SET is_deleted = ?, timestamp = ? WHERE id = ?',
      [isDeleted, this.now().getTime(), id]
    );
    return changes > 0;
  }
}
