import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { LocationRepository } from '../LocationRepository';
import { DatabaseContext } from '../DatabaseContext';
import { RepositoryError } from '../../services/base/ServiceError';
import { createLocation, updateLocationDetails } from '../../shared/domain';
import type { LocationInput } from '../../shared/types';
import { setupTestContext, countRows } from '../../test-utils/setupDatabase';

vi.mock('../../utils/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const location = (title: string, overrides: Partial<LocationInput> = {}) =>
  createLocation({ title, latitude: 47.6062, longitude: -122.3321, ...overrides });

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

describe('LocationRepository', () => {
  let db: Database.Database;
  let context: DatabaseContext;
  let repository: LocationRepository;

  beforeEach(async () => {
    ({ db, context } = await setupTestContext());
    repository = new LocationRepository(context, { now: () => new Date('2024-05-01T08:00:00.000Z') });
  });

  afterEach(async () => {
    await context.close();
  });

  describe('create', () => {
    it('should persist the location with a generated id', async () => {
      const created = await repository.create(
        location('Harbor Overlook', { description: 'Sunset over the water', city: 'Port Town', state: 'WA' })
      );

      expect(created.id).toBeGreaterThan(0);
      const fetched = await repository.getById(created.id);
      expect(fetched?.title).toBe('Harbor Overlook');
      expect(fetched?.address).toEqual({ city: 'Port Town', state: 'WA' });
      expect(fetched?.coordinate).toEqual({ latitude: 47.6062, longitude: -122.3321 });
      expect(fetched?.isDeleted).toBe(false);
      expect(fetched?.timestamp.toISOString()).toBe('2024-05-01T08:00:00.000Z');
    });

    it('should reject a duplicate title', async () => {
      await repository.create(location('Harbor Overlook'));

      const error = await captureError(repository.create(location('Harbor Overlook')));
      expect(error.code).toBe('DUPLICATE_KEY');
      expect(countRows(db, 'locations')).toBe(1);
    });

    it('should find a location by title', async () => {
      await repository.create(location('Ridge Trail'));
      expect((await repository.getByTitle('Ridge Trail'))?.title).toBe('Ridge Trail');
      expect(await repository.getByTitle('Nowhere')).toBeNull();
    });
  });

  describe('bulkCreate', () => {
    it('should create every location', async () => {
      const created = await repository.bulkCreate([location('A'), location('B'), location('C')]);
      expect(created.map(l => l.title)).toEqual(['A', 'B', 'C']);
      expect(new Set(created.map(l => l.id)).size).toBe(3);
    });

    it('should keep none of them when one insert fails', async () => {
      const error = await captureError(repository.bulkCreate([location('A'), location('B'), location('A')]));

      expect(error.code).toBe('DUPLICATE_KEY');
      expect(error.operation).toBe('BulkCreate');
      expect(countRows(db, 'locations')).toBe(0);
    });
  });

  describe('update', () => {
    it('should store the changed fields', async () => {
      const created = await repository.create(location('Old Title'));
      await repository.update(updateLocationDetails(created, 'New Title', 'Fresh description'));

      const fetched = await repository.getById(created.id);
      expect(fetched?.title).toBe('New Title');
      expect(fetched?.description).toBe('Fresh description');
    });

    it('should report NOT_FOUND for an unknown id', async () => {
      const error = await captureError(repository.update(location('Ghost', { id: 404 })));
      expect(error.code).toBe('NOT_FOUND');
    });

    it('should map a title collision to DUPLICATE_KEY', async () => {
      await repository.create(location('First'));
      const second = await repository.create(location('Second'));

      const error = await captureError(repository.update(updateLocationDetails(second, 'First', '')));
      expect(error.code).toBe('DUPLICATE_KEY');
      expect(error.operation).toBe('Update');
    });
  });

  describe('deletion', () => {
    it('should hide soft-deleted locations from getActive and restore them', async () => {
      const kept = await repository.create(location('Kept'));
      const hidden = await repository.create(location('Hidden'));

      expect(await repository.softDelete(hidden.id)).toBe(true);
      expect((await repository.getActive()).map(l => l.id)).toEqual([kept.id]);
      expect(await repository.getAll()).toHaveLength(2);
      expect((await repository.getById(hidden.id))?.isDeleted).toBe(true);

      expect(await repository.restore(hidden.id)).toBe(true);
      expect(await repository.getActive()).toHaveLength(2);
    });

    it('should return false for unknown ids', async () => {
      expect(await repository.softDelete(999)).toBe(false);
      expect(await repository.restore(999)).toBe(false);
      expect(await repository.delete(999)).toBe(false);
    });

    it('should remove the row and its weather on hard delete', async () => {
      const created = await repository.create(location('Doomed'));
      db.prepare(
        `INSERT INTO weather (location_id, latitude, longitude, timezone, timezone_offset, last_update)
         VALUES (?, 47.6, -122.3, 'America/Los_Angeles', -25200, 0)`
      ).run(created.id);

      expect(await repository.delete(created.id)).toBe(true);
      expect(countRows(db, 'locations')).toBe(0);
      expect(countRows(db, 'weather')).toBe(0);
    });
  });

  describe('getNearby', () => {
    beforeEach(async () => {
      await repository.create(location('Close Viewpoint', { latitude: 47.6205, longitude: -122.3493 }));
      await repository.create(location('South Harbor', { latitude: 47.2529, longitude: -122.4443 }));
      await repository.create(location('River Bend', { latitude: 45.5152, longitude: -122.6784 }));
      const deleted = await repository.create(location('Closed Pier', { latitude: 47.6097, longitude: -122.3331 }));
      await repository.softDelete(deleted.id);
    });

    it('should return active locations within range, nearest first', async () => {
      const nearby = await repository.getNearby(47.6062, -122.3321, 50);
      expect(nearby.map(l => l.title)).toEqual(['Close Viewpoint', 'South Harbor']);
    });

    it('should exclude locations outside a small radius', async () => {
      const nearby = await repository.getNearby(47.6062, -122.3321, 5);
      expect(nearby.map(l => l.title)).toEqual(['Close Viewpoint']);
    });

    it('should reject a negative distance', async () => {
      const error = await captureError(repository.getNearby(47.6062, -122.3321, -1));
      expect(error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('getPaged', () => {
    beforeEach(async () => {
      for (const title of ['Echo', 'Alpha', 'Delta', 'Bravo', 'Charlie']) {
        await repository.create(location(title, { city: title === 'Delta' ? 'Springfield' : 'Lakeside' }));
      }
    });

    it('should return the requested page ordered by title', async () => {
      const page = await repository.getPaged(2, 2);

      expect(page.items.map(l => l.title)).toEqual(['Charlie', 'Delta']);
      expect(page.totalCount).toBe(5);
      expect(page.totalPages).toBe(3);
      expect(page.hasPreviousPage).toBe(true);
      expect(page.hasNextPage).toBe(true);
    });

    it('should filter by search term across text columns', async () => {
      const page = await repository.getPaged(1, 10, 'spring');
      expect(page.items.map(l => l.title)).toEqual(['Delta']);
      expect(page.hasNextPage).toBe(false);
    });

    it('should match wildcard characters literally', async () => {
      const page = await repository.getPaged(1, 10, '%');
      expect(page.totalCount).toBe(0);
      expect(page.totalPages).toBe(0);
    });

    it('should include soft-deleted rows only when asked', async () => {
      const alpha = await repository.getByTitle('Alpha');
      await repository.softDelete(alpha?.id ?? 0);

      expect((await repository.getPaged(1, 10)).totalCount).toBe(4);
      expect((await repository.getPaged(1, 10, undefined, true)).totalCount).toBe(5);
    });

    it('should reject out-of-range paging arguments', async () => {
      expect((await captureError(repository.getPaged(0, 10))).code).toBe('VALIDATION_ERROR');
      expect((await captureError(repository.getPaged(1, 0))).code).toBe('VALIDATION_ERROR');
      expect((await captureError(repository.getPaged(1, 501))).code).toBe('VALIDATION_ERROR');
    });
  });
});
