import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LocationService } from '../LocationService';
import { LocationRepository } from '../../models/LocationRepository';
import { DatabaseContext } from '../../models/DatabaseContext';
import { updateLocationDetails } from '../../shared/domain';
import { setupTestContext } from '../../test-utils/setupDatabase';

vi.mock('../../utils/logger', () => ({
  logger: { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

describe('LocationService', () => {
  let context: DatabaseContext;
  let service: LocationService;

  beforeEach(async () => {
    ({ context } = await setupTestContext());
    service = new LocationService({ locations: new LocationRepository(context) });
  });

  afterEach(async () => {
    await context.close();
  });

  it('should create and fetch a location', async () => {
    const created = await service.create({ title: 'Cliff Walk', latitude: 50.1, longitude: -5.5, city: 'Cove' });
    if (!created.success) {
      throw new Error(created.error);
    }

    const fetched = await service.getById(created.data.id);
    expect(fetched.success && fetched.data?.address.city).toBe('Cove');
    const byTitle = await service.getByTitle('Cliff Walk');
    expect(byTitle.success && byTitle.data?.id).toBe(created.data.id);
  });

  it('should report invalid coordinates as a VALIDATION_ERROR failure', async () => {
    const result = await service.create({ title: 'Nowhere', latitude: 95, longitude: 0 });

    expect(result.success).toBe(false);
    expect(!result.success && result.code).toBe('VALIDATION_ERROR');
    expect(!result.success && result.operation).toBe('create');
  });

  it('should soft delete on delete and bring the location back on restore', async () => {
    const created = await service.create({ title: 'Old Mill', latitude: 1, longitude: 1 });
    if (!created.success) {
      throw new Error(created.error);
    }

    expect(await service.delete(created.data.id)).toEqual({ success: true, data: true });
    const active = await service.getActive();
    expect(active.success && active.data).toEqual([]);
    const all = await service.getAll();
    expect(all.success && all.data.map(l => l.isDeleted)).toEqual([true]);

    await service.restore(created.data.id);
    const restored = await service.getActive();
    expect(restored.success && restored.data).toHaveLength(1);
  });

  it('should update, search nearby and page', async () => {
    const created = await service.create({ title: 'Lighthouse', latitude: 50, longitude: -5 });
    await service.create({ title: 'Far Away', latitude: -33, longitude: 151 });
    if (!created.success) {
      throw new Error(created.error);
    }

    const updated = await service.update(updateLocationDetails(created.data, 'Lighthouse Point', 'Rocky coast'));
    expect(updated.success && updated.data.title).toBe('Lighthouse Point');

    const nearby = await service.getNearby(50.01, -5.01, 10);
    expect(nearby.success && nearby.data.map(l => l.title)).toEqual(['Lighthouse Point']);

    const page = await service.getPaged(1, 1, 'rocky');
    expect(page.success && page.data.totalCount).toBe(1);
  });

  it('should report paging errors as failures', async () => {
    const result = await service.getPaged(0, 10);
    expect(result).toEqual({
      success: false,
      error: 'GetPaged failed: Page number must be a positive integer, got 0',
      code: 'VALIDATION_ERROR',
      operation: 'GetPaged',
    });
  });
});
