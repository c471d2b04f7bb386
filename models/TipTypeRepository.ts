import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError } from '../services/base/ServiceError';
import { createTipType, withTipTypeId } from '../shared/domain';
import type { TipType } from '../shared/types';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';
import { Scalars, type DatabaseContext, type SqlRow } from './DatabaseContext';

const TipTypeRecordSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  i8n: z.string(),
});

const COLUMNS = 'id, name, i8n';

export class TipTypeRepository extends BaseRepository {
  protected readonly entityName = 'TipType';

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    super(context, options);
  }

  private toTipType = (row: SqlRow): TipType => createTipType(this.decode(TipTypeRecordSchema, row));

  async getById(id: number): Promise<TipType | null> {
    return this.run('GetById', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM tip_types WHERE id = ?`, [id], this.toTipType)
    );
  }

  async getAll(): Promise<TipType[]> {
    return this.run('GetAll', () =>
      this.context.executeQuery(`SELECT ${COLUMNS} FROM tip_types ORDER BY name`, [], this.toTipType)
    );
  }

  async getByName(name: string): Promise<TipType | null> {
    return this.run('GetByName', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM tip_types WHERE name = ?`, [name], this.toTipType)
    );
  }

  async create(tipType: TipType): Promise<TipType> {
    return this.run('Create', () =>
      this.context.executeInTransaction(async () => {
        const candidate = createTipType({ name: tipType.name, i8n: tipType.i8n });
        const exists = await this.context.executeScalar(
          'SELECT EXISTS(SELECT 1 FROM tip_types WHERE name = ?)',
          [candidate.name],
          Scalars.boolean
        );
        if (exists) {
          throw RepositoryError.duplicate(this.entityName, 'Create', candidate.name);
        }
        const id = await this.context.insert(candidate, t =>
          this.context.executeNonQuery('INSERT INTO tip_types (name, i8n) VALUES (?, ?)', [t.name, t.i8n])
        );
        logger.debug(`[TipTypeRepository] Created tip type: ${candidate.name} (id ${id})`);
        return withTipTypeId(candidate, id);
      })
    );
  }

  async update(tipType: TipType): Promise<TipType> {
    return this.run('Update', async () => {
      const candidate = createTipType(tipType);
      const changes = await this.context.update(candidate, t =>
        this.context.executeNonQuery('UPDATE tip_types SET name = ?, i8n = ? WHERE id = ?', [t.name, t.i8n, t.id])
      );
      if (changes === 0) {
        throw RepositoryError.notFound(this.entityName, 'Update', tipType.id);
      }
      return candidate;
    });
  }

  /**
   * Deletes the type and, through the foreign key, its tips.
   */
  async delete(id: number): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM tip_types WHERE id = ?', [id]);
      return changes > 0;
    });
  }
}
