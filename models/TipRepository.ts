import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError } from '../services/base/ServiceError';
import { createTip, withTipId } from '../shared/domain';
import type { Tip } from '../shared/types';
import { BaseRepository, type RepositoryOptions } from './BaseRepository';
import type { DatabaseContext, SqlRow } from './DatabaseContext';

const TipRecordSchema = z.object({
  id: z.number().int(),
  tip_type_id: z.number().int(),
  title: z.string(),
  content: z.string(),
  fstop: z.string(),
  shutter_speed: z.string(),
  iso: z.string(),
  i8n: z.string(),
});

type TipRecord = z.infer<typeof TipRecordSchema>;

function mapRecordToTip(record: TipRecord): Tip {
  return createTip({
    id: record.id,
    tipTypeId: record.tip_type_id,
    title: record.title,
    content: record.content,
    fstop: record.fstop,
    shutterSpeed: record.shutter_speed,
    iso: record.iso,
    i8n: record.i8n,
  });
}

const COLUMNS = 'id, tip_type_id, title, content, fstop, shutter_speed, iso, i8n';

export class TipRepository extends BaseRepository {
  protected readonly entityName = 'Tip';

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    super(context, options);
  }

  private toTip = (row: SqlRow): Tip => mapRecordToTip(this.decode(TipRecordSchema, row));

  async getById(id: number): Promise<Tip | null> {
    return this.run('GetById', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM tips WHERE id = ?`, [id], this.toTip)
    );
  }

  async getAll(): Promise<Tip[]> {
    return this.run('GetAll', () =>
      this.context.executeQuery(`SELECT ${COLUMNS} FROM tips ORDER BY tip_type_id, title`, [], this.toTip)
    );
  }

  async getByType(tipTypeId: number): Promise<Tip[]> {
    return this.run('GetByType', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM tips WHERE tip_type_id = ? ORDER BY title`,
        [tipTypeId],
        this.toTip
      )
    );
  }

  async getRandomByType(tipTypeId: number): Promise<Tip | null> {
    return this.run('GetRandomByType', () =>
      this.context.executeQuerySingle(
        `SELECT ${COLUMNS} FROM tips WHERE tip_type_id = ? ORDER BY RANDOM() LIMIT 1`,
        [tipTypeId],
        this.toTip
      )
    );
  }

  /**
   * Inserts a tip. An unknown tip type surfaces as CONSTRAINT_VIOLATION.
   */
  async create(tip: Tip): Promise<Tip> {
    return this.run('Create', () => this.insertTip(tip));
  }

  async bulkCreate(tips: readonly Tip[], signal?: AbortSignal): Promise<Tip[]> {
    return this.run('BulkCreate', async () => {
      const created: Tip[] = [];
      await this.context.bulkInsert(
        tips,
        async tip => {
          created.push(await this.insertTip(tip));
        },
        this.batchSize,
        signal
      );
      return created;
    });
  }

  async update(tip: Tip): Promise<Tip> {
    return this.run('Update', async () => {
      const candidate = createTip(tip);
      const changes = await this.context.update(candidate, t =>
        this.context.executeNonQuery(
          `UPDATE tips SET tip_type_id = ?, title = ?, content = ?, fstop = ?, shutter_speed = ?, iso = ?, i8n = ?
           WHERE id = ?`,
          [t.tipTypeId, t.title, t.content, t.fstop, t.shutterSpeed, t.iso, t.i8n, t.id]
        )
      );
      if (changes === 0) {
        throw RepositoryError.notFound(this.entityName, 'Update', tip.id);
      }
      return candidate;
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM tips WHERE id = ?', [id]);
      return changes > 0;
    });
  }

  private async insertTip(tip: Tip): Promise<Tip> {
    const candidate = createTip({ ...tip, id: 0 });
    const id = await this.context.insert(candidate, t =>
      this.context.executeNonQuery(
        `INSERT INTO tips (tip_type_id, title, content, fstop, shutter_speed, iso, i8n)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [t.tipTypeId, t.title, t.content, t.fstop, t.shutterSpeed, t.iso, t.i8n]
      )
    );
    logger.debug(`[TipRepository] Created tip: ${candidate.title} (id ${id})`);
    return withTipId(candidate, id);
  }
}
