import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError } from '../services/base/ServiceError';
import { createSetting } from '../shared/domain';
import type { Setting } from '../shared/types';
import { BaseRepository, escapeLike, type RepositoryOptions } from './BaseRepository';
import { Scalars, type DatabaseContext, type SqlRow } from './DatabaseContext';
import { TtlCache } from './cache/TtlCache';

const SettingRecordSchema = z.object({
  id: z.number().int(),
  key: z.string(),
  value: z.string(),
  description: z.string().nullable(),
  timestamp: z.number(),
});

type SettingRecord = z.infer<typeof SettingRecordSchema>;

function mapRecordToSetting(record: SettingRecord): Setting {
  return createSetting({
    id: record.id,
    key: record.key,
    value: record.value,
    description: record.description,
    timestamp: new Date(record.timestamp),
  });
}

const COLUMNS = 'id, key, value, description, timestamp';

export interface SettingUpsert {
  key: string;
  value: string;
  description?: string | null;
}

export interface SettingRepositoryOptions extends RepositoryOptions {
  /** Injected cache; one is created per repository when omitted. */
  cache?: TtlCache<string, Setting>;
  cacheTtlMs?: number;
}

/**
 * Settings are read far more often than written, so lookups by key go through a
 * TTL cache that also remembers keys that don't exist.
 */
export class SettingRepository extends BaseRepository {
  protected readonly entityName = 'Setting';
  private readonly cache: TtlCache<string, Setting>;

  constructor(context: DatabaseContext, options: SettingRepositoryOptions = {}) {
    super(context, options);
    this.cache = options.cache ?? new TtlCache<string, Setting>({ ttlMs: options.cacheTtlMs });
    logger.info('[SettingRepository] Initialized.');
  }

  private toSetting = (row: SqlRow): Setting => mapRecordToSetting(this.decode(SettingRecordSchema, row));

  async getByKey(key: string): Promise<Setting | null> {
    return this.run('GetByKey', async () => {
      const cached = await this.cache.get(key);
      if (cached.hit) {
        logger.trace(`[SettingRepository] Cache hit for key: ${key}`);
        return cached.value;
      }

      const setting = await this.context.executeQuerySingle(
        `SELECT ${COLUMNS} FROM settings WHERE key = ?`,
        [key],
        this.toSetting
      );
      await this.remember(key, setting);
      return setting;
    });
  }

  async getById(id: number): Promise<Setting | null> {
    return this.run('GetById', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM settings WHERE id = ?`, [id], this.toSetting)
    );
  }

  async getAll(): Promise<Setting[]> {
    return this.run('GetAll', () =>
      this.context.executeQuery(`SELECT ${COLUMNS} FROM settings ORDER BY key`, [], this.toSetting)
    );
  }

  async getAllAsDictionary(): Promise<Record<string, string>> {
    return this.run('GetAllAsDictionary', async () => {
      const settings = await this.context.executeQuery(`SELECT ${COLUMNS} FROM settings ORDER BY key`, [], this.toSetting);
      const dictionary: Record<string, string> = {};
      for (const setting of settings) {
        dictionary[setting.key] = setting.value;
      }
      return dictionary;
    });
  }

  async getByPrefix(prefix: string): Promise<Setting[]> {
    return this.run('GetByPrefix', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM settings WHERE key LIKE ? ESCAPE '\\' ORDER BY key`,
        [`${escapeLike(prefix)}%`],
        this.toSetting
      )
    );
  }

  async getRecentlyModified(limit: number = 10): Promise<Setting[]> {
    return this.run('GetRecentlyModified', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM settings ORDER BY timestamp DESC, id DESC LIMIT ?`,
        [Math.max(0, Math.trunc(limit))],
        this.toSetting
      )
    );
  }

  /**
   * Fetches several keys at once: cached keys are answered from the cache and the
   * rest with a single IN query. Found settings come back in request order.
   */
  async getByKeys(keys: readonly string[]): Promise<Setting[]> {
    return this.run('GetByKeys', async () => {
      const { hits, misses } = await this.cache.partition(keys);
      const fetched = new Map<string, Setting>();

      if (misses.length > 0) {
        const rows = await this.context.executeQuery(
          `SELECT ${COLUMNS} FROM settings WHERE key IN (${this.placeholders(misses.length)})`,
          misses,
          this.toSetting
        );
        for (const setting of rows) {
          fetched.set(setting.key, setting);
        }
        if (!this.context.isInTransactionScope()) {
          await this.cache.setMany(misses.map(key => [key, fetched.get(key) ?? null] as const));
        }
      }
      logger.debug(`[SettingRepository] GetByKeys: ${hits.size} cached, ${misses.length} queried.`);

      const result: Setting[] = [];
      for (const key of new Set(keys)) {
        const setting = hits.get(key) ?? fetched.get(key);
        if (setting) {
          result.push(setting);
        }
      }
      return result;
    });
  }

  /**
   * Inserts a new setting. Fails with DUPLICATE_KEY before touching the table when
   * the key is taken.
   */
  async create(setting: Setting): Promise<Setting> {
    return this.run('Create', async () => {
      const candidate = createSetting({ ...setting, timestamp: this.now() });
      const created = await this.context.executeInTransaction(async () => {
        const exists = await this.context.executeScalar(
          'SELECT EXISTS(SELECT 1 FROM settings WHERE key = ?)',
          [candidate.key],
          Scalars.boolean
        );
        if (exists) {
          throw RepositoryError.duplicate(this.entityName, 'Create', candidate.key);
        }
        const id = await this.context.insert(candidate, s => this.insertRow(s));
        return createSetting({ ...candidate, id });
      });
      await this.remember(created.key, created);
      logger.debug(`[SettingRepository] Created setting: ${created.key} (id ${created.id})`);
      return created;
    });
  }

  /**
   * Updates value and description by key. Zero affected rows is NOT_FOUND.
   */
  async update(setting: Setting): Promise<Setting> {
    return this.run('Update', async () => {
      const candidate = createSetting({ ...setting, timestamp: this.now() });
      const updated = await this.context.executeInTransaction(async () => {
        const changes = await this.context.executeNonQuery(
          'UPDATE settings SET value = ?, description = ?, timestamp = ? WHERE key = ?',
          [candidate.value, candidate.description, candidate.timestamp.getTime(), candidate.key]
        );
        if (changes === 0) {
          throw RepositoryError.notFound(this.entityName, 'Update', candidate.key);
        }
        return this.context.executeQuerySingle(
          `SELECT ${COLUMNS} FROM settings WHERE key = ?`,
          [candidate.key],
          this.toSetting
        );
      });
      if (!updated) {
        throw RepositoryError.notFound(this.entityName, 'Update', candidate.key);
      }
      await this.remember(updated.key, updated);
      return updated;
    });
  }

  /**
   * Deletes by key. The cache entry is only dropped when a row was removed.
   */
  async delete(key: string): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM settings WHERE key = ?', [key]);
      if (changes > 0) {
        await this.cache.delete(key);
        logger.debug(`[SettingRepository] Deleted setting: ${key}`);
        return true;
      }
      return false;
    });
  }

  /**
   * Updates the key when it exists, inserts it otherwise. Read and write share a
   * transaction so two concurrent upserts of a new key yield one row.
   * A null description keeps the stored one.
   */
  async upsert(key: string, value: string, description?: string | null): Promise<Setting> {
    return this.run('Upsert', async () => {
      const timestamp = this.now();
      const saved = await this.context.executeInTransaction(async () => {
        const existing = await this.context.executeQuerySingle(
          `SELECT ${COLUMNS} FROM settings WHERE key = ?`,
          [key],
          this.toSetting
        );

        if (existing) {
          const next = createSetting({
            ...existing,
            value,
            description: description ?? existing.description,
            timestamp,
          });
          await this.context.executeNonQuery(
            'UPDATE settings SET value = ?, description = ?, timestamp = ? WHERE id = ?',
            [next.value, next.description, next.timestamp.getTime(), next.id]
          );
          return next;
        }

        const candidate = createSetting({ key, value, description: description ?? null, timestamp });
        const id = await this.context.insert(candidate, s => this.insertRow(s));
        return createSetting({ ...candidate, id });
      });
      await this.remember(key, saved);
      return saved;
    });
  }

  /**
   * Deletes keys in batches inside one transaction, then invalidates every
   * affected cache entry at once.
   */
  async bulkDelete(keys: readonly string[], signal?: AbortSignal): Promise<number> {
    return this.run('BulkDelete', async () => {
      const uniqueKeys = [...new Set(keys)];
      const deleted = await this.context.executeInBatches(
        uniqueKeys,
        chunk =>
          this.context.executeNonQuery(`DELETE FROM settings WHERE key IN (${this.placeholders(chunk.length)})`, chunk),
        { batchSize: this.batchSize, signal }
      );
      await this.cache.deleteMany(uniqueKeys);
      logger.debug(`[SettingRepository] BulkDelete removed ${deleted} of ${uniqueKeys.length} key(s).`);
      return deleted;
    });
  }

  /**
   * Upserts in batches of multi-row statements inside one transaction.
   * Returns the number of settings written.
   */
  async bulkUpsert(values: readonly SettingUpsert[], signal?: AbortSignal): Promise<number> {
    return this.run('BulkUpsert', async () => {
      const timestamp = this.now();
      const settings = values.map(entry =>
        createSetting({ key: entry.key, value: entry.value, description: entry.description ?? null, timestamp })
      );

      const written = await this.context.executeInBatches(
        settings,
        async chunk => {
          const rows = chunk.map(() => '(?, ?, ?, ?)').join(', ');
          const params = chunk.flatMap(s => [s.key, s.value, s.description, s.timestamp.getTime()]);
          await this.context.executeNonQuery(
            `INSERT INTO settings (key, value, description, timestamp) VALUES ${rows}
             ON CONFLICT(key) DO UPDATE SET
               value = excluded.value,
               description = COALESCE(excluded.description, settings.description),
               timestamp = excluded.timestamp`,
            params
          );
          return chunk.length;
        },
        { batchSize: this.batchSize, signal }
      );
      await this.cache.deleteMany(settings.map(s => s.key));
      return written;
    });
  }

  async clearCache(): Promise<void> {
    await this.cache.clear();
    logger.debug('[SettingRepository] Cache cleared.');
  }

  private async insertRow(setting: Setting): Promise<number> {
    return this.context.executeNonQuery(
      'INSERT INTO settings (key, value, description, timestamp) VALUES (?, ?, ?, ?)',
      [setting.key, setting.value, setting.description, setting.timestamp.getTime()]
    );
  }

  /**
   * Caches a committed value. Inside a transaction that could still roll back
   * the entry is dropped instead.
   */
  private async remember(key: string, setting: Setting | null): Promise<void> {
    if (this.context.isInTransactionScope()) {
      await this.cache.delete(key);
    } else {
      await this.cache.set(key, setting);
    }
  }
}
