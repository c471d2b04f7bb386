import { z } from 'zod';
import { logger } from '../utils/logger';
import { RepositoryError } from '../services/base/ServiceError';
import { createSubscription, withSubscriptionId } from '../shared/domain';
import { SubscriptionStatusSchema } from '../shared/schemas/domainSchemas';
import type { Subscription } from '../shared/types';
import { BaseRepository, sqliteBoolean, type RepositoryOptions } from './BaseRepository';
import { Scalars, type DatabaseContext, type SqlParam, type SqlRow } from './DatabaseContext';

const SubscriptionRecordSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  product_id: z.string(),
  transaction_id: z.string(),
  purchase_token: z.string(),
  status: SubscriptionStatusSchema,
  start_date: z.number(),
  expiration_date: z.number(),
  auto_renewing: sqliteBoolean,
  last_verified: z.number().nullable(),
  cancelled_at: z.number().nullable(),
  renewal_count: z.number().int(),
});

type SubscriptionRecord = z.infer<typeof SubscriptionRecordSchema>;

const toDate = (value: number | null): Date | null => (value === null ? null : new Date(value));

function mapRecordToSubscription(record: SubscriptionRecord): Subscription {
  return createSubscription({
    id: record.id,
    userId: record.user_id,
    productId: record.product_id,
    transactionId: record.transaction_id,
    purchaseToken: record.purchase_token,
    status: record.status,
    startDate: new Date(record.start_date),
    expirationDate: new Date(record.expiration_date),
    autoRenewing: record.auto_renewing,
    lastVerified: toDate(record.last_verified),
    cancelledAt: toDate(record.cancelled_at),
    renewalCount: record.renewal_count,
  });
}

const COLUMNS = `id, user_id, product_id, transaction_id, purchase_token, status, start_date, expiration_date,
  auto_renewing, last_verified, cancelled_at, renewal_count`;

const HOUR_MS = 60 * 60 * 1000;

export class SubscriptionRepository extends BaseRepository {
  protected readonly entityName = 'Subscription';

  constructor(context: DatabaseContext, options: RepositoryOptions = {}) {
    super(context, options);
  }

  private toSubscription = (row: SqlRow): Subscription =>
    mapRecordToSubscription(this.decode(SubscriptionRecordSchema, row));

  async create(subscription: Subscription): Promise<Subscription> {
    return this.run('Create', () =>
      this.context.executeInTransaction(async () => {
        const candidate = createSubscription({ ...subscription, id: 0 });
        const exists = await this.context.executeScalar(
          'SELECT EXISTS(SELECT 1 FROM subscriptions WHERE transaction_id = ?)',
          [candidate.transactionId],
          Scalars.boolean
        );
        if (exists) {
          throw RepositoryError.duplicate(this.entityName, 'Create', candidate.transactionId);
        }
        const id = await this.context.insert(candidate, s =>
          this.context.executeNonQuery(
            `INSERT INTO subscriptions (user_id, product_id, transaction_id, purchase_token, status, start_date,
               expiration_date, auto_renewing, last_verified, cancelled_at, renewal_count, timestamp)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [...this.toParams(s), this.now().getTime()]
          )
        );
        logger.debug(`[SubscriptionRepository] Created subscription ${id} for user ${candidate.userId}`);
        return withSubscriptionId(candidate, id);
      })
    );
  }

  async getById(id: number): Promise<Subscription | null> {
    return this.run('GetById', () =>
      this.context.executeQuerySingle(`SELECT ${COLUMNS} FROM subscriptions WHERE id = ?`, [id], this.toSubscription)
    );
  }

  /**
   * The user's active, unexpired subscription with the latest expiration.
   */
  async getActiveByUserId(userId: string): Promise<Subscription | null> {
    return this.run('GetActive', () =>
      this.context.executeQuerySingle(
        `SELECT ${COLUMNS} FROM subscriptions
         WHERE user_id = ? AND status = 'active' AND expiration_date > ?
         ORDER BY expiration_date DESC LIMIT 1`,
        [userId, this.now().getTime()],
        this.toSubscription
      )
    );
  }

  async getByTransactionId(transactionId: string): Promise<Subscription | null> {
    return this.run('GetByTransactionId', () =>
      this.context.executeQuerySingle(
        `SELECT ${COLUMNS} FROM subscriptions WHERE transaction_id = ?`,
        [transactionId],
        this.toSubscription
      )
    );
  }

  /**
   * Latest subscription carrying the purchase token (renewals reuse it).
   */
  async getByPurchaseToken(purchaseToken: string): Promise<Subscription | null> {
    return this.run('GetByPurchaseToken', () =>
      this.context.executeQuerySingle(
        `SELECT ${COLUMNS} FROM subscriptions WHERE purchase_token = ? ORDER BY start_date DESC, id DESC LIMIT 1`,
        [purchaseToken],
        this.toSubscription
      )
    );
  }

  async getByUserId(userId: string): Promise<Subscription[]> {
    return this.run('GetByUserId', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM subscriptions WHERE user_id = ? ORDER BY start_date DESC, id DESC`,
        [userId],
        this.toSubscription
      )
    );
  }

  async update(subscription: Subscription): Promise<Subscription> {
    return this.run('Update', async () => {
      const candidate = createSubscription(subscription);
      const changes = await this.context.update(candidate, s =>
        this.context.executeNonQuery(
          `UPDATE subscriptions SET user_id = ?, product_id = ?, transaction_id = ?, purchase_token = ?, status = ?,
             start_date = ?, expiration_date = ?, auto_renewing = ?, last_verified = ?, cancelled_at = ?,
             renewal_count = ?, timestamp = ?
           WHERE id = ?`,
          [...this.toParams(s), this.now().getTime(), s.id]
        )
      );
      if (changes === 0) {
        throw RepositoryError.notFound(this.entityName, 'Update', subscription.id);
      }
      return candidate;
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.run('Delete', async () => {
      const changes = await this.context.executeNonQuery('DELETE FROM subscriptions WHERE id = ?', [id]);
      return changes > 0;
    });
  }

  /**
   * Subscriptions still marked active whose expiration date has passed.
   */
  async getExpired(): Promise<Subscription[]> {
    return this.run('GetExpired', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM subscriptions
         WHERE status = 'active' AND expiration_date <= ?
         ORDER BY expiration_date`,
        [this.now().getTime()],
        this.toSubscription
      )
    );
  }

  /**
   * Active subscriptions never verified, or last verified more than
   * `maxAgeHours` ago.
   */
  async getNeedingVerification(maxAgeHours: number = 24): Promise<Subscription[]> {
    return this.run('GetNeedingVerification', () =>
      this.context.executeQuery(
        `SELECT ${COLUMNS} FROM subscriptions
         WHERE status = 'active' AND (last_verified IS NULL OR last_verified < ?)
         ORDER BY last_verified IS NOT NULL, last_verified`,
        [this.now().getTime() - maxAgeHours * HOUR_MS],
        this.toSubscription
      )
    );
  }

  private toParams(s: Subscription): SqlParam[] {
    return [
      s.userId,
      s.productId,
      s.transactionId,
      s.purchaseToken,
      s.status,
      s.startDate.getTime(),
      s.expirationDate.getTime(),
      s.autoRenewing,
      s.lastVerified ? s.lastVerified.getTime() : null,
      s.cancelledAt ? s.cancelledAt.getTime() : null,
      s.renewalCount,
    ];
  }
}
