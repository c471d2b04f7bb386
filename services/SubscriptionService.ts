import type { SubscriptionRepository } from '../models/SubscriptionRepository';
import { createSubscription } from '../shared/domain';
import type { Subscription, SubscriptionInput } from '../shared/types';
import { BaseService, type RepositoryResult } from './base/BaseService';
import type { ISubscriptionService } from './interfaces';

interface SubscriptionServiceDeps {
  subscriptions: SubscriptionRepository;
}

export class SubscriptionService extends BaseService<SubscriptionServiceDeps> implements ISubscriptionService {
  constructor(deps: SubscriptionServiceDeps) {
    super('SubscriptionService', deps);
  }

  async create(input: SubscriptionInput): Promise<RepositoryResult<Subscription>> {
    return this.executeResult('create', () => this.deps.subscriptions.create(createSubscription(input)), {
      userId: input.userId,
      productId: input.productId,
    });
  }

  async getActive(userId: string): Promise<RepositoryResult<Subscription | null>> {
    return this.executeResult('getActive', () => this.deps.subscriptions.getActiveByUserId(userId), { userId });
  }

  async getByTransactionId(transactionId: string): Promise<RepositoryResult<Subscription | null>> {
    return this.executeResult('getByTransactionId', () => this.deps.subscriptions.getByTransactionId(transactionId));
  }

  async getByPurchaseToken(purchaseToken: string): Promise<RepositoryResult<Subscription | null>> {
    return this.executeResult('getByPurchaseToken', () => this.deps.subscriptions.getByPurchaseToken(purchaseToken));
  }

  async getByUserId(userId: string): Promise<RepositoryResult<Subscription[]>> {
    return this.executeResult('getByUserId', () => this.deps.subscriptions.getByUserId(userId), { userId });
  }

  async update(subscription: Subscription): Promise<RepositoryResult<Subscription>> {
    return this.executeResult('update', () => this.deps.subscriptions.update(subscription), { id: subscription.id });
  }

  async getById(id: number): Promise<RepositoryResult<Subscription | null>> {
    return this.executeResult('getById', () => this.deps.subscriptions.getById(id), { id });
  }

  async delete(id: number): Promise<RepositoryResult<boolean>> {
    return this.executeResult('delete', () => this.deps.subscriptions.delete(id), { id });
  }

  async getExpired(): Promise<RepositoryResult<Subscription[]>> {
    return this.executeResult('getExpired', () => this.deps.subscriptions.getExpired());
  }

  async getNeedingVerification(maxAgeHours: number = 24): Promise<RepositoryResult<Subscription[]>> {
    return this.executeResult(
      'getNeedingVerification',
      () => this.deps.subscriptions.getNeedingVerification(maxAgeHours),
      { maxAgeHours }
    );
  }
}
