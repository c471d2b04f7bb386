import type { Subscription, SubscriptionInput } from '../types';
import { SubscriptionSchema, validateDomain } from '../schemas/domainSchemas';
import { ValidationError } from '../../services/base/ServiceError';

export function createSubscription(input: SubscriptionInput): Subscription {
  const parsed = validateDomain(SubscriptionSchema, 'Subscription', {
    id: input.id ?? 0,
    userId: input.userId,
    productId: input.productId,
    transactionId: input.transactionId,
    purchaseToken: input.purchaseToken,
    status: input.status ?? 'pending',
    startDate: input.startDate,
    expirationDate: input.expirationDate,
    autoRenewing: input.autoRenewing ?? false,
    lastVerified: input.lastVerified ?? null,
    cancelledAt: input.cancelledAt ?? null,
    renewalCount: input.renewalCount ?? 0,
  });
  if (parsed.expirationDate.getTime() < parsed.startDate.getTime()) {
    throw new ValidationError('Invalid Subscription: expirationDate precedes startDate');
  }
  return Object.freeze(parsed);
}

export function withSubscriptionId(subscription: Subscription, id: number): Subscription {
  return createSubscription({ ...subscription, id });
}

export function isSubscriptionActive(subscription: Subscription, now: Date = new Date()): boolean {
  return subscription.status === 'active' && subscription.expirationDate.getTime() > now.getTime();
}

export function markSubscriptionVerified(subscription: Subscription, now: Date = new Date()): Subscription {
  return createSubscription({ ...subscription, lastVerified: now });
}

export function cancelSubscription(subscription: Subscription, now: Date = new Date()): Subscription {
  return createSubscription({ ...subscription, status: 'cancelled', autoRenewing: false, cancelledAt: now });
}

export function renewSubscription(subscription: Subscription, expirationDate: Date): Subscription {
  return createSubscription({
    ...subscription,
    status: 'active',
    expirationDate,
    renewalCount: subscription.renewalCount + 1,
  });
}
